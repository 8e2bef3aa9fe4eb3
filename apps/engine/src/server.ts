import path from "node:path";
import { fileURLToPath } from "node:url";

import Fastify from "fastify";

import { loadEnv } from "./config/env";
import { loadEngineConfig, resolveRepoRoot } from "./config/ssot";
import { createLogger, logFatal, type EngineLogger } from "./logger";
import { InferencePipeline } from "./pipeline";
import { registerEngineRoutes } from "./routes";
import { EngineRuntime } from "./runtime";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function exitFatal(log: EngineLogger, err: unknown, msg: string): never {
  logFatal(log, err, msg);
  process.exit(1);
}

async function main(): Promise<void> {
  let repoRoot: string;
  try {
    repoRoot = resolveRepoRoot();
  } catch (err: unknown) {
    exitFatal(createLogger(), err, "repo root not found");
  }
  loadEnv(repoRoot, path.resolve(__dirname, ".."));

  const log = createLogger();

  // Everything fatal happens here, before the server listens.
  let pipeline: InferencePipeline;
  let config_hash: string;
  try {
    const loaded = loadEngineConfig({ repoRoot });
    config_hash = loaded.config_hash;
    pipeline = InferencePipeline.build(loaded, log, {
      seriesPath: process.env.COGWATCH_SERIES_PATH,
      artifactPath: process.env.COGWATCH_MODEL_PATH,
    });
  } catch (err: unknown) {
    exitFatal(log, err, "pipeline construction failed");
  }

  const runtime = new EngineRuntime(pipeline, log);
  const app = Fastify({ logger: { level: process.env.LOG_LEVEL ?? "info" } });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,DELETE,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });
  app.addHook("onClose", async () => {
    runtime.closeAll();
  });

  registerEngineRoutes(app, runtime, { config_hash });

  const port = Number(process.env.PORT ?? 3110);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
