// apps/engine/src/config/ssot.ts
//
// Engine config SSOT.
//
// Contract:
// - SSOT file: config/engine/default.json (repo root located by walking upward
//   from cwd, or COGWATCH_REPO_ROOT)
// - config_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix
// - a missing or invalid file is fatal

import fs from "node:fs";
import path from "node:path";

import { EngineConfigV1Schema, type EngineConfigV1 } from "@cogwatch/contracts";
import { ConfigurationError } from "../errors";
import { findRepoRoot, sha256Hex, stableStringify } from "../util";

export const SSOT_RELATIVE_PATH = path.join("config", "engine", "default.json");

export type LoadedEngineConfig = {
  config: EngineConfigV1;
  config_hash: string;
  repo_root: string;
  source_path: string;
};

export function resolveRepoRoot(startDir: string = process.cwd()): string {
  if (process.env.COGWATCH_REPO_ROOT) return path.resolve(process.env.COGWATCH_REPO_ROOT);
  try {
    return findRepoRoot(startDir, SSOT_RELATIVE_PATH);
  } catch (e: unknown) {
    throw ConfigurationError.single("CONFIG_MISSING", SSOT_RELATIVE_PATH, e instanceof Error ? e.message : String(e));
  }
}

export function computeConfigHash(cfg: unknown): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

export function parseEngineConfig(raw: unknown, source = "<inline>"): EngineConfigV1 {
  const r = EngineConfigV1Schema.safeParse(raw);
  if (!r.success) {
    throw new ConfigurationError(
      "CONFIG_INVALID",
      r.error.issues.map((i) => ({ code: "CONFIG_INVALID", path: i.path.join("."), message: `${i.message} (${source})` }))
    );
  }
  return r.data;
}

/**
 * Without options: the SSOT under the located repo root.
 * With `file`: that file; relative paths inside it resolve against `repoRoot`,
 * or the file's own directory when no root is given.
 */
export function loadEngineConfig(opts: { file?: string; repoRoot?: string } = {}): LoadedEngineConfig {
  const source_path = opts.file
    ? path.resolve(opts.file)
    : path.join(opts.repoRoot ? path.resolve(opts.repoRoot) : resolveRepoRoot(), SSOT_RELATIVE_PATH);
  const repo_root = opts.repoRoot
    ? path.resolve(opts.repoRoot)
    : opts.file
      ? path.dirname(source_path)
      : path.dirname(path.dirname(path.dirname(source_path)));

  if (!fs.existsSync(source_path)) {
    throw ConfigurationError.single("CONFIG_MISSING", source_path, "engine config file not found");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(source_path, "utf8"));
  } catch (e: unknown) {
    throw ConfigurationError.single("CONFIG_INVALID", source_path, `not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const config = parseEngineConfig(raw, source_path);
  return { config, config_hash: computeConfigHash(raw), repo_root, source_path };
}

/** Relative config paths are resolved against the repo root. */
export function resolveConfigPath(loaded: LoadedEngineConfig, p: string): string {
  return path.isAbsolute(p) ? p : path.join(loaded.repo_root, p);
}
