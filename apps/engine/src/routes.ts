import type { FastifyInstance, FastifyReply } from "fastify";

import type { EngineRuntime } from "./runtime";
import type { PlaybackSession } from "./playback/session";
import { SseChannel } from "./sse";
import { assertInt, assertString } from "./util";

type SessionParams = { id: string };

function asRecord(x: unknown): Record<string, unknown> {
  if (!x || typeof x !== "object" || Array.isArray(x)) return {};
  return Object.fromEntries(Object.entries(x));
}

function badRequest(reply: FastifyReply, e: unknown): FastifyReply {
  return reply.code(400).send({ error: e instanceof Error ? e.message : String(e) });
}

export function registerEngineRoutes(app: FastifyInstance, runtime: EngineRuntime, meta: { config_hash: string }): void {
  const pipeline = runtime.pipeline;

  const withSession = (id: string, reply: FastifyReply): PlaybackSession | null => {
    const s = runtime.getSession(id);
    if (!s) {
      void reply.code(404).send({ error: `unknown session ${id}` });
      return null;
    }
    return s;
  };

  app.get("/api/health", async (_req, reply) => {
    return reply.send({
      ok: true,
      config_hash: meta.config_hash,
      ruleset_id: pipeline.rationale.ruleset_id,
      features: pipeline.classifier.feature_names,
      states: pipeline.classifier.states,
      data_issues: pipeline.issues.length,
    });
  });

  app.get("/api/owners", async (_req, reply) => {
    return reply.send({ owners: pipeline.owners() });
  });

  // GET /api/snapshot?owner=..&cursor=..
  app.get("/api/snapshot", async (req, reply) => {
    const q = asRecord(req.query);
    let owner: string;
    let cursor: number;
    try {
      owner = assertString(q.owner, "owner");
      cursor = assertInt(q.cursor, "cursor");
    } catch (e: unknown) {
      return badRequest(reply, e);
    }
    if (!pipeline.hasOwner(owner)) return reply.code(404).send({ error: `unknown owner ${owner}` });
    try {
      return reply.send(pipeline.getSnapshot(owner, cursor));
    } catch (e: unknown) {
      if (e instanceof RangeError) return badRequest(reply, e);
      throw e;
    }
  });

  app.post("/api/sessions", async (req, reply) => {
    const body = asRecord(req.body);
    let owner: string;
    let speed: number | undefined;
    try {
      owner = assertString(body.owner, "owner");
      speed = typeof body.speed !== "undefined" ? assertInt(body.speed, "speed") : undefined;
    } catch (e: unknown) {
      return badRequest(reply, e);
    }
    if (!pipeline.hasOwner(owner)) return reply.code(404).send({ error: `unknown owner ${owner}` });
    const s = runtime.createSession(owner, speed);
    return reply.code(201).send({ session_id: s.session_id, owner_id: s.owner_id, playback: s.state() });
  });

  app.get("/api/sessions", async (_req, reply) => {
    return reply.send({ sessions: runtime.listSessions() });
  });

  app.get<{ Params: SessionParams }>("/api/sessions/:id", async (req, reply) => {
    const s = withSession(req.params.id, reply);
    if (!s) return reply;
    return reply.send({ session_id: s.session_id, owner_id: s.owner_id, playback: s.state() });
  });

  app.get<{ Params: SessionParams }>("/api/sessions/:id/snapshot", async (req, reply) => {
    const s = withSession(req.params.id, reply);
    if (!s) return reply;
    return reply.send(s.read());
  });

  app.post<{ Params: SessionParams }>("/api/sessions/:id/start", async (req, reply) => {
    const s = withSession(req.params.id, reply);
    if (!s) return reply;
    return reply.send({ playback: s.start() });
  });

  app.post<{ Params: SessionParams }>("/api/sessions/:id/pause", async (req, reply) => {
    const s = withSession(req.params.id, reply);
    if (!s) return reply;
    return reply.send({ playback: s.pause() });
  });

  app.post<{ Params: SessionParams }>("/api/sessions/:id/reset", async (req, reply) => {
    const s = withSession(req.params.id, reply);
    if (!s) return reply;
    return reply.send({ playback: s.reset() });
  });

  app.post<{ Params: SessionParams }>("/api/sessions/:id/seek", async (req, reply) => {
    const s = withSession(req.params.id, reply);
    if (!s) return reply;
    let cursor: number;
    try {
      cursor = assertInt(asRecord(req.body).cursor, "cursor");
    } catch (e: unknown) {
      return badRequest(reply, e);
    }
    return reply.send({ playback: s.seek(cursor) });
  });

  app.post<{ Params: SessionParams }>("/api/sessions/:id/speed", async (req, reply) => {
    const s = withSession(req.params.id, reply);
    if (!s) return reply;
    // Non-integer or disallowed speeds fall back inside the controller.
    const v = Number(asRecord(req.body).speed);
    return reply.send({ playback: s.setSpeed(v) });
  });

  // Server-sent events: one `tick` event per published snapshot. A slow client
  // gets the newest tick once its socket drains; closing the session ends the
  // stream with a `close` event. When the last stream of a session goes away
  // the session is paused.
  app.get<{ Params: SessionParams }>("/api/sessions/:id/stream", async (req, reply) => {
    const s = withSession(req.params.id, reply);
    if (!s) return reply;

    reply.hijack();
    reply.raw.writeHead(200, {
      "content-type": "text/event-stream",
      "cache-control": "no-cache",
      connection: "keep-alive",
    });
    const channel = new SseChannel(reply.raw);
    channel.send("snapshot", s.read());
    const unsubscribe = s.subscribe((snap) => channel.sendLatest("tick", snap));
    const offClose = s.onClose(() => channel.end({ event: "close", data: { session_id: s.session_id } }));

    reply.raw.on("close", () => {
      unsubscribe();
      offClose();
      channel.end();
      if (runtime.getSession(s.session_id) && s.subscriberCount() === 0) s.pause();
    });
  });

  app.delete<{ Params: SessionParams }>("/api/sessions/:id", async (req, reply) => {
    if (!runtime.closeSession(req.params.id)) return reply.code(404).send({ error: `unknown session ${req.params.id}` });
    return reply.code(204).send();
  });
}
