import type { EngineLogger } from "./logger";
import type { InferencePipeline } from "./pipeline";
import { PlaybackController } from "./playback/controller";
import { PlaybackSession } from "./playback/session";
import { newId } from "./util";

/**
 * EngineRuntime: one shared read-only pipeline, many independent sessions.
 * Each session owns its own controller; nothing mutable is shared.
 */
export class EngineRuntime {
  private readonly sessions = new Map<string, PlaybackSession>();

  constructor(
    readonly pipeline: InferencePipeline,
    private readonly log: EngineLogger
  ) {}

  createSession(owner_id: string, speed?: number): PlaybackSession {
    const pb = this.pipeline.config.playback;
    const controller = new PlaybackController({
      upperBound: this.pipeline.upperBound(owner_id),
      allowedSpeeds: pb.allowed_speeds,
      defaultSpeed: pb.default_speed,
    });
    if (speed !== undefined) controller.setSpeed(speed);

    const session = new PlaybackSession({
      session_id: newId("ses"),
      owner_id,
      controller,
      source: this.pipeline,
      tickIntervalMs: pb.tick_interval_ms,
      recentWindow: pb.recent_window,
      strictConsistency: pb.strict_consistency,
      logger: this.log,
    });
    this.sessions.set(session.session_id, session);
    this.log.info({ session_id: session.session_id, owner_id }, "session created");
    return session;
  }

  getSession(session_id: string): PlaybackSession | undefined {
    return this.sessions.get(session_id);
  }

  listSessions(): Array<{ session_id: string; owner_id: string }> {
    return [...this.sessions.values()].map((s) => ({ session_id: s.session_id, owner_id: s.owner_id }));
  }

  closeSession(session_id: string): boolean {
    const s = this.sessions.get(session_id);
    if (!s) return false;
    s.close();
    this.sessions.delete(session_id);
    return true;
  }

  closeAll(): void {
    for (const id of [...this.sessions.keys()]) this.closeSession(id);
  }
}
