// apps/engine/src/playback/session.ts
//
// PlaybackSession: one owner, one controller, one timer.
//
// - Each timer fire runs advance -> snapshot -> notify to completion before
//   the next fire can run, so every published snapshot is computed at a
//   single cursor.
// - pause()/reset() clear the timer, so no later fire can advance.
// - strict consistency: the cursor does not advance again until the last
//   published snapshot has been read; fires in between are coalesced.
// - A failed snapshot is logged and the previous good one is kept (stale).

import type { PlaybackStateV1, RecentPointV1, SessionSnapshotV1, SnapshotV1 } from "@cogwatch/contracts";
import type { EngineLogger } from "../logger";
import { formatHms } from "../util";
import type { PlaybackController } from "./controller";

export interface SnapshotSource {
  getSnapshot(owner_id: string, cursor: number): SnapshotV1;
  recent(owner_id: string, cursor: number, n: number): RecentPointV1[];
}

export type SessionListener = (snap: SessionSnapshotV1) => void;

export type PlaybackSessionOptions = {
  session_id: string;
  owner_id: string;
  controller: PlaybackController;
  source: SnapshotSource;
  tickIntervalMs: number;
  recentWindow: number;
  strictConsistency: boolean;
  logger: EngineLogger;
};

export class PlaybackSession {
  readonly session_id: string;
  readonly owner_id: string;

  private readonly controller: PlaybackController;
  private readonly source: SnapshotSource;
  private readonly opts: PlaybackSessionOptions;
  private readonly log: EngineLogger;
  private readonly listeners = new Set<SessionListener>();
  private readonly closeHandlers = new Set<() => void>();
  private closed = false;

  private timer: ReturnType<typeof setInterval> | null = null;
  private lastGood: SnapshotV1;
  private stale = false;
  private consumed = true;
  private coalesced = 0;

  constructor(opts: PlaybackSessionOptions) {
    this.session_id = opts.session_id;
    this.owner_id = opts.owner_id;
    this.controller = opts.controller;
    this.source = opts.source;
    this.opts = opts;
    this.log = opts.logger.child({ session_id: opts.session_id, owner_id: opts.owner_id });
    // The first snapshot must succeed; a session that cannot render cursor 1 is not created.
    this.lastGood = this.source.getSnapshot(this.owner_id, this.controller.currentCursor());
  }

  start(): PlaybackStateV1 {
    this.controller.start();
    if (!this.timer) {
      this.timer = setInterval(() => this.onTimer(), this.opts.tickIntervalMs);
    }
    this.log.debug({ playback: this.controller.state() }, "playback started");
    return this.controller.state();
  }

  pause(): PlaybackStateV1 {
    this.controller.pause();
    this.stopTimer();
    this.log.debug({ playback: this.controller.state() }, "playback paused");
    return this.controller.state();
  }

  reset(): PlaybackStateV1 {
    this.controller.reset();
    this.stopTimer();
    this.refresh();
    this.publish();
    return this.controller.state();
  }

  seek(t: number): PlaybackStateV1 {
    this.controller.seek(t);
    this.refresh();
    this.publish();
    return this.controller.state();
  }

  setSpeed(v: number): PlaybackStateV1 {
    const applied = this.controller.setSpeed(v);
    if (applied !== v) this.log.debug({ requested: v, applied }, "speed not allowed; using fallback");
    return this.controller.state();
  }

  state(): PlaybackStateV1 {
    return this.controller.state();
  }

  coalescedTicks(): number {
    return this.coalesced;
  }

  /** Current snapshot; counts as the read that strict consistency waits for. */
  read(): SessionSnapshotV1 {
    this.consumed = true;
    return this.view();
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  subscriberCount(): number {
    return this.listeners.size;
  }

  /** Called once when the session is closed; returns an unregister function. */
  onClose(handler: () => void): () => void {
    this.closeHandlers.add(handler);
    return () => {
      this.closeHandlers.delete(handler);
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stopTimer();
    this.listeners.clear();
    for (const handler of [...this.closeHandlers]) {
      try {
        handler();
      } catch (err: unknown) {
        this.log.warn({ err }, "close handler failed");
      }
    }
    this.closeHandlers.clear();
  }

  /** One timer fire. Exposed for callers that drive time themselves. */
  onTimer(): void {
    if (!this.controller.isRunning()) return;
    if (this.opts.strictConsistency && !this.consumed) {
      this.coalesced++;
      return;
    }
    this.controller.tick();
    this.refresh();
    this.consumed = false;
    this.publish();
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private refresh(): void {
    const cursor = this.controller.currentCursor();
    try {
      this.lastGood = this.source.getSnapshot(this.owner_id, cursor);
      this.stale = false;
    } catch (err: unknown) {
      this.stale = true;
      this.log.warn({ err, cursor }, "snapshot failed; keeping previous snapshot");
    }
  }

  // Delivery to at least one subscriber counts as a read.
  private publish(): void {
    if (!this.listeners.size) return;
    const view = this.view();
    for (const listener of this.listeners) {
      try {
        listener(view);
      } catch (err: unknown) {
        this.log.warn({ err }, "snapshot listener failed");
      }
    }
    this.consumed = true;
  }

  private view(): SessionSnapshotV1 {
    const playback = this.controller.state();
    const snapshot = this.lastGood;
    const upper = playback.bounds[1];
    const remainingTicks = (upper - playback.cursor) / playback.speed;
    const remainingSeconds = (remainingTicks * this.opts.tickIntervalMs) / 1000;

    return {
      session_id: this.session_id,
      playback,
      snapshot,
      clock: formatHms(snapshot.t),
      progress: {
        percent: Math.round((playback.cursor / upper) * 1000) / 10,
        remaining: formatHms(remainingSeconds),
      },
      recent: this.source.recent(this.owner_id, snapshot.cursor, this.opts.recentWindow),
      stale: this.stale,
    };
  }
}
