// apps/engine/src/playback/controller.ts
//
// PlaybackController: simulated-time cursor over positions [1, upper].
//
//   idle    --start-->  running
//   paused  --start-->  running
//   running --pause-->  paused
//   any     --reset-->  idle (cursor = 1)
//   running --tick--->  running (cursor += speed, or 1 when that passes upper)
//
// Speed and seek never change the phase, except that seeking away from 1
// while idle leaves the controller paused (idle always means cursor = 1).
// Invalid speeds fall back to 1 and seeks clamp to the bounds; neither throws.

import type { PlaybackPhaseV1, PlaybackStateV1 } from "@cogwatch/contracts";

export type PlaybackControllerOptions = {
  // min(series length, duration bound)
  upperBound: number;
  allowedSpeeds: ReadonlyArray<number>;
  defaultSpeed: number;
};

export const FALLBACK_SPEED = 1;

export class PlaybackController {
  private phase: PlaybackPhaseV1 = "idle";
  private cursor = 1;
  private speed: number;
  private readonly upper: number;
  private readonly allowedSpeeds: ReadonlyArray<number>;

  constructor(opts: PlaybackControllerOptions) {
    if (!Number.isInteger(opts.upperBound) || opts.upperBound < 1) {
      throw new RangeError(`upperBound must be a positive integer (got ${opts.upperBound})`);
    }
    this.upper = opts.upperBound;
    this.allowedSpeeds = [...opts.allowedSpeeds];
    this.speed = this.normalizeSpeed(opts.defaultSpeed);
  }

  private normalizeSpeed(v: number): number {
    return Number.isInteger(v) && v > 0 && this.allowedSpeeds.includes(v) ? v : FALLBACK_SPEED;
  }

  start(): void {
    if (this.phase === "running") return;
    this.phase = "running";
  }

  pause(): void {
    if (this.phase !== "running") return;
    this.phase = "paused";
  }

  reset(): void {
    this.phase = "idle";
    this.cursor = 1;
  }

  /** Advances while running; returns whether the cursor moved. */
  tick(): boolean {
    if (this.phase !== "running") return false;
    const next = this.cursor + this.speed;
    this.cursor = next > this.upper ? 1 : next;
    return true;
  }

  setSpeed(v: number): number {
    this.speed = this.normalizeSpeed(v);
    return this.speed;
  }

  seek(t: number): number {
    const target = Number.isFinite(t) ? Math.trunc(t) : 1;
    this.cursor = Math.min(this.upper, Math.max(1, target));
    if (this.phase === "idle" && this.cursor !== 1) this.phase = "paused";
    return this.cursor;
  }

  currentCursor(): number {
    return this.cursor;
  }

  currentSpeed(): number {
    return this.speed;
  }

  bounds(): [1, number] {
    return [1, this.upper];
  }

  isRunning(): boolean {
    return this.phase === "running";
  }

  state(): PlaybackStateV1 {
    return {
      phase: this.phase,
      cursor: this.cursor,
      running: this.phase === "running",
      speed: this.speed,
      bounds: this.bounds(),
    };
  }
}
