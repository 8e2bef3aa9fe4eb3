// Server-sent events over a raw response.
//
// Ticks are pushed with sendLatest(): while the socket is not accepting
// writes only the newest tick is kept, and it is written on 'drain'.

export interface SseSink {
  write(chunk: string): boolean;
  end(): void;
  once(event: "drain", listener: () => void): unknown;
}

type SseEvent = { event: string; data: unknown };

function frame(e: SseEvent): string {
  return `event: ${e.event}\ndata: ${JSON.stringify(e.data)}\n\n`;
}

export class SseChannel {
  private waiting = false;
  private pending: SseEvent | null = null;
  private closed = false;

  constructor(private readonly sink: SseSink) {}

  /** Writes unconditionally (subject only to the channel being open). */
  send(event: string, data: unknown): void {
    if (this.closed) return;
    this.writeFrame({ event, data });
  }

  /** Writes now, or replaces the one held-back event until the sink drains. */
  sendLatest(event: string, data: unknown): void {
    if (this.closed) return;
    if (this.waiting) {
      this.pending = { event, data };
      return;
    }
    this.writeFrame({ event, data });
  }

  isWaiting(): boolean {
    return this.waiting;
  }

  /** Optionally writes a final event, then ends the sink. Idempotent. */
  end(last?: SseEvent): void {
    if (this.closed) return;
    this.pending = null;
    if (last) this.sink.write(frame(last));
    this.closed = true;
    this.sink.end();
  }

  private writeFrame(e: SseEvent): void {
    if (this.sink.write(frame(e))) return;
    if (this.waiting) return;
    this.waiting = true;
    this.sink.once("drain", () => this.flush());
  }

  private flush(): void {
    this.waiting = false;
    if (this.closed || !this.pending) return;
    const next = this.pending;
    this.pending = null;
    this.writeFrame(next);
  }
}
