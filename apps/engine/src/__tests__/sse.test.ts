import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { SseChannel, type SseSink } from "../sse";

// Sink whose buffer can be marked full; drain() empties it.
class FakeSink implements SseSink {
  chunks: string[] = [];
  full = false;
  ended = false;
  private drainListeners: Array<() => void> = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return !this.full;
  }

  end(): void {
    this.ended = true;
  }

  once(_event: "drain", listener: () => void): void {
    this.drainListeners.push(listener);
  }

  drain(): void {
    this.full = false;
    const listeners = this.drainListeners;
    this.drainListeners = [];
    for (const l of listeners) l();
  }

  events(): string[] {
    return this.chunks.map((c) => c.split("\n", 2).join("|"));
  }
}

describe("SseChannel", () => {
  it("frames events as server-sent events", () => {
    const sink = new FakeSink();
    new SseChannel(sink).send("snapshot", { cursor: 1 });
    assert.deepEqual(sink.chunks, ['event: snapshot\ndata: {"cursor":1}\n\n']);
  });

  it("holds only the newest tick while the sink is full", () => {
    const sink = new FakeSink();
    const channel = new SseChannel(sink);
    sink.full = true;
    channel.sendLatest("tick", 2);
    assert.equal(channel.isWaiting(), true);
    channel.sendLatest("tick", 3);
    channel.sendLatest("tick", 4);
    assert.deepEqual(sink.events(), ["event: tick|data: 2"]);

    sink.drain();
    assert.deepEqual(sink.events(), ["event: tick|data: 2", "event: tick|data: 4"]);
    assert.equal(channel.isWaiting(), false);

    channel.sendLatest("tick", 5);
    assert.equal(sink.chunks.length, 3);
  });

  it("ends once, with an optional final event, and drops held ticks", () => {
    const sink = new FakeSink();
    const channel = new SseChannel(sink);
    sink.full = true;
    channel.sendLatest("tick", 1);
    channel.sendLatest("tick", 2);
    channel.end({ event: "close", data: { session_id: "ses_1" } });
    channel.end();
    sink.drain();
    channel.sendLatest("tick", 3);

    assert.equal(sink.ended, true);
    assert.deepEqual(sink.events(), ["event: tick|data: 1", 'event: close|data: {"session_id":"ses_1"}']);
  });
});
