import { describe, it } from "node:test";
import assert from "node:assert/strict";
import pino, { type Logger } from "pino";

import { ConfigurationError } from "../errors";
import { logFatal } from "../logger";

function capture(): { lines: Array<Record<string, unknown>>; log: Logger } {
  const lines: Array<Record<string, unknown>> = [];
  const log = pino({ level: "info" }, { write: (msg: string) => lines.push(JSON.parse(msg)) });
  return { lines, log };
}

describe("logFatal", () => {
  it("logs a configuration error with its code and issues", () => {
    const { lines, log } = capture();
    logFatal(log, ConfigurationError.single("CONFIG_MISSING", "config/engine/default.json", "not found"), "startup failed");
    assert.equal(lines.length, 1);
    assert.equal(lines[0].level, 60);
    assert.equal(lines[0].msg, "startup failed");
    assert.equal(lines[0].code, "CONFIG_MISSING");
    assert.deepEqual(lines[0].issues, [
      { code: "CONFIG_MISSING", path: "config/engine/default.json", message: "not found" },
    ]);
  });

  it("logs any other error under err", () => {
    const { lines, log } = capture();
    logFatal(log, new Error("boom"), "startup failed");
    const err = lines[0].err;
    assert.ok(err && typeof err === "object" && "message" in err);
    assert.equal(err.message, "boom");
    assert.equal(lines[0].code, undefined);
  });
});
