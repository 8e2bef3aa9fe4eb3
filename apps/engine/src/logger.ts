import pino, { type Logger } from "pino";

import { isConfigurationError } from "./errors";

export type EngineLogger = Logger;

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): EngineLogger {
  return pino({ name: "cogwatch-engine", level });
}

// Tests and library callers that do not care about output.
export function silentLogger(): EngineLogger {
  return pino({ level: "silent" });
}

/** Fatal startup errors: configuration errors are logged with their code and issues. */
export function logFatal(log: EngineLogger, err: unknown, msg: string): void {
  if (isConfigurationError(err)) {
    log.fatal({ code: err.code, issues: err.issues }, msg);
  } else {
    log.fatal({ err }, msg);
  }
}
