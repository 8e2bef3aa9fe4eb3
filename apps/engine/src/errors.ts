// apps/engine/src/errors.ts
//
// Two families:
// - ConfigurationError: fatal, thrown only while a pipeline is being built.
// - ClassifierOutputError: one bad prediction; a live session logs it and keeps
//   its previous snapshot.
// Row-level data problems are not errors at all: the reader reports them as
// DataIssue records and drops the value.

export type ConfigurationErrorCode =
  | "CONFIG_MISSING"
  | "CONFIG_INVALID"
  | "INPUT_MISSING"
  | "INPUT_MALFORMED"
  | "WINDOW_TOO_LONG"
  | "ARTIFACT_MISSING"
  | "ARTIFACT_INVALID"
  | "SCHEMA_MISMATCH"
  | "LABEL_MAPPING_MISMATCH";

export type ConfigIssue = {
  code: ConfigurationErrorCode;
  path: string;
  message: string;
};

export class ConfigurationError extends Error {
  public readonly code: ConfigurationErrorCode;
  public readonly issues: ConfigIssue[];

  constructor(code: ConfigurationErrorCode, issues: ConfigIssue[]) {
    super(issues.length ? issues.map((e) => `${e.code}:${e.path}: ${e.message}`).join("; ") : code);
    this.name = "ConfigurationError";
    this.code = code;
    this.issues = issues;
  }

  static single(code: ConfigurationErrorCode, path: string, message: string): ConfigurationError {
    return new ConfigurationError(code, [{ code, path, message }]);
  }
}

export class ClassifierOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ClassifierOutputError";
  }
}

export type DataIssue = {
  // 1-based data row (the header is not counted)
  row: number;
  owner_id: string | null;
  t: number | null;
  column: string | null;
  reason: string;
};

export function isConfigurationError(e: unknown): e is ConfigurationError {
  return e instanceof ConfigurationError;
}
