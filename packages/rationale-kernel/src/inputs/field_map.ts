// Rationale Kernel - input projection
//
// Rules never see the raw objects. They read a flat FieldMap whose keys are
// the only paths a rule may reference:
// - feature.<feature_name>
// - raw.<channel>

import type { FeatureVectorV1 } from "@cogwatch/contracts";

export type FieldValue = number | null;

export type FieldMap = ReadonlyMap<string, FieldValue>;

const FIELD_PATH_RE = /^(feature|raw)\.([A-Za-z0-9_]+)$/;

export type FieldScope = {
  featureNames: ReadonlyArray<string>;
  channels: ReadonlyArray<string>;
};

export function projectFieldMap(features: FeatureVectorV1, raw: Readonly<Record<string, number | null>>): FieldMap {
  const out = new Map<string, FieldValue>();
  for (const name of Object.keys(features.values).sort()) {
    out.set(`feature.${name}`, features.values[name] ?? null);
  }
  for (const channel of Object.keys(raw).sort()) {
    out.set(`raw.${channel}`, raw[channel] ?? null);
  }
  return out;
}

/**
 * Throws when `path` is not a well-formed field path or names a feature or
 * channel outside the configured scope.
 */
export function assertAllowedFieldPath(path: string, scope: FieldScope, where: string): void {
  const m = FIELD_PATH_RE.exec(path);
  if (!m) {
    throw new Error(`FIELD_PATH_MALFORMED: ${path} @ ${where}`);
  }
  const [, kind, name] = m;
  const allowed = kind === "feature" ? scope.featureNames : scope.channels;
  if (!allowed.includes(name)) {
    throw new Error(`FIELD_PATH_NOT_IN_SCOPE: ${path} @ ${where}`);
  }
}
