// apps/engine/src/features/extractor.ts
//
// WindowedFeatureExtractor.
//
// - Owners are processed independently; no window crosses an owner.
// - A feature's own value at position p reads positions <= p only.
// - Undefined positions are filled per fillDownUp and listed in `filled`.
// - The precomputed table and the on-demand path share computeRaw(), so both
//   give identical vectors.

import {
  firstDefinedPosition,
  type FeatureConfigV1,
  type FeatureSpecV1,
  type FeatureVectorV1,
  type SeriesV1,
} from "@cogwatch/contracts";
import { ConfigurationError } from "../errors";
import { deltaAt, fillDownUp, lagAt, rollingMeanAt, rollingStdAt, type Column } from "./rolling";

export type FeatureRowV1 = FeatureVectorV1 & {
  raw: Readonly<Record<string, number | null>>;
  label: string | null;
};

export type FeatureTableV1 = {
  readonly owner_id: string;
  readonly feature_names: ReadonlyArray<string>;
  readonly rows: ReadonlyArray<FeatureRowV1>;
};

function channelColumn(series: SeriesV1, channel: string): Column {
  return series.samples.map((s) => s.channels[channel] ?? null);
}

function computeRaw(col: Column, f: FeatureSpecV1, end: number): number | null {
  switch (f.kind) {
    case "mean":
      return rollingMeanAt(col, end, f.window);
    case "stddev":
      return rollingStdAt(col, end, f.window);
    case "lag":
      return lagAt(col, end, f.window);
    case "delta":
      return deltaAt(col, end, f.window);
    default: {
      const _never: never = f.kind;
      throw new Error(`UNREACHABLE_FEATURE_KIND: ${String(_never)}`);
    }
  }
}

/** Fatal when a feature's window is longer than the owner's series. */
export function assertWindowsFit(series: SeriesV1, features: FeatureConfigV1): void {
  const n = series.samples.length;
  const tooLong = features.filter((f) => f.window > n);
  if (tooLong.length) {
    throw new ConfigurationError(
      "WINDOW_TOO_LONG",
      tooLong.map((f) => ({
        code: "WINDOW_TOO_LONG",
        path: `features.${f.name}`,
        message: `window ${f.window} exceeds series length ${n} for owner ${series.owner_id}`,
      }))
    );
  }
}

export function extractFeatureTable(series: SeriesV1, features: FeatureConfigV1): FeatureTableV1 {
  assertWindowsFit(series, features);
  const n = series.samples.length;

  const columns = new Map<string, { values: (number | null)[]; filled: boolean[] }>();
  const channelCache = new Map<string, Column>();
  for (const f of features) {
    let col = channelCache.get(f.channel);
    if (!col) {
      col = channelColumn(series, f.channel);
      channelCache.set(f.channel, col);
    }
    const rawValues: (number | null)[] = [];
    for (let i = 0; i < n; i++) rawValues.push(computeRaw(col, f, i));
    columns.set(f.name, fillDownUp(rawValues));
  }

  const feature_names = features.map((f) => f.name);
  const rows: FeatureRowV1[] = series.samples.map((s, i) => {
    const values: Record<string, number | null> = {};
    const filled: string[] = [];
    for (const name of feature_names) {
      const c = columns.get(name);
      values[name] = c ? c.values[i] : null;
      if (c?.filled[i]) filled.push(name);
    }
    return Object.freeze({
      owner_id: series.owner_id,
      position: i + 1,
      t: s.t,
      values,
      filled,
      complete: feature_names.every((name) => values[name] !== null),
      raw: { ...s.channels },
      label: s.label,
    });
  });

  return Object.freeze({ owner_id: series.owner_id, feature_names, rows: Object.freeze(rows) });
}

/**
 * On-demand vector at a 1-based position, O(window) when the position is
 * defined. Matches the corresponding row of extractFeatureTable().
 */
export function featureVectorAt(series: SeriesV1, features: FeatureConfigV1, position: number): FeatureVectorV1 {
  assertWindowsFit(series, features);
  const n = series.samples.length;
  if (!Number.isInteger(position) || position < 1 || position > n) {
    throw new RangeError(`position ${position} outside [1, ${n}] for owner ${series.owner_id}`);
  }
  const end = position - 1;

  const values: Record<string, number | null> = {};
  const filled: string[] = [];
  for (const f of features) {
    const col = channelColumn(series, f.channel);
    let v = computeRaw(col, f, end);
    if (v === null) {
      // down: last defined value before this position
      for (let i = end - 1; i >= 0 && v === null; i--) v = computeRaw(col, f, i);
      // up: first defined value of the series
      const firstPos = firstDefinedPosition(f) - 1;
      for (let i = Math.max(end + 1, firstPos); i < n && v === null; i++) v = computeRaw(col, f, i);
      if (v !== null) filled.push(f.name);
    }
    values[f.name] = v;
  }

  return {
    owner_id: series.owner_id,
    position,
    t: series.samples[end].t,
    values,
    filled,
    complete: features.every((f) => values[f.name] !== null),
  };
}

/** Rows usable for training/evaluation: every feature defined. */
export function trainableRows(table: FeatureTableV1): FeatureRowV1[] {
  return table.rows.filter((r) => r.complete);
}
