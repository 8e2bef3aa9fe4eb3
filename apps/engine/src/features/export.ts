// apps/engine/src/features/export.ts
//
// Feature-engineering output contract:
//   owner_id, t, <raw channels...>, <features...>[, label]
// Only complete rows (every feature defined after fill) are written.

import { stringify } from "csv-stringify/sync";

import type { FeatureTableV1 } from "./extractor";

export type FeatureExportOptions = {
  owner_column: string;
  time_column: string;
  channels: ReadonlyArray<string>;
  // null: no label column
  label_column: string | null;
};

export function featureTablesToCsv(tables: ReadonlyArray<FeatureTableV1>, opts: FeatureExportOptions): string {
  const featureNames = tables[0]?.feature_names ?? [];
  const header = [opts.owner_column, opts.time_column, ...opts.channels, ...featureNames];
  if (opts.label_column) header.push(opts.label_column);

  const records: Array<Array<string | number>> = [];
  for (const table of tables) {
    for (const row of table.rows) {
      if (!row.complete) continue;
      const rec: Array<string | number> = [row.owner_id, row.t];
      for (const ch of opts.channels) rec.push(row.raw[ch] ?? "NA");
      for (const name of featureNames) rec.push(row.values[name] ?? "NA");
      if (opts.label_column) rec.push(row.label ?? "NA");
      records.push(rec);
    }
  }

  return stringify([header, ...records]);
}

export type StateSummaryV1 = {
  state: string;
  n_observations: number;
  // column -> mean over the state's rows (missing values skipped)
  means: Record<string, number | null>;
};

/** Per ground-truth state: row count and column means. Rows without a label are skipped. */
export function summarizeByState(
  tables: ReadonlyArray<FeatureTableV1>,
  states: ReadonlyArray<string>,
  channels: ReadonlyArray<string>
): StateSummaryV1[] {
  const featureNames = tables[0]?.feature_names ?? [];
  const columns = [...channels, ...featureNames];

  return states
    .map((state) => {
      const sums = new Map<string, { sum: number; n: number }>(columns.map((c) => [c, { sum: 0, n: 0 }]));
      let count = 0;
      for (const table of tables) {
        for (const row of table.rows) {
          if (row.label !== state) continue;
          count++;
          for (const c of columns) {
            const v = c in row.values ? row.values[c] : row.raw[c];
            const acc = sums.get(c);
            if (acc && typeof v === "number") {
              acc.sum += v;
              acc.n++;
            }
          }
        }
      }
      const means: Record<string, number | null> = {};
      for (const c of columns) {
        const acc = sums.get(c);
        means[c] = acc && acc.n ? acc.sum / acc.n : null;
      }
      return { state, n_observations: count, means };
    })
    .filter((s) => s.n_observations > 0);
}
