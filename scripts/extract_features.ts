#!/usr/bin/env node
/**
 * Feature-engineering stage.
 *
 * Reads the raw series CSV, computes the configured causal features per owner
 * and writes the feature-engineering output contract:
 *   owner_id, t, raw channels, features[, label]
 * Rows that still have an undefined feature after fill are not written.
 *
 * Usage:
 *   npm run extract-features -- --input data/processed/surgical_data.csv --out data/processed/features_data.csv
 *   (add --exclude-short to skip owners shorter than a feature window instead of failing)
 */

import fs from "node:fs";
import path from "node:path";

import {
  createLogger,
  extractFeatureTable,
  featureTablesToCsv,
  isConfigurationError,
  loadEngineConfig,
  readSeriesCsv,
  resolveConfigPath,
  summarizeByState,
  type FeatureTableV1,
} from "@cogwatch/engine";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function flag(name: string): boolean {
  return process.argv.includes(name);
}

/* -------------------- main -------------------- */

function main(): void {
  const log = createLogger();
  const loaded = loadEngineConfig(arg("--config") ? { file: String(arg("--config")) } : {});
  const cfg = loaded.config;

  const input = arg("--input") ?? resolveConfigPath(loaded, cfg.paths.series_csv);
  const out = arg("--out") ?? path.join(path.dirname(input), "features_data.csv");
  const excludeShort = flag("--exclude-short");

  const { series, issues } = readSeriesCsv(input, cfg.input, cfg.states);
  if (issues.length) log.warn({ count: issues.length, first: issues.slice(0, 10) }, "data issues recovered");

  const tables: FeatureTableV1[] = [];
  for (const s of series) {
    try {
      tables.push(extractFeatureTable(s, cfg.features));
    } catch (e: unknown) {
      if (excludeShort && isConfigurationError(e) && e.code === "WINDOW_TOO_LONG") {
        log.warn({ owner_id: s.owner_id }, "owner excluded: series shorter than a feature window");
        continue;
      }
      throw e;
    }
  }

  const total = tables.reduce((n, t) => n + t.rows.length, 0);
  const complete = tables.reduce((n, t) => n + t.rows.filter((r) => r.complete).length, 0);

  fs.mkdirSync(path.dirname(out), { recursive: true });
  fs.writeFileSync(out, featureTablesToCsv(tables, cfg.input), "utf8");

  log.info({ owners: tables.length, rows: total, written: complete, dropped: total - complete, out }, "features written");
  for (const s of summarizeByState(tables, cfg.states, cfg.input.channels)) {
    log.info(s, "feature summary by state");
  }
}

try {
  main();
} catch (err: unknown) {
  console.error(isConfigurationError(err) ? `${err.code}: ${err.message}` : err);
  process.exit(1);
}
