// apps/engine/src/series/reader.ts
//
// Raw series CSV -> owner-keyed SeriesV1[].
//
// File-level problems (missing file, unparsable CSV, missing columns) are
// fatal. Row-level problems are recovered here and reported as DataIssue:
// - bad owner / bad t / duplicate (owner, t): the row is dropped
// - bad or out-of-range channel value: the row is kept, the value becomes null
// - unknown label: the row is kept, the label becomes null

import fs from "node:fs";
import { parse } from "csv-parse/sync";

import { assertStrictlyIncreasing, type InputConfigV1, type SampleV1, type SeriesV1 } from "@cogwatch/contracts";
import { ConfigurationError, type DataIssue } from "../errors";

export type SeriesReadResult = {
  series: SeriesV1[];
  issues: DataIssue[];
};

function numOrNa(v: string | undefined): number {
  const s = String(v ?? "").trim();
  if (!s || s.toUpperCase() === "NA" || s.toUpperCase() === "NAN") return NaN;
  const n = Number(s);
  return Number.isFinite(n) ? n : NaN;
}

type ParsedCsv = {
  header: string[];
  rows: Record<string, string>[];
};

function parseRows(text: string, source: string): ParsedCsv {
  let header: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      columns: (first: string[]) => {
        header = first.map((h) => String(h));
        return header;
      },
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (e: unknown) {
    throw ConfigurationError.single("INPUT_MALFORMED", source, e instanceof Error ? e.message : String(e));
  }
  if (!Array.isArray(parsed)) {
    throw ConfigurationError.single("INPUT_MALFORMED", source, "csv parser returned no rows");
  }
  return { header, rows: parsed.filter((r): r is Record<string, string> => !!r && typeof r === "object") };
}

export function parseSeriesCsv(
  text: string,
  input: InputConfigV1,
  states: ReadonlyArray<string>,
  source = "<inline>"
): SeriesReadResult {
  const { header, rows } = parseRows(text, source);
  const required = [input.owner_column, input.time_column, ...input.channels];
  const missing = required.filter((c) => !header.includes(c));
  if (missing.length) {
    throw ConfigurationError.single("INPUT_MALFORMED", source, `missing columns: ${missing.join(",")}`);
  }
  const labelColumn = input.label_column && header.includes(input.label_column) ? input.label_column : null;

  const issues: DataIssue[] = [];
  const byOwner = new Map<string, Map<number, SampleV1>>();

  rows.forEach((row, i) => {
    const rowNo = i + 1;
    const owner = String(row[input.owner_column] ?? "").trim();
    if (!owner) {
      issues.push({ row: rowNo, owner_id: null, t: null, column: input.owner_column, reason: "missing owner" });
      return;
    }
    const t = numOrNa(row[input.time_column]);
    if (!Number.isInteger(t)) {
      issues.push({ row: rowNo, owner_id: owner, t: null, column: input.time_column, reason: "time is not an integer" });
      return;
    }

    let samples = byOwner.get(owner);
    if (!samples) {
      samples = new Map();
      byOwner.set(owner, samples);
    }
    if (samples.has(t)) {
      issues.push({ row: rowNo, owner_id: owner, t, column: input.time_column, reason: "duplicate time for owner" });
      return;
    }

    const channels: Record<string, number | null> = {};
    for (const ch of input.channels) {
      const v = numOrNa(row[ch]);
      const range = input.channel_ranges[ch];
      if (Number.isNaN(v)) {
        issues.push({ row: rowNo, owner_id: owner, t, column: ch, reason: "value is not numeric" });
        channels[ch] = null;
      } else if (range && (v < range.min || v > range.max)) {
        issues.push({ row: rowNo, owner_id: owner, t, column: ch, reason: `value ${v} outside [${range.min}, ${range.max}]` });
        channels[ch] = null;
      } else {
        channels[ch] = v;
      }
    }

    let label: string | null = null;
    if (labelColumn) {
      const raw = String(row[labelColumn] ?? "").trim();
      if (raw && raw.toUpperCase() !== "NA") {
        if (states.includes(raw)) {
          label = raw;
        } else {
          issues.push({ row: rowNo, owner_id: owner, t, column: labelColumn, reason: `unknown state ${raw}` });
        }
      }
    }

    samples.set(t, { owner_id: owner, t, channels, label });
  });

  const owners = [...byOwner.keys()].sort((a, b) => a.localeCompare(b, "en", { numeric: true }));
  const series: SeriesV1[] = owners.map((owner_id) => {
    const m = byOwner.get(owner_id) ?? new Map<number, SampleV1>();
    const samples = [...m.values()].sort((a, b) => a.t - b.t);
    const out: SeriesV1 = Object.freeze({ owner_id, samples: Object.freeze(samples.map((s) => Object.freeze(s))) });
    assertStrictlyIncreasing(out);
    return out;
  });

  return { series, issues };
}

export function readSeriesCsv(filePath: string, input: InputConfigV1, states: ReadonlyArray<string>): SeriesReadResult {
  if (!fs.existsSync(filePath)) {
    throw ConfigurationError.single("INPUT_MISSING", filePath, "raw series file not found");
  }
  return parseSeriesCsv(fs.readFileSync(filePath, "utf8"), input, states, filePath);
}
