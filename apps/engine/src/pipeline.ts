// apps/engine/src/pipeline.ts
//
// InferencePipeline: raw series -> feature tables -> (classifier + rationale)
// keyed by cursor.
//
// Construction is all-or-nothing: config, artifact schema, series and
// windows are checked here and any failure is a ConfigurationError. After
// construction the tables are read-only and getSnapshot() is a pure lookup.

import type {
  EngineConfigV1,
  RecentPointV1,
  SeriesV1,
  SnapshotV1,
  ClassifierArtifactV1,
} from "@cogwatch/contracts";
import { createRationaleEngine, type RationaleEngine } from "@cogwatch/rationale-kernel";

import { createStateClassifier, loadClassifierArtifact, type StateClassifier } from "./classifier/state_classifier";
import { resolveConfigPath, type LoadedEngineConfig } from "./config/ssot";
import { ConfigurationError, isConfigurationError, type DataIssue } from "./errors";
import { extractFeatureTable, type FeatureTableV1 } from "./features/extractor";
import type { EngineLogger } from "./logger";
import type { SnapshotSource } from "./playback/session";
import { readSeriesCsv } from "./series/reader";

export type ShortSeriesPolicy = "fail" | "exclude";

export type PipelinePartsInput = {
  config: EngineConfigV1;
  series: ReadonlyArray<SeriesV1>;
  artifact: ClassifierArtifactV1;
  logger: EngineLogger;
  issues?: ReadonlyArray<DataIssue>;
  // what to do with an owner whose series is shorter than a feature window
  onShortSeries?: ShortSeriesPolicy;
};

export type OwnerSummary = {
  owner_id: string;
  samples: number;
  upper_bound: number;
};

export class InferencePipeline implements SnapshotSource {
  readonly config: EngineConfigV1;
  readonly classifier: StateClassifier;
  readonly rationale: RationaleEngine;
  readonly issues: ReadonlyArray<DataIssue>;
  private readonly tables: ReadonlyMap<string, FeatureTableV1>;

  private constructor(args: {
    config: EngineConfigV1;
    classifier: StateClassifier;
    rationale: RationaleEngine;
    tables: Map<string, FeatureTableV1>;
    issues: ReadonlyArray<DataIssue>;
  }) {
    this.config = args.config;
    this.classifier = args.classifier;
    this.rationale = args.rationale;
    this.tables = args.tables;
    this.issues = args.issues;
  }

  static fromParts(input: PipelinePartsInput): InferencePipeline {
    const { config, logger } = input;
    const featureNames = config.features.map((f) => f.name);

    // Schema first: a mismatched artifact must fail before any data work.
    const classifier = createStateClassifier(input.artifact, { featureNames, states: config.states });

    let rationale: RationaleEngine;
    try {
      rationale = createRationaleEngine(config.rationale, {
        states: config.states,
        featureNames,
        channels: config.input.channels,
      });
    } catch (e: unknown) {
      throw ConfigurationError.single("CONFIG_INVALID", "rationale", e instanceof Error ? e.message : String(e));
    }

    const tables = new Map<string, FeatureTableV1>();
    for (const s of input.series) {
      if (s.samples.length === 0) continue;
      try {
        tables.set(s.owner_id, extractFeatureTable(s, config.features));
      } catch (e: unknown) {
        if (isConfigurationError(e) && e.code === "WINDOW_TOO_LONG" && input.onShortSeries === "exclude") {
          logger.warn({ owner_id: s.owner_id, issues: e.issues }, "owner excluded: series shorter than a feature window");
          continue;
        }
        throw e;
      }
    }
    if (tables.size === 0) {
      throw ConfigurationError.single("INPUT_MALFORMED", "series", "no owner has a usable series");
    }

    const issues = input.issues ?? [];
    if (issues.length) {
      logger.warn({ count: issues.length, first: issues.slice(0, 5) }, "data issues recovered while reading series");
    }
    logger.info(
      { owners: [...tables.keys()], features: featureNames, ruleset_id: rationale.ruleset_id },
      "inference pipeline ready"
    );

    return new InferencePipeline({ config, classifier, rationale, tables, issues });
  }

  /** Reads the artifact and series named by the config (or the overrides). */
  static build(
    loaded: LoadedEngineConfig,
    logger: EngineLogger,
    overrides: { seriesPath?: string; artifactPath?: string; onShortSeries?: ShortSeriesPolicy } = {}
  ): InferencePipeline {
    const config = loaded.config;
    const artifactPath = overrides.artifactPath ?? resolveConfigPath(loaded, config.paths.classifier_artifact);
    const seriesPath = overrides.seriesPath ?? resolveConfigPath(loaded, config.paths.series_csv);

    const artifact = loadClassifierArtifact(artifactPath);
    const { series, issues } = readSeriesCsv(seriesPath, config.input, config.states);

    return InferencePipeline.fromParts({
      config,
      series,
      artifact,
      logger,
      issues,
      onShortSeries: overrides.onShortSeries,
    });
  }

  owners(): OwnerSummary[] {
    return [...this.tables.values()].map((t) => ({
      owner_id: t.owner_id,
      samples: t.rows.length,
      upper_bound: this.upperBound(t.owner_id),
    }));
  }

  hasOwner(owner_id: string): boolean {
    return this.tables.has(owner_id);
  }

  table(owner_id: string): FeatureTableV1 {
    const t = this.tables.get(owner_id);
    if (!t) throw new RangeError(`unknown owner ${owner_id}`);
    return t;
  }

  /** min(series length, configured duration bound) */
  upperBound(owner_id: string): number {
    return Math.min(this.table(owner_id).rows.length, this.config.playback.duration_bound);
  }

  getSnapshot(owner_id: string, cursor: number): SnapshotV1 {
    const table = this.table(owner_id);
    if (!Number.isInteger(cursor) || cursor < 1 || cursor > table.rows.length) {
      throw new RangeError(`cursor ${cursor} outside [1, ${table.rows.length}] for owner ${owner_id}`);
    }
    const row = table.rows[cursor - 1];
    const features = {
      owner_id: row.owner_id,
      position: row.position,
      t: row.t,
      values: { ...row.values },
      filled: [...row.filled],
      complete: row.complete,
    };
    const raw = { ...row.raw };
    const prediction = this.classifier.predict(features);
    const rationale = this.rationale.explain(prediction, features, raw);

    return { owner_id, cursor, t: row.t, raw, features, prediction, rationale, actual_state: row.label };
  }

  recent(owner_id: string, cursor: number, n: number): RecentPointV1[] {
    const rows = this.table(owner_id).rows;
    const end = Math.min(Math.max(cursor, 1), rows.length);
    const start = Math.max(1, end - n + 1);
    return rows.slice(start - 1, end).map((r) => ({ t: r.t, raw: { ...r.raw } }));
  }
}
