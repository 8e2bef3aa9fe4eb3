// Shared fixtures for engine tests. Values are made up.

import {
  COGNITIVE_STATES_V1,
  type ClassifierArtifactV1,
  type EngineConfigV1,
  type SampleV1,
  type SeriesV1,
} from "@cogwatch/contracts";

export function testConfig(overrides: Partial<EngineConfigV1> = {}): EngineConfigV1 {
  return {
    schema_version: "1.0.0",
    input: {
      owner_column: "owner",
      time_column: "t",
      label_column: "state",
      channels: ["x", "y"],
      channel_ranges: { x: { min: 0, max: 100 } },
    },
    features: [
      { name: "x_mean5", kind: "mean", channel: "x", window: 5 },
      { name: "x_sd3", kind: "stddev", channel: "x", window: 3 },
      { name: "x_lag2", kind: "lag", channel: "x", window: 2 },
      { name: "x_delta2", kind: "delta", channel: "x", window: 2 },
    ],
    states: [...COGNITIVE_STATES_V1],
    rationale: {
      type: "rationale_ruleset_v1",
      schema_version: "1.0.0",
      ruleset_id: "rs_test",
      headlines: {
        Optimal: "All steady.",
        "High Load": "Load is high:",
        Fatigued: "Fatigue signs:",
        "Attentional Lapse": "Lapse suspected:",
      },
      inputs_used: ["feature.x_mean5", "feature.x_delta2", "raw.y"],
      rules: [
        { rule_id: "hl_mean", rule_version: "1.0.0", state: "High Load", bullet: "Mean x {feature.x_mean5|2}" },
        {
          rule_id: "hl_jump",
          rule_version: "1.0.0",
          state: "High Load",
          when: { template_id: "ABOVE", field_path: "feature.x_delta2", threshold: 1 },
          bullet: "Jump of {feature.x_delta2|1}",
        },
      ],
    },
    playback: {
      allowed_speeds: [1, 10, 50, 100],
      default_speed: 1,
      tick_interval_ms: 1000,
      duration_bound: 10800,
      recent_window: 3,
      strict_consistency: false,
    },
    paths: { series_csv: "series.csv", classifier_artifact: "model.json" },
    ...overrides,
  };
}

/** Linear artifact whose prediction depends only on the bias. */
export function biasArtifact(bias: number[], featureNames?: string[]): ClassifierArtifactV1 {
  const names = featureNames ?? testConfig().features.map((f) => f.name);
  return {
    type: "state_classifier_v1",
    schema_version: "1.0.0",
    feature_names: names,
    num_class: 4,
    labels: COGNITIVE_STATES_V1.map((name, ordinal) => ({ ordinal, name })),
    model: {
      kind: "linear_softmax",
      weights: bias.map(() => names.map(() => 0)),
      bias,
    },
  };
}

export function makeSeries(
  owner_id: string,
  xs: ReadonlyArray<number | null>,
  opts: { ys?: ReadonlyArray<number | null>; labels?: ReadonlyArray<string | null>; t0?: number } = {}
): SeriesV1 {
  const t0 = opts.t0 ?? 1;
  const samples: SampleV1[] = xs.map((x, i) => ({
    owner_id,
    t: t0 + i,
    channels: { x, y: opts.ys ? opts.ys[i] ?? null : 1 },
    label: opts.labels ? opts.labels[i] ?? null : null,
  }));
  return { owner_id, samples };
}

export function constant(n: number, v: number): number[] {
  return Array.from({ length: n }, () => v);
}

export function ramp(n: number, start = 1): number[] {
  return Array.from({ length: n }, (_, i) => start + i);
}
