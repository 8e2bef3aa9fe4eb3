import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  ClassifierArtifactV1Schema,
  COGNITIVE_STATES_V1,
  ConditionV1Schema,
  FeatureConfigV1Schema,
  FeatureSpecV1Schema,
  PlaybackStateV1Schema,
  RationaleRuleV1Schema,
  SampleV1Schema,
  StateSetV1Schema,
  assertStrictlyIncreasing,
  firstDefinedPosition,
} from "../index";

describe("sample and series contracts", () => {
  it("defaults a missing label to null", () => {
    const s = SampleV1Schema.parse({ owner_id: "1", t: 4, channels: { x: 1.5, y: null } });
    assert.equal(s.label, null);
    assert.equal(SampleV1Schema.safeParse({ owner_id: "1", t: 4.5, channels: {} }).success, false);
  });

  it("requires strictly increasing time within an owner", () => {
    const sample = (t: number) => ({ owner_id: "1", t, channels: {}, label: null });
    assert.doesNotThrow(() => assertStrictlyIncreasing({ owner_id: "1", samples: [sample(1), sample(2)] }));
    assert.throws(
      () => assertStrictlyIncreasing({ owner_id: "1", samples: [sample(2), sample(2)] }),
      /SERIES_NOT_STRICTLY_INCREASING/
    );
  });
});

describe("state set", () => {
  it("accepts exactly four distinct states", () => {
    assert.equal(StateSetV1Schema.safeParse([...COGNITIVE_STATES_V1]).success, true);
    assert.equal(StateSetV1Schema.safeParse(["a", "b", "c"]).success, false);
    assert.equal(StateSetV1Schema.safeParse(["a", "b", "c", "a"]).success, false);
  });
});

describe("feature config", () => {
  it("needs a window of at least two for stddev", () => {
    assert.equal(FeatureSpecV1Schema.safeParse({ name: "s", kind: "stddev", channel: "x", window: 1 }).success, false);
    assert.equal(FeatureSpecV1Schema.safeParse({ name: "s", kind: "stddev", channel: "x", window: 2 }).success, true);
  });

  it("rejects duplicate names and names that cannot be field paths", () => {
    const f = { name: "m", kind: "mean", channel: "x", window: 3 };
    assert.equal(FeatureConfigV1Schema.safeParse([f, f]).success, false);
    assert.equal(FeatureConfigV1Schema.safeParse([{ ...f, name: "Mean-3" }]).success, false);
    assert.equal(FeatureConfigV1Schema.safeParse([]).success, false);
  });

  it("knows where each kind is first defined", () => {
    assert.equal(firstDefinedPosition({ name: "m", kind: "mean", channel: "x", window: 30 }), 30);
    assert.equal(firstDefinedPosition({ name: "s", kind: "stddev", channel: "x", window: 15 }), 15);
    assert.equal(firstDefinedPosition({ name: "l", kind: "lag", channel: "x", window: 5 }), 6);
    assert.equal(firstDefinedPosition({ name: "d", kind: "delta", channel: "x", window: 5 }), 6);
  });
});

describe("rationale rules", () => {
  it("parses nested conditions", () => {
    const cond = {
      template_id: "LOGICAL_AND",
      children: [
        { template_id: "ABOVE", field_path: "feature.a", threshold: 1 },
        { template_id: "LOGICAL_AND", children: [{ template_id: "BELOW", field_path: "raw.p", threshold: 2 }] },
      ],
    };
    assert.deepEqual(ConditionV1Schema.parse(cond), cond);
  });

  it("rejects unknown templates, malformed paths and extra keys", () => {
    assert.equal(ConditionV1Schema.safeParse({ template_id: "EQUALS", field_path: "feature.a", threshold: 1 }).success, false);
    assert.equal(ConditionV1Schema.safeParse({ template_id: "ABOVE", field_path: "a", threshold: 1 }).success, false);
    assert.equal(
      RationaleRuleV1Schema.safeParse({ rule_id: "r", rule_version: "1.0.0", state: "Optimal", bullet: "b", note: "x" }).success,
      false
    );
  });
});

describe("classifier artifact", () => {
  it("accepts a tree ensemble", () => {
    const r = ClassifierArtifactV1Schema.safeParse({
      type: "state_classifier_v1",
      schema_version: "1.0.0",
      feature_names: ["a"],
      num_class: 4,
      labels: COGNITIVE_STATES_V1.map((name, ordinal) => ({ ordinal, name })),
      model: {
        kind: "tree_ensemble",
        base_score: 0.5,
        trees: [{ class_index: 0, nodes: [{ node_id: 0, leaf: 0.1 }] }],
      },
    });
    assert.equal(r.success, true);
  });

  it("rejects an unknown model kind", () => {
    const r = ClassifierArtifactV1Schema.safeParse({
      type: "state_classifier_v1",
      schema_version: "1.0.0",
      feature_names: ["a"],
      num_class: 4,
      labels: [],
      model: { kind: "svm" },
    });
    assert.equal(r.success, false);
  });
});

describe("playback state", () => {
  it("anchors bounds at 1", () => {
    const ok = { phase: "running", cursor: 3, running: true, speed: 10, bounds: [1, 40] };
    assert.equal(PlaybackStateV1Schema.safeParse(ok).success, true);
    assert.equal(PlaybackStateV1Schema.safeParse({ ...ok, bounds: [0, 40] }).success, false);
  });
});
