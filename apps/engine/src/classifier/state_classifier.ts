// apps/engine/src/classifier/state_classifier.ts
//
// StateClassifier: the trained artifact behind a narrow contract.
//
// Admission (once, at startup; any failure is a ConfigurationError):
// - artifact.feature_names equals the configured feature order exactly
// - artifact.num_class and artifact.labels equal the configured state set
// - model dimensions agree with both
//
// predict() is stateless and deterministic for a given artifact.

import fs from "node:fs";

import {
  ClassifierArtifactV1Schema,
  PREDICTION_SUM_EPSILON,
  type ClassifierArtifactV1,
  type FeatureVectorV1,
  type PredictionV1,
} from "@cogwatch/contracts";
import { ClassifierOutputError, ConfigurationError, type ConfigIssue } from "../errors";
import { marginFnFor, softmax, validateTree } from "./models";

export interface StateClassifier {
  readonly feature_names: ReadonlyArray<string>;
  readonly states: ReadonlyArray<string>;
  predict(vector: FeatureVectorV1): PredictionV1;
  predictBatch(vectors: ReadonlyArray<FeatureVectorV1>): PredictionV1[];
}

export type ClassifierSchema = {
  featureNames: ReadonlyArray<string>;
  states: ReadonlyArray<string>;
};

export function parseClassifierArtifact(raw: unknown, source = "<inline>"): ClassifierArtifactV1 {
  const r = ClassifierArtifactV1Schema.safeParse(raw);
  if (!r.success) {
    throw new ConfigurationError(
      "ARTIFACT_INVALID",
      r.error.issues.map((i) => ({ code: "ARTIFACT_INVALID", path: i.path.join("."), message: `${i.message} (${source})` }))
    );
  }
  return r.data;
}

export function loadClassifierArtifact(filePath: string): ClassifierArtifactV1 {
  if (!fs.existsSync(filePath)) {
    throw ConfigurationError.single("ARTIFACT_MISSING", filePath, "classifier artifact not found");
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e: unknown) {
    throw ConfigurationError.single("ARTIFACT_INVALID", filePath, `not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseClassifierArtifact(raw, filePath);
}

function sameOrder(a: ReadonlyArray<string>, b: ReadonlyArray<string>): boolean {
  return a.length === b.length && a.every((x, i) => x === b[i]);
}

export function assertArtifactMatchesSchema(artifact: ClassifierArtifactV1, schema: ClassifierSchema): void {
  if (!sameOrder(artifact.feature_names, schema.featureNames)) {
    throw ConfigurationError.single(
      "SCHEMA_MISMATCH",
      "artifact.feature_names",
      `artifact expects [${artifact.feature_names.join(",")}] but features produce [${schema.featureNames.join(",")}]`
    );
  }

  const labelIssues: ConfigIssue[] = [];
  if (artifact.num_class !== schema.states.length) {
    labelIssues.push({
      code: "LABEL_MAPPING_MISMATCH",
      path: "artifact.num_class",
      message: `artifact has ${artifact.num_class} classes, state set has ${schema.states.length}`,
    });
  }
  const byOrdinal = new Map(artifact.labels.map((l) => [l.ordinal, l.name]));
  if (artifact.labels.length !== schema.states.length || byOrdinal.size !== artifact.labels.length) {
    labelIssues.push({ code: "LABEL_MAPPING_MISMATCH", path: "artifact.labels", message: "labels must list each ordinal once" });
  }
  schema.states.forEach((name, ordinal) => {
    const got = byOrdinal.get(ordinal);
    if (got !== name) {
      labelIssues.push({
        code: "LABEL_MAPPING_MISMATCH",
        path: `artifact.labels[${ordinal}]`,
        message: `ordinal ${ordinal} is ${got ?? "absent"} in artifact, ${name} in config`,
      });
    }
  });
  if (labelIssues.length) throw new ConfigurationError("LABEL_MAPPING_MISMATCH", labelIssues);

  const model = artifact.model;
  const nf = artifact.feature_names.length;
  const nc = artifact.num_class;
  const modelIssues: string[] = [];
  if (model.kind === "linear_softmax") {
    if (model.weights.length !== nc) modelIssues.push(`weights has ${model.weights.length} rows, expected ${nc}`);
    model.weights.forEach((row, k) => {
      if (row.length !== nf) modelIssues.push(`weights[${k}] has ${row.length} columns, expected ${nf}`);
    });
    if (model.bias.length !== nc) modelIssues.push(`bias has ${model.bias.length} entries, expected ${nc}`);
  } else {
    model.trees.forEach((tree, i) => {
      if (tree.class_index >= nc) modelIssues.push(`trees[${i}].class_index ${tree.class_index} >= ${nc}`);
      for (const e of validateTree(tree, nf)) modelIssues.push(`trees[${i}]: ${e}`);
    });
  }
  if (modelIssues.length) {
    throw new ConfigurationError(
      "ARTIFACT_INVALID",
      modelIssues.map((m) => ({ code: "ARTIFACT_INVALID", path: "artifact.model", message: m }))
    );
  }
}

/** Probabilities -> Prediction; ties go to the lowest ordinal. */
export function toPrediction(probs: ReadonlyArray<number>, states: ReadonlyArray<string>): PredictionV1 {
  if (probs.length !== states.length || probs.some((p) => !Number.isFinite(p) || p < 0 || p > 1)) {
    throw new ClassifierOutputError(`invalid probability vector [${probs.join(",")}]`);
  }
  const sum = probs.reduce((a, b) => a + b, 0);
  if (Math.abs(sum - 1) > PREDICTION_SUM_EPSILON) {
    throw new ClassifierOutputError(`probabilities sum to ${sum}`);
  }
  let best = 0;
  for (let k = 1; k < probs.length; k++) if (probs[k] > probs[best]) best = k;

  return {
    state: states[best],
    ordinal: best,
    confidence: probs[best],
    probabilities: states.map((state, ordinal) => ({ state, ordinal, probability: probs[ordinal] })),
  };
}

export function createStateClassifier(artifact: ClassifierArtifactV1, schema: ClassifierSchema): StateClassifier {
  assertArtifactMatchesSchema(artifact, schema);

  const feature_names = [...artifact.feature_names];
  const states = [...schema.states];
  const margins = marginFnFor(artifact.model, artifact.num_class);

  const predict = (vector: FeatureVectorV1): PredictionV1 => {
    const x = feature_names.map((name) => vector.values[name] ?? null);
    return toPrediction(softmax(margins(x)), states);
  };

  return {
    feature_names,
    states,
    predict,
    predictBatch: (vectors) => vectors.map(predict),
  };
}
