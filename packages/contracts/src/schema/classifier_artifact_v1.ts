import { z } from "zod";
import { StateLabelV1Schema } from "./state_set_v1";

// Boosted-tree node. Split nodes route on feature index `feature`:
// value < threshold goes to `yes`, otherwise `no`; a missing value goes to `missing`.
export const TreeSplitNodeV1Schema = z
  .object({
    node_id: z.number().int().nonnegative(),
    feature: z.number().int().nonnegative(),
    threshold: z.number().finite(),
    yes: z.number().int().nonnegative(),
    no: z.number().int().nonnegative(),
    missing: z.number().int().nonnegative(),
  })
  .strict();

export const TreeLeafNodeV1Schema = z
  .object({
    node_id: z.number().int().nonnegative(),
    leaf: z.number().finite(),
  })
  .strict();

export const TreeNodeV1Schema = z.union([TreeSplitNodeV1Schema, TreeLeafNodeV1Schema]);

export type TreeSplitNodeV1 = z.infer<typeof TreeSplitNodeV1Schema>;
export type TreeLeafNodeV1 = z.infer<typeof TreeLeafNodeV1Schema>;
export type TreeNodeV1 = z.infer<typeof TreeNodeV1Schema>;

export const RegressionTreeV1Schema = z.object({
  class_index: z.number().int().nonnegative(),
  nodes: z.array(TreeNodeV1Schema).min(1),
});

export type RegressionTreeV1 = z.infer<typeof RegressionTreeV1Schema>;

export const TreeEnsembleModelV1Schema = z.object({
  kind: z.literal("tree_ensemble"),
  base_score: z.number().finite(),
  trees: z.array(RegressionTreeV1Schema).min(1),
});

export const LinearSoftmaxModelV1Schema = z.object({
  kind: z.literal("linear_softmax"),
  // one row per class, one column per feature
  weights: z.array(z.array(z.number().finite())),
  bias: z.array(z.number().finite()),
});

export const ClassifierModelV1Schema = z.discriminatedUnion("kind", [
  TreeEnsembleModelV1Schema,
  LinearSoftmaxModelV1Schema,
]);

export type TreeEnsembleModelV1 = z.infer<typeof TreeEnsembleModelV1Schema>;
export type LinearSoftmaxModelV1 = z.infer<typeof LinearSoftmaxModelV1Schema>;
export type ClassifierModelV1 = z.infer<typeof ClassifierModelV1Schema>;

/**
 * Trained classifier artifact. Produced by the training job; consumed read-only.
 * The header (feature_names, num_class, labels) is checked against the engine
 * config before any prediction is served.
 */
export const ClassifierArtifactV1Schema = z.object({
  type: z.literal("state_classifier_v1"),
  schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
  feature_names: z.array(z.string().min(1)).min(1),
  num_class: z.number().int().positive(),
  labels: z.array(StateLabelV1Schema).min(1),
  model: ClassifierModelV1Schema,
});

export type ClassifierArtifactV1 = z.infer<typeof ClassifierArtifactV1Schema>;
