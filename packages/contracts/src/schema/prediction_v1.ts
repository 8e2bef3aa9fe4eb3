import { z } from "zod";

export const PREDICTION_SUM_EPSILON = 1e-6;

export const StateProbabilityV1Schema = z.object({
  state: z.string().min(1),
  ordinal: z.number().int().nonnegative(),
  probability: z.number().min(0).max(1),
});

export type StateProbabilityV1 = z.infer<typeof StateProbabilityV1Schema>;

export const PredictionV1Schema = z.object({
  // argmax; ties resolve to the lowest ordinal
  state: z.string().min(1),
  ordinal: z.number().int().nonnegative(),
  confidence: z.number().min(0).max(1),
  // ordered by ordinal
  probabilities: z.array(StateProbabilityV1Schema),
});

export type PredictionV1 = z.infer<typeof PredictionV1Schema>;

export const RationaleV1Schema = z.object({
  state: z.string().min(1),
  headline: z.string().min(1),
  bullet_points: z.array(z.string()),
  fired_rule_ids: z.array(z.string()),
});

export type RationaleV1 = z.infer<typeof RationaleV1Schema>;
