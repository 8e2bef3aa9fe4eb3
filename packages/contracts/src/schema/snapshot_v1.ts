import { z } from "zod";
import { FeatureVectorV1Schema } from "./feature_vector_v1";
import { PredictionV1Schema, RationaleV1Schema } from "./prediction_v1";
import { PlaybackStateV1Schema } from "./playback_v1";

/**
 * SnapshotV1: features, prediction and rationale computed at one cursor.
 */
export const SnapshotV1Schema = z.object({
  owner_id: z.string().min(1),
  cursor: z.number().int().positive(),
  t: z.number().int(),
  raw: z.record(z.number().nullable()),
  features: FeatureVectorV1Schema,
  prediction: PredictionV1Schema,
  rationale: RationaleV1Schema,
  // ground truth when the input carried a label column
  actual_state: z.string().nullable(),
});

export type SnapshotV1 = z.infer<typeof SnapshotV1Schema>;

export const RecentPointV1Schema = z.object({
  t: z.number().int(),
  raw: z.record(z.number().nullable()),
});

export const SessionSnapshotV1Schema = z.object({
  session_id: z.string().min(1),
  playback: PlaybackStateV1Schema,
  snapshot: SnapshotV1Schema,
  clock: z.string(),
  progress: z.object({
    percent: z.number(),
    remaining: z.string(),
  }),
  recent: z.array(RecentPointV1Schema),
  // true when this tick failed and the previous snapshot was kept
  stale: z.boolean(),
});

export type RecentPointV1 = z.infer<typeof RecentPointV1Schema>;
export type SessionSnapshotV1 = z.infer<typeof SessionSnapshotV1Schema>;
