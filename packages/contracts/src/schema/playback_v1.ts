import { z } from "zod";

export const PlaybackPhaseV1Schema = z.enum(["idle", "running", "paused"]);
export type PlaybackPhaseV1 = z.infer<typeof PlaybackPhaseV1Schema>;

export const PlaybackStateV1Schema = z.object({
  phase: PlaybackPhaseV1Schema,
  cursor: z.number().int().positive(),
  running: z.boolean(),
  speed: z.number().int().positive(),
  bounds: z.tuple([z.literal(1), z.number().int().positive()]),
});

export type PlaybackStateV1 = z.infer<typeof PlaybackStateV1Schema>;
