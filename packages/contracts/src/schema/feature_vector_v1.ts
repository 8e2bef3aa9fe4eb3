import { z } from "zod";

export const FeatureVectorV1Schema = z.object({
  owner_id: z.string().min(1),
  // 1-based position of the row inside the owner's series
  position: z.number().int().positive(),
  t: z.number().int(),
  values: z.record(z.number().nullable()),
  // features whose value came from the fill policy rather than their own window
  filled: z.array(z.string()),
  complete: z.boolean(),
});

export type FeatureVectorV1 = z.infer<typeof FeatureVectorV1Schema>;
