import { z } from "zod";

// Ordinal order matters: it is the label encoding the classifier was trained with.
export const COGNITIVE_STATES_V1 = ["Optimal", "High Load", "Fatigued", "Attentional Lapse"] as const;

export const STATE_COUNT_V1 = 4;

export const StateSetV1Schema = z
  .array(z.string().min(1))
  .length(STATE_COUNT_V1)
  .superRefine((names, ctx) => {
    if (new Set(names).size !== names.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "state names must be unique" });
    }
  });

export type StateSetV1 = z.infer<typeof StateSetV1Schema>;

export const StateLabelV1Schema = z.object({
  ordinal: z.number().int().min(0).max(STATE_COUNT_V1 - 1),
  name: z.string().min(1),
});

export type StateLabelV1 = z.infer<typeof StateLabelV1Schema>;
