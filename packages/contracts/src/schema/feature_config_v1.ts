import { z } from "zod";

export const FeatureKindV1Schema = z.enum(["mean", "stddev", "lag", "delta"]);
export type FeatureKindV1 = z.infer<typeof FeatureKindV1Schema>;

/**
 * One engineered feature.
 *
 * - mean/stddev: right-aligned window of `window` samples ending at t
 * - lag: raw value at t - window
 * - delta: raw value at t minus the `window`-sample mean ending at t - 1
 */
export const FeatureSpecV1Schema = z
  .object({
    name: z.string().regex(/^[a-z][a-z0-9_]*$/),
    kind: FeatureKindV1Schema,
    channel: z.string().min(1),
    window: z.number().int().positive(),
  })
  .strict()
  .superRefine((f, ctx) => {
    // a sample standard deviation needs at least two values
    if (f.kind === "stddev" && f.window < 2) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "stddev window must be >= 2", path: ["window"] });
    }
  });

export type FeatureSpecV1 = z.infer<typeof FeatureSpecV1Schema>;

export const FeatureConfigV1Schema = z
  .array(FeatureSpecV1Schema)
  .min(1)
  .superRefine((features, ctx) => {
    const seen = new Set<string>();
    features.forEach((f, i) => {
      if (seen.has(f.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate feature name ${f.name}`, path: [i, "name"] });
      }
      seen.add(f.name);
    });
  });

export type FeatureConfigV1 = z.infer<typeof FeatureConfigV1Schema>;

/**
 * Number of samples a feature needs before its first defined value
 * (1-based position of the first defined row).
 */
export function firstDefinedPosition(f: FeatureSpecV1): number {
  switch (f.kind) {
    case "mean":
    case "stddev":
      return f.window;
    case "lag":
      return f.window + 1;
    case "delta":
      return f.window + 1;
    default: {
      const _never: never = f.kind;
      throw new Error(`UNREACHABLE_FEATURE_KIND: ${String(_never)}`);
    }
  }
}
