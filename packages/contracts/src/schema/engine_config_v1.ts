import { z } from "zod";
import { FeatureConfigV1Schema } from "./feature_config_v1";
import { StateSetV1Schema } from "./state_set_v1";
import { RationaleRuleSetV1Schema } from "./rationale_rules_v1";

export const ChannelRangeV1Schema = z
  .object({
    min: z.number().finite(),
    max: z.number().finite(),
  })
  .refine((r) => r.min <= r.max, { message: "min must be <= max" });

export const InputConfigV1Schema = z
  .object({
    owner_column: z.string().min(1),
    time_column: z.string().min(1),
    label_column: z.string().min(1).nullable(),
    channels: z.array(z.string().min(1)).min(1),
    channel_ranges: z.record(ChannelRangeV1Schema),
  })
  .strict();

export const PlaybackConfigV1Schema = z
  .object({
    allowed_speeds: z.array(z.number().int().positive()).min(1),
    default_speed: z.number().int().positive(),
    tick_interval_ms: z.number().int().positive(),
    // upper bound on playback length, in samples (one sample per second)
    duration_bound: z.number().int().positive(),
    recent_window: z.number().int().positive(),
    strict_consistency: z.boolean(),
  })
  .strict();

export const EngineConfigV1Schema = z
  .object({
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    input: InputConfigV1Schema,
    features: FeatureConfigV1Schema,
    states: StateSetV1Schema,
    rationale: RationaleRuleSetV1Schema,
    playback: PlaybackConfigV1Schema,
    paths: z
      .object({
        series_csv: z.string().min(1),
        classifier_artifact: z.string().min(1),
      })
      .strict(),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    const channels = new Set(cfg.input.channels);
    cfg.features.forEach((f, i) => {
      if (!channels.has(f.channel)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `feature ${f.name} reads unknown channel ${f.channel}`,
          path: ["features", i, "channel"],
        });
      }
    });
    if (!cfg.playback.allowed_speeds.includes(cfg.playback.default_speed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "default_speed must be one of allowed_speeds",
        path: ["playback", "default_speed"],
      });
    }
    for (const s of cfg.states) {
      if (!(s in cfg.rationale.headlines)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `missing headline for state ${s}`,
          path: ["rationale", "headlines", s],
        });
      }
    }
  });

export type ChannelRangeV1 = z.infer<typeof ChannelRangeV1Schema>;
export type InputConfigV1 = z.infer<typeof InputConfigV1Schema>;
export type PlaybackConfigV1 = z.infer<typeof PlaybackConfigV1Schema>;
export type EngineConfigV1 = z.infer<typeof EngineConfigV1Schema>;
