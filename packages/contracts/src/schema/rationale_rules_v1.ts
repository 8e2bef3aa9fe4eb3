import { z } from "zod";

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/);

// Field paths a rule may read: "feature.<name>" or "raw.<channel>".
export const FieldPathV1Schema = z.string().regex(/^(feature|raw)\.[A-Za-z0-9_]+$/);

export const ConditionTemplateIdV1Schema = z.enum(["ABOVE", "BELOW", "LOGICAL_AND"]);
export type ConditionTemplateIdV1 = z.infer<typeof ConditionTemplateIdV1Schema>;

export type ThresholdConditionV1 = {
  template_id: "ABOVE" | "BELOW";
  field_path: string;
  threshold: number;
};

export type LogicalAndConditionV1 = {
  template_id: "LOGICAL_AND";
  children: ReadonlyArray<ConditionV1>;
};

export type ConditionV1 = ThresholdConditionV1 | LogicalAndConditionV1;

export const ConditionV1Schema: z.ZodType<ConditionV1> = z.lazy(() =>
  z.union([
    z
      .object({
        template_id: z.enum(["ABOVE", "BELOW"]),
        field_path: FieldPathV1Schema,
        threshold: z.number().finite(),
      })
      .strict(),
    z
      .object({
        template_id: z.literal("LOGICAL_AND"),
        children: z.array(ConditionV1Schema).min(1),
      })
      .strict(),
  ])
);

/**
 * One bullet rule. Without `when` the bullet is always emitted for its state.
 * `bullet` may cite field values with `{feature.x}` or `{raw.y|2}` (digits after `|`).
 */
export const RationaleRuleV1Schema = z
  .object({
    rule_id: z.string().min(1),
    rule_version: SemVerZ,
    state: z.string().min(1),
    when: ConditionV1Schema.optional(),
    bullet: z.string().min(1),
  })
  .strict();

export type RationaleRuleV1 = z.infer<typeof RationaleRuleV1Schema>;

export const RationaleRuleSetV1Schema = z
  .object({
    type: z.literal("rationale_ruleset_v1"),
    schema_version: SemVerZ,
    ruleset_id: z.string().min(1),
    headlines: z.record(z.string().min(1)),
    // declared up front; every path a rule touches must be listed here
    inputs_used: z.array(FieldPathV1Schema),
    // evaluation order is array order
    rules: z.array(RationaleRuleV1Schema),
  })
  .strict();

export type RationaleRuleSetV1 = z.infer<typeof RationaleRuleSetV1Schema>;
