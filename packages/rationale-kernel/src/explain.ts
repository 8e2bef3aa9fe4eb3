// Rationale Kernel - explain
//
// explain(prediction, features, raw) -> Rationale
//
// Rules for the predicted state are evaluated in declared order and every
// matching rule contributes its bullet (no short-circuit). The result depends
// only on the arguments and the admitted ruleset.

import type { FeatureVectorV1, PredictionV1, RationaleRuleSetV1, RationaleV1 } from "@cogwatch/contracts";
import { projectFieldMap } from "./inputs/field_map";
import { assertValidRuleSetV1, type RulesetScope } from "./ruleset/validate";
import { evalConditionV1 } from "./templates/condition_engine";
import { renderTextTemplate } from "./templates/text_template";

export interface RationaleEngine {
  readonly ruleset_id: string;
  explain(prediction: PredictionV1, features: FeatureVectorV1, raw: Readonly<Record<string, number | null>>): RationaleV1;
}

export function createRationaleEngine(ruleset: RationaleRuleSetV1, scope: RulesetScope): RationaleEngine {
  assertValidRuleSetV1(ruleset, scope);

  // Frozen copy so later edits to the caller's object cannot change answers.
  const rules = ruleset.rules.map((r) => Object.freeze({ ...r }));
  const headlines: Readonly<Record<string, string>> = Object.freeze({ ...ruleset.headlines });
  const states = [...scope.states];

  return {
    ruleset_id: ruleset.ruleset_id,
    explain(prediction, features, raw) {
      if (!states.includes(prediction.state)) {
        throw new Error(`PREDICTED_STATE_UNKNOWN: ${prediction.state} @ ruleset:${ruleset.ruleset_id}`);
      }
      const fieldMap = projectFieldMap(features, raw);

      const bullet_points: string[] = [];
      const fired_rule_ids: string[] = [];
      for (const rule of rules) {
        if (rule.state !== prediction.state) continue;
        if (rule.when && !evalConditionV1(fieldMap, rule.when)) continue;
        bullet_points.push(renderTextTemplate(rule.bullet, fieldMap));
        fired_rule_ids.push(rule.rule_id);
      }

      return {
        state: prediction.state,
        headline: renderTextTemplate(headlines[prediction.state], fieldMap),
        bullet_points,
        fired_rule_ids,
      };
    },
  };
}
