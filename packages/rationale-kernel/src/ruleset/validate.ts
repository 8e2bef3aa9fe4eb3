// Rationale Kernel - ruleset admission
//
// A ruleset is checked once, before the engine is handed out:
// - every state has a headline, and no headline names an unknown state
// - every rule targets a known state
// - every path a rule reads (condition or bullet placeholder) is declared in inputs_used
// - every declared path is inside the configured feature/channel scope
// - rule ids are unique

import type { RationaleRuleSetV1 } from "@cogwatch/contracts";
import { assertAllowedFieldPath, type FieldScope } from "../inputs/field_map";
import { collectFieldPathsFromConditionV1 } from "../templates/condition_engine";
import { collectPlaceholderPaths } from "../templates/text_template";

export type RulesetScope = FieldScope & {
  states: ReadonlyArray<string>;
};

export function assertValidRuleSetV1(ruleset: RationaleRuleSetV1, scope: RulesetScope): void {
  const where = `ruleset:${ruleset.ruleset_id}`;

  for (const s of scope.states) {
    if (typeof ruleset.headlines[s] !== "string") {
      throw new Error(`HEADLINE_MISSING: ${s} @ ${where}`);
    }
  }
  for (const s of Object.keys(ruleset.headlines)) {
    if (!scope.states.includes(s)) {
      throw new Error(`HEADLINE_FOR_UNKNOWN_STATE: ${s} @ ${where}`);
    }
  }

  for (const p of ruleset.inputs_used) {
    assertAllowedFieldPath(p, scope, `${where}.inputs_used`);
  }

  const seen = new Set<string>();
  for (const rule of ruleset.rules) {
    const at = `rule:${rule.rule_id}`;
    if (seen.has(rule.rule_id)) throw new Error(`RULE_ID_DUPLICATE: ${rule.rule_id} @ ${where}`);
    seen.add(rule.rule_id);

    if (!scope.states.includes(rule.state)) {
      throw new Error(`RULE_STATE_UNKNOWN: ${rule.state} @ ${at}`);
    }

    const referenced = new Set<string>(collectPlaceholderPaths(rule.bullet));
    if (rule.when) {
      for (const p of collectFieldPathsFromConditionV1(rule.when)) referenced.add(p);
    }
    for (const p of referenced) {
      if (!ruleset.inputs_used.includes(p)) {
        throw new Error(`INPUT_PATH_NOT_DECLARED_IN_INPUTS_USED: ${p} @ ${at}`);
      }
    }
  }

  for (const s of scope.states) {
    for (const p of collectPlaceholderPaths(ruleset.headlines[s])) {
      if (!ruleset.inputs_used.includes(p)) {
        throw new Error(`INPUT_PATH_NOT_DECLARED_IN_INPUTS_USED: ${p} @ headline:${s}`);
      }
    }
  }
}
