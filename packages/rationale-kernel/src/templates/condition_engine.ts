// Rationale Kernel - condition templates
//
// ABOVE / BELOW compare one field against a configured threshold with a
// strict inequality. A missing (null) field never satisfies a comparison.
// LOGICAL_AND holds when every child holds.

import type { ConditionV1 } from "@cogwatch/contracts";
import type { FieldMap } from "../inputs/field_map";

export function evalConditionV1(fieldMap: FieldMap, cond: ConditionV1): boolean {
  switch (cond.template_id) {
    case "ABOVE": {
      const v = fieldMap.get(cond.field_path);
      return typeof v === "number" && v > cond.threshold;
    }
    case "BELOW": {
      const v = fieldMap.get(cond.field_path);
      return typeof v === "number" && v < cond.threshold;
    }
    case "LOGICAL_AND":
      return cond.children.every((c) => evalConditionV1(fieldMap, c));
    default: {
      const _never: never = cond;
      throw new Error(`UNREACHABLE_TEMPLATE_ID: ${JSON.stringify(_never)}`);
    }
  }
}

export function collectFieldPathsFromConditionV1(cond: ConditionV1): ReadonlySet<string> {
  const paths = new Set<string>();

  const walk = (node: ConditionV1): void => {
    if (node.template_id === "LOGICAL_AND") {
      for (const child of node.children) walk(child);
      return;
    }
    paths.add(node.field_path);
  };

  walk(cond);
  return paths;
}
