import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { ConditionV1 } from "@cogwatch/contracts";
import { assertAllowedFieldPath, projectFieldMap } from "../inputs/field_map";
import { collectFieldPathsFromConditionV1, evalConditionV1 } from "../templates/condition_engine";
import { collectPlaceholderPaths, formatFieldValue, renderTextTemplate } from "../templates/text_template";

const fields = new Map<string, number | null>([
  ["feature.a", 2.26],
  ["feature.b", null],
  ["raw.p", 7],
]);

describe("text templates", () => {
  it("formats numbers without trailing zeros", () => {
    assert.equal(formatFieldValue(4.5, 2), "4.5");
    assert.equal(formatFieldValue(0.1234, 3), "0.123");
    assert.equal(formatFieldValue(3), "3");
    assert.equal(formatFieldValue(12, 2), "12");
    assert.equal(formatFieldValue(null, 2), "n/a");
    assert.equal(formatFieldValue(Number.NaN), "n/a");
  });

  it("substitutes field placeholders and leaves other braces alone", () => {
    assert.equal(
      renderTextTemplate("a={feature.a|1} b={feature.b} p={raw.p} z={feature.z} {other}", fields),
      "a=2.3 b=n/a p=7 z=n/a {other}"
    );
  });

  it("collects placeholder paths", () => {
    assert.deepEqual([...collectPlaceholderPaths("{feature.a|2} and {raw.p} and {feature.a}")], ["feature.a", "raw.p"]);
  });
});

describe("condition templates", () => {
  const and: ConditionV1 = {
    template_id: "LOGICAL_AND",
    children: [
      { template_id: "ABOVE", field_path: "feature.a", threshold: 2 },
      { template_id: "BELOW", field_path: "raw.p", threshold: 10 },
    ],
  };

  it("compares strictly", () => {
    assert.equal(evalConditionV1(fields, { template_id: "ABOVE", field_path: "feature.a", threshold: 2.26 }), false);
    assert.equal(evalConditionV1(fields, { template_id: "ABOVE", field_path: "feature.a", threshold: 2.25 }), true);
    assert.equal(evalConditionV1(fields, { template_id: "BELOW", field_path: "raw.p", threshold: 7 }), false);
    assert.equal(evalConditionV1(fields, { template_id: "BELOW", field_path: "raw.p", threshold: 7.5 }), true);
  });

  it("never matches a missing or unknown field", () => {
    assert.equal(evalConditionV1(fields, { template_id: "BELOW", field_path: "feature.b", threshold: 100 }), false);
    assert.equal(evalConditionV1(fields, { template_id: "ABOVE", field_path: "feature.q", threshold: -100 }), false);
  });

  it("requires every child of LOGICAL_AND", () => {
    assert.equal(evalConditionV1(fields, and), true);
    const withMissing: ConditionV1 = {
      template_id: "LOGICAL_AND",
      children: [and, { template_id: "ABOVE", field_path: "feature.b", threshold: 0 }],
    };
    assert.equal(evalConditionV1(fields, withMissing), false);
    assert.deepEqual([...collectFieldPathsFromConditionV1(withMissing)], ["feature.a", "raw.p", "feature.b"]);
  });
});

describe("field map", () => {
  it("projects features and raw channels under prefixed keys", () => {
    const map = projectFieldMap(
      { owner_id: "o", position: 1, t: 1, values: { b: 1, a: null }, filled: ["a"], complete: false },
      { p: 2 }
    );
    assert.deepEqual(
      [...map.entries()],
      [
        ["feature.a", null],
        ["feature.b", 1],
        ["raw.p", 2],
      ]
    );
  });

  it("checks paths against the configured scope", () => {
    const scope = { featureNames: ["a"], channels: ["p"] };
    assert.doesNotThrow(() => assertAllowedFieldPath("raw.p", scope, "t"));
    assert.throws(() => assertAllowedFieldPath("raw.a", scope, "t"), /FIELD_PATH_NOT_IN_SCOPE: raw\.a @ t/);
    assert.throws(() => assertAllowedFieldPath("a", scope, "t"), /FIELD_PATH_MALFORMED/);
  });
});
