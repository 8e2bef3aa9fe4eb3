// Rationale Kernel - text templates
//
// Placeholders: {feature.name} or {raw.channel|digits}.
// Numbers are rounded to `digits` and printed without trailing zeros
// (4.50 -> "4.5"); a missing value prints as "n/a".

import type { FieldMap } from "../inputs/field_map";

const PLACEHOLDER_RE = /\{((?:feature|raw)\.[A-Za-z0-9_]+)(?:\|(\d))?\}/g;

export function formatFieldValue(v: number | null | undefined, digits?: number): string {
  if (typeof v !== "number" || !Number.isFinite(v)) return "n/a";
  if (digits === undefined) return String(v);
  return String(Number(v.toFixed(digits)));
}

export function renderTextTemplate(template: string, fieldMap: FieldMap): string {
  return template.replace(PLACEHOLDER_RE, (_m, path: string, digits: string | undefined) =>
    formatFieldValue(fieldMap.get(path), digits === undefined ? undefined : Number(digits))
  );
}

export function collectPlaceholderPaths(template: string): ReadonlySet<string> {
  const out = new Set<string>();
  for (const m of template.matchAll(PLACEHOLDER_RE)) out.add(m[1]);
  return out;
}
