/**
 * Rules wire format: the `{ rules: [...] }` document the LIMS import
 * consumes. Every field is always present; absent values are `null`.
 */

import type { JsonValue } from "./json";

export type DdfType = "perfect" | "OK" | "not OK";

export type RuleColor = "green" | "orange" | "red";

export type RuleOperator = "<=" | "<" | ">=" | ">" | "=" | "!=";

export type RuleLinker = "AND" | "OR";

/** Numeric threshold, qualitative match text, or the dummy sentinel `""`. */
export type RuleValue = number | string;

export type Rule = {
  color: RuleColor;
  column: number;
  DDF_target_value: number | null;
  DDF_type: DdfType;
  DDF_unit: string | null;
  inverse: number;
  linker: RuleLinker | null;
  operator: RuleOperator;
  operator2: RuleOperator | null;
  parametertype_id: number;
  regex_filter: string | null;
  show: number;
  spec_id: number;
  text: string | null;
  translations: string | null;
  value: RuleValue;
  value2: RuleValue | null;
};

/** `action` is passed through untouched; generated items always say "create". */
export type RuleItem = { action: string; data: Rule };

export type RulesPayload = { rules: RuleItem[] };

/**
 * A rules document as loaded from disk: only the `rules` list is checked,
 * its items (and any sibling keys) are carried as plain JSON.
 */
export type RulesDocument = { [key: string]: JsonValue; rules: JsonValue[] };

/**
 * Rule record rebuilt from a rules CSV row. Columns keep whatever the sheet
 * holds, so most fields are looser than a generated `Rule`.
 */
export type ImportedRule = {
  color: string;
  column: number | null;
  DDF_target_value: string | null;
  DDF_type: string;
  DDF_unit: string | null;
  inverse: number | null;
  linker: string | null;
  operator: string;
  operator2: string | null;
  parametertype_id: number | null;
  regex_filter: string | null;
  show: number | null;
  spec_id: number | null;
  text: string | null;
  translations: string | null;
  value: number | string | null;
  value2: string | null;
};

export type ImportedRulesPayload = { rules: { action: "create"; data: ImportedRule }[] };
