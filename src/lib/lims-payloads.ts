/**
 * CSV rows → LIMS import payloads (rules, specs, parameter types,
 * template fields). Every item is wrapped as `{ action: "create", data }`.
 */

import type {
  ImportedRule,
  ImportedRulesPayload,
  ParameterType,
  ParameterTypesPayload,
  Spec,
  SpecTranslations,
  SpecsPayload,
  TemplateFieldsPayload,
} from "@/types";
import { cleanText, nullIfBlankOrLiteralNull, toInt, toNumberOrKeep, toText } from "./csv-coercion";
import type { CsvRow } from "./csv-table";
import { normalizeHeader } from "./csv-merge";
import { parseJsonText } from "./payload-json";
import { isMapping } from "./json-tree";
import { SPEC_TEXT_PLACEHOLDER } from "./rule-constants";

export type PayloadKind = "rules" | "specs" | "parametertypes" | "templatefields";

export const PAYLOAD_KINDS: readonly PayloadKind[] = ["rules", "specs", "parametertypes", "templatefields"];

export function isPayloadKind(value: string): value is PayloadKind {
  return (PAYLOAD_KINDS as readonly string[]).includes(value);
}

/** Cell by header name, ignoring case and surrounding spaces; undefined when the column is absent. */
export function cell(row: CsvRow, header: string): string | undefined {
  if (Object.hasOwn(row, header)) return row[header];
  const wanted = normalizeHeader(header);
  const key = Object.keys(row).find((k) => normalizeHeader(k) === wanted);
  return key === undefined ? undefined : row[key];
}

// ─── Rules ──────────────────────────────────────────────────

export function ruleFromRow(row: CsvRow): ImportedRule {
  const get = (header: string) => cell(row, header);
  return {
    color: toText(get("color")),
    column: toInt(get("column")),
    DDF_target_value: nullIfBlankOrLiteralNull(get("DDF_target_value")),
    DDF_type: toText(get("DDF_type")),
    DDF_unit: nullIfBlankOrLiteralNull(get("DDF_unit")),
    inverse: toInt(get("inverse")),
    linker: nullIfBlankOrLiteralNull(get("linker")),
    operator: toText(get("operator")),
    operator2: nullIfBlankOrLiteralNull(get("operator2")),
    parametertype_id: toInt(get("parametertype_id")),
    regex_filter: nullIfBlankOrLiteralNull(get("regex_filter")),
    show: toInt(get("show")),
    spec_id: toInt(get("spec_id")),
    text: nullIfBlankOrLiteralNull(get("text")),
    translations: nullIfBlankOrLiteralNull(get("translations")),
    value: toNumberOrKeep(get("value")),
    value2: nullIfBlankOrLiteralNull(get("value2")),
  };
}

export function buildRulesPayloadFromRows(rows: readonly CsvRow[]): ImportedRulesPayload {
  return { rules: rows.map((row) => ({ action: "create", data: ruleFromRow(row) })) };
}

// ─── Specs ──────────────────────────────────────────────────

export function specTranslationsFor(name: string): SpecTranslations {
  return {
    en: {
      name,
      DDF_Defaulttext_OK: SPEC_TEXT_PLACEHOLDER,
      DDF_Defaulttext_NOT_OK: SPEC_TEXT_PLACEHOLDER,
      DDF_Defaulttext_Toleranzbereich_NOT_OK: SPEC_TEXT_PLACEHOLDER,
    },
  };
}

export function specFromRow(row: CsvRow): Spec {
  const name = toText(cell(row, "name"));
  return {
    name,
    type: toInt(cell(row, "type")),
    status: toInt(cell(row, "status")),
    archiviert: toInt(cell(row, "archiviert")),
    order: nullIfBlankOrLiteralNull(cell(row, "order")),
    // the LIMS expects this field as JSON text
    translations: JSON.stringify(specTranslationsFor(name)),
  };
}

export function buildSpecsPayload(rows: readonly CsvRow[]): SpecsPayload {
  return { specs: rows.map((row) => ({ action: "create", data: specFromRow(row) })) };
}

/** Second decode of a spec's `translations` text; throws when it is not `{ en: { name } }`. */
export function readSpecTranslations(spec: Pick<Spec, "translations">): SpecTranslations {
  const parsed = parseJsonText(spec.translations, "spec translations");
  if (!isMapping(parsed) || !isMapping(parsed.en)) {
    throw new Error("Spec translations must be an object with an 'en' entry");
  }
  const en = parsed.en;
  const text = (key: string): string => {
    const value = en[key];
    return typeof value === "string" ? value : "";
  };
  return {
    en: {
      name: text("name"),
      DDF_Defaulttext_OK: text("DDF_Defaulttext_OK"),
      DDF_Defaulttext_NOT_OK: text("DDF_Defaulttext_NOT_OK"),
      DDF_Defaulttext_Toleranzbereich_NOT_OK: text("DDF_Defaulttext_Toleranzbereich_NOT_OK"),
    },
  };
}

// ─── Parameter types ────────────────────────────────────────

export function parameterTypeFromRow(row: CsvRow): ParameterType {
  const get = (header: string) => cleanText(cell(row, header));
  return {
    name: get("name"),
    group_id: get("group_id"),
    DDF_days: get("DDF_days"),
    DDF_price: get("DDF_price"),
    description: get("description"),
    einheit: get("einheit"),
    DDF_GBAID: get("DDF_GBAID"),
    translations: {
      en: {
        name: get("translations_en_name"),
        einheit: get("translations_en_einheit"),
      },
    },
  };
}

/** Rows marked `existing = yes` are already in the LIMS and are skipped. */
export function buildParameterTypesPayload(rows: readonly CsvRow[]): {
  payload: ParameterTypesPayload;
  skipped: number;
} {
  const fresh = rows.filter((row) => cleanText(cell(row, "existing")).toLowerCase() !== "yes");
  return {
    payload: { parametertypes: fresh.map((row) => ({ action: "create", data: parameterTypeFromRow(row) })) },
    skipped: rows.length - fresh.length,
  };
}

// ─── Template fields ────────────────────────────────────────

export function buildTemplateFieldsPayload(rows: readonly CsvRow[]): TemplateFieldsPayload {
  return {
    templatefields: rows.map((row) => ({
      action: "create",
      data: { template_id: cleanText(cell(row, "template_id")), field: cleanText(cell(row, "field")) },
    })),
  };
}
