/**
 * Rule generator form → rules payload. Every row is validated with
 * `parseParamInput`, the same parser the `generate` command uses, and all
 * row errors are reported together.
 */

import type { RulesPayload } from "@/types";
import { parseParamInput } from "./param-input";
import type { ParamInputFields, ParamSpec, QualitativeTexts } from "./param-input";
import { buildRulesForParameters } from "./rule-builder";

export interface GeneratorForm {
  specId: string;
  rows: readonly ParamInputFields[];
  qualitative: QualitativeTexts;
}

export type GeneratorFormResult =
  | { ok: true; specId: number; payload: RulesPayload; warnings: string[]; notes: string[] }
  | { ok: false; errors: string[] };

export const EMPTY_PARAM_ROW: ParamInputFields = {
  parametertypeId: "",
  target: "",
  unit: "",
  mode: "active",
  deviationPercent: "",
  upper: "",
};

export function parseSpecId(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number.parseInt(trimmed, 10);
  return value > 0 ? value : null;
}

export function evaluateGeneratorForm(form: GeneratorForm): GeneratorFormResult {
  const errors: string[] = [];
  const specId = parseSpecId(form.specId);
  if (specId === null) errors.push(`Invalid spec_id "${form.specId}". Must be a positive integer.`);
  if (form.rows.length === 0) errors.push("Add at least one parameter.");

  const specs: ParamSpec[] = [];
  form.rows.forEach((row, index) => {
    const parsed = parseParamInput(row, form.qualitative);
    if (parsed.ok) specs.push(parsed.spec);
    else errors.push(`Row ${index + 1}: ${parsed.error}`);
  });

  if (specId === null || errors.length > 0) return { ok: false, errors };

  const built = buildRulesForParameters(
    specId,
    specs.map(({ parametertypeId, mode }) => ({ parametertypeId, mode })),
  );
  if (!built.ok) return { ok: false, errors: [built.error] };

  const notes = specs.flatMap((spec) => spec.notes.map((note) => `parametertype_id ${spec.parametertypeId}: ${note}`));
  return { ok: true, specId, payload: { rules: built.rules }, warnings: built.warnings, notes };
}
