/**
 * Nutrition rules generator: table-driven deviation bands per parameter.
 *
 * The parameter table (src/data/nutrition-parameters.json) lists every
 * nutrition parameter in display order with its group and, for locked and
 * sodium-like parameters, the named deviation policy that applies at
 * g/100g:
 *   - locked: unit forced to g/100g, table policy
 *   - sodiumLike: table policy when the unit is g/100g, else deviation %
 *   - other: deviation %
 * A missing deviation % defaults to 10 with a warning. A blank target
 * produces a placeholder rule that keeps the unit.
 */

import nutritionTable from "@/data/nutrition-parameters.json";
import type { RuleItem, RulesPayload } from "@/types";
import type { BandMode } from "./band-modes";
import { parseLocaleNumber } from "./locale-number";
import type { DeviationPolicy } from "./numeric-policy";
import { buildRules } from "./rule-builder";
import { DEFAULT_DEVIATION_PERCENT, LOCKED_UNIT, MAX_DEVIATION_PERCENT } from "./rule-constants";

// ─── Types ──────────────────────────────────────────────────

export type NutritionGroup = "locked" | "sodiumLike" | "other";

export interface NutritionParameter {
  parametertypeId: number;
  name: string;
  group: NutritionGroup;
  /** Policy at g/100g; null for "other" parameters. */
  policy: DeviationPolicy | null;
}

/** Raw form values for one parameter. */
export interface NutritionInput {
  target: string;
  unit?: string | null;
  deviationPercent?: string;
}

export interface NutritionBuildInput {
  specId: number;
  inputs: Readonly<Record<number, NutritionInput | undefined>>;
}

export interface NutritionBuildResult {
  payload: RulesPayload;
  /** Defaults that were applied. */
  warnings: string[];
  /** Input that was adjusted or may need attention. */
  notes: string[];
  /** Parameters that emitted no rules because their input is invalid. */
  errors: string[];
}

// ─── Table loading ──────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberField(record: Record<string, unknown>, key: string, where: string): number {
  const value = record[key];
  if (typeof value !== "number") throw new Error(`${where}: "${key}" must be a number`);
  return value;
}

function readPolicy(value: unknown, where: string): DeviationPolicy {
  if (!isRecord(value)) throw new Error(`${where}: policy must be an object`);
  const record = value;
  const num = (key: string) => numberField(record, key, where);
  switch (record.type) {
    case "percent":
      return { type: "percent", percent: num("percent") };
    case "piecewise":
      return {
        type: "piecewise",
        lowThreshold: num("lowThreshold"),
        highThreshold: num("highThreshold"),
        lowAbsolute: num("lowAbsolute"),
        highAbsolute: num("highAbsolute"),
        percent: num("percent"),
      };
    case "threshold":
      return {
        type: "threshold",
        threshold: num("threshold"),
        lowAbsolute: num("lowAbsolute"),
        percent: num("percent"),
      };
    default:
      throw new Error(`${where}: unknown policy type ${String(record.type)}`);
  }
}

function isNutritionGroup(value: unknown): value is NutritionGroup {
  return value === "locked" || value === "sodiumLike" || value === "other";
}

export function loadNutritionTable(table: unknown): {
  parameters: NutritionParameter[];
  unitOptions: string[];
} {
  if (!isRecord(table)) throw new Error("Nutrition table must be an object");
  const policies = table.policies;
  const entries = table.parameters;
  if (!isRecord(policies) || !Array.isArray(entries)) {
    throw new Error("Nutrition table must have 'policies' and 'parameters'");
  }

  const parameters = entries.map((entry: unknown, index): NutritionParameter => {
    const where = `nutrition parameter #${index + 1}`;
    if (!isRecord(entry)) throw new Error(`${where}: must be an object`);
    const group = entry.group;
    if (!isNutritionGroup(group)) throw new Error(`${where}: unknown group ${String(group)}`);
    if (typeof entry.name !== "string") throw new Error(`${where}: "name" must be a string`);

    const policyName = entry.policy;
    let policy: DeviationPolicy | null = null;
    if (typeof policyName === "string") {
      policy = readPolicy(policies[policyName], `${where} (${policyName})`);
    } else if (group !== "other") {
      throw new Error(`${where}: ${group} parameters need a policy`);
    }

    return { parametertypeId: numberField(entry, "parametertypeId", where), name: entry.name, group, policy };
  });

  const options = table.unitOptions;
  const unitOptions = Array.isArray(options)
    ? options.filter((u): u is string => typeof u === "string")
    : [LOCKED_UNIT];

  return { parameters, unitOptions };
}

const catalog = loadNutritionTable(nutritionTable);

export const NUTRITION_PARAMETERS: readonly NutritionParameter[] = catalog.parameters;
export const NUTRITION_UNIT_OPTIONS: readonly string[] = catalog.unitOptions;

// ─── Per-parameter decisions ────────────────────────────────

export function effectiveUnit(param: NutritionParameter, unit: string | null | undefined): string | null {
  if (param.group === "locked") return LOCKED_UNIT;
  const trimmed = (unit ?? "").trim();
  return trimmed === "" ? null : trimmed;
}

/** Whether the form should ask for a deviation % for this parameter and unit. */
export function needsDeviationPercent(param: NutritionParameter, unit: string | null | undefined): boolean {
  if (param.group === "other") return true;
  if (param.group === "sodiumLike") return effectiveUnit(param, unit) !== LOCKED_UNIT;
  return false;
}

// ─── Generator ──────────────────────────────────────────────

export function buildNutritionRules(input: NutritionBuildInput): NutritionBuildResult {
  const rules: RuleItem[] = [];
  const warnings: string[] = [];
  const notes: string[] = [];
  const errors: string[] = [];

  for (const param of NUTRITION_PARAMETERS) {
    const raw = input.inputs[param.parametertypeId];
    const unit = effectiveUnit(param, raw?.unit);
    const parsed = parseLocaleNumber(raw?.target);

    if (parsed.error) {
      errors.push(`${param.name}: ${parsed.error} (input: ${raw?.target ?? ""})`);
      continue;
    }

    if (parsed.hadUnitText) {
      if (param.group === "locked") {
        notes.push(`${param.name}: unit text was removed from target. Note: units must be ${LOCKED_UNIT}.`);
      } else if (unit === null && parsed.extractedUnit) {
        notes.push(
          `${param.name}: detected unit '${parsed.extractedUnit}' in target input. Consider entering it in the Unit field.`,
        );
      }
    }

    let mode: BandMode;
    if (parsed.value === null) {
      mode = { kind: "blank", unit };
    } else if (param.policy && !needsDeviationPercent(param, unit)) {
      mode = { kind: "deviation", target: parsed.value, unit, policy: param.policy };
    } else {
      const percent = readDeviationPercent(param, raw?.deviationPercent, unit);
      if (!percent.ok) {
        errors.push(percent.error);
        continue;
      }
      if (percent.defaulted) warnings.push(percent.warning);
      mode = { kind: "deviation", target: parsed.value, unit, policy: { type: "percent", percent: percent.value } };
    }

    const built = buildRules({ parametertypeId: param.parametertypeId, specId: input.specId, mode });
    if (!built.ok) {
      errors.push(`${param.name}: ${built.error}`);
      continue;
    }
    rules.push(...built.rules);
    warnings.push(...built.warnings.map((w) => `${param.name}: ${w}`));
  }

  return { payload: { rules }, warnings, notes, errors };
}

type PercentResult =
  | { ok: true; value: number; defaulted: false }
  | { ok: true; value: number; defaulted: true; warning: string }
  | { ok: false; error: string };

function readDeviationPercent(
  param: NutritionParameter,
  raw: string | undefined,
  unit: string | null,
): PercentResult {
  const parsed = parseLocaleNumber(raw);
  if (parsed.error) {
    return { ok: false, error: `${param.name}: deviation% is not a valid number.` };
  }
  if (parsed.value === null) {
    const warning =
      param.group === "sodiumLike"
        ? `${param.name}: unit is not '${LOCKED_UNIT}' (${unit ?? "none"}), so deviation% is required. Defaulted to ${DEFAULT_DEVIATION_PERCENT}%.`
        : `${param.name}: deviation% not provided. Defaulted to ${DEFAULT_DEVIATION_PERCENT}%.`;
    return { ok: true, value: DEFAULT_DEVIATION_PERCENT, defaulted: true, warning };
  }
  if (parsed.value < 0 || parsed.value > MAX_DEVIATION_PERCENT) {
    return { ok: false, error: `${param.name}: deviation% must be between 0 and ${MAX_DEVIATION_PERCENT}.` };
  }
  return { ok: true, value: parsed.value, defaulted: false };
}
