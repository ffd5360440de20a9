/**
 * Rule builder: turns one parameter's band mode into its ordered rule list.
 *
 * Order is always: perfect first, OK bands (low, then high) next, not OK
 * last. Expected input problems come back as `{ ok: false }`; nothing throws.
 */

import type { DdfType, Rule, RuleItem, RuleLinker, RuleOperator, RuleValue } from "@/types";
import type { BandMode } from "./band-modes";
import { clampToZero, roundHalfUp } from "./decimal-rounding";
import {
  computeActiveBands,
  computeDeviationBounds,
  computeLimit3Bands,
  computeLimitThreshold,
  computeMineralBands,
} from "./numeric-policy";
import type { ActiveBands, DeviationPolicy } from "./numeric-policy";
import { DEVIATION_PLACES, DUMMY_SENTINEL, FIXED_RULE_FIELDS, MAX_DEVIATION_PERCENT, RULE_ACTION } from "./rule-constants";
import { colorForDdfType } from "./rule-severity";

// ─── Types ──────────────────────────────────────────────────

export interface BuildRulesInput {
  parametertypeId: number;
  specId: number;
  mode: BandMode;
}

export type BuildRulesResult =
  | { ok: true; rules: RuleItem[]; warnings: string[] }
  | { ok: false; error: string };

interface Clause {
  operator: RuleOperator;
  value: RuleValue;
}

interface RuleShape {
  type: DdfType;
  first: Clause;
  second?: Clause & { linker: RuleLinker };
}

interface RuleContext {
  parametertypeId: number;
  specId: number;
  target: number | null;
  unit: string | null;
}

// ─── Assembly ───────────────────────────────────────────────

function makeRule(ctx: RuleContext, shape: RuleShape): RuleItem {
  const data: Rule = {
    color: colorForDdfType(shape.type),
    column: FIXED_RULE_FIELDS.column,
    DDF_target_value: ctx.target,
    DDF_type: shape.type,
    DDF_unit: ctx.unit,
    inverse: FIXED_RULE_FIELDS.inverse,
    linker: shape.second?.linker ?? null,
    operator: shape.first.operator,
    operator2: shape.second?.operator ?? null,
    parametertype_id: ctx.parametertypeId,
    regex_filter: FIXED_RULE_FIELDS.regex_filter,
    show: FIXED_RULE_FIELDS.show,
    spec_id: ctx.specId,
    text: FIXED_RULE_FIELDS.text,
    translations: FIXED_RULE_FIELDS.translations,
    value: shape.first.value,
    value2: shape.second?.value ?? null,
  };
  return { action: RULE_ACTION, data };
}

const perfectAt = (operator: RuleOperator, value: RuleValue): RuleShape => ({
  type: "perfect",
  first: { operator, value },
});

const notOkAt = (operator: RuleOperator, value: RuleValue): RuleShape => ({
  type: "not OK",
  first: { operator, value },
});

function between(
  type: DdfType,
  lower: Clause,
  upper: Clause,
  linker: RuleLinker,
): RuleShape {
  return { type, first: lower, second: { ...upper, linker } };
}

/** Zero target: only an exact zero is perfect. */
const ZERO_TARGET_SHAPES: RuleShape[] = [perfectAt("<=", 0), notOkAt(">", 0)];

function fourBandShapes(target: number, bands: ActiveBands): RuleShape[] {
  if (target === 0) return ZERO_TARGET_SHAPES;
  return [
    between("perfect", { operator: ">=", value: bands.lowPerfect }, { operator: "<=", value: bands.highPerfect }, "AND"),
    between("OK", { operator: ">=", value: bands.lowOk }, { operator: "<", value: bands.lowPerfect }, "AND"),
    between("OK", { operator: ">", value: bands.highPerfect }, { operator: "<=", value: bands.highOk }, "AND"),
    between("not OK", { operator: "<", value: bands.lowOk }, { operator: ">", value: bands.highOk }, "OR"),
  ];
}

function limit3Shapes(target: number): RuleShape[] {
  if (target === 0) return ZERO_TARGET_SHAPES;
  const { perfectMax, limit } = computeLimit3Bands(target);
  return [
    perfectAt("<=", perfectMax),
    between("OK", { operator: ">=", value: perfectMax }, { operator: "<=", value: limit }, "AND"),
    notOkAt(">", limit),
  ];
}

function deviationShapes(target: number, policy: DeviationPolicy): RuleShape[] {
  const { lower, upper } = computeDeviationBounds(target, policy);
  return [
    between("perfect", { operator: ">=", value: lower }, { operator: "<=", value: upper }, "AND"),
    between("not OK", { operator: "<", value: lower }, { operator: ">", value: upper }, "OR"),
  ];
}

// ─── Validation ─────────────────────────────────────────────

function validatePolicy(policy: DeviationPolicy): string | null {
  if (!(policy.percent >= 0 && policy.percent <= MAX_DEVIATION_PERCENT)) {
    return `Deviation % must be between 0 and ${MAX_DEVIATION_PERCENT} (got ${policy.percent}).`;
  }
  return null;
}

function validateTarget(target: number): string | null {
  if (!Number.isFinite(target)) return "Target must be a finite number.";
  if (target < 0) return `Target must not be negative (got ${target}).`;
  return null;
}

// ─── Builder ────────────────────────────────────────────────

const q4 = (value: number): number => roundHalfUp(value, DEVIATION_PLACES);

export function buildRules(input: BuildRulesInput): BuildRulesResult {
  const { parametertypeId, specId, mode } = input;

  if (!Number.isInteger(parametertypeId) || parametertypeId <= 0) {
    return { ok: false, error: `parametertype_id must be a positive integer (got ${parametertypeId}).` };
  }
  if (!Number.isInteger(specId) || specId <= 0) {
    return { ok: false, error: `spec_id must be a positive integer (got ${specId}).` };
  }

  const base = { parametertypeId, specId };
  const build = (ctx: RuleContext, shapes: RuleShape[], warnings: string[] = []): BuildRulesResult => ({
    ok: true,
    rules: shapes.map((shape) => makeRule(ctx, shape)),
    warnings,
  });

  if (mode.kind === "dummy") {
    return build({ ...base, target: null, unit: null }, [perfectAt("!=", DUMMY_SENTINEL)]);
  }
  if (mode.kind === "blank") {
    return build({ ...base, target: null, unit: mode.unit }, [perfectAt("!=", DUMMY_SENTINEL)]);
  }

  if (mode.kind === "range") {
    return buildRange(base, mode.lower, mode.upper, mode.unit);
  }

  const targetError = validateTarget(mode.target);
  if (targetError) return { ok: false, error: targetError };
  const { target, unit } = mode;
  const ctx: RuleContext = { ...base, target, unit };

  switch (mode.kind) {
    case "active":
      return build(ctx, fourBandShapes(target, computeActiveBands(target)));
    case "mineral":
      return build(ctx, fourBandShapes(target, computeMineralBands(target)));
    case "limit3":
      return build(ctx, limit3Shapes(target));
    case "limit2": {
      const limit = computeLimitThreshold(target);
      return build(ctx, [perfectAt("<=", limit), notOkAt(">", limit)]);
    }
    case "qualitative": {
      const en = mode.texts.en.trim();
      const de = mode.texts.de.trim();
      if (en === "" || de === "") {
        return { ok: false, error: "Qualitative mode needs both an English and a German text." };
      }
      return build(ctx, [
        between("perfect", { operator: "=", value: en }, { operator: "=", value: de }, "OR"),
        notOkAt(">", computeLimitThreshold(target)),
      ]);
    }
    case "deviation": {
      const policyError = validatePolicy(mode.policy);
      if (policyError) return { ok: false, error: policyError };
      return build({ ...ctx, target: q4(target) }, deviationShapes(target, mode.policy));
    }
    case "minimum":
      return build({ ...ctx, target: q4(target) }, [perfectAt(">=", q4(target)), notOkAt("<=", q4(target))]);
    case "maximum":
      return build({ ...ctx, target: q4(target) }, [perfectAt("<=", q4(target)), notOkAt(">=", q4(target))]);
  }
}

function buildRange(
  base: { parametertypeId: number; specId: number },
  lowerInput: number,
  upperInput: number,
  unit: string | null,
): BuildRulesResult {
  if (!Number.isFinite(lowerInput) || !Number.isFinite(upperInput)) {
    return { ok: false, error: "Lower and upper bounds must be finite numbers." };
  }
  const warnings: string[] = [];
  let lower = lowerInput;
  let upper = upperInput;
  if (lower < 0) {
    lower = clampToZero(lower);
    warnings.push("Lower bound was negative and was clamped to 0.");
  }
  if (upper < 0) {
    upper = clampToZero(upper);
    warnings.push("Upper bound was negative and was clamped to 0.");
  }
  if (lower >= upper) {
    [lower, upper] = [upper, lower];
    warnings.push("Lower bound was not below the upper bound; values were swapped.");
  }

  const ctx: RuleContext = { ...base, target: q4(lower), unit };
  const shapes = [
    between("perfect", { operator: ">=", value: q4(lower) }, { operator: "<=", value: q4(upper) }, "AND"),
    between("not OK", { operator: "<=", value: q4(lower) }, { operator: ">=", value: q4(upper) }, "OR"),
  ];
  return { ok: true, rules: shapes.map((shape) => makeRule(ctx, shape)), warnings };
}

/** Build several parameters into one rules list; stops at the first failure. */
export function buildRulesForParameters(
  specId: number,
  params: { parametertypeId: number; mode: BandMode }[],
): BuildRulesResult {
  const rules: RuleItem[] = [];
  const warnings: string[] = [];
  for (const param of params) {
    const result = buildRules({ ...param, specId });
    if (!result.ok) {
      return { ok: false, error: `parametertype_id ${param.parametertypeId}: ${result.error}` };
    }
    rules.push(...result.rules);
    warnings.push(...result.warnings.map((w) => `parametertype_id ${param.parametertypeId}: ${w}`));
  }
  return { ok: true, rules, warnings };
}
