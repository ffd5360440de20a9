/**
 * Rule builder tests: per-mode rule shapes, ordering, validation and the
 * no-gap property of generated bands.
 */
import { describe, test, expect } from "vitest";
import { buildRules, buildRulesForParameters } from "@/lib/rule-builder";
import type { BuildRulesResult } from "@/lib/rule-builder";
import type { BandMode } from "@/lib/band-modes";
import type { Rule, RuleItem, RuleOperator, RuleValue } from "@/types";

// ─── Helpers ─────────────────────────────────────────────────

function rulesFor(mode: BandMode, parametertypeId = 5587, specId = 1029): RuleItem[] {
  const result = buildRules({ parametertypeId, specId, mode });
  if (!result.ok) throw new Error(result.error);
  return result.rules;
}

function errorOf(result: BuildRulesResult): string {
  return result.ok ? "" : result.error;
}

/** Compact view of the comparison part of each rule. */
function shapes(rules: RuleItem[]) {
  return rules.map(({ data }) => [data.DDF_type, data.operator, data.value, data.linker, data.operator2, data.value2]);
}

function compare(operator: RuleOperator, x: number, value: RuleValue | null): boolean {
  if (typeof value !== "number") return false;
  switch (operator) {
    case "<=": return x <= value;
    case "<": return x < value;
    case ">=": return x >= value;
    case ">": return x > value;
    case "=": return x === value;
    case "!=": return x !== value;
  }
}

function matches(rule: Rule, x: number): boolean {
  const first = compare(rule.operator, x, rule.value);
  if (rule.operator2 === null) return first;
  const second = compare(rule.operator2, x, rule.value2);
  return rule.linker === "OR" ? first || second : first && second;
}

const grid = Array.from({ length: 301 }, (_, i) => i / 10);

// ─── Fixed-multiplier modes ──────────────────────────────────

describe("active mode", () => {
  test("target 12 → perfect [10.8, 15], OK [9.6, 10.8) and (15, 18], not OK outside", () => {
    const rules = rulesFor({ kind: "active", target: 12, unit: "mg" });
    expect(shapes(rules)).toEqual([
      ["perfect", ">=", 10.8, "AND", "<=", 15],
      ["OK", ">=", 9.6, "AND", "<", 10.8],
      ["OK", ">", 15, "AND", "<=", 18],
      ["not OK", "<", 9.6, "OR", ">", 18],
    ]);
    expect(rules.map((r) => r.data.color)).toEqual(["green", "orange", "orange", "red"]);
    expect(rules.every((r) => r.data.DDF_target_value === 12 && r.data.DDF_unit === "mg")).toBe(true);
  });

  test("every value matches exactly one of the four rules", () => {
    const rules = rulesFor({ kind: "active", target: 12, unit: "mg" });
    for (const x of grid) {
      expect(rules.filter((r) => matches(r.data, x)).length).toBe(1);
    }
  });

  test("target 0 gives the two-rule zero case", () => {
    expect(shapes(rulesFor({ kind: "active", target: 0, unit: null }))).toEqual([
      ["perfect", "<=", 0, null, null, null],
      ["not OK", ">", 0, null, null, null],
    ]);
  });

  test("generated record carries every field in LIMS column order", () => {
    const [rule] = rulesFor({ kind: "active", target: 12, unit: "mg" });
    expect(rule.action).toBe("create");
    expect(Object.keys(rule.data)).toEqual([
      "color", "column", "DDF_target_value", "DDF_type", "DDF_unit", "inverse", "linker", "operator",
      "operator2", "parametertype_id", "regex_filter", "show", "spec_id", "text", "translations", "value", "value2",
    ]);
    expect(rule.data).toMatchObject({
      column: 0, inverse: 0, show: 1, regex_filter: null, text: null, translations: null,
      parametertype_id: 5587, spec_id: 1029,
    });
  });
});

describe("mineral mode", () => {
  test("upper OK ceiling is 1.45 × target", () => {
    const rules = rulesFor({ kind: "mineral", target: 10, unit: "mg" });
    expect(rules[2].data.value2).toBe(14.5);
    expect(rules[3].data.value2).toBe(14.5);
    expect(rules[0].data.value).toBe(9);
  });
});

describe("limit modes", () => {
  test("limit3 target 10 → perfect ≤ 3, OK 3..10, not OK > 10", () => {
    expect(shapes(rulesFor({ kind: "limit3", target: 10, unit: "%" }))).toEqual([
      ["perfect", "<=", 3, null, null, null],
      ["OK", ">=", 3, "AND", "<=", 10],
      ["not OK", ">", 10, null, null, null],
    ]);
  });

  test("limit3 leaves no gap", () => {
    const rules = rulesFor({ kind: "limit3", target: 10, unit: "%" });
    for (const x of grid) {
      expect(rules.some((r) => matches(r.data, x))).toBe(true);
    }
  });

  test("limit3 at zero matches the active zero case", () => {
    expect(shapes(rulesFor({ kind: "limit3", target: 0, unit: null }))).toEqual(
      shapes(rulesFor({ kind: "active", target: 0, unit: null })),
    );
  });

  test("limit2 uses one threshold for both rules, also at zero", () => {
    expect(shapes(rulesFor({ kind: "limit2", target: 7.255, unit: null }))).toEqual([
      ["perfect", "<=", 7.26, null, null, null],
      ["not OK", ">", 7.26, null, null, null],
    ]);
    expect(rulesFor({ kind: "limit2", target: 0, unit: null })).toHaveLength(2);
  });
});

// ─── Text and placeholder modes ──────────────────────────────

describe("qualitative mode", () => {
  test("perfect matches either text, not OK is numeric", () => {
    const rules = rulesFor({ kind: "qualitative", target: 0, unit: null, texts: { en: "negative", de: "negativ" } });
    expect(shapes(rules)).toEqual([
      ["perfect", "=", "negative", "OR", "=", "negativ"],
      ["not OK", ">", 0, null, null, null],
    ]);
  });

  test("a missing text is a validation error", () => {
    const result = buildRules({
      parametertypeId: 5587,
      specId: 1029,
      mode: { kind: "qualitative", target: 1, unit: null, texts: { en: "negative", de: "  " } },
    });
    expect(errorOf(result)).toBe("Qualitative mode needs both an English and a German text.");
  });
});

describe("dummy mode", () => {
  test("one rule with the literal two-quote sentinel and no target or unit", () => {
    const rules = rulesFor({ kind: "dummy" }, 11377, 42);
    expect(rules).toHaveLength(1);
    expect(rules[0].data).toMatchObject({
      DDF_type: "perfect",
      color: "green",
      operator: "!=",
      value: '""',
      DDF_target_value: null,
      DDF_unit: null,
      spec_id: 42,
    });
    expect(JSON.stringify(rules[0].data.value)).toBe('"\\"\\""');
  });

  test("blank keeps the declared unit", () => {
    const [rule] = rulesFor({ kind: "blank", unit: "g/100g" });
    expect(rule.data.value).toBe('""');
    expect(rule.data.DDF_unit).toBe("g/100g");
  });
});

// ─── Deviation and lab-limit modes ───────────────────────────

describe("deviation mode", () => {
  test("±10% of 12 → [10.8, 13.2]", () => {
    const rules = rulesFor({ kind: "deviation", target: 12, unit: "g/100g", policy: { type: "percent", percent: 10 } });
    expect(shapes(rules)).toEqual([
      ["perfect", ">=", 10.8, "AND", "<=", 13.2],
      ["not OK", "<", 10.8, "OR", ">", 13.2],
    ]);
  });

  test("deviation % above 50 is rejected", () => {
    const result = buildRules({
      parametertypeId: 5587,
      specId: 1,
      mode: { kind: "deviation", target: 12, unit: null, policy: { type: "percent", percent: 60 } },
    });
    expect(errorOf(result)).toBe("Deviation % must be between 0 and 50 (got 60).");
  });
});

describe("minimum / maximum / range", () => {
  test("minimum: perfect at or above, not OK at or below", () => {
    expect(shapes(rulesFor({ kind: "minimum", target: 0.35, unit: "g/cm3" }))).toEqual([
      ["perfect", ">=", 0.35, null, null, null],
      ["not OK", "<=", 0.35, null, null, null],
    ]);
  });

  test("maximum reverses the operators", () => {
    expect(shapes(rulesFor({ kind: "maximum", target: 12, unit: "%" }))).toEqual([
      ["perfect", "<=", 12, null, null, null],
      ["not OK", ">=", 12, null, null, null],
    ]);
  });

  test("range swaps inverted bounds with a warning", () => {
    const result = buildRules({ parametertypeId: 11194, specId: 7, mode: { kind: "range", lower: 5, upper: 2, unit: "g/cm3" } });
    if (!result.ok) throw new Error(result.error);
    expect(result.warnings).toEqual(["Lower bound was not below the upper bound; values were swapped."]);
    expect(shapes(result.rules)).toEqual([
      ["perfect", ">=", 2, "AND", "<=", 5],
      ["not OK", "<=", 2, "OR", ">=", 5],
    ]);
    expect(result.rules[0].data.DDF_target_value).toBe(2);
  });

  test("range clamps a negative lower bound to 0", () => {
    const result = buildRules({ parametertypeId: 11194, specId: 7, mode: { kind: "range", lower: -1, upper: 3, unit: null } });
    if (!result.ok) throw new Error(result.error);
    expect(result.warnings).toEqual(["Lower bound was negative and was clamped to 0."]);
    expect(result.rules[0].data.value).toBe(0);
  });
});

// ─── Validation ──────────────────────────────────────────────

describe("input validation", () => {
  test("non-positive or fractional parametertype_id is rejected", () => {
    for (const parametertypeId of [0, -3, 1.5]) {
      const result = buildRules({ parametertypeId, specId: 1, mode: { kind: "dummy" } });
      expect(result.ok).toBe(false);
    }
  });

  test("negative targets are rejected, not clamped", () => {
    const result = buildRules({ parametertypeId: 1, specId: 1, mode: { kind: "limit2", target: -2, unit: null } });
    expect(errorOf(result)).toBe("Target must not be negative (got -2).");
  });

  test("several parameters are concatenated in order; the first failure stops the batch", () => {
    const ok = buildRulesForParameters(9, [
      { parametertypeId: 1, mode: { kind: "limit2", target: 1, unit: null } },
      { parametertypeId: 2, mode: { kind: "dummy" } },
    ]);
    expect(ok.ok && ok.rules.map((r) => r.data.parametertype_id)).toEqual([1, 1, 2]);

    const failed = buildRulesForParameters(9, [
      { parametertypeId: 1, mode: { kind: "limit2", target: 1, unit: null } },
      { parametertypeId: 2, mode: { kind: "active", target: -1, unit: null } },
    ]);
    expect(errorOf(failed)).toBe("parametertype_id 2: Target must not be negative (got -1).");
  });
});
