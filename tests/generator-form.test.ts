import { describe, test, expect } from "vitest";
import { EMPTY_PARAM_ROW, evaluateGeneratorForm, parseSpecId } from "@/lib/generator-form";

const NO_TEXTS = { en: "", de: "" };

describe("parseSpecId", () => {
  test("positive integers only", () => {
    expect(parseSpecId(" 1029 ")).toBe(1029);
    expect(parseSpecId("0")).toBeNull();
    expect(parseSpecId("12.5")).toBeNull();
    expect(parseSpecId("")).toBeNull();
  });
});

describe("evaluateGeneratorForm", () => {
  test("builds the payload for valid rows", () => {
    const result = evaluateGeneratorForm({
      specId: "1029",
      rows: [{ ...EMPTY_PARAM_ROW, parametertypeId: "5587", target: "5", unit: "mg", mode: "minimum" }],
      qualitative: NO_TEXTS,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.specId).toBe(1029);
    expect(result.payload.rules).toHaveLength(2);
    expect(result.payload.rules[0].data).toMatchObject({
      parametertype_id: 5587,
      spec_id: 1029,
      DDF_type: "perfect",
      operator: ">=",
      value: 5,
      DDF_unit: "mg",
    });
    expect(result.warnings).toEqual([]);
    expect(result.notes).toEqual([]);
  });

  test("input adjustments come back as notes", () => {
    const result = evaluateGeneratorForm({
      specId: "7",
      rows: [{ ...EMPTY_PARAM_ROW, parametertypeId: "5587", target: "5mg", unit: "", mode: "minimum" }],
      qualitative: NO_TEXTS,
    });
    expect(result.ok && result.notes).toEqual(["parametertype_id 5587: Unit 'mg' was taken from the target text."]);
  });

  test("collects every row error", () => {
    const result = evaluateGeneratorForm({
      specId: "0",
      rows: [
        { ...EMPTY_PARAM_ROW, parametertypeId: "x", target: "1" },
        { ...EMPTY_PARAM_ROW, parametertypeId: "12", target: "1", mode: "sideways" },
      ],
      qualitative: NO_TEXTS,
    });
    expect(result).toEqual({
      ok: false,
      errors: [
        'Invalid spec_id "0". Must be a positive integer.',
        'Row 1: Invalid parametertype_id "x". Must be a positive integer.',
        'Row 2: Invalid mode "sideways". Expected one of: active, mineral, limit3, limit2, qualitative, dummy, deviation, minimum, maximum, range.',
      ],
    });
  });

  test("an empty form asks for a parameter", () => {
    const result = evaluateGeneratorForm({ specId: "3", rows: [], qualitative: NO_TEXTS });
    expect(result).toEqual({ ok: false, errors: ["Add at least one parameter."] });
  });

  test("range warnings are prefixed with the parameter", () => {
    const result = evaluateGeneratorForm({
      specId: "3",
      rows: [{ ...EMPTY_PARAM_ROW, parametertypeId: "11194", target: "0,5", upper: "0,2", unit: "g/cm3", mode: "range" }],
      qualitative: NO_TEXTS,
    });
    expect(result.ok && result.warnings).toEqual([
      "parametertype_id 11194: Lower bound was not below the upper bound; values were swapped.",
    ]);
  });
});
