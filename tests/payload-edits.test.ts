import { describe, test, expect } from "vitest";
import { applyPayloadEdit } from "@/lib/payload-edits";
import type { RulesDocument } from "@/types";

function sampleDoc(): RulesDocument {
  return {
    rules: [
      { action: "create", data: { parametertype_id: 5239, spec_id: 1, DDF_unit: null } },
      { action: "create", data: { parametertype_id: 5244, spec_id: 1, DDF_unit: "mg" } },
    ],
  };
}

describe("applyPayloadEdit", () => {
  test("spec_id", () => {
    const doc = sampleDoc();
    const result = applyPayloadEdit(doc, "Rules", { kind: "specId", specId: "77" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.changed).toBe(2);
    expect(result.total).toBe(2);
    expect(result.outputName).toBe("Rules_spec77.json");
    expect(result.summary).toBe("Updated spec_id on 2/2 rules");
    expect(result.document.rules[1]).toEqual({
      action: "create",
      data: { parametertype_id: 5244, spec_id: 77, DDF_unit: "mg" },
    });
    // input untouched
    expect(doc.rules[1]).toEqual({ action: "create", data: { parametertype_id: 5244, spec_id: 1, DDF_unit: "mg" } });
  });

  test("spec_id must be a positive integer", () => {
    expect(applyPayloadEdit(sampleDoc(), "Rules", { kind: "specId", specId: "abc" })).toEqual({
      ok: false,
      error: 'Invalid spec_id "abc". Must be a positive integer.',
    });
  });

  test("unit only where missing", () => {
    const result = applyPayloadEdit(sampleDoc(), "Rules", {
      kind: "unit",
      unit: "g/100g",
      onlyMissing: true,
      parameterIds: "",
    });
    expect(result.ok && result.changed).toBe(1);
    expect(result.ok && result.outputName).toBe("Rules_unit_g100g.json");
  });

  test("\"null\" clears the unit for the filtered parameters", () => {
    const result = applyPayloadEdit(sampleDoc(), "Rules", {
      kind: "unit",
      unit: "null",
      onlyMissing: false,
      parameterIds: "5244",
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.changed).toBe(1);
    expect(result.outputName).toBe("Rules_unit_null.json");
    expect(result.document.rules[1]).toEqual({
      action: "create",
      data: { parametertype_id: 5244, spec_id: 1, DDF_unit: null },
    });
  });

  test("any key with a typed value", () => {
    const result = applyPayloadEdit(sampleDoc(), "Rules", {
      kind: "key",
      keyPath: "data.regex_filter",
      value: "^A",
      valueType: "str",
      onlyMissing: false,
      parameterIds: "",
    });
    expect(result.ok && result.changed).toBe(2);
    expect(result.ok && result.outputName).toBe("Rules_data_regex_filter_^A.json");
  });

  test("key edits reject an empty path and bad values", () => {
    const base = { kind: "key", value: "1", valueType: "int", onlyMissing: false, parameterIds: "" } as const;
    expect(applyPayloadEdit(sampleDoc(), "Rules", { ...base, keyPath: " . " })).toEqual({
      ok: false,
      error: "Key path must be non-empty, e.g. 'action' or 'data.spec_id'",
    });
    expect(applyPayloadEdit(sampleDoc(), "Rules", { ...base, keyPath: "data.show", value: "abc" }).ok).toBe(false);
  });

  test("remove parameters", () => {
    const result = applyPayloadEdit(sampleDoc(), "Rules", { kind: "remove", parameterIds: "5244, 9" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.changed).toBe(1);
    expect(result.document.rules).toHaveLength(1);
    expect(result.outputName).toBe("Rules_remove_9_5244.json");
    expect(result.summary).toBe("Removed 1 of 2 rules");
  });

  test("remove needs at least one id", () => {
    expect(applyPayloadEdit(sampleDoc(), "Rules", { kind: "remove", parameterIds: " " })).toEqual({
      ok: false,
      error: "Enter at least one parametertype_id to remove",
    });
    expect(applyPayloadEdit(sampleDoc(), "Rules", { kind: "remove", parameterIds: "12a" })).toEqual({
      ok: false,
      error: 'Invalid parametertype_id "12a"',
    });
  });
});
