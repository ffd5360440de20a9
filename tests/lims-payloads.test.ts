import { describe, test, expect } from "vitest";
import {
  buildParameterTypesPayload,
  buildRulesPayloadFromRows,
  buildSpecsPayload,
  buildTemplateFieldsPayload,
  cell,
  isPayloadKind,
  readSpecTranslations,
  ruleFromRow,
} from "@/lib/lims-payloads";
import { serializePayload } from "@/lib/payload-json";
import { fillThresholdRules } from "@/lib/threshold-fill";

// ─── Rules ───────────────────────────────────────────────────

describe("rules from CSV rows", () => {
  const row = {
    color: "green",
    Column: "0",
    DDF_target_value: "12",
    DDF_type: "perfect",
    DDF_unit: "",
    inverse: "0",
    linker: "AND",
    operator: ">=",
    operator2: "<=",
    parametertype_id: "5587.0",
    regex_filter: "NULL",
    show: "1",
    spec_id: "1029",
    text: "",
    translations: "",
    value: "10.8",
    value2: "15",
  };

  test("every column is typed the way the import expects", () => {
    expect(ruleFromRow(row)).toEqual({
      color: "green",
      column: 0,
      DDF_target_value: "12",
      DDF_type: "perfect",
      DDF_unit: null,
      inverse: 0,
      linker: "AND",
      operator: ">=",
      operator2: "<=",
      parametertype_id: 5587,
      regex_filter: null,
      show: 1,
      spec_id: 1029,
      text: null,
      translations: null,
      value: 10.8,
      value2: "15",
    });
  });

  test("text values and missing columns", () => {
    const rule = ruleFromRow({ DDF_type: "perfect", operator: "=", value: "negativ" });
    expect(rule.value).toBe("negativ");
    expect(rule.color).toBe("");
    expect(rule.spec_id).toBeNull();
  });

  test("each row becomes a create action", () => {
    const payload = buildRulesPayloadFromRows([row, row]);
    expect(payload.rules).toHaveLength(2);
    expect(payload.rules[1].action).toBe("create");
  });

  test("cell lookup ignores header case and padding", () => {
    expect(cell({ " Spec_ID ": "7" }, "spec_id")).toBe("7");
    expect(cell({ spec_id: "7" }, "unit")).toBeUndefined();
  });
});

// ─── Specs ───────────────────────────────────────────────────

describe("specs from CSV rows", () => {
  const rows = [{ name: "Test spec", type: "2", status: "1", archiviert: "0", order: "" }];

  test("translations is JSON text with placeholder default texts", () => {
    const [spec] = buildSpecsPayload(rows).specs;
    expect(spec.data).toEqual({
      name: "Test spec",
      type: 2,
      status: 1,
      archiviert: 0,
      order: null,
      translations:
        '{"en":{"name":"Test spec","DDF_Defaulttext_OK":"NULL","DDF_Defaulttext_NOT_OK":"NULL","DDF_Defaulttext_Toleranzbereich_NOT_OK":"NULL"}}',
    });
  });

  test("serialized output double-encodes translations", () => {
    const text = serializePayload(buildSpecsPayload(rows));
    expect(text).toContain('"translations": "{\\"en\\":{\\"name\\":\\"Test spec\\",');
  });

  test("a second decode gives the translations object back", () => {
    const [spec] = buildSpecsPayload(rows).specs;
    expect(readSpecTranslations(spec.data).en.name).toBe("Test spec");
    expect(() => readSpecTranslations({ translations: "[]" })).toThrow(
      "Spec translations must be an object with an 'en' entry",
    );
  });
});

// ─── Parameter types / template fields ───────────────────────

describe("parameter types and template fields", () => {
  test("rows marked existing are skipped, the rest are trimmed", () => {
    const { payload, skipped } = buildParameterTypesPayload([
      { name: " Vitamin C ", group_id: "3", existing: "Yes" },
      { name: "Zinc ", einheit: "mg", translations_en_name: "Zinc", translations_en_einheit: "mg", existing: "" },
    ]);
    expect(skipped).toBe(1);
    expect(payload.parametertypes).toEqual([
      {
        action: "create",
        data: {
          name: "Zinc",
          group_id: "",
          DDF_days: "",
          DDF_price: "",
          description: "",
          einheit: "mg",
          DDF_GBAID: "",
          translations: { en: { name: "Zinc", einheit: "mg" } },
        },
      },
    ]);
  });

  test("template fields", () => {
    expect(buildTemplateFieldsPayload([{ template_id: " 12 ", field: "Moisture" }])).toEqual({
      templatefields: [{ action: "create", data: { template_id: "12", field: "Moisture" } }],
    });
  });

  test("payload kinds", () => {
    expect(isPayloadKind("specs")).toBe(true);
    expect(isPayloadKind("spec")).toBe(false);
  });
});

// ─── Threshold fill ──────────────────────────────────────────

describe("fillThresholdRules", () => {
  test("open perfect rows get a threshold and a not OK partner", () => {
    const headers = ["parametertype_id", "DDF_type", "operator", "value", "color"];
    const { table, filled } = fillThresholdRules(
      {
        headers,
        rows: [
          { parametertype_id: "1", DDF_type: "perfect", operator: "", value: "", color: "" },
          { parametertype_id: "2", DDF_type: "perfect", operator: "<=", value: "5", color: "green" },
          { parametertype_id: "3", DDF_type: "not OK", operator: "", value: "", color: "" },
        ],
      },
      0.05,
    );
    expect(filled).toBe(1);
    expect(table.headers).toEqual(headers);
    expect(table.rows).toEqual([
      { parametertype_id: "1", DDF_type: "perfect", operator: "<=", value: "0.05", color: "green" },
      { parametertype_id: "1", DDF_type: "not OK", operator: ">", value: "0.05", color: "red" },
      { parametertype_id: "2", DDF_type: "perfect", operator: "<=", value: "5", color: "green" },
      { parametertype_id: "3", DDF_type: "not OK", operator: "", value: "", color: "" },
    ]);
  });

  test("adds a color column when the sheet has none", () => {
    const { table } = fillThresholdRules({
      headers: ["DDF_type", "operator", "value"],
      rows: [{ DDF_type: "Perfect", operator: "", value: "" }],
    });
    expect(table.headers).toEqual(["DDF_type", "operator", "value", "color"]);
    expect(table.rows).toEqual([
      { DDF_type: "Perfect", operator: "<=", value: "0.01", color: "green" },
      { DDF_type: "not OK", operator: ">", value: "0.01", color: "red" },
    ]);
  });
});
