/**
 * CLI commands end to end on a temporary directory.
 */
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ArgReader, UsageError } from "@/cli/args";
import type { CommandContext } from "@/cli/context";
import { createCliLogger } from "@/cli/logger";
import { readRulesFile } from "@/cli/io";
import { runCli } from "@/cli/run";
import { runConvert, runExport } from "@/cli/commands/convert";
import { runGenerate } from "@/cli/commands/generate";
import { runRanges } from "@/cli/commands/ranges";
import { runRemoveParameter } from "@/cli/commands/remove-parameter";
import { runFillTemplate, runFillThresholds } from "@/cli/commands/templates";
import { runUpdateKey, runUpdateUnit } from "@/cli/commands/update-key";
import { runUpdateSpecId } from "@/cli/commands/update-spec-id";
import { isMapping } from "@/lib/json-tree";
import type { JsonObject, JsonValue } from "@/types";

// ─── Harness ─────────────────────────────────────────────────

let dir = "";

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "rules-cli-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const ctx: CommandContext = {
  config: { logLevel: "error", silent: true, csvDelimiter: ",", jsonIndent: 2 },
  logger: createCliLogger({ logLevel: "error", silent: true }),
  now: () => new Date(2025, 10, 5, 14, 3),
};

const args = (...tokens: string[]) => ArgReader.from(tokens);
const inDir = (name: string) => path.join(dir, name);

function write(name: string, text: string): string {
  const file = inDir(name);
  fs.writeFileSync(file, text, "utf-8");
  return file;
}

function rule(pid: number, extra: JsonObject = {}): JsonObject {
  return { action: "create", data: { parametertype_id: pid, spec_id: 1, DDF_unit: null, ...extra } };
}

function writeRules(name: string, rules: JsonValue[]): string {
  return write(name, JSON.stringify({ rules }, null, 2));
}

function dataOf(item: JsonValue | undefined): JsonObject {
  if (!isMapping(item) || !isMapping(item.data)) throw new Error("item has no data mapping");
  return item.data;
}

function sampleRules(): string {
  return writeRules("a.json", [rule(5239), rule(5239), rule(6001), rule(5239), rule(6001)]);
}

// ─── generate ────────────────────────────────────────────────

describe("generate", () => {
  test("writes all parameters' rules in order", () => {
    const out = inDir("rules.json");
    const result = runGenerate(
      args("--spec-id", "1029", "--param", "5587", "12", "mg", "active", "--param", "11377", "null", "null", "dummy", "--out", out),
      ctx,
    );
    expect(result).toEqual({ outPath: out, parameters: 2, rules: 5, warnings: [] });

    const { rules } = readRulesFile(out);
    expect(rules.map((r) => dataOf(r).parametertype_id)).toEqual([5587, 5587, 5587, 5587, 11377]);
    expect(dataOf(rules[0]).value).toBe(10.8);
    expect(dataOf(rules[4]).value).toBe('""');
    expect(fs.readFileSync(out, "utf-8")).toContain('"value": "\\"\\"",');
  });

  test("mode arguments and default file name", () => {
    const result = runGenerate(
      args("--spec-id", "7", "--param", "11194", "0.5", "g/cm3", "range:0.2", "--prefix", inDir("Lab")),
      ctx,
    );
    expect(result.outPath).toBe(inDir("Lab_7_20251105_1403.json"));
    expect(result.warnings).toEqual([
      "parametertype_id 11194: Lower bound was not below the upper bound; values were swapped.",
    ]);
    const [perfect] = readRulesFile(result.outPath).rules;
    expect([dataOf(perfect).value, dataOf(perfect).value2]).toEqual([0.2, 0.5]);
  });

  test("bad input writes nothing", () => {
    const out = inDir("bad.json");
    expect(() => runGenerate(args("--spec-id", "1", "--param", "1", "12", "mg", "--out", out), ctx)).toThrow(UsageError);
    expect(() => runGenerate(args("--spec-id", "1", "--param", "1", "-3", "mg", "limit2", "--out", out), ctx)).toThrow(
      "parametertype_id 1: Target must not be negative (got -3).",
    );
    expect(fs.existsSync(out)).toBe(false);
  });
});

// ─── payload updates ─────────────────────────────────────────

describe("update-spec-id", () => {
  test("default output goes next to the input", () => {
    const input = sampleRules();
    const result = runUpdateSpecId(args("--in", input, "--spec-id", "77"), ctx);
    expect(result).toEqual({ outputs: [inDir("a_spec77.json")], updated: 5, total: 5 });
    expect(readRulesFile(inDir("a_spec77.json")).rules.every((r) => dataOf(r).spec_id === 77)).toBe(true);
    expect(dataOf(readRulesFile(input).rules[0]).spec_id).toBe(1);
  });

  test("several inputs with --out are merged", () => {
    const a = sampleRules();
    const b = writeRules("b.json", [rule(42)]);
    const out = inDir("merged.json");
    const result = runUpdateSpecId(args("--in", a, b, "--spec-id", "9", "--out", out), ctx);
    expect(result).toEqual({ outputs: [out], updated: 6, total: 6 });
    expect(readRulesFile(out).rules.map((r) => dataOf(r).parametertype_id)).toEqual([5239, 5239, 6001, 5239, 6001, 42]);
  });

  test("spec id must be positive", () => {
    expect(() => runUpdateSpecId(args("--in", sampleRules(), "--spec-id", "0"), ctx)).toThrow(
      "--spec-id must be a positive integer (got 0)",
    );
  });
});

describe("update-key / update-unit", () => {
  test("typed value restricted to some parameters", () => {
    const input = sampleRules();
    const result = runUpdateKey(
      args("--in", input, "--key", "data.show", "--value", "0", "--parametertype-id", "6001"),
      ctx,
    );
    expect(result).toEqual({ outPath: inDir("a_data_show_0.json"), updated: 2, total: 5 });
    expect(readRulesFile(result.outPath).rules.map((r) => dataOf(r).show ?? "unset")).toEqual([
      "unset", "unset", 0, "unset", 0,
    ]);
  });

  test("explicit type errors are usage errors", () => {
    expect(() =>
      runUpdateKey(args("--in", sampleRules(), "--key", "data.show", "--value", "x", "--as", "int"), ctx),
    ).toThrow('Cannot parse integer from "x"');
  });

  test("unit update with --only-missing", () => {
    const input = writeRules("u.json", [rule(1), rule(2, { DDF_unit: "g" })]);
    const result = runUpdateUnit(args("--in", input, "--unit", "mg/100g", "--only-missing"), ctx);
    expect(result).toEqual({ outPath: inDir("u_unit_mg100g.json"), updated: 1, total: 2 });
    expect(readRulesFile(result.outPath).rules.map((r) => dataOf(r).DDF_unit)).toEqual(["mg/100g", "g"]);
  });

  test("--out and --inplace conflict", () => {
    expect(() =>
      runUpdateUnit(args("--in", sampleRules(), "--unit", "mg", "--out", inDir("x.json"), "--inplace"), ctx),
    ).toThrow("Use either --out or --inplace, not both");
  });
});

describe("remove-parameter", () => {
  test("in place", () => {
    const input = sampleRules();
    const result = runRemoveParameter(args("--in", input, "--param-id", "5239", "--inplace"), ctx);
    expect(result).toEqual({ outPath: input, removed: 3, total: 5 });
    expect(readRulesFile(input).rules.map((r) => dataOf(r).parametertype_id)).toEqual([6001, 6001]);
  });

  test("default output name lists the ids", () => {
    const result = runRemoveParameter(args("--in", sampleRules(), "--param-id", "6001,5239"), ctx);
    expect(result.outPath).toBe(inDir("a_remove_5239_6001.json"));
    expect(result.removed).toBe(5);
  });
});

// ─── CSV tooling ─────────────────────────────────────────────

describe("convert / export", () => {
  test("specs CSV to JSON with encoded translations", () => {
    const from = write("specs.csv", "name,type,status,archiviert,order\nTest spec,2,1,0,\n");
    const to = inDir("specs.json");
    expect(runConvert(args("--kind", "specs", "--from", from, "--to", to), ctx)).toEqual({
      outPath: to,
      items: 1,
      skipped: 0,
    });
    expect(fs.readFileSync(to, "utf-8")).toContain('"translations": "{\\"en\\":{\\"name\\":\\"Test spec\\",');
  });

  test("unknown kind", () => {
    expect(() => runConvert(args("--kind", "spec", "--from", "x.csv", "--to", "y.json"), ctx)).toThrow(
      '--kind must be one of rules, specs, parametertypes, templatefields (got "spec")',
    );
  });

  test("export merges rule sheets and never overwrites", () => {
    const a = write("r1.csv", "parametertype_id,DDF_type,value\n1,perfect,5\n");
    const b = write("r2.csv", "DDF_type,parametertype_id,value\nperfect,1,5\nnot OK,1,5\n");
    const out = inDir("rules.json");

    const [first] = runExport(args("--rules", a, b, "--out-rules", out), ctx);
    expect(first).toEqual({ kind: "rules", outPath: out, items: 2, duplicatesDropped: 1 });
    expect(readRulesFile(out).rules.map((r) => [dataOf(r).DDF_type, dataOf(r).parametertype_id, dataOf(r).value])).toEqual([
      ["perfect", 1, 5],
      ["not OK", 1, 5],
    ]);

    const [second] = runExport(args("--rules", a, "--out-rules", out), ctx);
    expect(second.outPath).toBe(inDir("rules_1.json"));
  });

  test("export refuses sheets with different columns before writing", () => {
    const a = write("s1.csv", "name,type\nA,1\n");
    const b = write("s2.csv", "name,status\nB,1\n");
    const out = inDir("specs.json");
    expect(() => runExport(args("--specs", a, b, "--out-specs", out), ctx)).toThrow(
      "Incompatible columns between CSV files for specs.",
    );
    expect(fs.existsSync(out)).toBe(false);
  });
});

describe("fill-template / fill-thresholds", () => {
  test("template pairs get their targets", () => {
    const from = writeRules("template.json", [rule(1), rule(1), rule(2), rule(2)]);
    const out = inDir("filled.json");
    expect(runFillTemplate(args("--from", from, "--spec-id", "1029", "--targets", "[0.55,", "2]", "--out", out), ctx)).toEqual({
      outPath: out,
      pairs: 2,
    });
    expect(readRulesFile(out).rules.map((r) => dataOf(r).value)).toEqual([0.55, 0.55, 2, 2]);
  });

  test("target count mismatch", () => {
    const from = writeRules("template.json", [rule(1), rule(1)]);
    expect(() =>
      runFillTemplate(args("--from", from, "--spec-id", "1", "--targets", "1, 2", "--out", inDir("x.json")), ctx),
    ).toThrow("Number of targets (2) does not match parameter count (1).");
  });

  test("open perfect rows get a threshold pair", () => {
    const input = write("sheet.csv", "DDF_type,operator,value,color\nperfect,,,\n");
    const out = inDir("sheet_filled.csv");
    expect(runFillThresholds(args("--in", input, "--out", out), ctx)).toEqual({ outPath: out, filled: 1, rows: 2 });
    expect(fs.readFileSync(out, "utf-8")).toBe(
      "DDF_type,operator,value,color\nperfect,<=,0.01,green\nnot OK,>,0.01,red\n",
    );
  });
});

describe("ranges", () => {
  test("limit type", () => {
    expect(runRanges(args("--target", "10", "--type", "limit"), ctx)).toEqual([
      "perfect_range: <= 3.00",
      "okay_range: 3.00 - 10.00",
      "not_okay_range: > 10.00",
    ]);
  });
});

// ─── dispatcher ──────────────────────────────────────────────

describe("runCli", () => {
  test("exit codes", () => {
    expect(runCli(["ranges", "--target", "12"], ctx)).toBe(0);
    expect(runCli(["ranges"], ctx)).toBe(1);
    expect(runCli(["nope"], ctx)).toBe(1);
    expect(runCli(["--help"], ctx)).toBe(0);
    expect(runCli([], ctx)).toBe(1);
    expect(runCli(["ranges", "--help"], ctx)).toBe(0);
  });

  test("missing input file fails without output", () => {
    const out = inDir("never.json");
    expect(runCli(["update-spec-id", "--in", inDir("missing.json"), "--spec-id", "5", "--out", out], ctx)).toBe(1);
    expect(fs.existsSync(out)).toBe(false);
  });
});
