/**
 * CSV reading, writing, merging and cell coercion.
 */
import { describe, test, expect } from "vitest";
import { parseCsvTable, stringifyCsvTable } from "@/lib/csv-table";
import { mergeCsvTables } from "@/lib/csv-merge";
import { cleanText, nullIfBlankOrLiteralNull, toInt, toNumberOrKeep, toText } from "@/lib/csv-coercion";

// ─── Reading / writing ───────────────────────────────────────

describe("parseCsvTable", () => {
  test("drops the BOM, trims cells, skips blank rows and pads short ones", () => {
    const table = parseCsvTable("\uFEFFname,type\n Foo , 1\n\n,\nBar\n");
    expect(table.headers).toEqual(["name", "type"]);
    expect(table.rows).toEqual([
      { name: "Foo", type: "1" },
      { name: "Bar", type: "" },
    ]);
  });

  test("quoted cells keep delimiters and doubled quotes", () => {
    const table = parseCsvTable('a,b\n"x, y","say ""hi"""\n');
    expect(table.rows).toEqual([{ a: "x, y", b: 'say "hi"' }]);
  });

  test("custom delimiter", () => {
    expect(parseCsvTable("a;b\n1;2\n", { delimiter: ";" }).rows).toEqual([{ a: "1", b: "2" }]);
  });

  test("empty input has no header row", () => {
    expect(() => parseCsvTable("")).toThrow("CSV has no header row");
  });

  test("stringifyCsvTable writes headers first and quotes when needed", () => {
    const text = stringifyCsvTable({ headers: ["a", "b"], rows: [{ a: "1", b: "x,y" }, { a: "2" }] });
    expect(text).toBe('a,b\n1,"x,y"\n2,\n');
  });
});

// ─── Merge ───────────────────────────────────────────────────

describe("mergeCsvTables", () => {
  const first = { label: "a.csv", table: { headers: ["Name", "Type"], rows: [{ Name: "x", Type: "1" }] } };
  const reordered = {
    label: "b.csv",
    table: {
      headers: ["type", "name"],
      rows: [
        { type: "1", name: "x" },
        { type: "2", name: "y" },
      ],
    },
  };

  test("re-keys rows to the first file's headers and drops exact duplicates", () => {
    const merged = mergeCsvTables([first, reordered], "specs");
    expect(merged.headers).toEqual(["Name", "Type"]);
    expect(merged.rows).toEqual([
      { Name: "x", Type: "1" },
      { Name: "y", Type: "2" },
    ]);
    expect(merged.duplicatesDropped).toBe(1);
    expect(merged.warnings).toEqual(["Column order differs between a.csv and b.csv; continuing."]);
  });

  test("refuses files with different columns", () => {
    const other = { label: "c.csv", table: { headers: ["name", "status"], rows: [] } };
    expect(() => mergeCsvTables([first, other], "specs")).toThrow("Incompatible columns between CSV files for specs.");
  });

  test("no sources gives an empty table", () => {
    expect(mergeCsvTables([], "rules")).toEqual({ headers: [], rows: [], warnings: [], duplicatesDropped: 0 });
  });
});

// ─── Coercion ────────────────────────────────────────────────

describe("cell coercion", () => {
  test("nullIfBlankOrLiteralNull", () => {
    expect(nullIfBlankOrLiteralNull("  ")).toBeNull();
    expect(nullIfBlankOrLiteralNull("Null")).toBeNull();
    expect(nullIfBlankOrLiteralNull(undefined)).toBeNull();
    expect(nullIfBlankOrLiteralNull(" mg ")).toBe("mg");
  });

  test("toInt truncates decimal text", () => {
    expect(toInt("7")).toBe(7);
    expect(toInt("3.0")).toBe(3);
    expect(toInt("2.9")).toBe(2);
    expect(Object.is(toInt("-0.5"), 0)).toBe(true);
    expect(toInt("abc")).toBeNull();
    expect(toInt("")).toBeNull();
  });

  test("toNumberOrKeep keeps text that is not a finite number", () => {
    expect(toNumberOrKeep("12")).toBe(12);
    expect(toNumberOrKeep("-4")).toBe(-4);
    expect(toNumberOrKeep("0.5")).toBe(0.5);
    expect(toNumberOrKeep("OK")).toBe("OK");
    expect(toNumberOrKeep("Infinity")).toBe("Infinity");
    expect(toNumberOrKeep("NULL")).toBeNull();
  });

  test("toText and cleanText", () => {
    expect(toText(undefined)).toBe("");
    expect(toText(" a ")).toBe(" a ");
    expect(cleanText(" a ")).toBe("a");
    expect(cleanText(null)).toBe("");
  });
});
