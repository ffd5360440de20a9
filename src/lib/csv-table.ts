/**
 * CSV text ⇄ header + row records, via csv-parse / csv-stringify.
 *
 * Cells are trimmed, a UTF-8 BOM is dropped and rows that are blank after
 * trimming are skipped. Short rows are padded with "".
 */

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

export type CsvRow = Record<string, string>;

export interface CsvTable {
  headers: string[];
  rows: CsvRow[];
}

export interface CsvReadOptions {
  delimiter?: string;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

export function parseCsvTable(text: string, options: CsvReadOptions = {}): CsvTable {
  const records: unknown = parse(text, {
    bom: true,
    delimiter: options.delimiter ?? ",",
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (!isStringMatrix(records) || records.length === 0) {
    throw new Error("CSV has no header row");
  }

  const [headerRow, ...body] = records;
  const headers = headerRow.map((h) => h.trim());
  const rows: CsvRow[] = [];
  for (const cells of body) {
    if (cells.every((cell) => cell.trim() === "")) continue;
    const row: CsvRow = {};
    headers.forEach((header, i) => {
      row[header] = (cells[i] ?? "").trim();
    });
    rows.push(row);
  }
  return { headers, rows };
}

export function stringifyCsvTable(table: CsvTable, options: CsvReadOptions = {}): string {
  const records = [table.headers, ...table.rows.map((row) => table.headers.map((h) => row[h] ?? ""))];
  return stringify(records, { delimiter: options.delimiter ?? "," });
}
