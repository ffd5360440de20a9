/**
 * Threshold fill for rules sheets: a "perfect" row with no operator yet
 * becomes `<= threshold`, and a matching "not OK" row (`> threshold`) is
 * inserted right below it. All other rows pass through untouched.
 */

import type { CsvRow, CsvTable } from "./csv-table";
import { cell } from "./lims-payloads";

export const DEFAULT_FILL_THRESHOLD = 0.01;

export interface ThresholdFillResult {
  table: CsvTable;
  /** Number of perfect rows that received a threshold. */
  filled: number;
}

/** Writes into the row's own spelling of the header, or adds the column. */
function setCell(row: CsvRow, headers: string[], header: string, value: string): void {
  const existing = Object.keys(row).find((k) => k.trim().toLowerCase() === header.toLowerCase());
  if (existing !== undefined) {
    row[existing] = value;
    return;
  }
  if (!headers.includes(header)) headers.push(header);
  row[header] = value;
}

export function fillThresholdRules(table: CsvTable, threshold: number = DEFAULT_FILL_THRESHOLD): ThresholdFillResult {
  const headers = [...table.headers];
  const rows: CsvRow[] = [];
  const value = String(threshold);
  let filled = 0;

  for (const source of table.rows) {
    const type = (cell(source, "DDF_type") ?? "").trim();
    const operator = (cell(source, "operator") ?? "").trim();
    if (type.toLowerCase() !== "perfect" || operator !== "") {
      rows.push({ ...source });
      continue;
    }

    const perfect: CsvRow = { ...source };
    setCell(perfect, headers, "DDF_type", type);
    setCell(perfect, headers, "operator", "<=");
    setCell(perfect, headers, "value", value);
    if ((cell(perfect, "color") ?? "").trim() === "") setCell(perfect, headers, "color", "green");

    const notOk: CsvRow = { ...perfect };
    setCell(notOk, headers, "DDF_type", "not OK");
    setCell(notOk, headers, "color", "red");
    setCell(notOk, headers, "operator", ">");

    rows.push(perfect, notOk);
    filled++;
  }

  return { table: { headers, rows }, filled };
}
