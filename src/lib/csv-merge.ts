/**
 * Multi-file CSV merge for one export kind (specs or rules).
 *
 * Header sets must match after trimming and lowercasing, otherwise the
 * merge is refused. A different column order only warns. Rows are re-keyed
 * to the first file's header spelling and exact duplicates are dropped,
 * keeping the first occurrence.
 */

import type { CsvRow, CsvTable } from "./csv-table";

export interface CsvSource {
  /** Shown in messages, usually the file path. */
  label: string;
  table: CsvTable;
}

export interface CsvMergeResult {
  headers: string[];
  rows: CsvRow[];
  warnings: string[];
  duplicatesDropped: number;
}

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((h) => right.has(h));
}

function rowKey(row: CsvRow): string {
  return JSON.stringify(Object.entries(row).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function mergeCsvTables(sources: readonly CsvSource[], kind: string): CsvMergeResult {
  if (sources.length === 0) {
    return { headers: [], rows: [], warnings: [], duplicatesDropped: 0 };
  }

  const [reference, ...others] = sources;
  const refHeaders = reference.table.headers;
  const refNormalized = refHeaders.map(normalizeHeader);
  const spelling = new Map(refNormalized.map((norm, i) => [norm, refHeaders[i]]));
  const warnings: string[] = [];

  for (const source of others) {
    const normalized = source.table.headers.map(normalizeHeader);
    if (!sameMembers(refNormalized, normalized)) {
      throw new Error(
        `Incompatible columns between CSV files for ${kind}.\n` +
          `Reference (${reference.label}): ${refHeaders.join(", ")}\n` +
          `Current   (${source.label}): ${source.table.headers.join(", ")}`,
      );
    }
    if (normalized.join("\u0000") !== refNormalized.join("\u0000")) {
      warnings.push(`Column order differs between ${reference.label} and ${source.label}; continuing.`);
    }
  }

  const seen = new Set<string>();
  const rows: CsvRow[] = [];
  let duplicatesDropped = 0;
  for (const source of sources) {
    for (const raw of source.table.rows) {
      const row: CsvRow = {};
      for (const [header, cell] of Object.entries(raw)) {
        row[spelling.get(normalizeHeader(header)) ?? header] = cell;
      }
      const key = rowKey(row);
      if (seen.has(key)) {
        duplicatesDropped++;
        continue;
      }
      seen.add(key);
      rows.push(row);
    }
  }

  return { headers: [...refHeaders], rows, warnings, duplicatesDropped };
}
