/**
 * File access for CLI commands. Reads fail with the path in the message;
 * writes create the target directory first.
 */

import * as fs from "fs";
import * as path from "path";
import type { JsonValue, RulesDocument } from "@/types";
import { parseCsvTable, stringifyCsvTable } from "@/lib/csv-table";
import type { CsvTable } from "@/lib/csv-table";
import { parseRulesDocument, serializePayload } from "@/lib/payload-json";

export function pathExists(file: string): boolean {
  return fs.existsSync(file);
}

export function readTextFile(file: string): string {
  if (!fs.existsSync(file)) throw new Error(`File not found: ${file}`);
  return fs.readFileSync(file, "utf-8");
}

export function writeTextFile(file: string, text: string): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  fs.writeFileSync(file, text, "utf-8");
}

// ─── JSON ───────────────────────────────────────────────────

export function readRulesFile(file: string): RulesDocument {
  return parseRulesDocument(readTextFile(file), file);
}

export function writeJsonFile(file: string, payload: JsonValue, indent: number): void {
  writeTextFile(file, serializePayload(payload, indent));
}

// ─── CSV ────────────────────────────────────────────────────

export function readCsvFile(file: string, delimiter: string): CsvTable {
  try {
    return parseCsvTable(readTextFile(file), { delimiter });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not read CSV ${file}: ${reason}`);
  }
}

export function writeCsvFile(file: string, table: CsvTable, delimiter: string): void {
  writeTextFile(file, stringifyCsvTable(table, { delimiter }));
}
