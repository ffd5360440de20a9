/**
 * Cell coercions for CSV → LIMS JSON conversion.
 *
 * These reproduce how the LIMS import sheets have always typed their cells,
 * so a converted file matches one exported by the sheet tooling.
 */

import { parseDecimalText } from "./typed-value";

export type CsvCell = string | null | undefined;

/** Blank or "null" (any case) → null, otherwise the trimmed text. */
export function nullIfBlankOrLiteralNull(value: CsvCell): string | null {
  if (value === null || value === undefined) return null;
  const text = value.trim();
  if (text === "" || text.toLowerCase() === "null") return null;
  return text;
}

/** Decimal text truncated to an integer ("3.0" → 3, "2.9" → 2); anything else → null. */
export function toInt(value: CsvCell): number | null {
  const text = nullIfBlankOrLiteralNull(value);
  if (text === null) return null;
  const parsed = parseDecimalText(text);
  if (parsed === null) return null;
  const truncated = Math.trunc(parsed);
  return truncated === 0 ? 0 : truncated;
}

/** Integer or decimal text → number; other text (e.g. "OK") is kept as is. */
export function toNumberOrKeep(value: CsvCell): number | string | null {
  const text = nullIfBlankOrLiteralNull(value);
  if (text === null) return null;
  if (/^-?\d+$/.test(text)) return Number.parseInt(text, 10);
  return parseDecimalText(text) ?? text;
}

/** Absent → "", otherwise the cell unchanged. */
export function toText(value: CsvCell): string {
  return value ?? "";
}

/** Absent → "", otherwise trimmed. */
export function cleanText(value: CsvCell): string {
  return (value ?? "").trim();
}
