/**
 * Free-text number parsing for target fields.
 *
 * Accepts EU ("1.500,2") and US ("1,500.2") separators, spaces inside the
 * number, and a trailing unit suffix ("200mg", "12 %"). An empty field is
 * not an error: it parses to `value: null` with `error: null`.
 */

export interface ParsedNumber {
  value: number | null;
  /** Unit letters found after the number, e.g. "mg". */
  extractedUnit: string | null;
  /** True when unit text was present and stripped from the number. */
  hadUnitText: boolean;
  error: string | null;
}

const NUMBER_WITH_UNIT = /^\s*([+-]?[0-9][0-9.,\s]*)\s*([A-Za-zµ/%]+)?\s*$/;
const PLAIN_DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/**
 * When both separators appear, the earlier one groups thousands. With only
 * one, exactly three trailing digits mean thousands; otherwise a comma is
 * the decimal point.
 */
export function normalizeSeparators(numeric: string): string {
  const dot = numeric.indexOf(".");
  const comma = numeric.indexOf(",");
  if (dot >= 0 && comma >= 0) {
    return dot < comma
      ? numeric.replace(/\./g, "").replace(/,/g, ".")
      : numeric.replace(/,/g, "");
  }
  if (dot >= 0) {
    return /\.\d{3}$/.test(numeric) ? numeric.replace(/\./g, "") : numeric;
  }
  if (comma >= 0) {
    return /,\d{3}$/.test(numeric) ? numeric.replace(/,/g, "") : numeric.replace(/,/g, ".");
  }
  return numeric;
}

export function parseLocaleNumber(raw: string | null | undefined): ParsedNumber {
  const text = (raw ?? "").trim();
  if (text === "") {
    return { value: null, extractedUnit: null, hadUnitText: false, error: null };
  }

  const match = NUMBER_WITH_UNIT.exec(text);
  if (!match) {
    return { value: null, extractedUnit: null, hadUnitText: false, error: "Could not parse number format." };
  }

  const numeric = match[1].replace(/\s/g, "");
  const unit = match[2] ?? null;
  const hadUnitText = unit !== null && unit.trim() !== "";

  const normalized = normalizeSeparators(numeric);
  if (!PLAIN_DECIMAL.test(normalized)) {
    return { value: null, extractedUnit: unit, hadUnitText, error: "Invalid numeric value." };
  }

  return { value: Number(normalized), extractedUnit: unit, hadUnitText, error: null };
}
