/**
 * Typed value parsing for the "update any key" operation.
 *
 * `auto` detects, in order: blank / "null" → null, true / false → boolean,
 * integer text → integer (text when beyond 2^53), decimal text → number,
 * anything else → the text.
 */

import type { JsonValue } from "@/types";

export const VALUE_TYPES = ["auto", "str", "int", "float", "bool", "null", "json"] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

export function isValueType(value: string): value is ValueType {
  return (VALUE_TYPES as readonly string[]).includes(value);
}

export type TypedValueResult = { ok: true; value: JsonValue } | { ok: false; error: string };

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_WORDS = new Set(["true", "1", "yes", "y", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "n", "off"]);

/** Decimal text → finite number, otherwise null. */
export function parseDecimalText(raw: string): number | null {
  const text = raw.trim();
  if (!DECIMAL_TEXT.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function isIntegerText(raw: string): boolean {
  return INTEGER_TEXT.test(raw.trim());
}

/** Integer text that fits a number exactly, otherwise null. */
function parseSafeInteger(raw: string): number | null {
  if (!isIntegerText(raw)) return null;
  const value = Number.parseInt(raw.trim(), 10);
  return Number.isSafeInteger(value) ? value : null;
}

export function parseTypedValue(raw: string, type: ValueType = "auto"): TypedValueResult {
  switch (type) {
    case "str":
      return { ok: true, value: raw };
    case "null":
      return { ok: true, value: null };
    case "int": {
      const value = parseSafeInteger(raw);
      if (value !== null) return { ok: true, value };
      return isIntegerText(raw)
        ? { ok: false, error: `Integer "${raw.trim()}" is too large to store exactly` }
        : { ok: false, error: `Cannot parse integer from "${raw}"` };
    }
    case "float": {
      const value = parseDecimalText(raw);
      return value === null ? { ok: false, error: `Cannot parse number from "${raw}"` } : { ok: true, value };
    }
    case "bool": {
      const word = raw.trim().toLowerCase();
      if (TRUE_WORDS.has(word)) return { ok: true, value: true };
      if (FALSE_WORDS.has(word)) return { ok: true, value: false };
      return { ok: false, error: `Cannot parse boolean from "${raw}"` };
    }
    case "json":
      try {
        const value: JsonValue = JSON.parse(raw);
        return { ok: true, value };
      } catch (err) {
        return { ok: false, error: `Invalid JSON value: ${err instanceof Error ? err.message : String(err)}` };
      }
    case "auto":
      return { ok: true, value: detectValue(raw) };
  }
}

function detectValue(raw: string): JsonValue {
  const word = raw.trim().toLowerCase();
  if (word === "" || word === "null") return null;
  if (word === "true" || word === "false") return word === "true";
  // integers too large for a number stay text
  if (isIntegerText(raw)) return parseSafeInteger(raw) ?? raw;
  return parseDecimalText(raw) ?? raw;
}
