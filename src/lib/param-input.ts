/**
 * Raw parameter input (CLI tokens or form cells) → a typed band mode.
 *
 * Shared by the `generate` command and the rule generator view so both
 * accept exactly the same text.
 */

import type { BandMode } from "./band-modes";
import { MODE_NAMES, isModeName } from "./band-modes";
import { parseLocaleNumber } from "./locale-number";
import { MAX_DEVIATION_PERCENT } from "./rule-constants";

export interface ParamInputFields {
  parametertypeId: string;
  target: string;
  unit: string;
  mode: string;
  /** Required for `deviation`. */
  deviationPercent?: string;
  /** Required for `range`; `target` is the lower bound. */
  upper?: string;
}

export interface QualitativeTexts {
  en: string;
  de: string;
}

export interface ParamSpec {
  parametertypeId: number;
  mode: BandMode;
  /** Input adjustments worth showing to the user. */
  notes: string[];
}

export type ParamInputResult = { ok: true; spec: ParamSpec } | { ok: false; error: string };

/** Blank or the literal "null" (any case) means "no value". */
export function isAbsentText(value: string | null | undefined): boolean {
  const text = (value ?? "").trim();
  return text === "" || text.toLowerCase() === "null";
}

/**
 * "deviation:15" → { mode: "deviation", argument: "15" }. The argument is
 * the deviation % for `deviation` and the upper bound for `range`.
 */
export function splitModeToken(token: string): { mode: string; argument: string | null } {
  const index = token.indexOf(":");
  if (index < 0) return { mode: token, argument: null };
  return { mode: token.slice(0, index), argument: token.slice(index + 1) };
}

type NumberField = { ok: true; value: number | null; unit: string | null } | { ok: false; error: string };

function readNumber(label: string, raw: string | undefined): NumberField {
  if (isAbsentText(raw)) return { ok: true, value: null, unit: null };
  const parsed = parseLocaleNumber(raw);
  if (parsed.error) return { ok: false, error: `Invalid ${label} "${raw ?? ""}": ${parsed.error}` };
  return { ok: true, value: parsed.value, unit: parsed.hadUnitText ? parsed.extractedUnit : null };
}

export function parseParamInput(
  fields: ParamInputFields,
  qualitative?: QualitativeTexts | null,
): ParamInputResult {
  const idText = fields.parametertypeId.trim();
  if (!/^\d+$/.test(idText) || Number.parseInt(idText, 10) <= 0) {
    return { ok: false, error: `Invalid parametertype_id "${fields.parametertypeId}". Must be a positive integer.` };
  }
  const parametertypeId = Number.parseInt(idText, 10);

  const modeName = fields.mode.trim().toLowerCase();
  if (!isModeName(modeName)) {
    return { ok: false, error: `Invalid mode "${fields.mode}". Expected one of: ${MODE_NAMES.join(", ")}.` };
  }

  if (modeName === "dummy") {
    return { ok: true, spec: { parametertypeId, mode: { kind: "dummy" }, notes: [] } };
  }

  const notes: string[] = [];
  const target = readNumber("target", fields.target);
  if (!target.ok) return target;

  let unit = isAbsentText(fields.unit) ? null : fields.unit.trim();
  if (target.unit !== null) {
    if (unit === null) {
      unit = target.unit;
      notes.push(`Unit '${target.unit}' was taken from the target text.`);
    } else {
      notes.push(`Unit text '${target.unit}' was removed from the target.`);
    }
  }

  if (target.value === null) {
    return { ok: false, error: `Mode "${modeName}" needs a numeric target.` };
  }
  const value = target.value;

  const done = (mode: BandMode): ParamInputResult => ({ ok: true, spec: { parametertypeId, mode, notes } });

  switch (modeName) {
    case "active":
    case "mineral":
    case "limit3":
    case "limit2":
    case "minimum":
    case "maximum":
      return done({ kind: modeName, target: value, unit });
    case "qualitative": {
      if (!qualitative || qualitative.en.trim() === "" || qualitative.de.trim() === "") {
        return { ok: false, error: "Qualitative mode needs both an English and a German text." };
      }
      return done({ kind: "qualitative", target: value, unit, texts: { en: qualitative.en, de: qualitative.de } });
    }
    case "deviation": {
      const percent = readNumber("deviation %", fields.deviationPercent);
      if (!percent.ok) return percent;
      if (percent.value === null) return { ok: false, error: "Mode \"deviation\" needs a deviation %." };
      if (percent.value < 0 || percent.value > MAX_DEVIATION_PERCENT) {
        return { ok: false, error: `Deviation % must be between 0 and ${MAX_DEVIATION_PERCENT}.` };
      }
      return done({ kind: "deviation", target: value, unit, policy: { type: "percent", percent: percent.value } });
    }
    case "range": {
      const upper = readNumber("upper bound", fields.upper);
      if (!upper.ok) return upper;
      if (upper.value === null) return { ok: false, error: "Mode \"range\" needs an upper bound." };
      return done({ kind: "range", lower: value, upper: upper.value, unit });
    }
  }
}
