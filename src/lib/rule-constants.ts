/**
 * Rule-generation constants: band multipliers, rounding places and the
 * fixed field values every generated rule carries.
 */

/** Active/mineral band multipliers, applied to the target. */
export const ACTIVE_MULTIPLIERS = {
  lowOk: 0.8,
  lowPerfect: 0.9,
  highPerfect: 1.25,
  highOk: 1.5,
} as const;

/** Mineral parameters tolerate less overshoot above the target. */
export const MINERAL_HIGH_OK_MULTIPLIER = 1.45;

/** limit3: everything at or below this fraction of the target is perfect. */
export const LIMIT3_PERFECT_FRACTION = 0.3;

/** Decimal places for the fixed-multiplier modes. */
export const BAND_PLACES = 2;

/** Decimal places for deviation-based and lab-limit modes. */
export const DEVIATION_PLACES = 4;

export const DEFAULT_DEVIATION_PERCENT = 10;
export const MAX_DEVIATION_PERCENT = 50;

/** Unit every locked nutrition parameter is declared in. */
export const LOCKED_UNIT = "g/100g";

/**
 * Dummy-rule value: a two-character string of two double quotes. The LIMS
 * reads it literally, so it must never become `null` or `""` (empty).
 */
export const DUMMY_SENTINEL = '""';

export const RULE_ACTION = "create";

/** Pass-through columns with the same value on every generated rule. */
export const FIXED_RULE_FIELDS = {
  column: 0,
  inverse: 0,
  show: 1,
  regex_filter: null,
  text: null,
  translations: null,
} as const;

/** Placeholder the LIMS shows for spec texts that were never filled in. */
export const SPEC_TEXT_PLACEHOLDER = "NULL";
