/**
 * Numeric banding policies: target value → band boundaries.
 *
 * Fixed-multiplier modes (active, mineral, limit3, limit2) quantize to 2
 * decimal places; deviation policies quantize to 4. Products and sums are
 * exact decimals rounded half-up. Callers reject negative targets before
 * calling.
 */

import { addHalfUp, clampToZero, multiplyHalfUp, percentHalfUp, roundHalfUp, subtractHalfUp } from "./decimal-rounding";
import {
  ACTIVE_MULTIPLIERS,
  BAND_PLACES,
  DEVIATION_PLACES,
  LIMIT3_PERFECT_FRACTION,
  MINERAL_HIGH_OK_MULTIPLIER,
} from "./rule-constants";

// ─── Fixed-multiplier bands ─────────────────────────────────

export interface ActiveBands {
  /** Lower edge of the low OK band; below it is not OK. */
  lowOk: number;
  lowPerfect: number;
  highPerfect: number;
  /** Upper edge of the high OK band; above it is not OK. */
  highOk: number;
}

const q2 = (value: number): number => roundHalfUp(value, BAND_PLACES);
const q4 = (value: number): number => roundHalfUp(value, DEVIATION_PLACES);
const times = (multiplier: number, target: number): number => multiplyHalfUp(multiplier, target, BAND_PLACES);

export function computeActiveBands(target: number): ActiveBands {
  return {
    lowOk: times(ACTIVE_MULTIPLIERS.lowOk, target),
    lowPerfect: times(ACTIVE_MULTIPLIERS.lowPerfect, target),
    highPerfect: times(ACTIVE_MULTIPLIERS.highPerfect, target),
    highOk: times(ACTIVE_MULTIPLIERS.highOk, target),
  };
}

export function computeMineralBands(target: number): ActiveBands {
  return {
    ...computeActiveBands(target),
    highOk: times(MINERAL_HIGH_OK_MULTIPLIER, target),
  };
}

export interface Limit3Bands {
  /** Perfect at or below this value. */
  perfectMax: number;
  /** Not OK above this value. */
  limit: number;
}

export function computeLimit3Bands(target: number): Limit3Bands {
  return {
    perfectMax: times(LIMIT3_PERFECT_FRACTION, target),
    limit: q2(target),
  };
}

/** Single threshold for limit2 and the qualitative not-OK rule. */
export function computeLimitThreshold(target: number): number {
  return q2(target);
}

// ─── Deviation policies ─────────────────────────────────────

/**
 * How far a measured value may stray from the target and still be perfect.
 *
 * - `percent`: a share of the target.
 * - `piecewise`: absolute floor below `lowThreshold`, percentage up to and
 *   including `highThreshold`, absolute ceiling above it.
 * - `threshold`: absolute floor below `threshold`, percentage from it on.
 */
export type DeviationPolicy =
  | { type: "percent"; percent: number }
  | {
      type: "piecewise";
      lowThreshold: number;
      highThreshold: number;
      lowAbsolute: number;
      highAbsolute: number;
      percent: number;
    }
  | { type: "threshold"; threshold: number; lowAbsolute: number; percent: number };

function percentOf(target: number, percent: number): number {
  return percentHalfUp(target, percent, DEVIATION_PLACES);
}

export function computeDeviation(target: number, policy: DeviationPolicy): number {
  switch (policy.type) {
    case "percent":
      return percentOf(target, policy.percent);
    case "piecewise":
      if (target < policy.lowThreshold) return q4(policy.lowAbsolute);
      if (target <= policy.highThreshold) return percentOf(target, policy.percent);
      return q4(policy.highAbsolute);
    case "threshold":
      if (target < policy.threshold) return q4(policy.lowAbsolute);
      return percentOf(target, policy.percent);
  }
}

export interface DeviationBounds {
  deviation: number;
  /** Never below 0. */
  lower: number;
  upper: number;
}

export function boundsFromDeviation(target: number, deviation: number): DeviationBounds {
  return {
    deviation,
    lower: clampToZero(subtractHalfUp(target, deviation, DEVIATION_PLACES)),
    upper: addHalfUp(target, deviation, DEVIATION_PLACES),
  };
}

export function computeDeviationBounds(target: number, policy: DeviationPolicy): DeviationBounds {
  return boundsFromDeviation(target, computeDeviation(target, policy));
}
