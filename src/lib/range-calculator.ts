/**
 * Range calculator: the band edges of the active and limit modes as text,
 * for checking a target before any rules are generated.
 */

import { formatFixed } from "./decimal-rounding";
import { computeActiveBands, computeLimit3Bands } from "./numeric-policy";

export type RangeType = "active" | "limit";

export const RANGE_TYPES: readonly RangeType[] = ["active", "limit"];

export function isRangeType(value: string): value is RangeType {
  return value === "active" || value === "limit";
}

const fmt = (value: number): string => formatFixed(value, 2);

export function describeRanges(target: number, type: RangeType): string[] {
  if (target === 0) {
    return ["perfect_range: 0.00", "not_okay_range: > 0.00"];
  }

  if (type === "active") {
    const b = computeActiveBands(target);
    return [
      `perfect_range: ${fmt(b.lowPerfect)} - ${fmt(b.highPerfect)}`,
      `okay_range: ${fmt(b.lowOk)} - ${fmt(b.lowPerfect)}`,
      `okay_range_2: ${fmt(b.highPerfect)} - ${fmt(b.highOk)}`,
      `not_okay_range: <${fmt(b.lowOk)} OR >${fmt(b.highOk)}`,
    ];
  }

  const { perfectMax, limit } = computeLimit3Bands(target);
  return [
    `perfect_range: <= ${fmt(perfectMax)}`,
    `okay_range: ${fmt(perfectMax)} - ${fmt(limit)}`,
    `not_okay_range: > ${fmt(limit)}`,
  ];
}
