/** Pure functions mapping rule classification to rule color and UI classes.
 *  The LIMS color field is derived 1:1 from DDF_type.
 */

import type { DdfType, RuleColor } from "@/types";

// ── Rule color ─────────────────────────────────────────────────────────────

export function colorForDdfType(type: DdfType): RuleColor {
  switch (type) {
    case "perfect":
      return "green";
    case "OK":
      return "orange";
    case "not OK":
      return "red";
  }
}

// ── UI classes ─────────────────────────────────────────────────────────────

/** Badge classes for a DDF_type cell; unknown labels (imported rows) are gray. */
export function getDdfTypeBadgeClasses(type: string): string {
  switch (type) {
    case "perfect":
      return "bg-green-50 text-green-700 border-green-200 border";
    case "OK":
      return "bg-amber-50 text-amber-700 border-amber-200 border";
    case "not OK":
      return "bg-red-50 text-red-700 border-red-200 border";
    default:
      return "bg-gray-100 text-gray-600 border-gray-200 border";
  }
}

/** CSS color for the rule color dot. */
export function getRuleColorDot(color: string): string {
  switch (color) {
    case "green":
      return "#16a34a"; // green-600
    case "orange":
      return "#d97706"; // amber-600
    case "red":
      return "#dc2626"; // red-600
    default:
      return "#6B7280"; // gray
  }
}
