/**
 * Band modes: one variant per rule shape, each carrying exactly the inputs
 * it needs. `dummy` has no target and no unit; `qualitative` always has both
 * match texts.
 */

import type { DeviationPolicy } from "./numeric-policy";

export type BandMode =
  | { kind: "active"; target: number; unit: string | null }
  | { kind: "mineral"; target: number; unit: string | null }
  | { kind: "limit3"; target: number; unit: string | null }
  | { kind: "limit2"; target: number; unit: string | null }
  | {
      kind: "qualitative";
      target: number;
      unit: string | null;
      texts: { en: string; de: string };
    }
  | { kind: "dummy" }
  /** Target left blank on a table-driven form; keeps the declared unit. */
  | { kind: "blank"; unit: string | null }
  | { kind: "deviation"; target: number; unit: string | null; policy: DeviationPolicy }
  | { kind: "minimum"; target: number; unit: string | null }
  | { kind: "maximum"; target: number; unit: string | null }
  | { kind: "range"; lower: number; upper: number; unit: string | null };

export type BandModeKind = BandMode["kind"];

/** Mode names a user may type or pick; `blank` is only produced by forms. */
export const MODE_NAMES = [
  "active",
  "mineral",
  "limit3",
  "limit2",
  "qualitative",
  "dummy",
  "deviation",
  "minimum",
  "maximum",
  "range",
] as const;

export type ModeName = (typeof MODE_NAMES)[number];

export function isModeName(value: string): value is ModeName {
  return (MODE_NAMES as readonly string[]).includes(value);
}

export const MODE_LABELS: Record<ModeName, string> = {
  active: "Active (4 bands)",
  mineral: "Mineral (4 bands, 1.45× ceiling)",
  limit3: "Limit, 3 bands",
  limit2: "Limit, 2 bands",
  qualitative: "Qualitative text match",
  dummy: "Dummy (any value)",
  deviation: "± deviation",
  minimum: "Minimum",
  maximum: "Maximum",
  range: "Lower / upper",
};

/** Modes that cannot be built without a numeric target. */
export function modeNeedsTarget(name: ModeName): boolean {
  return name !== "dummy";
}

/** Rules a mode emits for a positive target (T = 0 may emit fewer). */
export const RULES_PER_MODE: Record<ModeName, number> = {
  active: 4,
  mineral: 4,
  limit3: 3,
  limit2: 2,
  qualitative: 2,
  dummy: 1,
  deviation: 2,
  minimum: 2,
  maximum: 2,
  range: 2,
};
