/**
 * Design system tokens: referenceable class strings for the toolbox views.
 *
 * Rule color / DDF_type classes live in rule-severity.ts.
 *
 * Import tokens by category:
 *   import { ty, sp, btn, field, tbl, notice } from "@/lib/design-tokens";
 */

// ---------------------------------------------------------------------------
// Typography (ty)
// ---------------------------------------------------------------------------

export const ty = {
  /** Page title (L1): one per view */
  pageTitle: "text-2xl font-bold",
  /** Section header rendered uppercase via CSS */
  sectionHeaderUpper: "text-xs font-semibold uppercase tracking-wider text-muted-foreground",
  /** Table header: compact grids */
  tableHeader: "text-[10px] font-semibold uppercase tracking-wider text-muted-foreground",
  caption: "text-xs text-muted-foreground",
  /** Monospace data value: targets, bounds, ids */
  mono: "font-mono text-[11px]",
  monoSm: "font-mono text-xs",
} as const;

// ---------------------------------------------------------------------------
// Spacing (sp)
// ---------------------------------------------------------------------------

export const sp = {
  /** Main content area */
  mainContent: "p-6",
  landingHero: "px-8 py-8",
  /** Table cells: compact grids */
  cellCompact: "px-2 py-1",
  headerCompact: "px-2 py-1.5",
  card: "p-3",
} as const;

// ---------------------------------------------------------------------------
// Button classes (btn)
// ---------------------------------------------------------------------------

export const btn = {
  /** Primary small: view actions (GENERATE, APPLY) */
  primary: "rounded bg-primary px-2.5 py-1 text-[10px] font-semibold uppercase text-white hover:bg-primary/90",
  /** Secondary / outlined */
  secondary: "rounded border px-2.5 py-1 text-[10px] font-semibold uppercase text-muted-foreground hover:bg-muted/50",
  /** Ghost / icon */
  ghost: "rounded px-1.5 py-1 text-[10px] font-medium text-muted-foreground hover:bg-muted/50",
  /** Disabled modifier: add to any button */
  disabled: "opacity-50 cursor-not-allowed",
} as const;

// ---------------------------------------------------------------------------
// Form fields (field)
// ---------------------------------------------------------------------------

export const field = {
  input: "h-7 rounded border bg-background px-2 text-xs outline-none focus:border-primary",
  select: "h-7 rounded border bg-background px-1 text-xs cursor-pointer focus:outline-none focus:ring-1 focus:ring-primary",
  label: "flex flex-col gap-1 text-xs text-muted-foreground",
  invalid: "border-red-400 bg-red-50/50",
} as const;

// ---------------------------------------------------------------------------
// Table classes (tbl)
// ---------------------------------------------------------------------------

export const tbl = {
  headerRowCompact: "bg-muted/50 border-b",
  rowDivider: "border-b",
  wrapper: "rounded-md border",
} as const;

// ---------------------------------------------------------------------------
// Notices (notice): engine warnings, notes and errors
// ---------------------------------------------------------------------------

export const notice = {
  error: "rounded border border-red-200 bg-red-50 px-3 py-2 text-xs text-red-700",
  warning: "rounded border border-amber-200 bg-amber-50 px-3 py-2 text-xs text-amber-800",
  info: "rounded border bg-muted/30 px-3 py-2 text-xs text-muted-foreground",
} as const;

export type NoticeTone = keyof typeof notice;
