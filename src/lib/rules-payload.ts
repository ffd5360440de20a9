/**
 * Rules document operations: bulk overwrite, filtered overwrite, removal
 * by parameter id, merging and template filling.
 *
 * Every operation works on a copy and returns it together with its counts;
 * the caller's document is never touched. Items that are not
 * `{ data: {...} }` mappings are carried through unchanged.
 */

import type { JsonObject, JsonValue, RulesDocument } from "@/types";
import { getAtPath, isMapping, isMissingValue, setAtPath, splitKeyPath } from "./json-tree";
import { parseDecimalText } from "./typed-value";

// ─── Types ──────────────────────────────────────────────────

export interface UpdateResult {
  document: RulesDocument;
  updated: number;
  total: number;
}

export interface RemoveResult {
  document: RulesDocument;
  removed: number;
  total: number;
}

export interface FieldUpdateOptions {
  /** Only touch rules whose current value is null, "" or "null". */
  onlyMissing?: boolean;
  /** Only touch rules for these parametertype_ids; null/undefined = all. */
  parameterIds?: ReadonlySet<number> | null;
}

// ─── Structure ──────────────────────────────────────────────

/** Checks the top-level shape; throws on anything that is not `{ rules: [...] }`. */
export function ensureRulesDocument(value: JsonValue): RulesDocument {
  if (!isMapping(value)) {
    throw new Error("Invalid rules JSON: top level must be an object");
  }
  const rules = value.rules;
  if (!Array.isArray(rules)) {
    throw new Error("Invalid rules JSON: missing top-level 'rules' list");
  }
  return { ...value, rules };
}

function cloneDocument(doc: RulesDocument): RulesDocument {
  return structuredClone(doc);
}

/**
 * parametertype_id of an item, or null when the item is malformed. Only
 * integer numbers count; fractional ids and id text never match a filter.
 */
export function readParameterId(item: JsonValue): number | null {
  if (!isMapping(item)) return null;
  const data = item.data;
  if (!isMapping(data)) return null;
  const pid = data.parametertype_id;
  return typeof pid === "number" && Number.isInteger(pid) ? pid : null;
}

function matchesParameterFilter(item: JsonValue, ids: ReadonlySet<number> | null | undefined): boolean {
  if (!ids) return true;
  const pid = readParameterId(item);
  return pid !== null && ids.has(pid);
}

// ─── Overwrites ─────────────────────────────────────────────

/**
 * Sets `data.spec_id` on every item whose `data` is a mapping. An item
 * counts as updated even when it had no spec_id before; items without a
 * `data` mapping are skipped, not created.
 */
export function updateSpecId(doc: RulesDocument, specId: number): UpdateResult {
  const document = cloneDocument(doc);
  let updated = 0;
  for (const item of document.rules) {
    if (!isMapping(item)) continue;
    const data = item.data;
    if (!isMapping(data)) continue;
    data.spec_id = specId;
    updated++;
  }
  return { document, updated, total: document.rules.length };
}

/**
 * Writes `value` at a dot-path inside every matching item, creating
 * intermediate mappings as needed. Throws when the path is empty.
 */
export function updateRuleField(
  doc: RulesDocument,
  keyPath: string,
  value: JsonValue,
  options: FieldUpdateOptions = {},
): UpdateResult {
  const path = splitKeyPath(keyPath);
  if (path.length === 0) {
    throw new Error("Key path must be non-empty, e.g. 'action' or 'data.spec_id'");
  }

  const document = cloneDocument(doc);
  let updated = 0;
  for (const item of document.rules) {
    if (!isMapping(item)) continue;
    if (!matchesParameterFilter(item, options.parameterIds)) continue;
    if (options.onlyMissing && !isMissingValue(getAtPath(item, path))) continue;
    // each item gets its own copy of object values
    setAtPath(item, path, structuredClone(value));
    updated++;
  }
  return { document, updated, total: document.rules.length };
}

/** `updateRuleField` on `data.DDF_unit`; null clears the unit. */
export function updateUnit(
  doc: RulesDocument,
  unit: string | null,
  options: FieldUpdateOptions = {},
): UpdateResult {
  return updateRuleField(doc, "data.DDF_unit", unit, options);
}

// ─── Removal ────────────────────────────────────────────────

/** Drops every item whose parametertype_id is in `ids`; malformed items stay. */
export function removeParameters(doc: RulesDocument, ids: Iterable<number>): RemoveResult {
  const removeSet = new Set(ids);
  const document = cloneDocument(doc);
  const total = document.rules.length;
  document.rules = document.rules.filter((item) => {
    const pid = readParameterId(item);
    return pid === null || !removeSet.has(pid);
  });
  return { document, removed: total - document.rules.length, total };
}

// ─── Merge / summary ────────────────────────────────────────

/** Concatenates `rules` in input order; other top-level keys come from the first document. */
export function mergeRulesDocuments(docs: readonly RulesDocument[]): RulesDocument {
  if (docs.length === 0) return { rules: [] };
  const merged = cloneDocument(docs[0]);
  for (const doc of docs.slice(1)) {
    merged.rules.push(...structuredClone(doc.rules));
  }
  return merged;
}

export interface ParameterCount {
  parametertypeId: number | null;
  count: number;
}

/** Rule counts per parametertype_id, in first-seen order. Malformed items count under null. */
export function countRulesByParameter(doc: RulesDocument): ParameterCount[] {
  const counts = new Map<number | null, number>();
  for (const item of doc.rules) {
    const pid = readParameterId(item);
    counts.set(pid, (counts.get(pid) ?? 0) + 1);
  }
  return [...counts].map(([parametertypeId, count]) => ({ parametertypeId, count }));
}

// ─── Parsing helpers ────────────────────────────────────────

export type ParameterIdsResult =
  | { ok: true; ids: Set<number> | null }
  | { ok: false; error: string };

/** "5239, 5244 6001" → {5239, 5244, 6001}; blank → null (no restriction). */
export function parseParameterIds(text: string | readonly string[]): ParameterIdsResult {
  const parts = (typeof text === "string" ? [text] : text)
    .flatMap((chunk) => chunk.replace(/,/g, " ").split(/\s+/))
    .filter((part) => part !== "");
  if (parts.length === 0) return { ok: true, ids: null };

  const ids = new Set<number>();
  for (const part of parts) {
    if (!/^[+-]?\d+$/.test(part)) {
      return { ok: false, error: `Invalid parametertype_id "${part}"` };
    }
    ids.add(Number.parseInt(part, 10));
  }
  return { ok: true, ids };
}

// ─── Template filling ───────────────────────────────────────

export type TemplateResult =
  | { ok: true; document: RulesDocument; pairs: number }
  | { ok: false; error: string };

/** "[0.55, 2, 0.85, 90]" → [0.55, 2, 0.85, 90]; brackets optional. */
export function parseTemplateTargets(
  text: string,
): { ok: true; targets: number[] } | { ok: false; error: string } {
  let inner = text.trim();
  if (inner.startsWith("[") && inner.endsWith("]")) inner = inner.slice(1, -1);

  const targets: number[] = [];
  for (const part of inner.split(",").map((p) => p.trim()).filter((p) => p !== "")) {
    const value = parseDecimalText(part);
    if (value === null) return { ok: false, error: `Invalid target "${part}"` };
    targets.push(value);
  }
  return { ok: true, targets };
}

/**
 * Fills a template of perfect / not-OK rule pairs: pair i gets `spec_id`,
 * `value` and `DDF_target_value` from `targets[i]`.
 */
export function applyTemplateTargets(
  template: RulesDocument,
  specId: number,
  targets: readonly number[],
): TemplateResult {
  const rules = template.rules;
  if (rules.length % 2 !== 0) {
    return { ok: false, error: "Template format error: rules must come in perfect/not-OK pairs." };
  }
  const pairs = rules.length / 2;
  if (targets.length !== pairs) {
    return {
      ok: false,
      error: `Number of targets (${targets.length}) does not match parameter count (${pairs}). Expected one target per pair of rules.`,
    };
  }

  const document: RulesDocument = { rules: structuredClone(rules) };
  document.rules.forEach((item, index) => {
    if (!isMapping(item)) return;
    const target = targets[Math.floor(index / 2)];
    const data: JsonObject = isMapping(item.data) ? item.data : {};
    data.spec_id = specId;
    data.value = target;
    data.DDF_target_value = target;
    item.data = data;
  });
  return { ok: true, document, pairs };
}
