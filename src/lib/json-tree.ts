/**
 * Dot-path access over a neutral JSON tree.
 *
 * Values are classified into mapping / sequence / scalar nodes; paths walk
 * mappings only. `setAtPath` creates (or replaces) intermediate levels with
 * empty mappings, so writing `data.limits.max` never fails.
 */

import type { JsonObject, JsonPrimitive, JsonValue } from "@/types";

export type TreeNode =
  | { kind: "mapping"; value: JsonObject }
  | { kind: "sequence"; value: JsonValue[] }
  | { kind: "scalar"; value: JsonPrimitive };

export function classify(value: JsonValue): TreeNode {
  if (Array.isArray(value)) return { kind: "sequence", value };
  if (value !== null && typeof value === "object") return { kind: "mapping", value };
  return { kind: "scalar", value };
}

export function isMapping(value: JsonValue | undefined): value is JsonObject {
  return value !== undefined && classify(value).kind === "mapping";
}

/** "data.spec_id" → ["data", "spec_id"]; empty segments are dropped. */
export function splitKeyPath(path: string): string[] {
  return path
    .split(".")
    .map((segment) => segment.trim())
    .filter((segment) => segment !== "");
}

/** `undefined` when any level is missing or not a mapping. */
export function getAtPath(root: JsonValue, path: readonly string[]): JsonValue | undefined {
  let current: JsonValue = root;
  for (const key of path) {
    const node = classify(current);
    if (node.kind !== "mapping" || !Object.hasOwn(node.value, key)) return undefined;
    current = node.value[key];
  }
  return current;
}

export function setAtPath(root: JsonObject, path: readonly string[], value: JsonValue): void {
  if (path.length === 0) throw new Error("Key path must not be empty");
  let current = root;
  for (const key of path.slice(0, -1)) {
    const child = current[key];
    if (isMapping(child)) {
      current = child;
    } else {
      const created: JsonObject = {};
      current[key] = created;
      current = created;
    }
  }
  current[path[path.length - 1]] = value;
}

/** null, "", or the text "null" in any case. */
export function isMissingValue(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null) return true;
  return typeof value === "string" && ["", "null"].includes(value.trim().toLowerCase());
}
