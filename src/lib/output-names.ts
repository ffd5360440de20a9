/**
 * Output file naming. Pure string helpers so the browser views and the
 * CLI name their downloads and files the same way.
 */

import type { JsonValue } from "@/types";

const SEPARATOR = /[\\/]/;

/** "exports/Rules_20251105.json" → "Rules_20251105" */
export function fileStem(path: string): string {
  const base = path.split(SEPARATOR).pop() ?? path;
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

/** Replaces the last path segment, keeping the directory part as written. */
export function siblingPath(path: string, fileName: string): string {
  const match = /^(.*[\\/])[^\\/]*$/.exec(path);
  return match ? `${match[1]}${fileName}` : fileName;
}

function safeLabel(text: string): string {
  return text.replace(/\//g, "").replace(/ /g, "");
}

export function specIdOutputName(stem: string, specId: number): string {
  return `${stem}_spec${specId}.json`;
}

export function unitOutputName(stem: string, unit: string | null): string {
  return `${stem}_unit_${unit === null ? "null" : safeLabel(unit)}.json`;
}

export function keyOutputName(stem: string, keyPath: string, value: JsonValue): string {
  const label = value === null ? "null" : typeof value === "object" ? JSON.stringify(value) : String(value);
  return `${stem}_${keyPath.replace(/\./g, "_")}_${safeLabel(label)}.json`;
}

export function removeOutputName(stem: string, ids: Iterable<number>): string {
  return `${stem}_remove_${[...ids].sort((a, b) => a - b).join("_")}.json`;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** "Rules_1029_20251105_1430.json" */
export function generatedRulesFileName(prefix: string, specId: number, now: Date): string {
  const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}`;
  return `${prefix}_${specId}_${stamp}.json`;
}

/** merged.json → merged_1.json → merged_2.json … until `exists` says no. */
export function uniqueOutputPath(requested: string, exists: (path: string) => boolean): string {
  if (!exists(requested)) return requested;
  const stem = fileStem(requested);
  const base = requested.split(SEPARATOR).pop() ?? requested;
  const extension = base.slice(stem.length);
  for (let i = 1; ; i++) {
    const candidate = siblingPath(requested, `${stem}_${i}${extension}`);
    if (!exists(candidate)) return candidate;
  }
}
