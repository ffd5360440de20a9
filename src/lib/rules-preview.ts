/**
 * Flattens rules items into display rows for the preview grid. Items are
 * read as plain JSON, so uploaded documents with missing or odd fields
 * still render.
 */

import type { JsonObject, JsonValue } from "@/types";
import { isMapping } from "./json-tree";

export interface PreviewRow {
  index: number;
  parametertypeId: string;
  specId: string;
  ddfType: string;
  color: string;
  condition: string;
  target: string;
  unit: string;
}

function cellText(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** ">= 0.9 AND <= 1.1"; single clause when there is no linker. */
export function describeCondition(data: JsonObject): string {
  const first = `${cellText(data.operator)} ${cellText(data.value)}`.trim();
  const linker = cellText(data.linker);
  if (!linker) return first;
  return `${first} ${linker} ${cellText(data.operator2)} ${cellText(data.value2)}`.trim();
}

export function toPreviewRows(items: readonly JsonValue[]): PreviewRow[] {
  return items.map((item, index) => {
    const data: JsonObject = isMapping(item) && isMapping(item.data) ? item.data : {};
    return {
      index,
      parametertypeId: cellText(data.parametertype_id),
      specId: cellText(data.spec_id),
      ddfType: cellText(data.DDF_type),
      color: cellText(data.color),
      condition: describeCondition(data),
      target: cellText(data.DDF_target_value),
      unit: cellText(data.DDF_unit),
    };
  });
}
