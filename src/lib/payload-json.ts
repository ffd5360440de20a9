/**
 * JSON text in and out of payload documents.
 *
 * Output is pretty-printed UTF-8 (no \u escaping of non-ASCII) with a
 * trailing newline. Field order is insertion order, which the rule builder
 * fixes to the LIMS column order.
 */

import type { JsonValue, RulesDocument } from "@/types";
import { ensureRulesDocument } from "./rules-payload";

export const DEFAULT_JSON_INDENT = 2;

export function serializePayload(payload: JsonValue, indent: number = DEFAULT_JSON_INDENT): string {
  return `${JSON.stringify(payload, null, indent)}\n`;
}

/** Throws with the source label when the text is not valid JSON. */
export function parseJsonText(text: string, source = "input"): JsonValue {
  try {
    const value: JsonValue = JSON.parse(text.replace(/^\uFEFF/, ""));
    return value;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not parse JSON from ${source}: ${reason}`);
  }
}

export function parseRulesDocument(text: string, source = "input"): RulesDocument {
  return ensureRulesDocument(parseJsonText(text, source));
}
