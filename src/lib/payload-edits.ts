/**
 * Payload editor actions: form text in, edited document plus its download
 * name out. Each action maps onto the matching `update-*` /
 * `remove-parameter` command and names its output the same way.
 */

import type { RulesDocument } from "@/types";
import { parseSpecId } from "./generator-form";
import { splitKeyPath } from "./json-tree";
import { keyOutputName, removeOutputName, specIdOutputName, unitOutputName } from "./output-names";
import { isAbsentText } from "./param-input";
import { parseParameterIds, removeParameters, updateRuleField, updateSpecId, updateUnit } from "./rules-payload";
import { parseTypedValue } from "./typed-value";
import type { ValueType } from "./typed-value";

export type PayloadEdit =
  | { kind: "specId"; specId: string }
  | { kind: "unit"; unit: string; onlyMissing: boolean; parameterIds: string }
  | { kind: "key"; keyPath: string; value: string; valueType: ValueType; onlyMissing: boolean; parameterIds: string }
  | { kind: "remove"; parameterIds: string };

export type PayloadEditKind = PayloadEdit["kind"];

export type PayloadEditResult =
  | { ok: true; document: RulesDocument; changed: number; total: number; outputName: string; summary: string }
  | { ok: false; error: string };

function fail(error: string): PayloadEditResult {
  return { ok: false, error };
}

export function applyPayloadEdit(doc: RulesDocument, stem: string, edit: PayloadEdit): PayloadEditResult {
  switch (edit.kind) {
    case "specId": {
      const specId = parseSpecId(edit.specId);
      if (specId === null) return fail(`Invalid spec_id "${edit.specId}". Must be a positive integer.`);
      const r = updateSpecId(doc, specId);
      return {
        ok: true,
        document: r.document,
        changed: r.updated,
        total: r.total,
        outputName: specIdOutputName(stem, specId),
        summary: `Updated spec_id on ${r.updated}/${r.total} rules`,
      };
    }
    case "unit": {
      const ids = parseParameterIds(edit.parameterIds);
      if (!ids.ok) return fail(ids.error);
      const unit = isAbsentText(edit.unit) ? null : edit.unit.trim();
      const r = updateUnit(doc, unit, { onlyMissing: edit.onlyMissing, parameterIds: ids.ids });
      return {
        ok: true,
        document: r.document,
        changed: r.updated,
        total: r.total,
        outputName: unitOutputName(stem, unit),
        summary: `Updated DDF_unit on ${r.updated}/${r.total} rules`,
      };
    }
    case "key": {
      const keyPath = edit.keyPath.trim();
      if (splitKeyPath(keyPath).length === 0) return fail("Key path must be non-empty, e.g. 'action' or 'data.spec_id'");
      const ids = parseParameterIds(edit.parameterIds);
      if (!ids.ok) return fail(ids.error);
      const typed = parseTypedValue(edit.value, edit.valueType);
      if (!typed.ok) return fail(typed.error);
      const r = updateRuleField(doc, keyPath, typed.value, { onlyMissing: edit.onlyMissing, parameterIds: ids.ids });
      return {
        ok: true,
        document: r.document,
        changed: r.updated,
        total: r.total,
        outputName: keyOutputName(stem, keyPath, typed.value),
        summary: `Updated '${keyPath}' on ${r.updated}/${r.total} rules`,
      };
    }
    case "remove": {
      const ids = parseParameterIds(edit.parameterIds);
      if (!ids.ok) return fail(ids.error);
      if (ids.ids === null) return fail("Enter at least one parametertype_id to remove");
      const r = removeParameters(doc, ids.ids);
      return {
        ok: true,
        document: r.document,
        changed: r.removed,
        total: r.total,
        outputName: removeOutputName(stem, ids.ids),
        summary: `Removed ${r.removed} of ${r.total} rules`,
      };
    }
  }
}
