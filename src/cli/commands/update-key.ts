/**
 * update-key / update-unit: overwrite any dot-path in a rules file, or the
 * unit in particular.
 */

import { UsageError } from "../args";
import type { ArgReader } from "../args";
import type { CommandContext, CommandDefinition } from "../context";
import { readRulesFile, writeJsonFile } from "../io";
import { describeIds, outputFor, parameterFilter } from "./shared";
import { fileStem, keyOutputName, unitOutputName } from "@/lib/output-names";
import { isAbsentText } from "@/lib/param-input";
import { updateRuleField, updateUnit } from "@/lib/rules-payload";
import type { UpdateResult } from "@/lib/rules-payload";
import { isValueType, parseTypedValue, VALUE_TYPES } from "@/lib/typed-value";

export interface UpdateFieldResult {
  outPath: string;
  updated: number;
  total: number;
}

function report(ctx: CommandContext, label: string, result: UpdateResult, ids: ReadonlySet<number> | null): void {
  const scope = ids ? ` (parametertype_id ${describeIds(ids)})` : "";
  ctx.logger.info(`Updated ${label} on ${result.updated}/${result.total} rules${scope}`);
  if (result.updated === 0) ctx.logger.warn("No rules matched; the output equals the input");
}

export function runUpdateKey(args: ArgReader, ctx: CommandContext): UpdateFieldResult {
  args.assertKnown(updateKeyCommand.flags);
  const input = args.requireString("in");
  const key = args.requireString("key");
  const raw = args.requireString("value");
  const type = args.string("as") ?? "auto";
  if (!isValueType(type)) {
    throw new UsageError(`--as must be one of ${VALUE_TYPES.join(", ")} (got "${type}")`);
  }
  const typed = parseTypedValue(raw, type);
  if (!typed.ok) throw new UsageError(typed.error);

  const ids = parameterFilter(args);
  const result = updateRuleField(readRulesFile(input), key, typed.value, {
    onlyMissing: args.flag("only-missing"),
    parameterIds: ids,
  });
  const outPath = outputFor(args, input, () => keyOutputName(fileStem(input), key, typed.value));
  writeJsonFile(outPath, result.document, ctx.config.jsonIndent);
  report(ctx, `'${key}' = ${JSON.stringify(typed.value)}`, result, ids);
  ctx.logger.info(`Saved ${outPath}`);
  return { outPath, updated: result.updated, total: result.total };
}

export function runUpdateUnit(args: ArgReader, ctx: CommandContext): UpdateFieldResult {
  args.assertKnown(updateUnitCommand.flags);
  const input = args.requireString("in");
  const rawUnit = args.requireString("unit");
  const unit = isAbsentText(rawUnit) ? null : rawUnit.trim();

  const ids = parameterFilter(args);
  const result = updateUnit(readRulesFile(input), unit, { onlyMissing: args.flag("only-missing"), parameterIds: ids });
  const outPath = outputFor(args, input, () => unitOutputName(fileStem(input), unit));
  writeJsonFile(outPath, result.document, ctx.config.jsonIndent);
  report(ctx, `DDF_unit = ${unit ?? "null"}`, result, ids);
  ctx.logger.info(`Saved ${outPath}`);
  return { outPath, updated: result.updated, total: result.total };
}

export const updateKeyCommand: CommandDefinition = {
  summary: "Set any dot-path key on rules",
  usage:
    "update-key --in PATH --key DOT.PATH --value V [--as auto|str|int|float|bool|null|json] [--only-missing] [--parametertype-id ID …] [--out PATH | --inplace]",
  flags: ["in", "key", "value", "as", "only-missing", "parametertype-id", "out", "inplace"],
  run: runUpdateKey,
};

export const updateUnitCommand: CommandDefinition = {
  summary: "Set DDF_unit on rules (null clears it)",
  usage: "update-unit --in PATH --unit U [--only-missing] [--parametertype-id ID …] [--out PATH | --inplace]",
  flags: ["in", "unit", "only-missing", "parametertype-id", "out", "inplace"],
  run: runUpdateUnit,
};
