import { UsageError } from "../args";
import type { ArgReader } from "../args";
import type { CommandContext, CommandDefinition } from "../context";
import { readRulesFile, writeJsonFile } from "../io";
import { describeIds, outputFor, parameterFilter } from "./shared";
import { fileStem, removeOutputName } from "@/lib/output-names";
import { removeParameters } from "@/lib/rules-payload";

export interface RemoveParameterResult {
  outPath: string;
  removed: number;
  total: number;
}

/** remove-parameter: drop every rule of the given parametertype_ids. */
export function runRemoveParameter(args: ArgReader, ctx: CommandContext): RemoveParameterResult {
  args.assertKnown(removeParameterCommand.flags);
  const input = args.requireString("in");
  const ids = parameterFilter(args, "param-id");
  if (ids === null) throw new UsageError("--param-id is required");

  const result = removeParameters(readRulesFile(input), ids);
  const outPath = outputFor(args, input, () => removeOutputName(fileStem(input), ids));
  writeJsonFile(outPath, result.document, ctx.config.jsonIndent);

  if (result.removed === 0) {
    ctx.logger.warn(`No rules found for parametertype_id ${describeIds(ids)}`);
  }
  ctx.logger.info(
    `Removed ${result.removed} of ${result.total} rules; ${result.total - result.removed} remain. Saved ${outPath}`,
  );
  return { outPath, removed: result.removed, total: result.total };
}

export const removeParameterCommand: CommandDefinition = {
  summary: "Remove all rules of given parametertype_ids",
  usage: "remove-parameter --in PATH --param-id ID [ID …] [--out PATH | --inplace]",
  flags: ["in", "param-id", "out", "inplace"],
  run: runRemoveParameter,
};
