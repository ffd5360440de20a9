/**
 * update-spec-id: overwrite `data.spec_id` in one or more rules files.
 *
 * One input + --out writes that file; several inputs + --out merge into
 * one output; otherwise each input gets `<stem>_spec<N>.json` beside it
 * (or is rewritten with --inplace).
 */

import { UsageError } from "../args";
import type { ArgReader } from "../args";
import type { CommandContext, CommandDefinition } from "../context";
import { readRulesFile, writeJsonFile } from "../io";
import { outputFor } from "./shared";
import { fileStem, specIdOutputName } from "@/lib/output-names";
import { mergeRulesDocuments, updateSpecId } from "@/lib/rules-payload";

export interface UpdateSpecIdResult {
  outputs: string[];
  updated: number;
  total: number;
}

export function runUpdateSpecId(args: ArgReader, ctx: CommandContext): UpdateSpecIdResult {
  args.assertKnown(updateSpecIdCommand.flags);
  const inputs = args.list("in");
  if (inputs.length === 0) throw new UsageError("--in needs at least one rules file");
  const specId = args.requireInt("spec-id");
  if (specId <= 0) throw new UsageError(`--spec-id must be a positive integer (got ${specId})`);

  const results = inputs.map((file) => ({ file, ...updateSpecId(readRulesFile(file), specId) }));
  const updated = results.reduce((sum, r) => sum + r.updated, 0);
  const total = results.reduce((sum, r) => sum + r.total, 0);

  for (const r of results) {
    ctx.logger.info(`${r.file}: updated ${r.updated}/${r.total} rules to spec_id ${specId}`);
  }

  const out = args.string("out");
  if (inputs.length > 1 && out !== undefined) {
    if (args.flag("inplace")) throw new UsageError("Use either --out or --inplace, not both");
    writeJsonFile(out, mergeRulesDocuments(results.map((r) => r.document)), ctx.config.jsonIndent);
    ctx.logger.info(`Merged ${results.length} files (${total} rules) into ${out}`);
    return { outputs: [out], updated, total };
  }

  const outputs = results.map((r) => {
    const target = outputFor(args, r.file, () => specIdOutputName(fileStem(r.file), specId));
    writeJsonFile(target, r.document, ctx.config.jsonIndent);
    ctx.logger.info(`Saved ${target}`);
    return target;
  });
  return { outputs, updated, total };
}

export const updateSpecIdCommand: CommandDefinition = {
  summary: "Set spec_id on every rule",
  usage: "update-spec-id --in A.json [B.json …] --spec-id N [--out PATH | --inplace]",
  flags: ["in", "spec-id", "out", "inplace"],
  run: runUpdateSpecId,
};
