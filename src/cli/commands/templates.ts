/**
 * fill-template / fill-thresholds: complete prepared rule sheets.
 */

import { UsageError } from "../args";
import type { ArgReader } from "../args";
import type { CommandContext, CommandDefinition } from "../context";
import { readCsvFile, readRulesFile, writeCsvFile, writeJsonFile } from "../io";
import { applyTemplateTargets, parseTemplateTargets } from "@/lib/rules-payload";
import { DEFAULT_FILL_THRESHOLD, fillThresholdRules } from "@/lib/threshold-fill";

export interface FillTemplateResult {
  outPath: string;
  pairs: number;
}

export function runFillTemplate(args: ArgReader, ctx: CommandContext): FillTemplateResult {
  args.assertKnown(fillTemplateCommand.flags);
  const from = args.requireString("from");
  const specId = args.requireInt("spec-id");
  const out = args.requireString("out");
  // unquoted lists arrive as several tokens
  const targetsText = args.list("targets").join(" ");
  if (targetsText.trim() === "") throw new UsageError("--targets is required");

  const targets = parseTemplateTargets(targetsText);
  if (!targets.ok) throw new UsageError(targets.error);

  const filled = applyTemplateTargets(readRulesFile(from), specId, targets.targets);
  if (!filled.ok) throw new Error(filled.error);

  writeJsonFile(out, filled.document, ctx.config.jsonIndent);
  ctx.logger.info(`Filled ${filled.pairs} parameter pair(s) for spec_id ${specId} → ${out}`);
  return { outPath: out, pairs: filled.pairs };
}

export const fillTemplateCommand: CommandDefinition = {
  summary: "Fill a perfect/not-OK template with targets",
  usage: 'fill-template --from TEMPLATE.json --spec-id N --targets "[0.55, 2, 0.85]" --out PATH',
  flags: ["from", "spec-id", "targets", "out"],
  run: runFillTemplate,
};

export interface FillThresholdsResult {
  outPath: string;
  filled: number;
  rows: number;
}

export function runFillThresholds(args: ArgReader, ctx: CommandContext): FillThresholdsResult {
  args.assertKnown(fillThresholdsCommand.flags);
  const input = args.requireString("in");
  const out = args.requireString("out");
  const threshold = args.number("threshold") ?? DEFAULT_FILL_THRESHOLD;
  const delimiter = args.string("delim") ?? ctx.config.csvDelimiter;

  const { table, filled } = fillThresholdRules(readCsvFile(input, delimiter), threshold);
  writeCsvFile(out, table, delimiter);

  if (filled === 0) ctx.logger.warn(`No perfect rows without an operator in ${input}`);
  ctx.logger.info(`Filled ${filled} perfect rule(s) at ${threshold}; ${table.rows.length} rows → ${out}`);
  return { outPath: out, filled, rows: table.rows.length };
}

export const fillThresholdsCommand: CommandDefinition = {
  summary: "Add <= threshold / > threshold pairs to open perfect rows",
  usage: "fill-thresholds --in CSV --out CSV [--threshold 0.01] [--delim D]",
  flags: ["in", "out", "threshold", "delim"],
  run: runFillThresholds,
};
