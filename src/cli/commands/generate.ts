/**
 * generate: build rules for one or more parameters of a spec.
 *
 *   generate --spec-id 1029 --param 5587 12 mg active --param 11194 0.35 g/cm3 range:0.5
 */

import { UsageError } from "../args";
import type { ArgReader } from "../args";
import type { CommandContext, CommandDefinition } from "../context";
import { writeJsonFile } from "../io";
import { generatedRulesFileName } from "@/lib/output-names";
import { parseParamInput, splitModeToken } from "@/lib/param-input";
import type { ParamSpec, QualitativeTexts } from "@/lib/param-input";
import { buildRulesForParameters } from "@/lib/rule-builder";

export interface GenerateResult {
  outPath: string;
  parameters: number;
  rules: number;
  warnings: string[];
}

const DEFAULT_PREFIX = "Rules";

function readQualitative(args: ArgReader): QualitativeTexts | null {
  const groups = args.groupsOf("qual");
  if (groups.length === 0) return null;
  if (groups.length > 1 || groups[0].length !== 2) {
    throw new UsageError("--qual takes exactly two values: EN DE");
  }
  const [en, de] = groups[0];
  return { en, de };
}

function readParams(args: ArgReader, qualitative: QualitativeTexts | null): ParamSpec[] {
  const groups = args.groupsOf("param");
  if (groups.length === 0) throw new UsageError("At least one --param is required");

  return groups.map((group, index) => {
    if (group.length !== 4) {
      throw new UsageError(`--param #${index + 1} takes ID TARGET UNIT MODE[:ARG] (got ${group.length} values)`);
    }
    const [parametertypeId, target, unit, modeToken] = group;
    const { mode, argument } = splitModeToken(modeToken);
    const parsed = parseParamInput(
      { parametertypeId, target, unit, mode, deviationPercent: argument ?? undefined, upper: argument ?? undefined },
      qualitative,
    );
    if (!parsed.ok) throw new Error(`--param #${index + 1}: ${parsed.error}`);
    return parsed.spec;
  });
}

export function runGenerate(args: ArgReader, ctx: CommandContext): GenerateResult {
  args.assertKnown(generateCommand.flags);
  const specId = args.requireInt("spec-id");
  const specs = readParams(args, readQualitative(args));

  for (const spec of specs) {
    for (const note of spec.notes) ctx.logger.warn(`parametertype_id ${spec.parametertypeId}: ${note}`);
  }

  const result = buildRulesForParameters(
    specId,
    specs.map(({ parametertypeId, mode }) => ({ parametertypeId, mode })),
  );
  if (!result.ok) throw new Error(result.error);
  for (const warning of result.warnings) ctx.logger.warn(warning);

  const prefix = args.string("prefix") ?? DEFAULT_PREFIX;
  const outPath = args.string("out") ?? generatedRulesFileName(prefix, specId, ctx.now());
  writeJsonFile(outPath, { rules: result.rules }, ctx.config.jsonIndent);

  for (const spec of specs) {
    const count = result.rules.filter((r) => r.data.parametertype_id === spec.parametertypeId).length;
    ctx.logger.debug(`parametertype_id ${spec.parametertypeId}: ${spec.mode.kind}, ${count} rules`);
  }
  ctx.logger.info(`Wrote ${result.rules.length} rules for ${specs.length} parameter(s) to ${outPath}`);

  return { outPath, parameters: specs.length, rules: result.rules.length, warnings: result.warnings };
}

export const generateCommand: CommandDefinition = {
  summary: "Generate band rules for parameters of a spec",
  usage:
    "generate --spec-id N --param ID TARGET UNIT MODE[:ARG] [--param …] [--qual EN DE] [--out PATH] [--prefix P]",
  flags: ["spec-id", "param", "qual", "out", "prefix"],
  run: runGenerate,
};
