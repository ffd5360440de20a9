import { UsageError } from "../args";
import type { ArgReader } from "../args";
import type { CommandContext, CommandDefinition } from "../context";
import { describeRanges, isRangeType, RANGE_TYPES } from "@/lib/range-calculator";

/** ranges: print the band edges for a target without writing anything. */
export function runRanges(args: ArgReader, ctx: CommandContext): string[] {
  args.assertKnown(rangesCommand.flags);
  const target = args.number("target");
  if (target === undefined) throw new UsageError("--target is required");
  if (target < 0) throw new UsageError(`--target must not be negative (got ${target})`);
  const type = args.string("type") ?? "active";
  if (!isRangeType(type)) {
    throw new UsageError(`--type must be one of ${RANGE_TYPES.join(", ")} (got "${type}")`);
  }

  const lines = describeRanges(target, type);
  for (const line of lines) ctx.logger.info(line);
  return lines;
}

export const rangesCommand: CommandDefinition = {
  summary: "Show band edges for a target",
  usage: "ranges --target T [--type active|limit]",
  flags: ["target", "type"],
  run: runRanges,
};
