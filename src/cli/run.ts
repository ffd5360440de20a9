/**
 * CLI dispatcher: picks the command, runs it, and maps failures to an
 * exit code. Usage errors also print the command's usage line.
 */

import { parseCommandLine, UsageError } from "./args";
import type { CommandLine } from "./args";
import { COMMANDS } from "./commands";
import type { CommandContext } from "./context";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function printHelp(ctx: CommandContext): void {
  ctx.logger.info("Usage: npm run cli -- <command> [flags]");
  for (const [name, command] of Object.entries(COMMANDS)) {
    ctx.logger.info(`  ${name.padEnd(18)}${command.summary}`);
  }
}

function readCommandLine(argv: readonly string[], ctx: CommandContext): CommandLine | null {
  try {
    return parseCommandLine(argv);
  } catch (err) {
    ctx.logger.error(err instanceof Error ? err.message : String(err));
    return null;
  }
}

export function runCli(argv: readonly string[], ctx: CommandContext): number {
  const line = readCommandLine(argv, ctx);
  if (!line) return EXIT_FAILURE;

  const { command, args } = line;
  if (command === null || command === "help") {
    printHelp(ctx);
    return command === null && !args.has("help") ? EXIT_FAILURE : EXIT_OK;
  }

  const definition = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!definition) {
    ctx.logger.error(`Unknown command "${command}"`);
    printHelp(ctx);
    return EXIT_FAILURE;
  }
  if (args.has("help")) {
    ctx.logger.info(`Usage: ${definition.usage}`);
    return EXIT_OK;
  }

  try {
    definition.run(args, ctx);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof UsageError) {
      ctx.logger.error(err.message);
      ctx.logger.info(`Usage: ${definition.usage}`);
    } else {
      ctx.logger.error(err);
    }
    return EXIT_FAILURE;
  }
}
