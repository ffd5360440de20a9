import type { ArgReader } from "./args";
import { loadConfig } from "./config";
import type { CliConfig } from "./config";
import { createCliLogger } from "./logger";
import type { CliLogger } from "./logger";

/** What a command gets besides its flags. */
export interface CommandContext {
  config: CliConfig;
  logger: CliLogger;
  /** Clock for generated file names. */
  now: () => Date;
}

export interface CommandDefinition {
  summary: string;
  usage: string;
  flags: readonly string[];
  run: (args: ArgReader, ctx: CommandContext) => unknown;
}

export function createContext(env: NodeJS.ProcessEnv = process.env): CommandContext {
  const config = loadConfig(env);
  return { config, logger: createCliLogger(config), now: () => new Date() };
}
