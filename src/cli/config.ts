/**
 * CLI runtime configuration, read once from the environment.
 *
 *   LOG_LEVEL            winston level (default: info in production, debug otherwise)
 *   NODE_ENV             "test" silences the logger
 *   RULES_CSV_DELIMITER  single character, default ","
 *   RULES_JSON_INDENT    0..8, default 2
 */

import { DEFAULT_JSON_INDENT } from "@/lib/payload-json";

export interface CliConfig {
  logLevel: LogLevel;
  silent: boolean;
  csvDelimiter: string;
  jsonIndent: number;
}

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const nodeEnv = env.NODE_ENV ?? "development";

  const level = (env.LOG_LEVEL ?? "").trim().toLowerCase() || (nodeEnv === "production" ? "info" : "debug");
  if (!isLogLevel(level)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${env.LOG_LEVEL ?? ""}")`);
  }

  const delimiter = env.RULES_CSV_DELIMITER ?? ",";
  if (delimiter.length !== 1) {
    throw new Error(`RULES_CSV_DELIMITER must be a single character (got "${delimiter}")`);
  }

  const indentText = (env.RULES_JSON_INDENT ?? "").trim();
  const indent = indentText === "" ? DEFAULT_JSON_INDENT : Number(indentText);
  if (!Number.isInteger(indent) || indent < 0 || indent > 8) {
    throw new Error(`RULES_JSON_INDENT must be an integer between 0 and 8 (got "${indentText}")`);
  }

  return { logLevel: level, silent: nodeEnv === "test", csvDelimiter: delimiter, jsonIndent: indent };
}
