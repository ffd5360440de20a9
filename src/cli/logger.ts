import winston from "winston";
import type { CliConfig } from "./config";

/*
|--------------------------------------------------------------------------
| Logger Configuration
|--------------------------------------------------------------------------
| One console logger for every CLI command. Warnings and errors go to
| stderr so a command's summary lines can be piped on their own.
|--------------------------------------------------------------------------
*/

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, stack }) => `${timestamp} [${level}] ${stack || message}`);

export type CliLogger = winston.Logger;

export function createCliLogger(config: Pick<CliConfig, "logLevel" | "silent">): CliLogger {
  return winston.createLogger({
    level: config.logLevel,
    silent: config.silent,
    format: combine(errors({ stack: true }), timestamp(), logFormat),
    transports: [
      new winston.transports.Console({
        stderrLevels: ["error", "warn"],
        format: combine(colorize(), timestamp(), logFormat),
      }),
    ],
  });
}
