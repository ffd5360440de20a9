/**
 * convert / export: CSV sheets to LIMS import JSON.
 *
 * `convert` handles one file of any payload kind. `export` merges several
 * specs and/or rules CSVs per kind and never overwrites an existing output.
 */

import { UsageError } from "../args";
import type { ArgReader } from "../args";
import type { CommandContext, CommandDefinition } from "../context";
import { pathExists, readCsvFile, writeJsonFile } from "../io";
import type { CsvRow } from "@/lib/csv-table";
import { mergeCsvTables } from "@/lib/csv-merge";
import {
  buildParameterTypesPayload,
  buildRulesPayloadFromRows,
  buildSpecsPayload,
  buildTemplateFieldsPayload,
  isPayloadKind,
  PAYLOAD_KINDS,
} from "@/lib/lims-payloads";
import type { PayloadKind } from "@/lib/lims-payloads";
import { uniqueOutputPath } from "@/lib/output-names";
import type { JsonValue } from "@/types";

// ─── Payload dispatch ───────────────────────────────────────

interface BuiltPayload {
  payload: JsonValue;
  items: number;
  skipped: number;
}

function buildPayload(kind: PayloadKind, rows: readonly CsvRow[]): BuiltPayload {
  switch (kind) {
    case "rules": {
      const payload = buildRulesPayloadFromRows(rows);
      return { payload, items: payload.rules.length, skipped: 0 };
    }
    case "specs": {
      const payload = buildSpecsPayload(rows);
      return { payload, items: payload.specs.length, skipped: 0 };
    }
    case "parametertypes": {
      const { payload, skipped } = buildParameterTypesPayload(rows);
      return { payload, items: payload.parametertypes.length, skipped };
    }
    case "templatefields": {
      const payload = buildTemplateFieldsPayload(rows);
      return { payload, items: payload.templatefields.length, skipped: 0 };
    }
  }
}

function delimiterOf(args: ArgReader, ctx: CommandContext): string {
  const delimiter = args.string("delim") ?? ctx.config.csvDelimiter;
  if (delimiter.length !== 1) throw new UsageError(`--delim must be a single character (got "${delimiter}")`);
  return delimiter;
}

// ─── convert ────────────────────────────────────────────────

export interface ConvertResult {
  outPath: string;
  items: number;
  skipped: number;
}

export function runConvert(args: ArgReader, ctx: CommandContext): ConvertResult {
  args.assertKnown(convertCommand.flags);
  const kind = args.requireString("kind");
  if (!isPayloadKind(kind)) {
    throw new UsageError(`--kind must be one of ${PAYLOAD_KINDS.join(", ")} (got "${kind}")`);
  }
  const from = args.requireString("from");
  const to = args.requireString("to");

  const table = readCsvFile(from, delimiterOf(args, ctx));
  const built = buildPayload(kind, table.rows);
  writeJsonFile(to, built.payload, ctx.config.jsonIndent);

  if (built.skipped > 0) ctx.logger.info(`Skipped ${built.skipped} existing ${kind} rows`);
  ctx.logger.info(`Converted ${built.items} ${kind} rows from ${from} to ${to}`);
  return { outPath: to, items: built.items, skipped: built.skipped };
}

export const convertCommand: CommandDefinition = {
  summary: "Convert one CSV sheet to LIMS JSON",
  usage: "convert --kind rules|specs|parametertypes|templatefields --from CSV --to JSON [--delim D]",
  flags: ["kind", "from", "to", "delim"],
  run: runConvert,
};

// ─── export ─────────────────────────────────────────────────

export interface ExportOutput {
  kind: "specs" | "rules";
  outPath: string;
  items: number;
  duplicatesDropped: number;
}

const EXPORT_KINDS = [
  { kind: "specs", inFlag: "specs", outFlag: "out-specs" },
  { kind: "rules", inFlag: "rules", outFlag: "out-rules" },
] as const;

export function runExport(args: ArgReader, ctx: CommandContext): ExportOutput[] {
  args.assertKnown(exportCommand.flags);
  const delimiter = delimiterOf(args, ctx);

  const jobs = EXPORT_KINDS.filter(({ inFlag }) => args.has(inFlag)).map((job) => {
    const files = args.list(job.inFlag);
    if (files.length === 0) throw new UsageError(`--${job.inFlag} needs at least one CSV file`);
    return { ...job, files, out: args.requireString(job.outFlag) };
  });
  if (jobs.length === 0) throw new UsageError("Give --specs and/or --rules CSV files");

  // read and merge everything before the first write
  const merged = jobs.map((job) => {
    const sources = job.files.map((file) => ({ label: file, table: readCsvFile(file, delimiter) }));
    return { job, result: mergeCsvTables(sources, job.kind) };
  });

  return merged.map(({ job, result }) => {
    for (const warning of result.warnings) ctx.logger.warn(warning);
    const built = buildPayload(job.kind, result.rows);
    const outPath = uniqueOutputPath(job.out, pathExists);
    if (outPath !== job.out) ctx.logger.warn(`${job.out} exists; writing ${outPath} instead`);
    writeJsonFile(outPath, built.payload, ctx.config.jsonIndent);
    ctx.logger.info(
      `${job.kind}: ${job.files.length} file(s), ${built.items} rows, ${result.duplicatesDropped} duplicates dropped → ${outPath}`,
    );
    return { kind: job.kind, outPath, items: built.items, duplicatesDropped: result.duplicatesDropped };
  });
}

export const exportCommand: CommandDefinition = {
  summary: "Merge specs/rules CSV exports into LIMS JSON",
  usage: "export [--specs CSV … --out-specs PATH] [--rules CSV … --out-rules PATH] [--delim D]",
  flags: ["specs", "out-specs", "rules", "out-rules", "delim"],
  run: runExport,
};
