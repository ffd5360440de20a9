import { UsageError } from "../args";
import type { ArgReader } from "../args";
import { siblingPath } from "@/lib/output-names";
import { parseParameterIds } from "@/lib/rules-payload";

/** `--out PATH`, `--inplace`, or a default name next to the input. */
export function outputFor(args: ArgReader, input: string, defaultName: () => string): string {
  const out = args.string("out");
  const inplace = args.flag("inplace");
  if (out !== undefined && inplace) {
    throw new UsageError("Use either --out or --inplace, not both");
  }
  if (inplace) return input;
  return out ?? siblingPath(input, defaultName());
}

/** `--parametertype-id ID …` as a filter; null when the flag is absent. */
export function parameterFilter(args: ArgReader, flag = "parametertype-id"): ReadonlySet<number> | null {
  if (!args.has(flag)) return null;
  const parsed = parseParameterIds(args.list(flag));
  if (!parsed.ok) throw new UsageError(parsed.error);
  if (parsed.ids === null) throw new UsageError(`--${flag} needs at least one id`);
  return parsed.ids;
}

export function describeIds(ids: Iterable<number>): string {
  return [...ids].join(", ");
}
