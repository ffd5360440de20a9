/**
 * Command-line flag parsing.
 *
 *   <command> --flag v1 v2 --other=v --switch
 *
 * Every `--flag` opens a group that collects the tokens up to the next
 * flag, so repeatable multi-value flags (`--param ID TARGET UNIT MODE`)
 * keep their grouping. `--flag=value` is a one-value group.
 */

import { parseDecimalText } from "@/lib/typed-value";

/** Missing, malformed or conflicting flags. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CommandLine {
  command: string | null;
  args: ArgReader;
}

export function parseCommandLine(argv: readonly string[]): CommandLine {
  const [first, ...rest] = argv;
  if (first === undefined || first.startsWith("--")) {
    return { command: null, args: ArgReader.from(argv) };
  }
  return { command: first, args: ArgReader.from(rest) };
}

export class ArgReader {
  private readonly groups = new Map<string, string[][]>();

  private constructor() {}

  static from(tokens: readonly string[]): ArgReader {
    const reader = new ArgReader();
    let current: string[] | null = null;
    for (const token of tokens) {
      if (token.startsWith("--") && token.length > 2) {
        const [name, ...inline] = token.slice(2).split("=");
        current = inline.length ? [inline.join("=")] : [];
        const list = reader.groups.get(name) ?? [];
        list.push(current);
        reader.groups.set(name, list);
        if (inline.length) current = null;
      } else if (current) {
        current.push(token);
      } else {
        throw new UsageError(`Unexpected argument "${token}"`);
      }
    }
    return reader;
  }

  has(name: string): boolean {
    return this.groups.has(name);
  }

  /** Raw value groups, one per occurrence of the flag. */
  groupsOf(name: string): string[][] {
    return this.groups.get(name) ?? [];
  }

  /** All values of every occurrence, in order. */
  list(name: string): string[] {
    return this.groupsOf(name).flat();
  }

  /** Single-value flag; undefined when absent. */
  string(name: string): string | undefined {
    const groups = this.groupsOf(name);
    if (groups.length === 0) return undefined;
    if (groups.length > 1 || groups[0].length !== 1) {
      throw new UsageError(`--${name} takes exactly one value`);
    }
    return groups[0][0];
  }

  requireString(name: string): string {
    const value = this.string(name);
    if (value === undefined) throw new UsageError(`--${name} is required`);
    return value;
  }

  /** Switch without values. */
  flag(name: string): boolean {
    const groups = this.groupsOf(name);
    if (groups.some((g) => g.length > 0)) {
      throw new UsageError(`--${name} does not take a value`);
    }
    return groups.length > 0;
  }

  number(name: string): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    const value = parseDecimalText(raw);
    if (value === null) throw new UsageError(`--${name} must be a number (got "${raw}")`);
    return value;
  }

  int(name: string): number | undefined {
    const value = this.number(name);
    if (value !== undefined && !Number.isInteger(value)) {
      throw new UsageError(`--${name} must be an integer (got ${value})`);
    }
    return value;
  }

  requireInt(name: string): number {
    const value = this.int(name);
    if (value === undefined) throw new UsageError(`--${name} is required`);
    return value;
  }

  /** Throws on any flag outside `known`. */
  assertKnown(known: readonly string[]): void {
    const unknown = [...this.groups.keys()].filter((name) => !known.includes(name));
    if (unknown.length) {
      throw new UsageError(`Unknown flag${unknown.length > 1 ? "s" : ""}: ${unknown.map((n) => `--${n}`).join(", ")}`);
    }
  }
}
