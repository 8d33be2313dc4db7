/**
 * Small argv helpers. Flags are `--name value` or bare `--name` switches.
 */

/** A command line the user got wrong. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Flags that take a value; every other `--flag` is a switch. */
export const VALUE_FLAGS: ReadonlySet<string> = new Set([
  "--depth",
  "--rev",
  "--offset",
  "--file",
  "--sum",
  "--pattern",
  "--dir",
  "--out",
]);

export function flagValue(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args.at(index + 1);
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`${name} needs a value`);
  }
  return value;
}

export function hasFlag(args: readonly string[], name: string): boolean {
  return args.includes(name);
}

export function intFlag(args: readonly string[], name: string): number | undefined {
  const value = flagValue(args, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`${name} must be a whole number, got '${value}'`);
  }
  return Number(value);
}

function positionalIndexes(args: readonly string[]): number[] {
  const indexes: number[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      if (VALUE_FLAGS.has(args[i])) i++;
      continue;
    }
    indexes.push(i);
  }
  return indexes;
}

/** Arguments that are neither flags nor flag values. */
export function positionals(args: readonly string[]): string[] {
  return positionalIndexes(args).map((i) => args[i]);
}

/** The first positional as a subcommand, and every other argument. */
export function splitAction(args: readonly string[]): { action?: string; rest: string[] } {
  const index = positionalIndexes(args).at(0);
  if (index === undefined) return { rest: [...args] };
  return { action: args[index], rest: args.filter((_, i) => i !== index) };
}

/** The positional at `index`, or a usage error naming it. */
export function requirePositional(args: readonly string[], index: number, name: string): string {
  const value = positionals(args).at(index);
  if (value === undefined) {
    throw new UsageError(`missing <${name}>`);
  }
  return value;
}
