import { CliUsageError } from './errors.js';

export type FlagMap = Partial<Record<string, string>>;

/** Removes `--flag value` pairs from `args` and returns them by flag name. */
export function extractFlags(args: string[], keys: readonly string[]): FlagMap {
  const flags: FlagMap = {};
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    flags[token] = expectValue(token, args[index + 1]);
    args.splice(index, 2);
  }
  return flags;
}

export function extractBooleanFlags(args: string[], keys: readonly string[]): Set<string> {
  const flags = new Set<string>();
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    flags.add(token);
    args.splice(index, 1);
  }
  return flags;
}

export function expectValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new CliUsageError(`Flag '${flag}' requires a value.`);
  }
  return value;
}

/** First value present among `keys` (aliases of one flag). */
export function pickFlag(flags: FlagMap, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = flags[key];
    if (value !== undefined) return value;
  }
  return undefined;
}

export function parsePositiveInt(flag: string, value: string): number {
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new CliUsageError(`Flag '${flag}' expects a positive integer, got '${value}'.`);
  }
  return Number(value);
}

export function rejectUnknownFlags(args: readonly string[]): void {
  const unknown = args.find((arg) => /^--?[a-zA-Z]/.test(arg));
  if (unknown) {
    throw new CliUsageError(`Unknown option '${unknown}'.`);
  }
}
