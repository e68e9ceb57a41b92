import { CliUsageError } from './errors.js';

export type FlagMap = Partial<Record<string, string>>;

/** Remove `key value` pairs from `args`; the last occurrence wins. */
export function extractFlags(args: string[], keys: readonly string[]): FlagMap {
  const flags: FlagMap = {};
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    flags[token] = requireValue(token, args[index + 1]);
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

/** Collect every value given to any of `keys`, in command-line order. */
export function extractMultipleFlags(args: string[], keys: readonly string[]): string[] {
  const values: string[] = [];
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    values.push(requireValue(token, args[index + 1]));
    args.splice(index, 2);
  }
  return values;
}

export function assertNoExtraArgs(args: readonly string[]): void {
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('-')) {
    throw new CliUsageError(`Flag '${flag}' requires a value.`);
  }
  return value;
}
