import { UsageError } from '../lib/types';

/**
 * Value following `flag`, or undefined when the flag is absent.
 * A flag given without a value is an error, never a silent default.
 */
export function readFlagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;

  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function readPositiveInt(args: readonly string[], flag: string): number | undefined {
  const value = readFlagValue(args, flag);
  if (value === undefined) return undefined;

  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new UsageError(`${flag} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

export function hasFlag(args: readonly string[], flag: string): boolean {
  return args.includes(flag);
}
