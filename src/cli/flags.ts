import { DEFAULT_CONFIG_PATH } from '../config/reader.js';

/**
 * Value of a `--name=value` flag, undefined when absent.
 */
export function flagValue(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find(a => a.startsWith(prefix));
  return arg?.slice(prefix.length);
}

/**
 * Parse a positive integer `--name=N` flag.
 *
 * @returns undefined when absent, null when present but invalid
 */
export function parsePositiveIntFlag(args: string[], name: string): number | undefined | null {
  const raw = flagValue(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return /^\d+$/.test(raw) && value > 0 ? value : null;
}

export function parseConfigPath(args: string[]): string {
  return flagValue(args, 'config') ?? DEFAULT_CONFIG_PATH;
}
