/**
 * Config file reader with Zod validation.
 *
 * Reads `.pkg-advisor/config.json`, parses it through the schema and returns
 * a fully populated config. Missing file = all defaults. Invalid input =
 * error naming the field path.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { AdvisorConfigSchema, DEFAULT_ADVISOR_CONFIG } from './schema.js';
import type { AdvisorConfig } from './schema.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CONFIG_PATH = join('.pkg-advisor', 'config.json');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// Error type
// ============================================================================

/**
 * Error thrown when config reading or validation fails.
 */
export class AdvisorConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'AdvisorConfigError';
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read and validate the config from disk.
 *
 * @throws {AdvisorConfigError} On invalid JSON or validation failure
 */
export async function readAdvisorConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<AdvisorConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_ADVISOR_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new AdvisorConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = validateAdvisorConfig(raw);
  if (!result.valid) {
    throw new AdvisorConfigError(
      `Config validation failed:\n${result.errors.join('\n')}`,
      result.field,
    );
  }

  return result.config;
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateAdvisorConfig(
  raw: unknown,
): { valid: true; config: AdvisorConfig } | { valid: false; errors: string[]; field?: string } {
  const result = AdvisorConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });
  return { valid: false, errors, field: result.error.issues[0]?.path.join('.') };
}

/**
 * Failure cooldown window in milliseconds.
 */
export function failureCooldownMs(config: AdvisorConfig): number {
  return config.installs.failure_cooldown_days * MS_PER_DAY;
}
