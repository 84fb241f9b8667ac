/**
 * Sanitizes package and usage records received from collaborators.
 *
 * A bad field is repaired where possible (clamped, floored or dropped); a
 * record that cannot be repaired is excluded. Problems are returned as
 * InputDataError values, never thrown, so one bad record cannot abort a
 * recommendation run.
 */

import type { Package, UsagePattern } from '../types/package.js';

// ============================================================================
// Types
// ============================================================================

export type SanitizeAction = 'repaired' | 'excluded';

/**
 * Describes one malformed record. Reported, not thrown.
 */
export class InputDataError extends Error {
  constructor(
    message: string,
    public readonly recordIndex: number,
    public readonly action: SanitizeAction,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'InputDataError';
  }
}

export interface SanitizeResult<T> {
  records: T[];
  issues: InputDataError[];
  /** Number of records excluded entirely */
  excluded: number;
  /** Number of kept records that needed at least one repair */
  repaired: number;
}

// ============================================================================
// Field helpers
// ============================================================================

function countRepaired(issues: readonly InputDataError[]): number {
  return new Set(issues.filter(i => i.action === 'repaired').map(i => i.recordIndex)).size;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): { list: string[]; changed: boolean } {
  if (value === undefined) return { list: [], changed: false };
  if (!Array.isArray(value)) return { list: [], changed: true };
  const list = value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
  return { list, changed: list.length !== value.length };
}

function timestamp(value: unknown): { value: string | null; changed: boolean } {
  if (value === null || value === undefined) return { value: null, changed: false };
  if (typeof value === 'string' && !Number.isNaN(Date.parse(value))) {
    return { value, changed: false };
  }
  return { value: null, changed: true };
}

function optionalString(value: unknown): { value: string | undefined; changed: boolean } {
  if (value === undefined || value === null) return { value: undefined, changed: false };
  if (typeof value === 'string') return { value, changed: false };
  return { value: undefined, changed: true };
}

function recordName(raw: Record<string, unknown>, field: string): string | null {
  const value = raw[field];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

// ============================================================================
// sanitizePackages
// ============================================================================

/**
 * Validate and repair package records.
 *
 * Records without a usable name are excluded. Unparseable install
 * timestamps become null (not installed); non-string tags and dependencies
 * are dropped; invalid optional fields are removed.
 */
export function sanitizePackages(input: readonly unknown[]): SanitizeResult<Package> {
  const records: Package[] = [];
  const issues: InputDataError[] = [];
  let excluded = 0;

  input.forEach((raw, index) => {
    if (!isRecord(raw)) {
      issues.push(new InputDataError('Package record is not an object', index, 'excluded'));
      excluded++;
      return;
    }

    const name = recordName(raw, 'name');
    if (!name) {
      issues.push(new InputDataError('Package record has no name', index, 'excluded', 'name'));
      excluded++;
      return;
    }

    const repair = (field: string, message: string) => {
      issues.push(new InputDataError(`${name}: ${message}`, index, 'repaired', field));
    };

    const version = typeof raw.version === 'string' ? raw.version : '';
    if (raw.version !== undefined && typeof raw.version !== 'string') repair('version', 'version is not a string');

    const description = optionalString(raw.description);
    if (description.changed) repair('description', 'description is not a string');

    const source = optionalString(raw.source);
    if (source.changed) repair('source', 'source is not a string');

    const installedAt = timestamp(raw.installedAt);
    if (installedAt.changed) repair('installedAt', 'unparseable install timestamp dropped');

    let size: number | undefined;
    if (raw.size !== undefined && raw.size !== null) {
      if (typeof raw.size === 'number' && Number.isFinite(raw.size) && raw.size >= 0) {
        size = raw.size;
      } else {
        repair('size', 'invalid size dropped');
      }
    }

    const tags = stringList(raw.tags);
    if (tags.changed) repair('tags', 'non-string tags dropped');

    const dependencies = stringList(raw.dependencies);
    if (dependencies.changed) repair('dependencies', 'non-string dependencies dropped');

    const pkg: Package = {
      name,
      version,
      installedAt: installedAt.value,
      tags: tags.list,
      dependencies: dependencies.list,
    };
    if (description.value !== undefined) pkg.description = description.value;
    if (source.value !== undefined) pkg.source = source.value;
    if (size !== undefined) pkg.size = size;
    if (isRecord(raw.metadata)) pkg.metadata = { ...raw.metadata };

    records.push(pkg);
  });

  return { records, issues, excluded, repaired: countRepaired(issues) };
}

// ============================================================================
// sanitizeUsagePatterns
// ============================================================================

/**
 * Validate and repair usage records.
 *
 * Negative frequencies are clamped to 0 and fractional ones floored; a
 * non-numeric frequency excludes the record. Any incoming importance is
 * discarded since it is derived, not settable.
 */
export function sanitizeUsagePatterns(input: readonly unknown[]): SanitizeResult<UsagePattern> {
  const records: UsagePattern[] = [];
  const issues: InputDataError[] = [];
  let excluded = 0;

  input.forEach((raw, index) => {
    if (!isRecord(raw)) {
      issues.push(new InputDataError('Usage record is not an object', index, 'excluded'));
      excluded++;
      return;
    }

    const packageName = recordName(raw, 'packageName');
    if (!packageName) {
      issues.push(new InputDataError('Usage record has no package name', index, 'excluded', 'packageName'));
      excluded++;
      return;
    }

    if (typeof raw.frequency !== 'number' || !Number.isFinite(raw.frequency)) {
      issues.push(new InputDataError(`${packageName}: frequency is not a number`, index, 'excluded', 'frequency'));
      excluded++;
      return;
    }

    let frequency = raw.frequency;
    if (frequency < 0) {
      issues.push(new InputDataError(`${packageName}: negative frequency clamped to 0`, index, 'repaired', 'frequency'));
      frequency = 0;
    } else if (!Number.isInteger(frequency)) {
      issues.push(new InputDataError(`${packageName}: fractional frequency floored`, index, 'repaired', 'frequency'));
      frequency = Math.floor(frequency);
    }

    const lastUsed = timestamp(raw.lastUsed);
    if (lastUsed.changed) {
      issues.push(new InputDataError(`${packageName}: unparseable last-used timestamp dropped`, index, 'repaired', 'lastUsed'));
    }

    const contexts = stringList(raw.contexts);
    if (contexts.changed) {
      issues.push(new InputDataError(`${packageName}: non-string contexts dropped`, index, 'repaired', 'contexts'));
    }

    const pattern: UsagePattern = {
      packageName,
      frequency,
      lastUsed: lastUsed.value,
      contexts: contexts.list,
    };
    if (isRecord(raw.metadata)) pattern.metadata = { ...raw.metadata };

    records.push(pattern);
  });

  return { records, issues, excluded, repaired: countRepaired(issues) };
}
