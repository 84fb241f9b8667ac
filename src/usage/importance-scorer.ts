/**
 * Usage signal builder: turns per-package usage records into importance.
 *
 * Importance is a weighted mean of two factors: frequency (log-scaled so
 * each extra use matters less as counts grow) and recency (exponential
 * decay, halving every `decayDays` since last use). Both factors and the
 * result lie in [0, 1].
 */

import { packageKey } from '../types/package.js';
import type { UsagePattern } from '../types/package.js';
import type { ImportanceMap } from '../types/recommendation.js';

// ============================================================================
// Types
// ============================================================================

export interface ImportanceOptions {
  decayDays?: number;          // default 30
  frequencyWeight?: number;    // default 0.6
  recencyWeight?: number;      // default 0.4
  frequencySaturation?: number;// uses at which frequency factor reaches 1, default 100
}

/** Importance of one package with the frequency used for tie-breaks */
export interface RankedUsage {
  packageName: string;
  importance: number;
  frequency: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_IMPORTANCE_OPTIONS: Required<ImportanceOptions> = {
  decayDays: 30,
  frequencyWeight: 0.6,
  recencyWeight: 0.4,
  frequencySaturation: 100,
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// Factors
// ============================================================================

/**
 * Log-scaled frequency factor: ln(1 + f) / ln(1 + saturation), capped at 1.
 */
export function frequencyFactor(frequency: number, saturation: number): number {
  if (!Number.isFinite(frequency) || frequency <= 0) return 0;
  const ceiling = Math.log1p(Math.max(1, saturation));
  return Math.min(1, Math.log1p(frequency) / ceiling);
}

/**
 * Recency factor: 0.5 ^ (days since last use / decayDays).
 *
 * Null or unparseable timestamps give 0. Timestamps in the future count as
 * "just used".
 */
export function recencyFactor(lastUsed: string | null, now: number, decayDays: number): number {
  if (lastUsed === null) return 0;
  const usedAt = Date.parse(lastUsed);
  if (Number.isNaN(usedAt)) return 0;

  const elapsedDays = Math.max(0, now - usedAt) / MS_PER_DAY;
  if (decayDays <= 0) return elapsedDays === 0 ? 1 : 0;
  return Math.pow(0.5, elapsedDays / decayDays);
}

// ============================================================================
// scoreUsage
// ============================================================================

/**
 * Importance of a single usage record.
 *
 * A frequency of 0 yields 0 even when a last-used timestamp is present.
 */
export function scoreUsage(pattern: UsagePattern, now: number, options?: ImportanceOptions): number {
  const opts = { ...DEFAULT_IMPORTANCE_OPTIONS, ...options };

  if (!Number.isFinite(pattern.frequency) || pattern.frequency <= 0) {
    return 0;
  }

  const fw = Math.max(0, opts.frequencyWeight);
  const rw = Math.max(0, opts.recencyWeight);
  const total = fw + rw;
  if (total === 0) return 0;

  const freq = frequencyFactor(pattern.frequency, opts.frequencySaturation);
  const recency = recencyFactor(pattern.lastUsed, now, opts.decayDays);
  const score = (fw * freq + rw * recency) / total;

  return Math.min(1, Math.max(0, score));
}

// ============================================================================
// rankByImportance / computeImportance
// ============================================================================

/**
 * Score every usage record and order by importance descending, then raw
 * frequency descending, then name.
 *
 * Duplicate records for one package keep the higher-importance one.
 */
export function rankByImportance(
  patterns: Iterable<UsagePattern>,
  now: number,
  options?: ImportanceOptions,
): RankedUsage[] {
  const byKey = new Map<string, RankedUsage>();

  for (const pattern of patterns) {
    const key = packageKey(pattern.packageName);
    if (!key) continue;

    const ranked: RankedUsage = {
      packageName: key,
      importance: scoreUsage(pattern, now, options),
      frequency: Math.max(0, pattern.frequency),
    };

    const existing = byKey.get(key);
    if (
      !existing ||
      ranked.importance > existing.importance ||
      (ranked.importance === existing.importance && ranked.frequency > existing.frequency)
    ) {
      byKey.set(key, ranked);
    }
  }

  return Array.from(byKey.values()).sort((a, b) => {
    if (b.importance !== a.importance) return b.importance - a.importance;
    if (b.frequency !== a.frequency) return b.frequency - a.frequency;
    return a.packageName < b.packageName ? -1 : a.packageName > b.packageName ? 1 : 0;
  });
}

/**
 * Build the importance map for a set of usage records.
 *
 * Keys are normalized package names; iteration order follows
 * {@link rankByImportance}. Packages without a record are absent, read them
 * with {@link importanceOf} to get the implied 0.
 */
export function computeImportance(
  patterns: Iterable<UsagePattern>,
  now: number,
  options?: ImportanceOptions,
): ImportanceMap {
  const map: ImportanceMap = new Map();
  for (const entry of rankByImportance(patterns, now, options)) {
    map.set(entry.packageName, entry.importance);
  }
  return map;
}

/** Importance for a package name, 0 when it has no usage record */
export function importanceOf(importance: ImportanceMap, name: string): number {
  return importance.get(packageKey(name)) ?? 0;
}
