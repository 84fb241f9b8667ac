/**
 * Normalizes raw suggestion backend output into AI candidates.
 *
 * The backend is free-text driven and may return malformed, duplicated or
 * adversarial entries. Nothing here throws: unusable entries are dropped
 * and counted so callers can report them.
 */

import { z } from 'zod';
import { packageKey } from '../types/package.js';
import type { AICandidate } from '../types/recommendation.js';

// ============================================================================
// Types
// ============================================================================

export interface NormalizedSuggestions {
  /** Deduplicated candidates in first-appearance order */
  candidates: AICandidate[];
  /** Raw entries that could not be used */
  dropped: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Confidence assumed when the backend omits one */
export const DEFAULT_CONFIDENCE = 0.5;

/** Maximum stored reason length */
export const MAX_REASON_LENGTH = 500;

/** Separator between reasons merged from duplicate entries */
const REASON_SEPARATOR = '; ';

/**
 * Plausible package name: starts alphanumeric (or @ for scoped names), no
 * whitespace, limited character set.
 */
const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9@][A-Za-z0-9._+:@/-]*$/;

const MAX_PACKAGE_NAME_LENGTH = 214;

// ============================================================================
// Schema
// ============================================================================

/** Loose entry schema; field-level cleanup happens after parsing */
const RawSuggestionSchema = z.object({
  package: z.string(),
  reason: z.unknown().optional(),
  confidence: z.unknown().optional(),
}).passthrough();

// ============================================================================
// normalizeSuggestions
// ============================================================================

/**
 * Turn raw backend output into deduplicated AI candidates.
 *
 * - Non-array input counts as zero entries.
 * - Entries without a usable package name are dropped.
 * - Confidence is clamped to [0, 1]; missing or non-numeric -> 0.5.
 * - Duplicates (case-insensitive) keep the higher confidence (first on
 *   ties) and merge distinct reasons, the kept entry's reason first.
 */
export function normalizeSuggestions(raw: unknown): NormalizedSuggestions {
  if (!Array.isArray(raw)) {
    return { candidates: [], dropped: 0 };
  }

  let dropped = 0;
  const groups = new Map<string, AICandidate[]>();

  for (const entry of raw) {
    const candidate = toCandidate(entry);
    if (!candidate) {
      dropped++;
      continue;
    }
    const group = groups.get(candidate.key);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(candidate.key, [candidate]);
    }
  }

  const candidates = Array.from(groups.values()).map(mergeDuplicates);
  return { candidates, dropped };
}

// ============================================================================
// Internal helpers
// ============================================================================

function toCandidate(entry: unknown): AICandidate | null {
  const parsed = RawSuggestionSchema.safeParse(entry);
  if (!parsed.success) return null;

  const packageName = parsed.data.package.trim();
  if (
    packageName.length === 0 ||
    packageName.length > MAX_PACKAGE_NAME_LENGTH ||
    !PACKAGE_NAME_PATTERN.test(packageName)
  ) {
    return null;
  }

  return {
    packageName,
    key: packageKey(packageName),
    reason: cleanReason(parsed.data.reason),
    confidence: parseConfidence(parsed.data.confidence),
  };
}

/**
 * Clamp a confidence value into [0, 1]. Numeric strings are accepted;
 * anything else falls back to {@link DEFAULT_CONFIDENCE}.
 */
export function parseConfidence(value: unknown): number {
  let numeric: number | null = null;

  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    numeric = Number(value);
  }

  if (numeric === null || Number.isNaN(numeric)) {
    return DEFAULT_CONFIDENCE;
  }
  return Math.min(1, Math.max(0, numeric));
}

function cleanReason(value: unknown): string {
  if (typeof value !== 'string') return '';
  const collapsed = value.replace(/\s+/g, ' ').trim();
  return collapsed.length > MAX_REASON_LENGTH
    ? collapsed.slice(0, MAX_REASON_LENGTH).trimEnd()
    : collapsed;
}

function mergeDuplicates(group: AICandidate[]): AICandidate {
  let kept = group[0];
  for (const candidate of group) {
    if (candidate.confidence > kept.confidence) kept = candidate;
  }

  const reasons: string[] = [];
  const seen = new Set<string>();
  for (const reason of [kept.reason, ...group.filter(c => c !== kept).map(c => c.reason)]) {
    const key = reason.toLowerCase();
    if (reason && !seen.has(key)) {
      seen.add(key);
      reasons.push(reason);
    }
  }

  return {
    ...kept,
    reason: reasons.join(REASON_SEPARATOR),
  };
}
