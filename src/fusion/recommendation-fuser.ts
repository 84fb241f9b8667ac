/**
 * Recommendation fuser: merges similarity and AI candidates into one
 * ranked, deduplicated list of recommendations.
 *
 * Each source contributes `weight * rawScore`. A package backed by both
 * sources is "hybrid" and scores the sum of both contributions. Every score
 * is capped at 1.0 afterwards; since contributions are non-negative the cap
 * never puts a hybrid below either of its single-source scores.
 *
 * Pipeline: exclude -> accumulate -> categorize -> cap -> sort -> truncate -> rows
 */

import { randomUUID } from 'crypto';
import { packageKey } from '../types/package.js';
import type {
  AICandidate,
  ImportanceMap,
  Recommendation,
  RecommendationCategory,
  RecommendationMetadata,
  RecommendationSource,
  SimilarityCandidate,
} from '../types/recommendation.js';
import { importanceOf } from '../usage/importance-scorer.js';

// ============================================================================
// Types
// ============================================================================

/** Per-source trust weights */
export interface FusionWeights {
  similarity: number; // default 0.5
  ai: number;         // default 0.6
}

export interface FuseInput {
  similarity: readonly SimilarityCandidate[];
  ai: readonly AICandidate[];
  importance: ImportanceMap;
  /** Names of installed packages */
  installed: Iterable<string>;
  /** Names with a failed install inside the cooldown window */
  recentFailures: Iterable<string>;
  limit?: number;
}

export interface FuseOptions {
  weights?: Partial<FusionWeights>;
  /** Generation time in epoch ms, default Date.now() */
  now?: number;
  /** Run identifier shared by all rows, default a random UUID */
  runId?: string;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_FUSION_WEIGHTS: FusionWeights = {
  similarity: 0.5,
  ai: 0.6,
};

export const DEFAULT_RECOMMENDATION_LIMIT = 10;

/** Score ceiling applied after contributions are summed */
export const MAX_SCORE = 1;

/** Higher ranks first on equal score */
const CATEGORY_RANK: Record<RecommendationCategory, number> = {
  hybrid: 0,
  ai: 1,
  similarity: 2,
};

/** Contributors named in a similarity reason */
const MAX_REASON_CONTRIBUTORS = 3;

// ============================================================================
// Accumulator
// ============================================================================

interface Accumulated {
  key: string;
  similarity?: SimilarityCandidate;
  ai?: AICandidate;
}

// ============================================================================
// fuse
// ============================================================================

/**
 * Fuse similarity and AI candidates into ranked recommendation rows.
 *
 * 1. Drop installed packages and packages with a recent failed install.
 * 2. Accumulate per normalized name; duplicates within a source keep the max.
 * 3. Score: w_sim * similarity + w_ai * confidence, capped at 1.0; zero
 *    scores are dropped.
 * 4. Sort by score, then hybrid > ai > similarity, then name.
 * 5. Truncate to `limit` and emit immutable rows.
 *
 * Deterministic for identical inputs when `now` and `runId` are given.
 */
export function fuse(input: FuseInput, options?: FuseOptions): Recommendation[] {
  const weights: FusionWeights = {
    similarity: Math.max(0, options?.weights?.similarity ?? DEFAULT_FUSION_WEIGHTS.similarity),
    ai: Math.max(0, options?.weights?.ai ?? DEFAULT_FUSION_WEIGHTS.ai),
  };
  const limit = input.limit ?? DEFAULT_RECOMMENDATION_LIMIT;
  if (limit <= 0) return [];

  const excluded = new Set<string>();
  for (const name of input.installed) excluded.add(packageKey(name));
  for (const name of input.recentFailures) excluded.add(packageKey(name));

  const accumulator = new Map<string, Accumulated>();
  const entry = (key: string): Accumulated => {
    let acc = accumulator.get(key);
    if (!acc) {
      acc = { key };
      accumulator.set(key, acc);
    }
    return acc;
  };

  for (const candidate of input.similarity) {
    const key = packageKey(candidate.packageName);
    if (!key || excluded.has(key) || !(candidate.score > 0)) continue;
    const acc = entry(key);
    if (!acc.similarity || candidate.score > acc.similarity.score) {
      acc.similarity = candidate;
    }
  }

  for (const candidate of input.ai) {
    const key = packageKey(candidate.packageName);
    if (!key || excluded.has(key) || !(candidate.confidence >= 0)) continue;
    const acc = entry(key);
    if (!acc.ai || candidate.confidence > acc.ai.confidence) {
      acc.ai = candidate;
    }
  }

  const timestamp = new Date(options?.now ?? Date.now()).toISOString();
  const runId = options?.runId ?? randomUUID();

  const scored = Array.from(accumulator.values())
    .map(acc => score(acc, weights, input.importance))
    .filter(s => s.score > 0);

  scored.sort((a, b) =>
    b.score - a.score ||
    CATEGORY_RANK[a.category] - CATEGORY_RANK[b.category] ||
    (a.key < b.key ? -1 : a.key > b.key ? 1 : 0),
  );

  return scored.slice(0, limit).map((s, index): Recommendation => ({
    runId,
    rank: index + 1,
    packageName: s.packageName,
    score: s.score,
    reason: s.reason,
    category: s.category,
    source: s.source,
    timestamp,
    metadata: s.metadata,
  }));
}

// ============================================================================
// Internal helpers
// ============================================================================

interface Scored {
  key: string;
  packageName: string;
  score: number;
  reason: string;
  category: RecommendationCategory;
  source: RecommendationSource;
  metadata: RecommendationMetadata;
}

function score(acc: Accumulated, weights: FusionWeights, importance: ImportanceMap): Scored {
  const metadata: RecommendationMetadata = {
    uncappedScore: 0,
    weights: { ...weights },
  };
  const reasons: string[] = [];
  let total = 0;

  if (acc.similarity) {
    const contribution = weights.similarity * acc.similarity.score;
    total += contribution;
    metadata.similarityScore = acc.similarity.score;
    metadata.similarityContribution = contribution;

    const contributors = rankContributors(acc.similarity.contributors, importance);
    metadata.contributors = contributors;
    metadata.contributorImportance = Object.fromEntries(
      contributors.map(name => [name, importanceOf(importance, name)]),
    );
    reasons.push(similarityReason(contributors));
  }

  if (acc.ai) {
    const contribution = weights.ai * acc.ai.confidence;
    total += contribution;
    metadata.aiConfidence = acc.ai.confidence;
    metadata.aiContribution = contribution;
    reasons.push(acc.ai.reason ? `Suggested for your workflow: ${acc.ai.reason}` : 'Suggested for your workflow');
  }

  metadata.uncappedScore = total;

  const category: RecommendationCategory =
    acc.similarity && acc.ai ? 'hybrid' : acc.ai ? 'ai' : 'similarity';
  const source: RecommendationSource =
    category === 'hybrid' ? 'similarity+ai' : category;

  return {
    key: acc.key,
    // Catalog spelling wins over the backend's
    packageName: acc.similarity?.packageName ?? acc.ai?.packageName ?? acc.key,
    score: Math.min(MAX_SCORE, total),
    reason: reasons.join('; '),
    category,
    source,
    metadata,
  };
}

/** Contributors ordered by importance, keeping the incoming order on ties */
function rankContributors(contributors: readonly string[], importance: ImportanceMap): string[] {
  return contributors
    .map((name, index) => ({ name, index, importance: importanceOf(importance, name) }))
    .sort((a, b) => b.importance - a.importance || a.index - b.index)
    .map(c => c.name);
}

function similarityReason(contributors: string[]): string {
  if (contributors.length === 0) return 'Similar to installed packages';
  const named = contributors.slice(0, MAX_REASON_CONTRIBUTORS).join(', ');
  const more = contributors.length - MAX_REASON_CONTRIBUTORS;
  return more > 0
    ? `Similar to installed ${named} and ${more} more`
    : `Similar to installed ${named}`;
}
