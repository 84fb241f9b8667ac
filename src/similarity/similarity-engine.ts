/**
 * Similarity engine: scores catalog packages against the installed set.
 *
 * Pairwise similarity is the Jaccard overlap of tag sets, boosted when one
 * package lies in the other's dependency closure and again when the two
 * share usage contexts (weighted by how important the more-used side is).
 * A candidate's score is the MAX over installed packages, so a generic
 * package that loosely resembles many things does not accumulate credit.
 *
 * Pipeline: graph -> pairwise scores -> max per candidate -> drop zeros -> sort -> cap
 */

import { packageKey } from '../types/package.js';
import type { Package, UsagePattern } from '../types/package.js';
import type { ImportanceMap, SimilarityCandidate } from '../types/recommendation.js';
import { importanceOf } from '../usage/importance-scorer.js';
import { PackageGraph } from './package-graph.js';
import { jaccardSimilarity, union } from './text-utils.js';

// ============================================================================
// Types
// ============================================================================

export interface SimilarityWeights {
  dependencyBoost: number; // default 0.25
  contextBoost: number;    // default 0.15
}

export interface FindSimilarOptions extends Partial<SimilarityWeights> {
  /** Importance per installed package, from the usage signal builder */
  importance?: ImportanceMap;
  /** Usage records supplying usage contexts */
  usage?: UsagePattern[];
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = {
  dependencyBoost: 0.25,
  contextBoost: 0.15,
};

const NO_IMPORTANCE: ImportanceMap = new Map();

// ============================================================================
// packageSimilarity
// ============================================================================

/**
 * Symmetric similarity between two packages in [0, 1].
 *
 * - tag Jaccard overlap
 * - + dependencyBoost when dependency-linked in either direction
 * - + contextBoost * jaccard(tags+contexts) * max(importance) when either
 *   side has usage contexts
 */
export function packageSimilarity(
  a: string,
  b: string,
  graph: PackageGraph,
  importance: ImportanceMap = NO_IMPORTANCE,
  weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS,
): number {
  if (packageKey(a) === packageKey(b)) return 1;

  let score = jaccardSimilarity(graph.tagsOf(a), graph.tagsOf(b));

  if (graph.dependencyLinked(a, b)) {
    score += weights.dependencyBoost;
  }

  const contextsA = graph.contextsOf(a);
  const contextsB = graph.contextsOf(b);
  if (contextsA.size > 0 || contextsB.size > 0) {
    const overlap = jaccardSimilarity(
      union(graph.tagsOf(a), contextsA),
      union(graph.tagsOf(b), contextsB),
    );
    const weight = Math.max(importanceOf(importance, a), importanceOf(importance, b));
    score += weights.contextBoost * overlap * weight;
  }

  return Math.min(1, Math.max(0, score));
}

// ============================================================================
// findSimilar
// ============================================================================

/**
 * Rank not-yet-installed catalog packages by resemblance to the installed set.
 *
 * Candidates already installed (by name, or carrying an install timestamp)
 * are skipped; duplicate pool entries keep the first. Zero scores are not
 * returned. Sorted by score descending, ties by name, capped at `topN`.
 */
export function findSimilar(
  installed: Package[],
  candidatePool: Package[],
  topN: number,
  options?: FindSimilarOptions,
): SimilarityCandidate[] {
  if (candidatePool.length === 0 || installed.length === 0 || topN <= 0) {
    return [];
  }

  const weights: SimilarityWeights = {
    dependencyBoost: options?.dependencyBoost ?? DEFAULT_SIMILARITY_WEIGHTS.dependencyBoost,
    contextBoost: options?.contextBoost ?? DEFAULT_SIMILARITY_WEIGHTS.contextBoost,
  };
  const importance = options?.importance ?? NO_IMPORTANCE;
  const graph = new PackageGraph([...installed, ...candidatePool], options?.usage ?? []);

  const installedKeys = new Set(installed.map(p => packageKey(p.name)));
  const seen = new Set<string>();
  const candidates: SimilarityCandidate[] = [];

  for (const candidate of candidatePool) {
    const key = packageKey(candidate.name);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    if (installedKeys.has(key) || candidate.installedAt !== null) continue;

    const pairs: Array<{ name: string; score: number }> = [];
    for (const pkg of installed) {
      const score = packageSimilarity(candidate.name, pkg.name, graph, importance, weights);
      if (score > 0) pairs.push({ name: pkg.name, score });
    }
    if (pairs.length === 0) continue;

    pairs.sort((x, y) => y.score - x.score || compareNames(x.name, y.name));

    candidates.push({
      packageName: candidate.name.trim(),
      score: pairs[0].score,
      contributors: pairs.map(p => p.name),
    });
  }

  candidates.sort((x, y) => y.score - x.score || compareNames(x.packageName, y.packageName));
  return candidates.slice(0, topN);
}

// ============================================================================
// Internal helpers
// ============================================================================

function compareNames(a: string, b: string): number {
  const ka = packageKey(a);
  const kb = packageKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}
