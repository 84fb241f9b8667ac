/**
 * Candidate and recommendation types for the scoring pipeline.
 *
 * SimilarityCandidate and AICandidate are ephemeral, produced per run.
 * Recommendation rows are persisted append-only and never mutated.
 */

import { z } from 'zod';

// ============================================================================
// Candidates
// ============================================================================

/** A not-yet-installed package scored by resemblance to the installed set */
export interface SimilarityCandidate {
  packageName: string;
  /** Best pairwise similarity against any installed package (0-1) */
  score: number;
  /** Installed packages with a positive pairwise score, best first */
  contributors: string[];
}

/** A normalized suggestion from the suggestion backend */
export interface AICandidate {
  /** Display name as the backend spelled it */
  packageName: string;
  /** Normalized dedup key */
  key: string;
  reason: string;
  /** 0-1, 0.5 when the backend gave none */
  confidence: number;
}

/** Raw shape the suggestion backend is asked to return */
export interface RawSuggestion {
  package: string;
  reason: string;
  confidence?: number;
}

/** Package name to importance score (0-1) */
export type ImportanceMap = Map<string, number>;

// ============================================================================
// Recommendation
// ============================================================================

export const RECOMMENDATION_CATEGORIES = ['similarity', 'ai', 'hybrid'] as const;

export type RecommendationCategory = typeof RECOMMENDATION_CATEGORIES[number];

export const RECOMMENDATION_SOURCES = ['similarity', 'ai', 'similarity+ai'] as const;

export type RecommendationSource = typeof RECOMMENDATION_SOURCES[number];

/** Audit trail of the raw inputs behind one recommendation */
export interface RecommendationMetadata {
  similarityScore?: number;
  similarityContribution?: number;
  aiConfidence?: number;
  aiContribution?: number;
  /** Sum of contributions before the 1.0 cap */
  uncappedScore: number;
  weights: { similarity: number; ai: number };
  contributors?: string[];
  /** Importance of each contributing installed package */
  contributorImportance?: Record<string, number>;
}

export interface Recommendation {
  runId: string;
  /** 1-based position within its run */
  rank: number;
  packageName: string;
  score: number;
  reason: string;
  category: RecommendationCategory;
  source: RecommendationSource;
  timestamp: string;
  metadata: RecommendationMetadata;
}

export const RecommendationSchema = z.object({
  runId: z.string().min(1),
  rank: z.number().int().positive(),
  packageName: z.string().min(1),
  score: z.number(),
  reason: z.string(),
  category: z.enum(RECOMMENDATION_CATEGORIES),
  source: z.enum(RECOMMENDATION_SOURCES),
  timestamp: z.string(),
  metadata: z.object({
    similarityScore: z.number().optional(),
    similarityContribution: z.number().optional(),
    aiConfidence: z.number().optional(),
    aiContribution: z.number().optional(),
    uncappedScore: z.number(),
    weights: z.object({ similarity: z.number(), ai: z.number() }),
    contributors: z.array(z.string()).optional(),
    contributorImportance: z.record(z.string(), z.number()).optional(),
  }).passthrough(),
});

// ============================================================================
// Run result
// ============================================================================

/** Degraded-mode signals every caller must be able to surface */
export interface RecommendationDiagnostics {
  /** Suggestion entries dropped by the normalizer */
  droppedAiEntries: number;
  backendTimedOut: boolean;
  /** No backend configured or empty workflow text */
  backendSkipped: boolean;
  /** Failure message when the backend failed for a reason other than timeout */
  backendError?: string;
  /** Package and usage records excluded as unusable */
  droppedInputRecords: number;
  /** Package and usage records kept after repairing one or more fields */
  repairedInputRecords: number;
}

export type PersistenceResult =
  | { ok: true; saved: number }
  | { ok: false; error: string };

export interface RecommendationResult {
  runId: string;
  similarityCandidates: SimilarityCandidate[];
  aiCandidates: AICandidate[];
  fused: Recommendation[];
  diagnostics: RecommendationDiagnostics;
  persistence: PersistenceResult;
}
