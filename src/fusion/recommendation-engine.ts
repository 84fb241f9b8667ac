/**
 * Recommendation engine: one run from collaborator data to persisted rows.
 *
 * Loads installed packages, the candidate pool, usage patterns and recent
 * install failures; sanitizes them; runs similarity and the suggestion
 * backend concurrently; fuses; persists. Backend and persistence trouble
 * degrade the run and are reported, they never abort it.
 */

import { randomUUID } from 'crypto';
import type {
  AICandidate,
  RecommendationDiagnostics,
  RecommendationResult,
  PersistenceResult,
  Recommendation,
} from '../types/recommendation.js';
import type { AdvisorConfig } from '../config/schema.js';
import { DEFAULT_ADVISOR_CONFIG } from '../config/schema.js';
import { failureCooldownMs } from '../config/reader.js';
import type { RecommendationStoreAdapter } from '../storage/recommendation-store.js';
import type { PackageCatalog } from '../storage/package-catalog.js';
import { sanitizePackages, sanitizeUsagePatterns } from '../validation/input-sanitizer.js';
import { computeImportance } from '../usage/importance-scorer.js';
import { findSimilar } from '../similarity/similarity-engine.js';
import { requestSuggestions } from '../suggestions/suggestion-backend.js';
import type { SuggestionBackend, SuggestionOutcome } from '../suggestions/suggestion-backend.js';
import { normalizeSuggestions } from '../suggestions/suggestion-normalizer.js';
import { fuse } from './recommendation-fuser.js';

// ============================================================================
// Types
// ============================================================================

export interface UsageSource {
  /** Raw usage records; the engine sanitizes them */
  loadUsageRecords(): Promise<unknown[]>;
}

export interface RecommendationEngineDeps {
  store: RecommendationStoreAdapter;
  catalog: PackageCatalog;
  usage: UsageSource;
  /** Omitted means similarity-only runs */
  backend?: SuggestionBackend;
  config?: AdvisorConfig;
}

export interface RecommendOptions {
  /** Overrides `fusion.limit` */
  limit?: number;
  /** Epoch ms used for recency decay, the failure cooldown and row timestamps */
  now?: number;
  runId?: string;
}

/**
 * Thrown when no candidate pool was supplied at all. An empty pool is fine.
 */
export class CandidatePoolMissingError extends Error {
  constructor(message = 'No candidate pool supplied: expected an array of packages') {
    super(message);
    this.name = 'CandidatePoolMissingError';
  }
}

type SuggestionStep = SuggestionOutcome | { status: 'skipped' };

// ============================================================================
// RecommendationEngine
// ============================================================================

export class RecommendationEngine {
  private readonly config: AdvisorConfig;

  constructor(private readonly deps: RecommendationEngineDeps) {
    this.config = deps.config ?? DEFAULT_ADVISOR_CONFIG;
  }

  /**
   * Produce, persist and return one recommendation run for `workflow`.
   *
   * @throws {CandidatePoolMissingError} When the catalog supplies no pool
   */
  async getRecommendations(workflow: string, options?: RecommendOptions): Promise<RecommendationResult> {
    const { store, catalog, usage } = this.deps;
    const config = this.config;
    const now = options?.now ?? Date.now();
    const runId = options?.runId ?? randomUUID();

    const [installedRaw, poolRaw, usageRaw, failures] = await Promise.all([
      store.loadInstalled(),
      catalog.listCandidates(),
      usage.loadUsageRecords(),
      store.loadRecentFailures(failureCooldownMs(config), now),
    ]);

    if (!Array.isArray(poolRaw)) {
      throw new CandidatePoolMissingError();
    }

    const installed = sanitizePackages(installedRaw);
    const pool = sanitizePackages(poolRaw);
    const patterns = sanitizeUsagePatterns(usageRaw);

    const importance = computeImportance(patterns.records, now, {
      decayDays: config.usage.decay_days,
      frequencyWeight: config.usage.frequency_weight,
      recencyWeight: config.usage.recency_weight,
      frequencySaturation: config.usage.frequency_saturation,
    });

    const similarityTask = Promise.resolve().then(() =>
      findSimilar(installed.records, pool.records, config.similarity.top_n, {
        dependencyBoost: config.similarity.dependency_boost,
        contextBoost: config.similarity.context_boost,
        importance,
        usage: patterns.records,
      }),
    );

    const [similarityCandidates, suggestion] = await Promise.all([
      similarityTask,
      this.fetchSuggestions(workflow),
    ]);

    let aiCandidates: AICandidate[] = [];
    let droppedAiEntries = 0;
    if (suggestion.status === 'ok') {
      const normalized = normalizeSuggestions(suggestion.suggestions);
      aiCandidates = normalized.candidates;
      droppedAiEntries = normalized.dropped;
    }

    const diagnostics: RecommendationDiagnostics = {
      droppedAiEntries,
      backendTimedOut: suggestion.status === 'timeout',
      backendSkipped: suggestion.status === 'skipped',
      droppedInputRecords: installed.excluded + pool.excluded + patterns.excluded,
      repairedInputRecords: installed.repaired + pool.repaired + patterns.repaired,
    };
    if (suggestion.status === 'failed') {
      diagnostics.backendError = suggestion.error;
    }

    const fused = fuse(
      {
        similarity: similarityCandidates,
        ai: aiCandidates,
        importance,
        installed: installed.records.map(p => p.name),
        recentFailures: failures,
        limit: options?.limit ?? config.fusion.limit,
      },
      {
        weights: { similarity: config.fusion.similarity_weight, ai: config.fusion.ai_weight },
        now,
        runId,
      },
    );

    const persistence = await this.persist(fused);

    return { runId, similarityCandidates, aiCandidates, fused, diagnostics, persistence };
  }

  private async fetchSuggestions(workflow: string): Promise<SuggestionStep> {
    const text = workflow.trim();
    if (!this.deps.backend || text.length === 0) {
      return { status: 'skipped' };
    }
    return requestSuggestions(
      this.deps.backend,
      { workflow: text, maxSuggestions: this.config.suggestions.max_suggestions },
      this.config.suggestions.timeout_ms,
    );
  }

  private async persist(rows: readonly Recommendation[]): Promise<PersistenceResult> {
    try {
      await this.deps.store.save(rows);
      return { ok: true, saved: rows.length };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }
}
