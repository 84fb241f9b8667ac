/**
 * Zod schema for the advisor configuration.
 *
 * Every field has a `.default()` so that `AdvisorConfigSchema.parse({})`
 * returns a complete config. Users can provide a partial config, or none.
 *
 * @module config/schema
 */

import { z } from 'zod';

// ============================================================================
// Section schemas
// ============================================================================

/**
 * Source trust weights and result size for fusion.
 * AI suggestions default slightly above similarity.
 */
const FusionSchema = z.object({
  similarity_weight: z.number().min(0).max(10).default(0.5),
  ai_weight: z.number().min(0).max(10).default(0.6),
  limit: z.number().int().min(1).max(200).default(10),
});

/**
 * Importance scoring: decay half-life and factor weights.
 */
const UsageSchema = z.object({
  decay_days: z.number().min(1).max(3650).default(30),
  frequency_weight: z.number().min(0).max(1).default(0.6),
  recency_weight: z.number().min(0).max(1).default(0.4),
  frequency_saturation: z.number().int().min(1).max(1_000_000).default(100),
});

/**
 * Similarity candidate count and boost constants.
 */
const SimilaritySchema = z.object({
  top_n: z.number().int().min(1).max(1000).default(20),
  dependency_boost: z.number().min(0).max(1).default(0.25),
  context_boost: z.number().min(0).max(1).default(0.15),
});

/**
 * Suggestion backend call settings.
 */
const SuggestionsSchema = z.object({
  timeout_ms: z.number().int().min(100).max(300_000).default(15_000),
  max_suggestions: z.number().int().min(1).max(100).default(10),
  model: z.string().min(1).default('claude-sonnet-4-20250514'),
});

/**
 * Cooldown after a failed install during which the package is not suggested.
 */
const InstallsSchema = z.object({
  failure_cooldown_days: z.number().min(0).max(365).default(7),
});

const StorageSchema = z.object({
  data_dir: z.string().min(1).default('.pkg-advisor'),
  catalog_file: z.string().min(1).default('catalog.json'),
});

// ============================================================================
// Composite schema
// ============================================================================

/**
 * Complete advisor config schema with defaults on every field.
 *
 * Usage:
 * ```typescript
 * const config = AdvisorConfigSchema.parse({});
 * const tuned = AdvisorConfigSchema.parse({ fusion: { ai_weight: 0.8 } });
 * ```
 */
export const AdvisorConfigSchema = z.object({
  fusion: FusionSchema.default(() => ({
    similarity_weight: 0.5,
    ai_weight: 0.6,
    limit: 10,
  })),
  usage: UsageSchema.default(() => ({
    decay_days: 30,
    frequency_weight: 0.6,
    recency_weight: 0.4,
    frequency_saturation: 100,
  })),
  similarity: SimilaritySchema.default(() => ({
    top_n: 20,
    dependency_boost: 0.25,
    context_boost: 0.15,
  })),
  suggestions: SuggestionsSchema.default(() => ({
    timeout_ms: 15_000,
    max_suggestions: 10,
    model: 'claude-sonnet-4-20250514',
  })),
  installs: InstallsSchema.default(() => ({
    failure_cooldown_days: 7,
  })),
  storage: StorageSchema.default(() => ({
    data_dir: '.pkg-advisor',
    catalog_file: 'catalog.json',
  })),
});

export type AdvisorConfig = z.infer<typeof AdvisorConfigSchema>;

/**
 * Default config produced by parsing an empty object.
 */
export const DEFAULT_ADVISOR_CONFIG: AdvisorConfig = AdvisorConfigSchema.parse({});
