import { join } from 'path';
import { JsonlRecommendationStore } from './storage/recommendation-store.js';
import { JsonPackageCatalog } from './storage/package-catalog.js';
import { RecommendationEngine } from './fusion/recommendation-engine.js';
import { createCatalogSuggestionBackend } from './suggestions/catalog-suggestion-backend.js';
import { createLlmSuggestionBackend, isLlmBackendAvailable } from './suggestions/llm-suggestion-backend.js';
import { DEFAULT_ADVISOR_CONFIG } from './config/schema.js';
import type { AdvisorConfig } from './config/schema.js';

// Types
export type {
  Package,
  UsagePattern,
  InstallationRecord,
  InstallOperation,
} from './types/package.js';
export {
  PackageSchema,
  UsagePatternSchema,
  InstallationRecordSchema,
  INSTALL_OPERATIONS,
  packageKey,
} from './types/package.js';
export type {
  SimilarityCandidate,
  AICandidate,
  RawSuggestion,
  ImportanceMap,
  Recommendation,
  RecommendationCategory,
  RecommendationSource,
  RecommendationMetadata,
  RecommendationDiagnostics,
  PersistenceResult,
  RecommendationResult,
} from './types/recommendation.js';
export {
  RecommendationSchema,
  RECOMMENDATION_CATEGORIES,
  RECOMMENDATION_SOURCES,
} from './types/recommendation.js';

// Usage signal
export {
  computeImportance,
  rankByImportance,
  scoreUsage,
  frequencyFactor,
  recencyFactor,
  importanceOf,
  DEFAULT_IMPORTANCE_OPTIONS,
} from './usage/importance-scorer.js';
export type { ImportanceOptions, RankedUsage } from './usage/importance-scorer.js';

// Similarity
export { PackageGraph } from './similarity/package-graph.js';
export {
  findSimilar,
  packageSimilarity,
  DEFAULT_SIMILARITY_WEIGHTS,
} from './similarity/similarity-engine.js';
export type { SimilarityWeights, FindSimilarOptions } from './similarity/similarity-engine.js';

// Suggestions
export {
  normalizeSuggestions,
  parseConfidence,
  DEFAULT_CONFIDENCE,
  MAX_REASON_LENGTH,
} from './suggestions/suggestion-normalizer.js';
export type { NormalizedSuggestions } from './suggestions/suggestion-normalizer.js';
export { requestSuggestions, BackendUnavailableError } from './suggestions/suggestion-backend.js';
export type {
  SuggestionBackend,
  SuggestionRequest,
  SuggestionOutcome,
} from './suggestions/suggestion-backend.js';
export {
  createLlmSuggestionBackend,
  isLlmBackendAvailable,
  buildSuggestionPrompt,
  parseSuggestionText,
} from './suggestions/llm-suggestion-backend.js';
export type { LlmBackendOptions } from './suggestions/llm-suggestion-backend.js';
export {
  createCatalogSuggestionBackend,
  CATALOG_CONFIDENCE_CEILING,
} from './suggestions/catalog-suggestion-backend.js';

// Fusion
export {
  fuse,
  DEFAULT_FUSION_WEIGHTS,
  DEFAULT_RECOMMENDATION_LIMIT,
  MAX_SCORE,
} from './fusion/recommendation-fuser.js';
export type { FusionWeights, FuseInput, FuseOptions } from './fusion/recommendation-fuser.js';
export { RecommendationEngine, CandidatePoolMissingError } from './fusion/recommendation-engine.js';
export type {
  RecommendationEngineDeps,
  RecommendOptions,
  UsageSource,
} from './fusion/recommendation-engine.js';

// Validation
export {
  sanitizePackages,
  sanitizeUsagePatterns,
  InputDataError,
} from './validation/input-sanitizer.js';
export type { SanitizeResult, SanitizeAction } from './validation/input-sanitizer.js';

// Storage
export { JsonlRecommendationStore } from './storage/recommendation-store.js';
export type {
  RecommendationStoreAdapter,
  HistoryOptions,
  InstallationHistoryOptions,
} from './storage/recommendation-store.js';
export { JsonPackageCatalog, PackageCatalogError } from './storage/package-catalog.js';
export type { PackageCatalog } from './storage/package-catalog.js';
export { recentFailures, DEFAULT_FAILURE_COOLDOWN_MS } from './storage/recent-failures.js';

// Config
export { AdvisorConfigSchema, DEFAULT_ADVISOR_CONFIG } from './config/schema.js';
export type { AdvisorConfig } from './config/schema.js';
export {
  readAdvisorConfig,
  validateAdvisorConfig,
  failureCooldownMs,
  AdvisorConfigError,
  DEFAULT_CONFIG_PATH,
} from './config/reader.js';

// Reports
export {
  formatRecommendations,
  formatDiagnostics,
  formatHistory,
  categoryColorCode,
} from './reports/recommendation-formatter.js';
export type { FormatOptions } from './reports/recommendation-formatter.js';

/**
 * Create the file-backed store and catalog for a config.
 */
export function createStores(config: AdvisorConfig = DEFAULT_ADVISOR_CONFIG) {
  const dataDir = config.storage.data_dir;
  const catalogPath = join(dataDir, config.storage.catalog_file);

  const store = new JsonlRecommendationStore(dataDir);
  const catalog = new JsonPackageCatalog(catalogPath);

  return {
    store,
    catalog,
    catalogPath,
  };
}

/**
 * Wire a recommendation engine with its stores and a suggestion backend.
 *
 * The LLM backend is used when an API key is available and `offline` is not
 * set; otherwise suggestions come from the local catalog.
 */
export function createAdvisor(options?: {
  config?: AdvisorConfig;
  offline?: boolean;
}) {
  const config = options?.config ?? DEFAULT_ADVISOR_CONFIG;
  const { store, catalog, catalogPath } = createStores(config);

  const useLlm = !options?.offline && isLlmBackendAvailable();
  const backend = useLlm
    ? createLlmSuggestionBackend({ model: config.suggestions.model })
    : createCatalogSuggestionBackend(catalog);

  const engine = new RecommendationEngine({
    store,
    catalog,
    usage: store,
    backend,
    config,
  });

  return {
    store,
    catalog,
    catalogPath,
    engine,
    backendName: useLlm ? 'llm' as const : 'catalog' as const,
  };
}
