import natural from 'natural';
import type { Package } from '../types/package.js';
import type { SuggestionBackend } from './suggestion-backend.js';
import type { RawSuggestion } from '../types/recommendation.js';
import type { PackageCatalog } from '../storage/package-catalog.js';
import { sanitizePackages } from '../validation/input-sanitizer.js';

/** Highest confidence an offline match can claim; model suggestions may go higher */
export const CATALOG_CONFIDENCE_CEILING = 0.7;

// Build searchable document from package metadata
function buildDocument(pkg: Package): string {
  const parts = [pkg.name, pkg.description ?? '', ...pkg.tags];
  return parts.join(' ').replace(/[-_/]+/g, ' ');
}

// Tokens shared between the workflow text and a document
function matchedTerms(tokenize: (text: string) => string[], workflow: string, document: string): string[] {
  const docTokens = new Set(tokenize(document.toLowerCase()));
  const matched: string[] = [];
  for (const token of tokenize(workflow.toLowerCase())) {
    if (docTokens.has(token) && !matched.includes(token)) matched.push(token);
  }
  return matched;
}

/**
 * Offline suggestion backend: ranks catalog packages against the workflow
 * text with a TF-IDF index over names, descriptions and tags.
 *
 * Confidence is the TF-IDF score relative to the best match, scaled to at
 * most {@link CATALOG_CONFIDENCE_CEILING}.
 */
export function createCatalogSuggestionBackend(catalog: PackageCatalog): SuggestionBackend {
  return async (request, signal) => {
    const { records: packages } = sanitizePackages((await catalog.listCandidates()) ?? []);
    if (signal.aborted) {
      throw new Error('Catalog suggestion request aborted');
    }

    const tfidf = new natural.TfIdf();
    const documents = packages.map(buildDocument);
    documents.forEach(document => tfidf.addDocument(document));

    const scored: Array<{ index: number; score: number }> = [];
    tfidf.tfidfs(request.workflow.replace(/[-_/]+/g, ' '), (index, measure) => {
      if (measure > 0) scored.push({ index, score: measure });
    });
    if (scored.length === 0) return [];

    scored.sort((a, b) => b.score - a.score || a.index - b.index);
    const best = scored[0].score;
    const tokenizer = new natural.WordTokenizer();
    const tokenize = (text: string): string[] => tokenizer.tokenize(text) ?? [];

    return scored.slice(0, Math.max(0, request.maxSuggestions)).map(({ index, score }): RawSuggestion => {
      const terms = matchedTerms(tokenize, request.workflow, documents[index]);
      return {
        package: packages[index].name,
        reason: terms.length > 0
          ? `Catalog match for ${terms.join(', ')}`
          : 'Catalog match for your workflow',
        confidence: Math.round((score / best) * CATALOG_CONFIDENCE_CEILING * 100) / 100,
      };
    });
  };
}
