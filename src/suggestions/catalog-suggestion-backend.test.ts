import { describe, it, expect } from 'vitest';
import { createCatalogSuggestionBackend, CATALOG_CONFIDENCE_CEILING } from './catalog-suggestion-backend.js';
import type { Package } from '../types/package.js';

function makePackage(name: string, description: string, tags: string[]): Package {
  return { name, version: '1.0.0', description, installedAt: null, tags, dependencies: [] };
}

const CATALOG: Package[] = [
  makePackage('pandas', 'dataframes for tabular data analysis', ['data-analysis']),
  makePackage('numpy', 'numerical arrays for data analysis', ['numerical']),
  makePackage('flask', 'web framework', ['web']),
  makePackage('gimp', 'image editor', ['graphics']),
];

const catalog = { listCandidates: async () => CATALOG };
const signal = () => new AbortController().signal;

describe('createCatalogSuggestionBackend', () => {
  it('ranks catalog packages by TF-IDF match against the workflow', async () => {
    const backend = createCatalogSuggestionBackend(catalog);
    const result = await backend({ workflow: 'tabular data analysis with dataframes', maxSuggestions: 10 }, signal());

    expect(result).toEqual([
      {
        package: 'pandas',
        reason: 'Catalog match for tabular, data, analysis, dataframes',
        confidence: CATALOG_CONFIDENCE_CEILING,
      },
      {
        package: 'numpy',
        reason: 'Catalog match for data, analysis',
        confidence: expect.any(Number),
      },
    ]);
  });

  it('honors the suggestion count hint', async () => {
    const backend = createCatalogSuggestionBackend(catalog);
    const result = await backend({ workflow: 'tabular data analysis', maxSuggestions: 1 }, signal());

    expect(result).toHaveLength(1);
  });

  it('returns no suggestions when nothing matches', async () => {
    const backend = createCatalogSuggestionBackend(catalog);
    const result = await backend({ workflow: 'kernel debugging', maxSuggestions: 10 }, signal());

    expect(result).toEqual([]);
  });

  it('rejects when the request was already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const backend = createCatalogSuggestionBackend(catalog);

    await expect(backend({ workflow: 'web', maxSuggestions: 10 }, controller.signal)).rejects.toThrow('aborted');
  });
});
