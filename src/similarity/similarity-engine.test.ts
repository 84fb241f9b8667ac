/**
 * Tests for pairwise package similarity and candidate ranking.
 */

import { describe, it, expect } from 'vitest';
import { findSimilar, packageSimilarity } from './similarity-engine.js';
import { PackageGraph } from './package-graph.js';
import type { Package, UsagePattern } from '../types/package.js';

// ============================================================================
// Helpers
// ============================================================================

function makePackage(name: string, overrides: Partial<Package> = {}): Package {
  return {
    name,
    version: '1.0.0',
    installedAt: null,
    tags: [],
    dependencies: [],
    ...overrides,
  };
}

function installedPackage(name: string, overrides: Partial<Package> = {}): Package {
  return makePackage(name, { installedAt: '2026-01-01T00:00:00.000Z', ...overrides });
}

// ============================================================================
// packageSimilarity
// ============================================================================

describe('packageSimilarity', () => {
  it('is the tag Jaccard overlap without other signals', () => {
    const graph = new PackageGraph([
      makePackage('a', { tags: ['x', 'y'] }),
      makePackage('b', { tags: ['y', 'z'] }),
    ]);
    expect(packageSimilarity('a', 'b', graph)).toBeCloseTo(1 / 3, 10);
  });

  it('adds the dependency boost when one package depends on the other', () => {
    const graph = new PackageGraph([
      makePackage('requests', { tags: ['http'], dependencies: ['urllib3'] }),
      makePackage('urllib3', { tags: ['networking'] }),
    ]);
    expect(packageSimilarity('requests', 'urllib3', graph)).toBeCloseTo(0.25, 10);
  });

  it('adds the context boost scaled by importance', () => {
    const usage: UsagePattern[] = [{
      packageName: 'jupyter',
      frequency: 100,
      lastUsed: null,
      contexts: ['data-analysis'],
    }];
    const graph = new PackageGraph([
      makePackage('jupyter', { tags: ['notebook'] }),
      makePackage('matplotlib', { tags: ['plotting', 'data-analysis'] }),
    ], usage);
    const importance = new Map([['jupyter', 1]]);

    // labels: {notebook, data-analysis} vs {plotting, data-analysis} -> 1/3
    expect(packageSimilarity('jupyter', 'matplotlib', graph, importance)).toBeCloseTo(0.05, 10);
  });

  it('gives no context boost when the package has no importance', () => {
    const graph = new PackageGraph([
      makePackage('jupyter', { tags: ['notebook'] }),
      makePackage('matplotlib', { tags: ['plotting', 'data-analysis'] }),
    ]);
    graph.addContexts('jupyter', ['data-analysis']);
    expect(packageSimilarity('jupyter', 'matplotlib', graph)).toBe(0);
  });

  it('caps at 1', () => {
    const graph = new PackageGraph([
      makePackage('a', { tags: ['x'], dependencies: ['b'] }),
      makePackage('b', { tags: ['x'] }),
    ]);
    expect(packageSimilarity('a', 'b', graph)).toBe(1);
  });

  it('is symmetric', () => {
    const usage: UsagePattern[] = [
      { packageName: 'vim', frequency: 40, lastUsed: null, contexts: ['editing', 'terminal'] },
      { packageName: 'tmux', frequency: 5, lastUsed: null, contexts: ['terminal'] },
    ];
    const graph = new PackageGraph([
      makePackage('vim', { tags: ['editor', 'terminal'], dependencies: ['ncurses'] }),
      makePackage('tmux', { tags: ['terminal', 'multiplexer'], dependencies: ['ncurses'] }),
      makePackage('neovim', { tags: ['editor'], dependencies: ['libuv'] }),
      makePackage('ncurses', { tags: ['library'] }),
    ], usage);
    const importance = new Map([['vim', 0.7], ['tmux', 0.2]]);
    const names = ['vim', 'tmux', 'neovim', 'ncurses'];

    for (const a of names) {
      for (const b of names) {
        expect(packageSimilarity(a, b, graph, importance))
          .toBe(packageSimilarity(b, a, graph, importance));
      }
    }
  });
});

// ============================================================================
// findSimilar
// ============================================================================

describe('findSimilar', () => {
  it('ranks a tag match above an unrelated package, which is excluded', () => {
    const installed = [installedPackage('pandas', { tags: ['data-analysis'] })];
    const pool = [
      makePackage('flask', { tags: ['web'] }),
      makePackage('numpy', { tags: ['data-analysis'] }),
    ];

    const result = findSimilar(installed, pool, 10);
    expect(result).toEqual([
      { packageName: 'numpy', score: 1, contributors: ['pandas'] },
    ]);
  });

  it('takes the max over installed packages rather than the sum', () => {
    const installed = [
      installedPackage('a', { tags: ['x'] }),
      installedPackage('b', { tags: ['y'] }),
    ];
    const pool = [makePackage('c', { tags: ['x', 'y'] })];

    const [candidate] = findSimilar(installed, pool, 10);
    expect(candidate.score).toBeCloseTo(0.5, 10);
    expect(candidate.contributors).toEqual(['a', 'b']);
  });

  it('orders contributors by pairwise score', () => {
    const installed = [
      installedPackage('loose', { tags: ['x', 'q', 'r'] }),
      installedPackage('close', { tags: ['x', 'y'] }),
    ];
    const pool = [makePackage('cand', { tags: ['x', 'y'] })];

    const [candidate] = findSimilar(installed, pool, 10);
    expect(candidate.contributors).toEqual(['close', 'loose']);
  });

  it('breaks score ties alphabetically', () => {
    const installed = [installedPackage('base', { tags: ['t'] })];
    const pool = [
      makePackage('zeta', { tags: ['t'] }),
      makePackage('Alpha', { tags: ['t'] }),
      makePackage('mid', { tags: ['t'] }),
    ];

    expect(findSimilar(installed, pool, 10).map(c => c.packageName)).toEqual(['Alpha', 'mid', 'zeta']);
  });

  it('returns at most topN candidates', () => {
    const installed = [installedPackage('base', { tags: ['t'] })];
    const pool = ['p1', 'p2', 'p3', 'p4'].map(name => makePackage(name, { tags: ['t'] }));

    expect(findSimilar(installed, pool, 2).map(c => c.packageName)).toEqual(['p1', 'p2']);
    expect(findSimilar(installed, pool, 0)).toEqual([]);
  });

  it('skips candidates that are already installed', () => {
    const installed = [installedPackage('pandas', { tags: ['data-analysis'] })];
    const pool = [
      makePackage('PANDAS', { tags: ['data-analysis'] }),
      makePackage('scipy', { tags: ['data-analysis'], installedAt: '2025-12-01T00:00:00.000Z' }),
      makePackage('numpy', { tags: ['data-analysis'] }),
    ];

    expect(findSimilar(installed, pool, 10).map(c => c.packageName)).toEqual(['numpy']);
  });

  it('keeps the first of duplicate pool entries', () => {
    const installed = [installedPackage('pandas', { tags: ['data-analysis'] })];
    const pool = [
      makePackage('numpy', { tags: ['data-analysis', 'arrays'] }),
      makePackage('NumPy', { tags: ['data-analysis'] }),
    ];

    const result = findSimilar(installed, pool, 10);
    expect(result).toHaveLength(1);
    expect(result[0].packageName).toBe('numpy');
  });

  it('returns an empty sequence for an empty candidate pool', () => {
    const installed = [installedPackage('pandas', { tags: ['data-analysis'] })];
    expect(findSimilar(installed, [], 10)).toEqual([]);
  });

  it('returns an empty sequence when nothing is installed', () => {
    expect(findSimilar([], [makePackage('numpy', { tags: ['x'] })], 10)).toEqual([]);
  });

  it('applies configured boosts', () => {
    const installed = [installedPackage('requests', { tags: ['http'], dependencies: ['urllib3'] })];
    const pool = [makePackage('urllib3', { tags: ['networking'] })];

    const [candidate] = findSimilar(installed, pool, 10, { dependencyBoost: 0.4 });
    expect(candidate.score).toBeCloseTo(0.4, 10);
  });
});
