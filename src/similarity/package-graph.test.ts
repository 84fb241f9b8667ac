import { describe, it, expect } from 'vitest';
import { PackageGraph } from './package-graph.js';
import type { Package } from '../types/package.js';

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

describe('PackageGraph', () => {
  it('looks up tags case-insensitively', () => {
    const graph = new PackageGraph([makePackage('Pandas', { tags: ['Data-Analysis', ' tabular '] })]);
    expect([...graph.tagsOf('pandas')]).toEqual(['data-analysis', 'tabular']);
    expect(graph.has('PANDAS')).toBe(true);
  });

  it('returns empty sets for unknown packages', () => {
    const graph = new PackageGraph();
    expect(graph.tagsOf('ghost').size).toBe(0);
    expect(graph.dependencyClosure('ghost').size).toBe(0);
  });

  it('keeps dependencies on packages that have no record', () => {
    const graph = new PackageGraph([makePackage('app', { dependencies: ['libghost'] })]);
    expect(graph.has('libghost')).toBe(false);
    expect([...graph.dependencyClosure('app')]).toEqual(['libghost']);
  });

  it('walks transitive dependencies', () => {
    const graph = new PackageGraph([
      makePackage('a', { dependencies: ['b'] }),
      makePackage('b', { dependencies: ['c'] }),
      makePackage('c', { dependencies: ['d'] }),
    ]);
    expect([...graph.dependencyClosure('a')].sort()).toEqual(['b', 'c', 'd']);
  });

  it('terminates on dependency cycles and excludes the start package', () => {
    const graph = new PackageGraph([
      makePackage('a', { dependencies: ['b'] }),
      makePackage('b', { dependencies: ['a'] }),
    ]);
    expect([...graph.dependencyClosure('a')]).toEqual(['b']);
  });

  it('links packages in either dependency direction', () => {
    const graph = new PackageGraph([makePackage('requests', { dependencies: ['URLLib3'] })]);
    expect(graph.dependencyLinked('requests', 'urllib3')).toBe(true);
    expect(graph.dependencyLinked('urllib3', 'requests')).toBe(true);
    expect(graph.dependencyLinked('requests', 'flask')).toBe(false);
  });

  it('merges repeated registrations and invalidates cached closures', () => {
    const graph = new PackageGraph([makePackage('a', { dependencies: ['b'] })]);
    expect([...graph.dependencyClosure('a')]).toEqual(['b']);

    graph.addPackage(makePackage('b', { dependencies: ['c'] }));
    expect([...graph.dependencyClosure('a')].sort()).toEqual(['b', 'c']);
  });

  it('attaches usage contexts from usage records', () => {
    const graph = new PackageGraph([], [{
      packageName: 'Jupyter',
      frequency: 3,
      lastUsed: null,
      contexts: ['Data-Analysis'],
    }]);
    expect([...graph.contextsOf('jupyter')]).toEqual(['data-analysis']);
  });
});
