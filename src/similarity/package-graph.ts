/**
 * Name-keyed lookup table of package relations.
 *
 * Tags, dependencies and usage contexts are stored as plain identifiers
 * keyed by normalized package name. A dependency may name a package that
 * has no record here; it is still a valid node and simply has no outgoing
 * edges. Dependency closures are resolved lazily and memoized.
 */

import { packageKey } from '../types/package.js';
import type { Package, UsagePattern } from '../types/package.js';
import { normalizeLabels } from './text-utils.js';

interface GraphNode {
  tags: Set<string>;
  dependencies: Set<string>;
  contexts: Set<string>;
}

const EMPTY: ReadonlySet<string> = new Set();

export class PackageGraph {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly closureCache = new Map<string, ReadonlySet<string>>();

  constructor(packages: Iterable<Package> = [], usage: Iterable<UsagePattern> = []) {
    for (const pkg of packages) this.addPackage(pkg);
    for (const pattern of usage) this.addContexts(pattern.packageName, pattern.contexts);
  }

  /**
   * Register a package's tags and dependencies. Registering the same name
   * twice merges both records.
   */
  addPackage(pkg: Package): void {
    const node = this.node(pkg.name);
    for (const tag of normalizeLabels(pkg.tags)) node.tags.add(tag);
    for (const dep of pkg.dependencies) {
      const key = packageKey(dep);
      if (key) node.dependencies.add(key);
    }
    this.closureCache.clear();
  }

  /** Attach usage contexts observed for a package */
  addContexts(name: string, contexts: Iterable<string>): void {
    const node = this.node(name);
    for (const context of normalizeLabels(contexts)) node.contexts.add(context);
  }

  has(name: string): boolean {
    return this.nodes.has(packageKey(name));
  }

  tagsOf(name: string): ReadonlySet<string> {
    return this.nodes.get(packageKey(name))?.tags ?? EMPTY;
  }

  contextsOf(name: string): ReadonlySet<string> {
    return this.nodes.get(packageKey(name))?.contexts ?? EMPTY;
  }

  dependenciesOf(name: string): ReadonlySet<string> {
    return this.nodes.get(packageKey(name))?.dependencies ?? EMPTY;
  }

  /**
   * All packages reachable through dependency edges, excluding the start
   * package itself. Unknown names terminate the walk. Cycles are safe.
   */
  dependencyClosure(name: string): ReadonlySet<string> {
    const start = packageKey(name);
    const cached = this.closureCache.get(start);
    if (cached) return cached;

    const visited = new Set<string>();
    const queue = [...this.dependenciesOf(start)];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || current === start || visited.has(current)) continue;
      visited.add(current);
      for (const next of this.dependenciesOf(current)) {
        if (!visited.has(next)) queue.push(next);
      }
    }

    this.closureCache.set(start, visited);
    return visited;
  }

  /** True when either package lies in the other's dependency closure */
  dependencyLinked(a: string, b: string): boolean {
    const ka = packageKey(a);
    const kb = packageKey(b);
    return this.dependencyClosure(ka).has(kb) || this.dependencyClosure(kb).has(ka);
  }

  private node(name: string): GraphNode {
    const key = packageKey(name);
    let node = this.nodes.get(key);
    if (!node) {
      node = { tags: new Set(), dependencies: new Set(), contexts: new Set() };
      this.nodes.set(key, node);
    }
    return node;
  }
}
