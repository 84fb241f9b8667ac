/**
 * Candidate pool source backed by a JSON file.
 *
 * The file holds an array of package records (the known catalog, usually
 * much larger than the installed set). A missing file means no catalog was
 * supplied and yields null; an empty array is a valid, empty pool. Entries
 * are returned unvalidated: the input sanitizer repairs or excludes them.
 */

import { readFile } from 'fs/promises';

export interface PackageCatalog {
  /** Raw candidate records, or null when no catalog is available at all */
  listCandidates(): Promise<unknown[] | null>;
}

export class PackageCatalogError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'PackageCatalogError';
  }
}

export class JsonPackageCatalog implements PackageCatalog {
  constructor(private readonly path: string) {}

  async listCandidates(): Promise<unknown[] | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new PackageCatalogError(`Invalid JSON in catalog file: ${this.path}`, this.path);
    }
    if (!Array.isArray(raw)) {
      throw new PackageCatalogError(`Catalog file must contain an array of packages: ${this.path}`, this.path);
    }
    return raw;
  }
}
