import { readFile, writeFile, appendFile, rename, mkdir } from 'fs/promises';
import { join, dirname } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  PackageSchema,
  UsagePatternSchema,
  InstallationRecordSchema,
  packageKey,
} from '../types/package.js';
import type { Package, UsagePattern, InstallationRecord } from '../types/package.js';
import { RecommendationSchema } from '../types/recommendation.js';
import type { Recommendation, RecommendationSource } from '../types/recommendation.js';
import { sanitizePackages, sanitizeUsagePatterns } from '../validation/input-sanitizer.js';
import { recentFailures } from './recent-failures.js';

// ============================================================================
// Adapter contract
// ============================================================================

/**
 * The only storage operations the recommendation engine depends on.
 */
export interface RecommendationStoreAdapter {
  /** Append recommendation rows; never rewrites earlier rows */
  save(recommendations: readonly Recommendation[]): Promise<void>;
  /** Normalized names of packages whose install failed within `windowMs` before `now` */
  loadRecentFailures(windowMs: number, now: number): Promise<Set<string>>;
  /** Raw records of installed packages; the engine sanitizes them */
  loadInstalled(): Promise<unknown[]>;
}

export interface HistoryOptions {
  limit?: number;                  // default 10
  source?: RecommendationSource;
}

export interface InstallationHistoryOptions {
  limit?: number;                  // default 10
  packageName?: string;
}

const DEFAULT_HISTORY_LIMIT = 10;

const FILES = {
  packages: 'packages.json',
  usage: 'usage-patterns.json',
  installations: 'installations.jsonl',
  recommendations: 'recommendations.jsonl',
} as const;

// ============================================================================
// JsonlRecommendationStore
// ============================================================================

/**
 * File-backed store under a data directory.
 *
 * Packages and usage patterns are upserted into JSON documents written with
 * write-tmp-then-rename. Installation records and recommendations are
 * append-only JSONL. Writes are serialized through a queue. Package and
 * usage reads go through the input sanitizer, which repairs what it can;
 * JSONL reads validate every line and skip malformed ones with a warning.
 */
export class JsonlRecommendationStore implements RecommendationStoreAdapter {
  private readonly dataDir: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(dataDir: string = '.pkg-advisor') {
    this.dataDir = dataDir;
  }

  // --------------------------------------------------------------------------
  // Packages
  // --------------------------------------------------------------------------

  /**
   * Insert or replace a package (case-insensitive on name). Other stored
   * records are written back untouched.
   *
   * @throws {ZodError} When `pkg` is not a valid package
   */
  async upsertPackage(pkg: Package): Promise<void> {
    PackageSchema.parse(pkg);
    await this.enqueue(async () => {
      const entries = await this.readRawArray(FILES.packages);
      const next = withoutName(entries, 'name', packageKey(pkg.name));
      next.push(pkg);
      await this.writeJson(FILES.packages, next);
    });
  }

  /**
   * Stored packages, repaired where possible. Records that cannot be
   * repaired are skipped with a warning.
   */
  async listPackages(): Promise<Package[]> {
    const { records, excluded } = sanitizePackages(await this.readRawArray(FILES.packages));
    if (excluded > 0) console.warn(`Skipping ${excluded} invalid entries in ${FILES.packages}`);
    return records;
  }

  async getPackage(name: string): Promise<Package | null> {
    const key = packageKey(name);
    return (await this.listPackages()).find(p => packageKey(p.name) === key) ?? null;
  }

  /**
   * Unvalidated package records carrying an install timestamp, so that
   * callers can repair and count bad records themselves.
   */
  async loadInstalled(): Promise<unknown[]> {
    return (await this.readRawArray(FILES.packages)).filter(
      entry => !isRecord(entry) || (entry.installedAt !== null && entry.installedAt !== undefined),
    );
  }

  // --------------------------------------------------------------------------
  // Usage patterns
  // --------------------------------------------------------------------------

  /**
   * Insert or replace the usage record for a package. Any importance on the
   * input is dropped since it is derived.
   *
   * @throws {ZodError} When `pattern` is not a valid usage record
   */
  async upsertUsagePattern(pattern: UsagePattern): Promise<void> {
    UsagePatternSchema.parse(pattern);
    await this.enqueue(async () => {
      const entries = await this.readRawArray(FILES.usage);
      const next = withoutName(entries, 'packageName', packageKey(pattern.packageName));
      const { importance: _derived, ...stored } = pattern;
      next.push(stored);
      await this.writeJson(FILES.usage, next);
    });
  }

  /**
   * All usage records, most frequently used first.
   */
  async listUsagePatterns(): Promise<UsagePattern[]> {
    const { records, excluded } = sanitizeUsagePatterns(await this.loadUsageRecords());
    if (excluded > 0) console.warn(`Skipping ${excluded} invalid entries in ${FILES.usage}`);
    return records.sort((a, b) => b.frequency - a.frequency);
  }

  /** Unvalidated usage records */
  async loadUsageRecords(): Promise<unknown[]> {
    return this.readRawArray(FILES.usage);
  }

  // --------------------------------------------------------------------------
  // Installation history
  // --------------------------------------------------------------------------

  async recordInstallation(record: InstallationRecord): Promise<void> {
    await this.enqueue(() => this.appendLines(FILES.installations, [record]));
  }

  /**
   * Installation records, newest first.
   */
  async getInstallationHistory(options?: InstallationHistoryOptions): Promise<InstallationRecord[]> {
    const limit = options?.limit ?? DEFAULT_HISTORY_LIMIT;
    let records = await this.readJsonl(FILES.installations, InstallationRecordSchema);

    if (options?.packageName) {
      const key = packageKey(options.packageName);
      records = records.filter(r => packageKey(r.packageName) === key);
    }

    return sortNewestFirst(records).slice(0, limit);
  }

  async loadRecentFailures(windowMs: number, now: number): Promise<Set<string>> {
    const records = await this.readJsonl(FILES.installations, InstallationRecordSchema);
    return recentFailures(records, windowMs, now);
  }

  // --------------------------------------------------------------------------
  // Recommendations
  // --------------------------------------------------------------------------

  /**
   * Append all rows of a run in a single write. Earlier rows are never
   * touched, so concurrent runs cannot overwrite each other.
   */
  async save(recommendations: readonly Recommendation[]): Promise<void> {
    if (recommendations.length === 0) return;
    await this.enqueue(() => this.appendLines(FILES.recommendations, recommendations));
  }

  /**
   * Rows of the most recent run, in rank order. Empty when nothing was saved.
   */
  async loadLatestRun(): Promise<Recommendation[]> {
    const rows = await this.readJsonl(FILES.recommendations, RecommendationSchema);
    if (rows.length === 0) return [];

    let latestRun = rows[0].runId;
    let latestAt = -Infinity;
    for (const row of rows) {
      const at = Date.parse(row.timestamp);
      if (at >= latestAt) {
        latestAt = at;
        latestRun = row.runId;
      }
    }

    return rows.filter(r => r.runId === latestRun).sort((a, b) => a.rank - b.rank);
  }

  /**
   * Recommendation rows across runs, newest first, optionally by source.
   */
  async getRecommendationHistory(options?: HistoryOptions): Promise<Recommendation[]> {
    const limit = options?.limit ?? DEFAULT_HISTORY_LIMIT;
    let rows = await this.readJsonl(FILES.recommendations, RecommendationSchema);

    if (options?.source) {
      rows = rows.filter(r => r.source === options.source);
    }

    return sortNewestFirst(rows).slice(0, limit);
  }

  // --------------------------------------------------------------------------
  // File helpers
  // --------------------------------------------------------------------------

  private async enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.writeQueue.then(task);
    // Keep the queue alive after a failed write; the caller still sees the error
    this.writeQueue = run.catch(() => undefined);
    await run;
  }

  private async appendLines(file: string, entries: readonly unknown[]): Promise<void> {
    const path = join(this.dataDir, file);
    await mkdir(dirname(path), { recursive: true });
    const content = entries.map(e => JSON.stringify(e)).join('\n') + '\n';
    await appendFile(path, content, 'utf-8');
  }

  private async writeJson(file: string, value: unknown): Promise<void> {
    const path = join(this.dataDir, file);
    await mkdir(dirname(path), { recursive: true });

    const tempPath = join(
      dirname(path),
      `.${file}-${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`,
    );
    await writeFile(tempPath, JSON.stringify(value, null, 2), 'utf-8');
    await rename(tempPath, path);
  }

  private async readText(file: string): Promise<string | null> {
    try {
      return await readFile(join(this.dataDir, file), 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw err;
    }
  }

  /** Top-level array of a JSON document, entries unvalidated */
  private async readRawArray(file: string): Promise<unknown[]> {
    const content = await this.readText(file);
    if (content === null) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      console.warn(`Ignoring corrupt ${file}`);
      return [];
    }
    if (!Array.isArray(parsed)) {
      console.warn(`Ignoring ${file}: expected an array`);
      return [];
    }
    return parsed;
  }

  private async readJsonl<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T[]> {
    const content = await this.readText(file);
    if (content === null) return [];

    const items: T[] = [];
    for (const line of content.split(/\r?\n/)) {
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        console.warn(`Skipping malformed line in ${file}`);
        continue;
      }

      const result = schema.safeParse(parsed);
      if (result.success) {
        items.push(result.data);
      } else {
        console.warn(`Skipping invalid entry in ${file}`);
      }
    }
    return items;
  }
}

// ============================================================================
// Internal helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Raw entries except those whose `field` normalizes to `key` */
function withoutName(entries: unknown[], field: string, key: string): unknown[] {
  return entries.filter(entry => {
    if (!isRecord(entry)) return true;
    const name = entry[field];
    return typeof name !== 'string' || packageKey(name) !== key;
  });
}

/** Newest first; entries with equal timestamps keep their stored order */
function sortNewestFirst<T extends { timestamp: string }>(entries: T[]): T[] {
  return entries
    .map((entry, index) => ({ entry, index, at: Date.parse(entry.timestamp) || 0 }))
    .sort((a, b) => b.at - a.at || a.index - b.index)
    .map(e => e.entry);
}
