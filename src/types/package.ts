/**
 * Package, usage and installation records consumed by the recommendation core.
 *
 * These are read-only snapshots handed over by external collaborators (the
 * package detector, the log analyzer and the package manager). The core never
 * mutates them. Schemas are used when records are read back from disk.
 */

import { z } from 'zod';

// ============================================================================
// Package
// ============================================================================

/**
 * A software package known to the host, installed or not.
 *
 * Dependencies are weak references by name and may point at packages that
 * have no record of their own yet.
 */
export interface Package {
  name: string;
  version: string;
  description?: string;
  /** Where the package was installed from (apt, pip, snap, ...) */
  source?: string;
  /** ISO timestamp of installation; null means not installed */
  installedAt: string | null;
  /** Size in bytes */
  size?: number;
  tags: string[];
  dependencies: string[];
  metadata?: Record<string, unknown>;
}

export const PackageSchema = z.object({
  name: z.string().min(1),
  version: z.string().default(''),
  description: z.string().optional(),
  source: z.string().optional(),
  installedAt: z.string().nullable().default(null),
  size: z.number().nonnegative().optional(),
  tags: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

// ============================================================================
// UsagePattern
// ============================================================================

/**
 * Observed usage of one installed package. At most one per package.
 */
export interface UsagePattern {
  packageName: string;
  /** Non-negative use count */
  frequency: number;
  /** ISO timestamp of last use */
  lastUsed: string | null;
  /** Free-text usage labels such as "web-dev" or "data-analysis" */
  contexts: string[];
  /** Derived by the usage signal builder; ignored on input */
  importance?: number;
  metadata?: Record<string, unknown>;
}

export const UsagePatternSchema = z.object({
  packageName: z.string().min(1),
  frequency: z.number().int().nonnegative(),
  lastUsed: z.string().nullable().default(null),
  contexts: z.array(z.string()).default([]),
  importance: z.number().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

// ============================================================================
// InstallationRecord
// ============================================================================

export const INSTALL_OPERATIONS = ['install', 'uninstall'] as const;

export type InstallOperation = typeof INSTALL_OPERATIONS[number];

/**
 * Outcome of one package manager operation, written by the package manager
 * collaborator and only read by the core.
 */
export interface InstallationRecord {
  packageName: string;
  operation: InstallOperation;
  timestamp: string;
  success: boolean;
  details?: string;
}

export const InstallationRecordSchema = z.object({
  packageName: z.string().min(1),
  operation: z.enum(INSTALL_OPERATIONS),
  timestamp: z.string(),
  success: z.boolean(),
  details: z.string().optional(),
});

// ============================================================================
// Name handling
// ============================================================================

/**
 * Normalized identity key for a package name.
 *
 * Package identity is case-insensitive and ignores surrounding whitespace.
 */
export function packageKey(name: string): string {
  return name.trim().toLowerCase();
}
