import { packageKey } from '../types/package.js';
import type { InstallationRecord } from '../types/package.js';

/** Default cooldown after a failed install: 7 days */
export const DEFAULT_FAILURE_COOLDOWN_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Packages whose install failed inside the cooldown window and that have
 * not been installed successfully since.
 *
 * Returns normalized package names. Uninstall records are ignored, as are
 * records with unparseable timestamps.
 */
export function recentFailures(
  records: Iterable<InstallationRecord>,
  windowMs: number,
  now: number = Date.now(),
): Set<string> {
  const since = now - windowMs;
  const lastFailure = new Map<string, number>();
  const lastSuccess = new Map<string, number>();

  for (const record of records) {
    if (record.operation !== 'install') continue;
    const at = Date.parse(record.timestamp);
    if (Number.isNaN(at)) continue;

    const key = packageKey(record.packageName);
    const target = record.success ? lastSuccess : lastFailure;
    target.set(key, Math.max(at, target.get(key) ?? -Infinity));
  }

  const failures = new Set<string>();
  for (const [key, failedAt] of lastFailure) {
    if (failedAt < since || failedAt > now) continue;
    if ((lastSuccess.get(key) ?? -Infinity) > failedAt) continue;
    failures.add(key);
  }
  return failures;
}
