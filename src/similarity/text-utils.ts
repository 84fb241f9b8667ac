/**
 * Set helpers shared by the similarity engine and the suggestion backends.
 */

// ============================================================================
// Labels
// ============================================================================

/**
 * Normalize free-form labels (tags, usage contexts) into a set:
 * trimmed, lower-cased, empty strings removed.
 */
export function normalizeLabels(labels: Iterable<string>): Set<string> {
  const result = new Set<string>();
  for (const label of labels) {
    const normalized = label.trim().toLowerCase();
    if (normalized.length > 0) result.add(normalized);
  }
  return result;
}

// ============================================================================
// Similarity
// ============================================================================

/**
 * Compute Jaccard similarity between two sets.
 *
 * Formula: |A ∩ B| / |A ∪ B|
 *
 * Returns a value between 0 (no overlap) and 1 (identical sets).
 * Returns 0 if both sets are empty.
 */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;

  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }

  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/** Union of two sets as a new set */
export function union<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> {
  const result = new Set(a);
  for (const item of b) result.add(item);
  return result;
}
