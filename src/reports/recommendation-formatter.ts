/**
 * Pure rendering functions for recommendation output.
 *
 * - formatRecommendations: one run, numbered rows plus a diagnostics footer
 * - formatDiagnostics: degraded-mode notes only
 * - formatHistory: stored rows, newest first
 */

import pc from 'picocolors';
import type {
  Recommendation,
  RecommendationCategory,
  RecommendationResult,
} from '../types/recommendation.js';

export interface FormatOptions {
  /** Include score breakdown per row and skipped-backend notes */
  verbose?: boolean;
}

/**
 * Color code for a category. Returns a code, caller applies picocolors.
 */
export function categoryColorCode(category: RecommendationCategory): 'green' | 'cyan' | 'white' {
  if (category === 'hybrid') return 'green';
  if (category === 'ai') return 'cyan';
  return 'white';
}

function colorize(category: RecommendationCategory, text: string): string {
  return pc[categoryColorCode(category)](text);
}

function formatRow(rec: Recommendation, verbose: boolean): string[] {
  const lines = [
    `${String(rec.rank).padStart(2)}. ${pc.bold(rec.packageName)}  ${rec.score.toFixed(2)}  ${colorize(rec.category, `[${rec.category}]`)}`,
    `    ${pc.dim(rec.reason)}`,
  ];

  if (verbose) {
    const parts: string[] = [];
    const m = rec.metadata;
    if (m.similarityScore !== undefined && m.similarityContribution !== undefined) {
      parts.push(`similarity ${m.similarityScore.toFixed(2)} -> ${m.similarityContribution.toFixed(2)}`);
    }
    if (m.aiConfidence !== undefined && m.aiContribution !== undefined) {
      parts.push(`ai ${m.aiConfidence.toFixed(2)} -> ${m.aiContribution.toFixed(2)}`);
    }
    parts.push(`uncapped ${m.uncappedScore.toFixed(2)}`);
    lines.push(`    ${pc.dim(parts.join(' | '))}`);
  }

  return lines;
}

/**
 * Notes describing how the run was degraded. Empty when it was not.
 */
export function formatDiagnostics(result: RecommendationResult, options: FormatOptions = {}): string[] {
  const { diagnostics, persistence } = result;
  const notes: string[] = [];

  if (diagnostics.backendTimedOut) {
    notes.push(pc.yellow('Suggestion backend timed out, showing similarity results only.'));
  }
  if (diagnostics.backendError !== undefined) {
    notes.push(pc.yellow(`Suggestion backend failed: ${diagnostics.backendError}`));
  }
  if (diagnostics.backendSkipped && options.verbose) {
    notes.push(pc.dim('Suggestion backend skipped.'));
  }
  if (diagnostics.droppedAiEntries > 0) {
    notes.push(pc.yellow(`Dropped ${diagnostics.droppedAiEntries} unusable suggestion(s).`));
  }
  if (diagnostics.droppedInputRecords > 0) {
    notes.push(pc.yellow(`Excluded ${diagnostics.droppedInputRecords} unusable input record(s).`));
  }
  if (diagnostics.repairedInputRecords > 0) {
    notes.push(pc.yellow(`Repaired ${diagnostics.repairedInputRecords} input record(s) with invalid fields.`));
  }
  if (!persistence.ok) {
    notes.push(pc.red(`Recommendations were not saved: ${persistence.error}`));
  }

  return notes;
}

/**
 * Render one recommendation run.
 */
export function formatRecommendations(result: RecommendationResult, options: FormatOptions = {}): string {
  const verbose = options.verbose ?? false;
  const lines: string[] = [pc.bold('Recommendations')];

  if (result.fused.length === 0) {
    lines.push(pc.dim('No recommendations.'));
  } else {
    for (const rec of result.fused) {
      lines.push(...formatRow(rec, verbose));
    }
  }

  const notes = formatDiagnostics(result, options);
  if (notes.length > 0) {
    lines.push('');
    lines.push(...notes);
  }

  return lines.join('\n');
}

/**
 * Render stored recommendation rows, one line each.
 */
export function formatHistory(rows: readonly Recommendation[]): string {
  if (rows.length === 0) {
    return pc.dim('No recommendation history.');
  }
  return rows
    .map(rec =>
      `${pc.dim(rec.timestamp)}  ${pc.bold(rec.packageName)}  ${rec.score.toFixed(2)}  ${colorize(rec.category, rec.source)}`,
    )
    .join('\n');
}
