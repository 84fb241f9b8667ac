/**
 * CLI command: `pkg-advisor history`
 *
 * Lists stored recommendation rows, newest first.
 *
 * @module cli/commands/history
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { createStores } from '../../index.js';
import { readAdvisorConfig, AdvisorConfigError } from '../../config/reader.js';
import { RECOMMENDATION_SOURCES } from '../../types/recommendation.js';
import type { RecommendationSource } from '../../types/recommendation.js';
import type { AdvisorConfig } from '../../config/schema.js';
import { formatHistory } from '../../reports/recommendation-formatter.js';
import { flagValue, parseConfigPath, parsePositiveIntFlag } from '../flags.js';

function isRecommendationSource(value: string): value is RecommendationSource {
  return RECOMMENDATION_SOURCES.some(source => source === value);
}

/**
 * Execute the `history` CLI command.
 *
 * @param args - CLI arguments after `history`
 * @returns Exit code (0 = ok, 1 = invalid arguments or config)
 */
export async function historyCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const jsonMode = args.includes('--json');

  const limit = parsePositiveIntFlag(args, 'limit');
  if (limit === null) {
    p.log.error('--limit must be a positive integer');
    return 1;
  }

  const sourceArg = flagValue(args, 'source');
  let source: RecommendationSource | undefined;
  if (sourceArg !== undefined) {
    if (!isRecommendationSource(sourceArg)) {
      p.log.error(`--source must be one of: ${RECOMMENDATION_SOURCES.join(', ')}`);
      return 1;
    }
    source = sourceArg;
  }

  let config: AdvisorConfig;
  try {
    config = await readAdvisorConfig(parseConfigPath(args));
  } catch (err) {
    if (err instanceof AdvisorConfigError) {
      p.log.error(err.message);
      return 1;
    }
    throw err;
  }

  const { store } = createStores(config);
  const rows = await store.getRecommendationHistory({ limit, source });

  if (jsonMode) {
    console.log(JSON.stringify(rows, null, 2));
    return 0;
  }

  p.intro(pc.bgCyan(pc.black(' Recommendation History ')));
  p.log.message(formatHistory(rows));
  p.outro(`${rows.length} row(s)`);
  return 0;
}

function showHelp(): void {
  console.log(`
pkg-advisor history - Show stored recommendations

Usage:
  pkg-advisor history [options]

Options:
  --limit=N         Maximum rows (default 10)
  --source=SOURCE   Filter by source: similarity, ai, similarity+ai
  --json            Print rows as JSON
  --config=PATH     Config file (default .pkg-advisor/config.json)
  --help, -h        Show this help
`);
}
