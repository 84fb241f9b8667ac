/**
 * CLI command: `pkg-advisor recommend "<workflow>"`
 *
 * Runs one recommendation pass and prints the ranked list. A degraded run
 * (backend timeout, dropped entries, unsaved results) still exits 0 and is
 * reported in the footer.
 *
 * Exit codes:
 * - 0: Recommendations produced (possibly empty or degraded)
 * - 1: Invalid arguments, invalid config, or no catalog
 *
 * @module cli/commands/recommend
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { createAdvisor } from '../../index.js';
import { readAdvisorConfig, AdvisorConfigError } from '../../config/reader.js';
import { parseConfigPath, parsePositiveIntFlag } from '../flags.js';
import { CandidatePoolMissingError } from '../../fusion/recommendation-engine.js';
import { formatRecommendations } from '../../reports/recommendation-formatter.js';
import type { AdvisorConfig } from '../../config/schema.js';
import type { RecommendationResult } from '../../types/recommendation.js';

/**
 * Execute the `recommend` CLI command.
 *
 * @param args - CLI arguments after `recommend`
 * @returns Exit code
 */
export async function recommendCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const jsonMode = args.includes('--json');
  const verbose = args.includes('--verbose');
  const offline = args.includes('--offline');
  const workflow = args.filter(a => !a.startsWith('-')).join(' ');

  const limit = parsePositiveIntFlag(args, 'limit');
  if (limit === null) {
    p.log.error('--limit must be a positive integer');
    return 1;
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

  const advisor = createAdvisor({ config, offline });

  let result: RecommendationResult;
  try {
    result = await advisor.engine.getRecommendations(workflow, { limit });
  } catch (err) {
    if (err instanceof CandidatePoolMissingError) {
      p.log.error(`No package catalog found at ${advisor.catalogPath}`);
      return 1;
    }
    throw err;
  }

  if (jsonMode) {
    console.log(JSON.stringify(result, null, 2));
    return 0;
  }

  p.intro(pc.bgCyan(pc.black(' pkg-advisor ')));
  if (verbose) {
    p.log.info(`Suggestion backend: ${advisor.backendName}`);
  }
  p.log.message(formatRecommendations(result, { verbose }));
  p.outro(result.persistence.ok
    ? `Saved run ${pc.dim(result.runId)}`
    : pc.yellow('Run not saved'));

  return 0;
}

function showHelp(): void {
  console.log(`
pkg-advisor recommend - Recommend packages for a workflow

Usage:
  pkg-advisor recommend "<workflow description>" [options]

Options:
  --limit=N       Maximum recommendations (default from config, 10)
  --json          Print the full result as JSON
  --verbose       Show score breakdowns and backend details
  --offline       Use catalog suggestions instead of the LLM backend
  --config=PATH   Config file (default .pkg-advisor/config.json)
  --help, -h      Show this help

Examples:
  pkg-advisor recommend "analyse sales data in notebooks"
  pkg-advisor recommend "serve a REST API" --limit=5 --offline
`);
}
