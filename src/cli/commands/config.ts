/**
 * CLI command: `pkg-advisor config`
 *
 * Prints the effective configuration: the config file merged over defaults.
 *
 * Exit codes:
 * - 0: Config is valid (or absent, meaning defaults)
 * - 1: Config file has invalid JSON or values
 *
 * @module cli/commands/config
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readAdvisorConfig, AdvisorConfigError } from '../../config/reader.js';
import type { AdvisorConfig } from '../../config/schema.js';
import { parseConfigPath } from '../flags.js';

/**
 * Flatten a config into `section.key = value` lines in schema order.
 */
export function formatConfig(config: AdvisorConfig): string[] {
  const lines: string[] = [];
  for (const [section, values] of Object.entries(config)) {
    for (const [key, value] of Object.entries(values)) {
      lines.push(`${section}.${key} = ${JSON.stringify(value)}`);
    }
  }
  return lines;
}

/**
 * Execute the `config` CLI command.
 *
 * @param args - CLI arguments after `config`
 * @returns Exit code
 */
export async function configCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const jsonMode = args.includes('--json');
  const configPath = parseConfigPath(args);

  let config: AdvisorConfig;
  try {
    config = await readAdvisorConfig(configPath);
  } catch (err) {
    if (err instanceof AdvisorConfigError) {
      if (jsonMode) {
        console.log(JSON.stringify({ valid: false, field: err.field ?? null, message: err.message }, null, 2));
      } else {
        p.log.error(err.message);
      }
      return 1;
    }
    throw err;
  }

  if (jsonMode) {
    console.log(JSON.stringify(config, null, 2));
    return 0;
  }

  p.intro(pc.bgCyan(pc.black(' Effective Config ')));
  p.log.message(`Source: ${configPath}`);
  p.log.message(formatConfig(config).join('\n'));
  p.outro('Done');
  return 0;
}

function showHelp(): void {
  console.log(`
pkg-advisor config - Show the effective configuration

Usage:
  pkg-advisor config [options]

Options:
  --json          Print the config as JSON
  --config=PATH   Config file (default .pkg-advisor/config.json)
  --help, -h      Show this help
`);
}
