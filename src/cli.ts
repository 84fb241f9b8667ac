#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { recommendCommand } from './cli/commands/recommend.js';
import { historyCommand } from './cli/commands/history.js';
import { configCommand } from './cli/commands/config.js';

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js      ${process.version}`);
  console.log(`Platform     ${process.platform} ${process.arch}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  switch (command) {
    case 'recommend':
    case 'rec':
    case 'r': {
      process.exitCode = await recommendCommand(args.slice(1));
      break;
    }

    case 'history':
    case 'h': {
      process.exitCode = await historyCommand(args.slice(1));
      break;
    }

    case 'config':
    case 'cfg': {
      process.exitCode = await configCommand(args.slice(1));
      break;
    }

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp();
      break;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      process.exitCode = 1;
  }
}

function showHelp() {
  console.log(`
pkg-advisor - Package recommendations from installed packages, usage and your workflow

Usage:
  pkg-advisor <command> [options]

Commands:
  recommend, rec, r   Recommend packages for a described workflow
  history, h          Show stored recommendations
  config, cfg         Show the effective configuration
  help                Show this help

Options:
  --version, -V       Show version information

Examples:
  pkg-advisor recommend "analyse sales data in notebooks"
  pkg-advisor r "serve a REST API" --limit=5 --offline --verbose
  pkg-advisor history --source=ai --limit=20
  pkg-advisor config --json

Data:
  Everything lives under .pkg-advisor/ (override with storage.data_dir):
    config.json              Configuration (all fields optional)
    catalog.json             Candidate packages
    packages.json            Known packages; installed ones carry installedAt
    usage-patterns.json      Usage frequency, last use and contexts
    installations.jsonl      Install and uninstall outcomes
    recommendations.jsonl    Every recommendation run, append-only

  Set ANTHROPIC_API_KEY to get workflow suggestions from the LLM backend;
  without it (or with --offline) suggestions come from the catalog.
`);
}

main().catch((err) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
