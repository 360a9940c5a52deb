#!/usr/bin/env node
import 'dotenv/config';
import {
  CliUsageError,
  formulasCommand,
  layoutCommand,
  metricsCommand,
  migrateCommand,
  parseLayoutType,
  rebuildCommand,
  reportCommand,
} from './cli-commands.js';

// ── ANSI helpers ────────────────────────────────────────────────────
const isTTY = process.stdout.isTTY ?? false;
const ansi = {
  reset: isTTY ? '\x1b[0m' : '', bold: isTTY ? '\x1b[1m' : '', dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '', red: isTTY ? '\x1b[31m' : '',
};
function c(color: keyof typeof ansi, text: string): string { return `${ansi[color]}${text}${ansi.reset}`; }

// ── Arg parsing ─────────────────────────────────────────────────────
const args = process.argv.slice(2);
const command = args[0]?.toLowerCase();

function getFlag(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 && idx + 1 < args.length ? args[idx + 1] : undefined;
}

function requireSnapshot(): string {
  const path = args[1];
  if (!path || path.startsWith('-')) throw new CliUsageError('<snapshot> path is required');
  return path;
}

function printHelp() {
  console.log(`
  ${c('bold', 'asset-graph')} ${c('dim', 'asset relationship graph snapshots')}

  ${c('cyan', 'Commands:')}
    ${c('bold', 'metrics')} <snapshot>                    Network metrics
    ${c('bold', 'report')} <snapshot>                     Markdown network report
    ${c('bold', 'formulas')} <snapshot>                   Financial formulas that apply to the assets
    ${c('bold', 'rebuild')} <snapshot> [--out file]       Re-infer relationships and save
    ${c('bold', 'layout')} <snapshot> [--type t]          2D positions (circular, grid, spring)
    ${c('bold', 'migrate')}                               Apply PostgreSQL migrations (PG_* env)
    ${c('bold', '--help')}                                Show this help

  ${c('cyan', 'Examples:')}
    ${c('dim', 'asset-graph metrics .asset-graph/graph-cache.json')}
    ${c('dim', 'asset-graph rebuild graph.json --out rebuilt.json')}
    ${c('dim', 'asset-graph layout graph.json --type grid')}
`);
}

// ── Main ────────────────────────────────────────────────────────────
async function main(): Promise<number> {
  if (!command || command === '--help' || command === '-h' || command === 'help') { printHelp(); return 0; }
  try {
    switch (command) {
      case 'metrics': console.log(await metricsCommand(requireSnapshot())); break;
      case 'report':  console.log(await reportCommand(requireSnapshot())); break;
      case 'formulas': console.log(await formulasCommand(requireSnapshot())); break;
      case 'rebuild': console.log(await rebuildCommand(requireSnapshot(), getFlag('--out'))); break;
      case 'layout':  console.log(await layoutCommand(requireSnapshot(), parseLayoutType(getFlag('--type')))); break;
      case 'migrate': console.log(await migrateCommand()); break;
      default:
        console.error(`${c('red', 'Error:')} Unknown command "${command}"\n`);
        printHelp();
        return 1;
    }
    return 0;
  } catch (err) {
    console.error(`${c('red', 'Error:')} ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

process.exitCode = await main();
