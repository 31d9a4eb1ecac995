#!/usr/bin/env ts-node
/**
 * explore-board.ts
 * ================
 *
 * Build the full reachable-state graph for a board configuration file and
 * print either a one-line summary or the state space as JSON.
 *
 * Usage (from repo root):
 *
 *   npx ts-node scripts/explore-board.ts boards/pinned-4x4.json
 *   npx ts-node scripts/explore-board.ts boards/pinned-4x4.json --json > graph.json
 *
 * Exit code:
 *   0  – graph built
 *   1  – bad arguments, unreadable or invalid configuration
 */

/* eslint-disable no-console */

import { BoardExplorerService } from '../src/node/services/BoardExplorerService';
import { logger } from '../src/node/utils/logger';
import { isBoardConfigError, toStateSpace, wrapKlotskiError } from '../src/shared/engine';

export interface CliArgs {
  configPath: string;
  json: boolean;
  progressInterval?: number;
}

function printUsage(): void {
  console.log(
    [
      'Usage: explore-board.ts <config.json> [--json] [--progress-interval <n>]',
      '',
      'Examples:',
      '  # Summary only',
      '  npx ts-node scripts/explore-board.ts boards/pinned-4x4.json',
      '',
      '  # Full state space on stdout, progress logged every 1000 states',
      '  npx ts-node scripts/explore-board.ts boards/pinned-4x4.json --json --progress-interval 1000',
    ].join('\n')
  );
}

export function parseArgs(argv: string[]): CliArgs | null {
  let configPath: string | undefined;
  let json = false;
  let progressInterval: number | undefined;

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (!raw.startsWith('--')) {
      if (configPath !== undefined) {
        console.error(`Unexpected argument: ${raw}`);
        return null;
      }
      configPath = raw;
      continue;
    }

    const [flag, valueMaybe] = raw.split('=', 2);
    const next = argv[i + 1];
    const value = valueMaybe ?? (next && !next.startsWith('--') ? next : undefined);

    switch (flag) {
      case '--json':
        json = true;
        break;
      case '--progress-interval': {
        const parsed = value !== undefined ? Number(value) : NaN;
        if (!Number.isInteger(parsed) || parsed < 0) {
          console.error('--progress-interval expects a non-negative integer');
          return null;
        }
        progressInterval = parsed;
        if (valueMaybe === undefined && next === value) {
          i += 1;
        }
        break;
      }
      default:
        console.error(`Unknown flag: ${flag}`);
        return null;
    }
  }

  if (!configPath) {
    console.error('Missing board configuration path');
    return null;
  }

  return { configPath, json, ...(progressInterval !== undefined ? { progressInterval } : {}) };
}

/**
 * Explore one configuration file and print the result.
 *
 * @returns the process exit code
 */
export function run(args: CliArgs): number {
  const explorer = new BoardExplorerService(
    args.progressInterval !== undefined ? { progressInterval: args.progressInterval } : {}
  );

  try {
    const boardConfig = explorer.loadConfigFile(args.configPath);
    const report = explorer.explore(boardConfig, args.configPath);

    if (args.json) {
      console.log(JSON.stringify(toStateSpace(report.root)));
    } else {
      const { nodeCount, edgeCount, winningNodeCount } = report.summary;
      console.log(
        `[explore-board] ${args.configPath}: ${nodeCount} state(s), ${edgeCount} edge(s), ` +
          `${winningNodeCount} winning state(s) in ${report.durationMs}ms`
      );
    }
    return 0;
  } catch (err) {
    if (isBoardConfigError(err)) {
      console.error(`[explore-board] ${err.message}:`);
      for (const message of err.errors) {
        console.error(`  - ${message}`);
      }
      if (typeof err.context.cause === 'string') {
        console.error(`  - ${err.context.cause}`);
      }
    } else {
      logger.error('Exploration failed', { error: wrapKlotskiError(err, 'explore-board').toJSON() });
    }
    return 1;
  }
}

function main(): void {
  const args = parseArgs(process.argv);
  if (!args) {
    printUsage();
    process.exitCode = 1;
    return;
  }
  process.exitCode = run(args);
}

if (require.main === module) {
  main();
}
