import type Database from 'better-sqlite3';
import {
  analyzePresence,
  projectGrid,
  type AnalysisStats,
} from '@presence-histogram/core';
import { DEFAULT_CONFIG_PATH, toAnalysisOptions, type ConfigFile } from './config.js';
import { renderReport } from './render.js';
import { readEventLog } from './store.js';

export const HELP = `presence-histogram: weekly presence histogram from an activity event store

USAGE
  presence-histogram [options]

OPTIONS
  --config <path>   Configuration file (default: ${DEFAULT_CONFIG_PATH})
  --help            Show this help

OUTPUT
  Tab-separated table on stdout: one row per time-of-day bucket, one column
  per weekday (Mon..Sun). Diagnostics go to stderr.
`;

export interface CliArgs {
  configPath: string;
  help: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    configPath: DEFAULT_CONFIG_PATH,
    help: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--config') {
      const path = args[i + 1];
      if (i + 1 >= args.length || path === '') {
        throw new Error('--config requires a path');
      }
      result.configPath = path;
      i++;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }

    i++;
  }

  return result;
}

export interface ReportOutput {
  text: string;
  stats: AnalysisStats;
}

/**
 * Reads the store, runs the analysis and renders the report.
 */
export function runReport(db: Database.Database, config: ConfigFile): ReportOutput {
  const options = toAnalysisOptions(config);
  const { activityTimestampsMs, presenceRows } = readEventLog(db, config.userId);

  const { grid, stats } = analyzePresence({
    activityTimestampsMs,
    presenceRows,
    options,
  });

  return {
    text: renderReport(projectGrid(grid, options)),
    stats,
  };
}
