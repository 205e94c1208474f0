#!/usr/bin/env tsx

import { HELP, parseArgs, runReport } from './cli.js';
import { loadConfig } from './config.js';
import * as log from './log.js';
import { openEventStore } from './store.js';

function main(): void {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    return;
  }

  const config = loadConfig(args.configPath);
  const db = openEventStore(config.databasePath);

  try {
    const { text, stats } = runReport(db, config);
    log.info(
      `${stats.activityTimestamps} activity timestamps, ${stats.uptimeWindows} uptime windows, ` +
        `${stats.presenceIntervals} presence intervals (${stats.droppedIntervals} dropped, ` +
        `${stats.clampedSpans} spans counted)`,
    );
    if (stats.uptimeWindows === 0) {
      log.warn('observer uptime could not be established; every presence interval was dropped');
    }
    process.stdout.write(text);
  } finally {
    db.close();
  }
}

try {
  main();
} catch (err) {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
