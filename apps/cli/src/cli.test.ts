import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { parseArgs, runReport } from './cli.js';
import { parseConfig } from './config.js';
import { ACTIVITY_TABLES } from './store.js';

describe('parseArgs', () => {
  it('should default to config.json', () => {
    expect(parseArgs([])).toEqual({ configPath: 'config.json', help: false });
  });

  it('should read --config and --help', () => {
    expect(parseArgs(['--config', 'other.json', '--help'])).toEqual({
      configPath: 'other.json',
      help: true,
    });
  });

  it('should require a path after --config', () => {
    expect(() => parseArgs(['--config'])).toThrow('--config requires a path');
    expect(() => parseArgs(['--config', ''])).toThrow('--config requires a path');
  });

  it('should reject unknown arguments', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown argument: --verbose');
  });
});

describe('runReport', () => {
  const PREFIX = 'usr1';
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    for (const table of ACTIVITY_TABLES) {
      db.exec(
        `create table ${PREFIX}_${table} (id integer primary key, created_at text, user_id text, display_name text, type text)`,
      );
    }
    const activity = db.prepare(`insert into ${PREFIX}_feed_gps (created_at) values (?)`);
    for (const t of ['10:00', '10:10', '10:20', '10:30']) {
      activity.run(`2024-01-01T${t}:00.000Z`);
    }
    const presence = db.prepare(
      `insert into ${PREFIX}_feed_online_offline (created_at, user_id, display_name, type) values (?, ?, ?, ?)`,
    );
    presence.run('2024-01-01T10:05:00.000Z', 'usr_a', 'Alice', 'Online');
    presence.run('2024-01-01T10:25:00.000Z', 'usr_a', 'Alice', 'Offline');
  });

  afterEach(() => {
    db.close();
  });

  it('should render the weekly table for the store', () => {
    const config = parseConfig(
      {
        userId: 'usr_1',
        databasePath: ':memory:',
        runningDetectionThresholdMinutes: 10,
        bucketDurationMinutes: 15,
        normalize: false,
        timezone: 'UTC',
      },
      '/srv',
    );

    const { text, stats } = runReport(db, config);
    const lines = text.split('\n');

    expect(lines[0]).toBe('bucket\tMon\tTue\tWed\tThu\tFri\tSat\tSun');
    // 96 buckets plus header, and the trailing newline leaves one empty entry
    expect(lines).toHaveLength(98);
    expect(lines[1 + 40]).toBe('10:00\t1\t\t\t\t\t\t');
    expect(lines[1 + 41]).toBe('10:15\t1\t\t\t\t\t\t');
    expect(lines[1 + 42]).toBe('10:30\t\t\t\t\t\t\t');

    expect(stats).toEqual({
      activityTimestamps: 6,
      uptimeWindows: 1,
      presenceIntervals: 1,
      clampedSpans: 1,
      droppedIntervals: 0,
    });
  });
});
