import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { systemTimezone } from '@presence-histogram/core';
import { ConfigError, loadConfig, parseConfig, toAnalysisOptions } from './config.js';

const VALID = {
  userId: 'usr_1234-abcd',
  databasePath: 'store.sqlite3',
  runningDetectionThresholdMinutes: 10,
  bucketDurationMinutes: 15,
  normalize: true,
};

describe('parseConfig', () => {
  it('should resolve the database path against the base directory', () => {
    const config = parseConfig(VALID, '/srv/presence');
    expect(config.databasePath).toBe(resolve('/srv/presence', 'store.sqlite3'));
    expect(config.userId).toBe('usr_1234-abcd');
  });

  it('should report every invalid field by path', () => {
    const run = () =>
      parseConfig({ ...VALID, bucketDurationMinutes: 7, normalize: 'yes' }, '/srv');
    expect(run).toThrow(ConfigError);
    expect(run).toThrow(/bucketDurationMinutes: must evenly divide 1440/);
    expect(run).toThrow(/normalize: Expected boolean, received string/);
  });

  it('should reject a start time without an offset', () => {
    expect(() => parseConfig({ ...VALID, startTime: 'yesterday' }, '/srv')).toThrow(
      /startTime: /,
    );
  });

  it('should reject an unknown timezone', () => {
    expect(() => parseConfig({ ...VALID, timezone: 'Nowhere/Special' }, '/srv')).toThrow(
      /timezone: must be a valid IANA timezone/,
    );
  });
});

describe('toAnalysisOptions', () => {
  it('should map file fields onto analysis options with defaults', () => {
    const options = toAnalysisOptions(parseConfig(VALID, '/srv'));
    expect(options).toEqual({
      bucketMinutes: 15,
      runningThresholdMinutes: 10,
      timezone: systemTimezone(),
      minimumBucketActivations: 1,
      normalize: true,
      noDataReturnsZero: false,
    });
  });

  it('should carry filters and the configured timezone', () => {
    const options = toAnalysisOptions(
      parseConfig(
        {
          ...VALID,
          friendIds: ['usr_a'],
          startTime: '2024-01-01T00:00:00Z',
          minimumBucketActivations: 2,
          noDataReturnsZero: true,
          timezone: 'Europe/Berlin',
        },
        '/srv',
      ),
    );
    expect(options.allowedUserIds).toEqual(['usr_a']);
    expect(options.startTimeMs).toBe(1704067200000);
    expect(options.minimumBucketActivations).toBe(2);
    expect(options.noDataReturnsZero).toBe(true);
    expect(options.timezone).toBe('Europe/Berlin');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'presence-histogram-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read a JSON file and resolve paths beside it', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, JSON.stringify(VALID));
    expect(loadConfig(path).databasePath).toBe(join(dir, 'store.sqlite3'));
  });

  it('should throw ConfigError for a missing file', () => {
    expect(() => loadConfig(join(dir, 'absent.json'))).toThrow(
      /cannot read configuration file/,
    );
  });

  it('should throw ConfigError for malformed JSON', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, '{ not json');
    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow(/is not valid JSON/);
  });
});
