/**
 * Configuration file loading.
 *
 * The file is JSON, validated with zod and then turned into the core's
 * analysis options.
 */

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import {
  analysisOptionsSchema,
  bucketMinutesSchema,
  systemTimezone,
  timezoneSchema,
  type AnalysisOptions,
} from '@presence-histogram/core';

export const DEFAULT_CONFIG_PATH = 'config.json';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Schema for the configuration file.
 */
export const configFileSchema = z.object({
  /** Owner of the event store; selects its tables */
  userId: z.string().min(1),
  /** SQLite database path, relative to the configuration file */
  databasePath: z.string().min(1),
  /** Only these users are analyzed; all users when absent */
  friendIds: z.array(z.string().min(1)).optional(),
  /** Largest gap between activity timestamps still treated as observer uptime */
  runningDetectionThresholdMinutes: z.number().nonnegative(),
  bucketDurationMinutes: bucketMinutesSchema,
  normalize: z.boolean(),
  /** RFC 3339 instant; presence rows before it are ignored */
  startTime: z.string().datetime({ offset: true }).optional(),
  minimumBucketActivations: z.number().int().nonnegative().optional(),
  noDataReturnsZero: z.boolean().optional(),
  /** IANA timezone buckets are read in; the host's zone when absent */
  timezone: timezoneSchema.optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates a parsed configuration object.
 *
 * @param baseDir - Directory relative database paths are resolved against
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(raw: unknown, baseDir: string): ConfigFile {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(result.error)}`);
  }
  return {
    ...result.data,
    databasePath: resolve(baseDir, result.data.databasePath),
  };
}

/**
 * Reads and validates the configuration file.
 *
 * @throws ConfigError if the file is missing, is not JSON, or fails validation
 */
export function loadConfig(path: string): ConfigFile {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError(
      `cannot read configuration file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `configuration file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseConfig(raw, dirname(resolve(path)));
}

/**
 * Maps configuration file fields onto the core's analysis options.
 */
export function toAnalysisOptions(config: ConfigFile): AnalysisOptions {
  return analysisOptionsSchema.parse({
    bucketMinutes: config.bucketDurationMinutes,
    runningThresholdMinutes: config.runningDetectionThresholdMinutes,
    timezone: config.timezone ?? systemTimezone(),
    allowedUserIds: config.friendIds,
    startTimeMs: config.startTime === undefined ? undefined : Date.parse(config.startTime),
    minimumBucketActivations: config.minimumBucketActivations,
    normalize: config.normalize,
    noDataReturnsZero: config.noDataReturnsZero,
  });
}
