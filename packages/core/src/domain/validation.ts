/**
 * Zod validation schemas for analysis options and raw event-source values.
 */

import { z } from 'zod';
import { MINUTES_PER_DAY } from '../time/constants.js';
import { isValidTimezone } from '../time/bucket.js';
import { createUserId, type PresenceKind } from './types.js';

/**
 * Schema for UserId (non-empty string).
 */
export const userIdSchema = z.string().min(1).transform((value) => createUserId(value));

/**
 * Schema for the presence kind as stored by the event source ("Online" / "Offline").
 */
export const presenceKindSchema = z
  .enum(['Online', 'Offline'])
  .transform((value): PresenceKind => (value === 'Online' ? 'online' : 'offline'));

/**
 * Schema for the bucket width: a positive integer number of minutes dividing a day.
 */
export const bucketMinutesSchema = z
  .number()
  .int()
  .positive()
  .refine((minutes) => MINUTES_PER_DAY % minutes === 0, {
    message: `must evenly divide ${MINUTES_PER_DAY}`,
  });

/**
 * Schema for an IANA timezone name understood by Intl.
 */
export const timezoneSchema = z.string().refine(isValidTimezone, {
  message: 'must be a valid IANA timezone',
});

/**
 * Schema for the options the analysis pipeline consumes.
 */
export const analysisOptionsSchema = z.object({
  bucketMinutes: bucketMinutesSchema,
  runningThresholdMinutes: z.number().nonnegative(),
  timezone: timezoneSchema,
  /** Users to include; when absent every user is included */
  allowedUserIds: z.array(userIdSchema).optional(),
  /** Presence rows strictly before this instant are ignored */
  startTimeMs: z.number().optional(),
  minimumBucketActivations: z.number().int().nonnegative().default(1),
  normalize: z.boolean().default(false),
  noDataReturnsZero: z.boolean().default(false),
});

export type AnalysisOptionsInput = z.input<typeof analysisOptionsSchema>;

export type AnalysisOptions = z.output<typeof analysisOptionsSchema>;
