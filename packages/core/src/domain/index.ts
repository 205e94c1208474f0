/**
 * Domain module public exports.
 * This module contains the presence domain types, errors and validation schemas.
 */

// Types
export type {
  UserId,
  UptimeEventKind,
  UptimeEvent,
  PresenceKind,
  PresenceRow,
  PresenceInterval,
} from './types.js';

export { createUserId, startEvent, stopEvent } from './types.js';

// Errors
export type { IntegrityErrorCode } from './errors.js';
export { IntegrityError } from './errors.js';

// Validation schemas
export type { AnalysisOptions, AnalysisOptionsInput } from './validation.js';
export {
  userIdSchema,
  presenceKindSchema,
  bucketMinutesSchema,
  timezoneSchema,
  analysisOptionsSchema,
} from './validation.js';
