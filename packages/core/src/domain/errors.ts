/**
 * Fatal precondition failures.
 *
 * An IntegrityError means the input was not sorted or the engine itself is
 * inconsistent. The run cannot continue and no partial histogram is meaningful.
 * Recoverable data-quality problems never throw; they are reported through
 * return values (see ClampResult).
 */

export type IntegrityErrorCode =
  /** Activity timestamps were not in ascending order */
  | 'unsortedTimestamps'
  /** An offline event came before its matching online event */
  | 'negativePresenceInterval'
  /** An uptime timeline does not alternate start/stop */
  | 'brokenTimeline'
  /** Clamping produced a span with stop <= start */
  | 'nonPositiveClampedSpan'
  /** A bucket holds presence counts but no activity dates */
  | 'countWithoutSample';

export class IntegrityError extends Error {
  readonly code: IntegrityErrorCode;

  constructor(code: IntegrityErrorCode, message: string) {
    super(message);
    this.name = 'IntegrityError';
    this.code = code;
  }
}
