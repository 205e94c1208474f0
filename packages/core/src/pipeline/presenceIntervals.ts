import { IntegrityError } from '../domain/errors.js';
import type { PresenceInterval, PresenceRow, UserId } from '../domain/types.js';
import { createTimeSpan, isNegativeOrZero } from '../time/timeSpan.js';

/**
 * Row filters applied before presence rows are paired into intervals.
 */
export interface PresenceFilter {
  /** Users to include; undefined includes every user */
  allowedUserIds?: ReadonlySet<UserId>;
  /** Rows strictly before this instant are ignored */
  startTimeMs?: number;
}

/**
 * Checks whether a user passes the allowlist. An unset allowlist admits everyone.
 */
export function isUserAllowed(
  userId: UserId,
  allowedUserIds: ReadonlySet<UserId> | undefined,
): boolean {
  return allowedUserIds === undefined || allowedUserIds.has(userId);
}

/**
 * Pairs each user's online and offline rows into presence intervals.
 *
 * Rows must be in the order they were recorded. An online row replaces any
 * earlier unmatched online row for the same user, and an offline row with no
 * matching online row is ignored.
 *
 * @throws IntegrityError if an offline row is not later than its online row
 */
export function* collectPresenceIntervals(
  rows: Iterable<PresenceRow>,
  filter: PresenceFilter = {},
): Generator<PresenceInterval, void, undefined> {
  const onlineSince = new Map<UserId, number>();

  for (const row of rows) {
    if (filter.startTimeMs !== undefined && row.tsMs < filter.startTimeMs) {
      continue;
    }
    if (!isUserAllowed(row.userId, filter.allowedUserIds)) {
      continue;
    }

    switch (row.kind) {
      case 'online':
        onlineSince.set(row.userId, row.tsMs);
        break;

      case 'offline': {
        const onlineMs = onlineSince.get(row.userId);
        if (onlineMs === undefined) {
          break;
        }
        onlineSince.delete(row.userId);

        const span = createTimeSpan(onlineMs, row.tsMs);
        if (isNegativeOrZero(span)) {
          throw new IntegrityError(
            'negativePresenceInterval',
            `got a non-positive duration for ${row.displayName}`,
          );
        }
        yield { userId: row.userId, displayName: row.displayName, span };
        break;
      }

      default: {
        const _exhaustive: never = row.kind;
        throw new Error(`Unknown presence kind: ${String(_exhaustive)}`);
      }
    }
  }
}
