/**
 * Read-only access to the SQLite event store.
 *
 * Each store belongs to one user; its tables are named after that user's id
 * with '-' and '_' removed, e.g. usr1234abcd_feed_gps.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  presenceKindSchema,
  userIdSchema,
  type PresenceRow,
} from '@presence-histogram/core';

export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

/**
 * Table suffixes whose created_at column is evidence the observer was running.
 */
export const ACTIVITY_TABLES = [
  'feed_avatar',
  'feed_gps',
  'feed_online_offline',
  'feed_status',
  'friend_log_history',
] as const;

export const PRESENCE_TABLE = 'feed_online_offline';

/**
 * Both input streams of one analysis run.
 */
export interface EventLog {
  activityTimestampsMs: number[];
  presenceRows: PresenceRow[];
}

const activityRowSchema = z.object({
  created_at: z.string(),
});

const presenceRowSchema = z.object({
  created_at: z.string(),
  user_id: z.string(),
  display_name: z.string(),
  type: z.string(),
});

/**
 * Opens an existing store without write access.
 */
export function openEventStore(path: string): Database.Database {
  return new Database(path, { readonly: true, fileMustExist: true });
}

/**
 * Derives the table prefix for a user.
 *
 * @throws StoreError if the result is not purely alphanumeric
 */
export function tablePrefix(userId: string): string {
  const prefix = userId.replace(/[-_]/g, '');
  if (!/^[A-Za-z0-9]+$/.test(prefix)) {
    throw new StoreError(`user id ${JSON.stringify(userId)} does not name a table prefix`);
  }
  return prefix;
}

/**
 * RFC 3339 instant with an explicit offset; anything else would be read in the
 * host's zone.
 */
const createdAtSchema = z.string().datetime({ offset: true });

function parseCreatedAt(createdAt: string): number {
  const result = createdAtSchema.safeParse(createdAt);
  if (!result.success) {
    throw new StoreError(`unparseable created_at: ${JSON.stringify(createdAt)}`);
  }
  return Date.parse(result.data);
}

/**
 * Reads every activity timestamp of the store, ascending.
 */
export function readActivityTimestamps(db: Database.Database, prefix: string): number[] {
  const sql =
    ACTIVITY_TABLES.map((table) => `select created_at from ${prefix}_${table}`).join(' union ') +
    ' order by created_at asc';

  return db
    .prepare(sql)
    .all()
    .map((row) => parseCreatedAt(activityRowSchema.parse(row).created_at));
}

/**
 * Reads online/offline rows in the order they were recorded.
 */
export function readPresenceRows(db: Database.Database, prefix: string): PresenceRow[] {
  const sql = `select created_at, user_id, display_name, type from ${prefix}_${PRESENCE_TABLE} order by id`;

  return db
    .prepare(sql)
    .all()
    .map((raw) => {
      const row = presenceRowSchema.parse(raw);
      const kind = presenceKindSchema.safeParse(row.type);
      if (!kind.success) {
        throw new StoreError(`unexpected presence event type: ${JSON.stringify(row.type)}`);
      }
      const userId = userIdSchema.safeParse(row.user_id);
      if (!userId.success) {
        throw new StoreError(`presence row for ${row.display_name} has an empty user id`);
      }
      return {
        tsMs: parseCreatedAt(row.created_at),
        userId: userId.data,
        displayName: row.display_name,
        kind: kind.data,
      };
    });
}

/**
 * Reads both streams inside one transaction so they describe the same snapshot.
 */
export function readEventLog(db: Database.Database, userId: string): EventLog {
  const prefix = tablePrefix(userId);
  const read = db.transaction(() => ({
    activityTimestampsMs: readActivityTimestamps(db, prefix),
    presenceRows: readPresenceRows(db, prefix),
  }));
  return read();
}
