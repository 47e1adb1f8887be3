/**
 * Schema bootstrap
 *
 * Creates the tables on first start. Statements are idempotent.
 */

import { sql } from 'drizzle-orm';
import type { Database } from './client';

export async function initializeDatabase(db: Database): Promise<void> {
  await db.run(sql`
    CREATE TABLE IF NOT EXISTS incidents (
      incident_id TEXT PRIMARY KEY NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      task TEXT NOT NULL DEFAULT '',
      session_id TEXT NOT NULL DEFAULT '',
      full_log TEXT NOT NULL DEFAULT '',
      response TEXT NOT NULL DEFAULT '',
      tokens_used INTEGER NOT NULL DEFAULT 0,
      execution_time_ms INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      completed_at INTEGER
    )
  `);
  await db.run(sql`CREATE INDEX IF NOT EXISTS incidents_status_idx ON incidents (status)`);
}
