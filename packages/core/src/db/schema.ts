/**
 * Drizzle schema
 *
 * Incidents are stored flat: the columns are exactly what the dispatch layer
 * reads and writes, so no JSON data blob is needed.
 */

import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const incidents = sqliteTable('incidents', {
  incident_id: text('incident_id').primaryKey(),
  status: text('status', { enum: ['pending', 'running', 'completed', 'failed'] })
    .notNull()
    .default('pending'),
  task: text('task').notNull().default(''),
  session_id: text('session_id').notNull().default(''),
  full_log: text('full_log').notNull().default(''),
  response: text('response').notNull().default(''),
  tokens_used: integer('tokens_used').notNull().default(0),
  execution_time_ms: integer('execution_time_ms').notNull().default(0),
  created_at: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updated_at: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  completed_at: integer('completed_at', { mode: 'timestamp_ms' }),
});

export type IncidentRow = typeof incidents.$inferSelect;
export type IncidentInsert = typeof incidents.$inferInsert;
