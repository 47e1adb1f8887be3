/**
 * LibSQL Client Factory
 *
 * Creates and configures LibSQL database clients for Drizzle ORM.
 * Supports local file-based SQLite, in-memory databases (tests) and remote
 * libSQL endpoints.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Client, Config } from '@libsql/client';
import { createClient } from '@libsql/client';
import type { LibSQLDatabase } from 'drizzle-orm/libsql';
import { drizzle } from 'drizzle-orm/libsql';
import { getErrorMessage, TriageError } from '../utils/errors';
import { expandPath, extractDbFilePath, isLocalDbUrl } from '../utils/path';
import { initializeDatabase } from './migrate';
import * as schema from './schema';

/**
 * Database configuration options
 */
export interface DbConfig {
  /**
   * Database URL
   * - Local file: 'file:~/.triage/triage.db' or 'file:/absolute/path/triage.db'
   * - In-memory: ':memory:'
   * - Remote: 'libsql://your-db.example.com'
   */
  url: string;

  /**
   * Auth token (remote databases only)
   */
  authToken?: string;
}

/**
 * Error thrown when database connection fails
 */
export class DatabaseConnectionError extends TriageError {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message, 'DATABASE_CONNECTION');
  }
}

/**
 * Type alias for Drizzle database instance
 */
export type Database = LibSQLDatabase<typeof schema>;

function createLibSQLClient(config: DbConfig): Client {
  try {
    const clientConfig: Config = { url: expandPath(config.url) };
    if (config.authToken) {
      clientConfig.authToken = config.authToken;
    }
    return createClient(clientConfig);
  } catch (error) {
    throw new DatabaseConnectionError(
      `Failed to create LibSQL client: ${getErrorMessage(error)}`,
      error
    );
  }
}

/**
 * Configure SQLite pragmas for concurrent access
 * - WAL mode allows readers and writers to coexist
 * - Busy timeout retries locked operations instead of failing immediately
 */
async function configureSQLitePragmas(client: Client): Promise<void> {
  try {
    await client.execute('PRAGMA journal_mode = WAL');
    await client.execute('PRAGMA busy_timeout = 5000');
    console.log('✅ SQLite pragmas configured (WAL, busy timeout 5s)');
  } catch (error) {
    console.warn('⚠️  Failed to configure SQLite pragmas:', error);
  }
}

/**
 * Create a ready-to-use database: parent directory created for local files,
 * pragmas applied and schema initialized.
 *
 * @example
 * ```typescript
 * const db = await createDatabaseAsync({ url: 'file:~/.triage/triage.db' });
 * const incidents = new IncidentRepository(db);
 * ```
 */
export async function createDatabaseAsync(config: DbConfig): Promise<Database> {
  if (isLocalDbUrl(config.url)) {
    await mkdir(dirname(extractDbFilePath(config.url)), { recursive: true });
  }

  const client = createLibSQLClient(config);
  const db = drizzle(client, { schema });

  if (isLocalDbUrl(config.url)) {
    await configureSQLitePragmas(client);
  }
  await initializeDatabase(db);

  return db;
}
