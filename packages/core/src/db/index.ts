/**
 * Database layer: client factory, schema and repositories
 */

export { and, desc, eq, sql } from 'drizzle-orm';
export * from './client';
export * from './migrate';
export * from './repositories';
export * from './schema';
