/**
 * @triage/core - Shared core functionality for triage
 *
 * Consolidates types, wire protocol, config, the Codex executor and the
 * database layer.
 */

export * from './config';
export * from './db';
export * from './protocol';
export * from './tools/codex';
export * from './types';
export * from './utils/errors';
export * from './utils/format';
export * from './utils/logger';
export * from './utils/path';
