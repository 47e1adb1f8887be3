/**
 * Repository Exports
 */

export * from './incidents';
