/**
 * Triage Configuration Module
 *
 * Exports configuration loading, constants and the agent environment policy.
 */

export * from './config-manager';
export * from './constants';
export * from './env-allowlist';
export * from './types';
