/**
 * App-level constants for triage
 *
 * Centralized configuration values that can be easily tweaked.
 */

/**
 * Daemon Constants
 */
export const DAEMON = {
  /**
   * Default daemon port
   */
  DEFAULT_PORT: 3030,

  /**
   * Default daemon host
   */
  DEFAULT_HOST: 'localhost',
} as const;

/**
 * Worker Connection Constants
 */
export const WORKER = {
  /**
   * Socket.io namespace the worker connects to
   */
  NAMESPACE: '/worker',

  /**
   * Event name carrying every protocol envelope, in both directions
   */
  MESSAGE_EVENT: 'message',

  /**
   * Heartbeat interval in milliseconds
   */
  HEARTBEAT_INTERVAL_MS: 30_000, // 30 seconds

  /**
   * Delay between reconnect attempts in milliseconds
   */
  RECONNECT_DELAY_MS: 5_000, // 5 seconds

  /**
   * How long a single connect attempt may take
   */
  CONNECT_TIMEOUT_MS: 10_000, // 10 seconds

  /**
   * How long a write waits for the peer to acknowledge a frame
   */
  ACK_TIMEOUT_MS: 10_000, // 10 seconds
} as const;

/**
 * Agent Execution Constants
 */
export const EXECUTION = {
  /**
   * Agent binary looked up on PATH
   */
  CODEX_BIN: 'codex',

  /**
   * Upper bound for an in-process (fallback) run
   */
  FALLBACK_TIMEOUT_MS: 30 * 60 * 1000, // 30 minutes

  /**
   * Grace period between SIGTERM and SIGKILL when cancelling a run
   */
  KILL_GRACE_MS: 5_000,

  /**
   * Environment variable prefix passed through to the agent unchanged
   */
  ENV_PREFIX: 'CODEX_',

  /**
   * Per-incident workspace root (relative to the triage home)
   */
  WORKSPACE_BASE_PATH: 'workspaces',
} as const;

/**
 * Database Constants
 */
export const DATABASE = {
  /**
   * Default local database URL
   */
  DEFAULT_URL: 'file:~/.triage/triage.db',
} as const;
