/**
 * Console monkey-patch for environment-aware logging.
 *
 * Patches global console methods to respect the LOG_LEVEL environment
 * variable, so every console.log/debug call in the daemon and the worker
 * follows the configured level without code changes.
 *
 * Respects LOG_LEVEL or DEBUG environment variables:
 * - LOG_LEVEL=debug: Show all logs (debug, info, warn, error)
 * - LOG_LEVEL=info: Show info, warn, error (default in production)
 * - LOG_LEVEL=warn: Show warn, error
 * - LOG_LEVEL=error: Show error only
 * - DEBUG=triage:* or DEBUG=*: Enable debug logs
 *
 * Call patchConsole() once at process startup.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get current log level from environment
 */
export function getCurrentLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const logLevel = env.LOG_LEVEL?.toLowerCase();
  if (logLevel && isLogLevel(logLevel)) {
    return logLevel;
  }

  // DEBUG=* or DEBUG=triage:*
  if (env.DEBUG) {
    const debug = env.DEBUG;
    if (debug === '*' || debug.includes('triage')) {
      return 'debug';
    }
  }

  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

interface ConsoleMethods {
  debug: typeof console.debug;
  log: typeof console.log;
  info: typeof console.info;
  warn: typeof console.warn;
  error: typeof console.error;
}

let originalMethods: ConsoleMethods | undefined;

/**
 * Patch global console methods to respect log levels.
 *
 * Calling it again re-reads the level from the environment.
 */
export function patchConsole(level: LogLevel = getCurrentLogLevel()): void {
  const originals = originalMethods ?? {
    debug: console.debug,
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };
  originalMethods = originals;

  const shouldLog = (target: LogLevel) => LOG_LEVELS[target] >= LOG_LEVELS[level];

  console.debug = (...args: unknown[]) => {
    if (shouldLog('debug')) {
      originals.debug(...args);
    }
  };

  // Treat console.log as debug level (most verbose)
  console.log = (...args: unknown[]) => {
    if (shouldLog('debug')) {
      originals.log(...args);
    }
  };

  console.info = (...args: unknown[]) => {
    if (shouldLog('info')) {
      originals.info(...args);
    }
  };

  console.warn = (...args: unknown[]) => {
    if (shouldLog('warn')) {
      originals.warn(...args);
    }
  };

  // console.error always shows (highest priority)
  console.error = (...args: unknown[]) => {
    if (shouldLog('error')) {
      originals.error(...args);
    }
  };
}

/**
 * Restore original console methods (useful for testing)
 */
export function unpatchConsole(): void {
  if (!originalMethods) {
    return;
  }
  console.debug = originalMethods.debug;
  console.log = originalMethods.log;
  console.info = originalMethods.info;
  console.warn = originalMethods.warn;
  console.error = originalMethods.error;
  originalMethods = undefined;
}
