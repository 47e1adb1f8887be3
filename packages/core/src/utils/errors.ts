/**
 * Error utilities for consistent error handling across triage
 *
 * Provides the error class hierarchy used by the dispatch layer, the Codex
 * executor and the worker, plus formatting and logging helpers.
 */

/**
 * Base class for all triage errors
 */
export class TriageError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a resource is not found in the database
 */
export class NotFoundError extends TriageError {
  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, 'NOT_FOUND');
    this.resourceType = resourceType;
    this.id = id;
  }

  public readonly resourceType: string;
  public readonly id: string;
}

/**
 * Thrown when validation fails
 */
export class ValidationError extends TriageError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

/**
 * Thrown at dispatch time when no worker connection is installed
 */
export class WorkerNotConnectedError extends TriageError {
  constructor() {
    super('codex worker not connected', 'WORKER_NOT_CONNECTED');
  }
}

/**
 * Thrown when a frame cannot be written to the worker connection
 */
export class TransportError extends TriageError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'TRANSPORT_ERROR');
  }
}

/**
 * Thrown for frames that are not valid worker messages
 */
export class ProtocolError extends TriageError {
  constructor(message: string) {
    super(message, 'PROTOCOL_ERROR');
  }
}

/**
 * The agent binary could not be started. No partial result exists.
 */
export class ProcessStartError extends TriageError {
  constructor(command: string, public readonly cause?: unknown) {
    super(`failed to start ${command}: ${getErrorMessage(cause)}`, 'PROCESS_START_FAILED');
  }
}

/**
 * The agent exited with a non-zero status or was killed by a signal
 */
export class ProcessExitError extends TriageError {
  constructor(
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    detail?: string
  ) {
    const status = signal ? `signal ${signal}` : `exit status ${exitCode}`;
    super(detail ? `codex exited with ${status}: ${detail}` : `codex exited with ${status}`, 'PROCESS_EXIT');
  }
}

export class ExecutionCancelledError extends TriageError {
  constructor() {
    super('execution cancelled', 'EXECUTION_CANCELLED');
  }
}

export class ExecutionTimeoutError extends TriageError {
  constructor(public readonly timeoutMs: number) {
    super(`execution timed out after ${timeoutMs}ms`, 'EXECUTION_TIMEOUT');
  }
}

/**
 * A line on the agent's event stream was not valid JSON
 */
export class EventDecodeError extends TriageError {
  constructor(
    public readonly eventIndex: number,
    public readonly cause?: unknown
  ) {
    super(`failed to decode event ${eventIndex}: ${getErrorMessage(cause)}`, 'EVENT_DECODE_ERROR');
  }
}

/**
 * Extract error message from any value
 * Handles Error objects, strings, and unknown types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Get full error details including stack trace
 * Useful for logging but not for client responses
 */
export function getErrorDetails(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }
  return {
    message: getErrorMessage(error),
  };
}

/**
 * Format error for user-facing output (no stack traces)
 * Safe to return to clients
 */
export function formatUserError(error: unknown): string {
  const message = getErrorMessage(error);

  return message
    .replace(/\/[\w/.-]+\.ts:\d+/g, '[source]') // Remove file paths
    .replace(/^Error: /, '')
    .trim();
}

/**
 * Log error with context information
 * Used by services and the dispatch layer
 */
export function logError(
  error: unknown,
  context: string,
  metadata: Record<string, unknown> = {}
): void {
  const details = getErrorDetails(error);
  const metadataStr = Object.keys(metadata).length > 0 ? JSON.stringify(metadata) : '';

  console.error(`❌ [${context}] ${details.message} ${metadataStr}`.trim());

  if (process.env.NODE_ENV === 'development' && details.stack) {
    console.error(details.stack);
  }
}
