// src/types/execution.ts
import type { IncidentID } from './incident';
import type { LLMSettings, ProxyConfig } from './settings';

/**
 * Everything needed to start or resume one agent run. Immutable once sent.
 */
export interface TaskEnvelope {
  readonly incidentId: IncidentID;
  readonly task: string;
  /** Prior agent session token; present means resume */
  readonly sessionId?: string;
  readonly settings?: Readonly<LLMSettings>;
  readonly proxy?: Readonly<ProxyConfig>;
  readonly enabledSkills?: readonly string[];
}

/**
 * Outcome of one agent run. Partial data (output, log, timing, error
 * messages) is kept even when `error` is set.
 */
export interface ExecutionResult {
  output: string;
  /** Empty string when no session token was issued or supplied */
  sessionId: string;
  durationMs: number;
  tokensUsed: number;
  fullLog: string;
  errorMessages: string[];
  error?: Error;
}

export type ProgressCallback = (fullLog: string) => void;

/**
 * Caller-side contract shared by the worker path and the in-process fallback.
 * Exactly one of onCompleted / onError fires per dispatched attempt.
 */
export interface IncidentCallbacks {
  onOutput(text: string): void;
  onCompleted(sessionId: string, response: string): void;
  onError(message: string): void;
}
