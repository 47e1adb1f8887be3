// src/types/incident.ts

/** Opaque identifier of one dispatched unit of agent work */
export type IncidentID = string;

export const IncidentStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type IncidentStatus = (typeof IncidentStatus)[keyof typeof IncidentStatus];

export interface Incident {
  incident_id: IncidentID;

  status: IncidentStatus;

  /** Original task text handed to the agent */
  task: string;

  /** Resumable agent session token, empty until the agent issues one */
  session_id: string;

  /** Accumulated progress transcript (reasoning, commands, errors) */
  full_log: string;

  /** Final response shown to the caller, metrics appended */
  response: string;

  tokens_used: number;
  execution_time_ms: number;

  created_at: string;
  updated_at: string;
  completed_at?: string;
}

/**
 * Durable incident log consumed by the dispatch layer.
 *
 * Progress that arrives with no registered caller lands in updateLog so it is
 * never lost; terminal outcomes land in markCompleted / markFailed.
 */
export interface IncidentLogSink {
  updateLog(incidentId: IncidentID, fullLog: string): Promise<void>;
  markCompleted(incidentId: IncidentID, outcome: IncidentCompletion): Promise<void>;
  markFailed(incidentId: IncidentID, response: string): Promise<void>;
}

export interface IncidentCompletion {
  session_id: string;
  response: string;
  tokens_used: number;
  execution_time_ms: number;
}
