// src/types/protocol.ts

export const WorkerMessageType = {
  // daemon -> worker
  NEW_INCIDENT: 'new_incident',
  CONTINUE_INCIDENT: 'continue_incident',
  CANCEL_INCIDENT: 'cancel_incident',
  PROXY_CONFIG_UPDATE: 'proxy_config_update',

  // worker -> daemon
  CODEX_OUTPUT: 'codex_output',
  CODEX_COMPLETED: 'codex_completed',
  CODEX_ERROR: 'codex_error',
  HEARTBEAT: 'heartbeat',
  STATUS: 'status',
} as const;

export type WorkerMessageType = (typeof WorkerMessageType)[keyof typeof WorkerMessageType];

export interface WireProxyConfig {
  url: string;
  no_proxy?: string;
  openai_enabled: boolean;
  slack_enabled: boolean;
  zabbix_enabled: boolean;
}

/**
 * Envelope exchanged over the worker connection.
 *
 * Field names are the wire names. `type` stays a plain string so frames of a
 * newer protocol revision still decode and can be logged and skipped.
 */
export interface WorkerMessage {
  type: WorkerMessageType | (string & {});
  incident_id?: string;
  task?: string;
  message?: string;
  output?: string;
  session_id?: string;
  error?: string;
  data?: Record<string, unknown>;

  // Usage metrics (codex_completed)
  tokens_used?: number;
  execution_time_ms?: number;

  // Provider settings (new_incident / continue_incident)
  provider?: string;
  openai_api_key?: string;
  model?: string;
  reasoning_effort?: string;
  base_url?: string;

  proxy_config?: WireProxyConfig;
  enabled_skills?: string[];
}
