/**
 * Triage Configuration Types
 */

/**
 * Daemon settings
 */
export interface TriageDaemonSettings {
  /** Daemon port (default: 3030) */
  port?: number;

  /** Daemon host (default: localhost) */
  host?: string;
}

export interface TriageDatabaseSettings {
  /** libSQL URL (default: file:~/.triage/triage.db) */
  url?: string;

  /** Auth token for remote libSQL servers */
  authToken?: string;
}

/**
 * Agent execution settings
 */
export interface TriageExecutionSettings {
  /** Agent binary (default: codex) */
  codexBin?: string;

  /** Root of per-incident working directories */
  workspaceDir?: string;

  /** Timeout for in-process fallback runs (default: 30 minutes) */
  fallbackTimeoutMs?: number;

  /** Environment prefixes passed through to the agent (default: CODEX_) */
  envPrefixes?: string[];
}

/**
 * Model provider defaults. The API key lives under credentials.
 */
export interface TriageLLMSettings {
  provider?: string;
  model?: string;
  reasoningEffort?: string;
  baseUrl?: string;
}

export interface TriageProxySettings {
  url?: string;
  noProxy?: string;
  openaiEnabled?: boolean;
  slackEnabled?: boolean;
  zabbixEnabled?: boolean;
}

export interface TriageCredentials {
  OPENAI_API_KEY?: string;
}

export type CredentialKey = keyof TriageCredentials;

/**
 * Contents of ~/.triage/config.yaml
 */
export interface TriageConfig {
  daemon?: TriageDaemonSettings;
  database?: TriageDatabaseSettings;
  execution?: TriageExecutionSettings;
  llm?: TriageLLMSettings;
  proxy?: TriageProxySettings;
  credentials?: TriageCredentials;
}

/**
 * Config after defaults and environment overrides are applied
 */
export interface ResolvedConfig {
  daemon: Required<TriageDaemonSettings>;
  database: { url: string; authToken?: string };
  execution: Required<TriageExecutionSettings>;
  llm: TriageLLMSettings & { provider: string };
  proxy: TriageProxySettings;
  credentials: TriageCredentials;
}
