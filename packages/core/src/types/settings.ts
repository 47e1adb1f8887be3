// src/types/settings.ts

/**
 * Model provider settings handed to the agent process.
 *
 * Credentials travel here explicitly; the agent never inherits them from the
 * daemon's own environment.
 */
export interface LLMSettings {
  provider: string;
  apiKey?: string;
  model?: string;
  reasoningEffort?: string;
  baseUrl?: string;
}

export interface ProxyConfig {
  url: string;
  noProxy: string;
  openaiEnabled: boolean;
  slackEnabled: boolean;
  zabbixEnabled: boolean;
}

/**
 * Settings lookup used by the dispatch layer before every start/continue.
 */
export interface SettingsProvider {
  getLLMSettings(): Promise<LLMSettings | undefined>;
  getProxyConfig(): Promise<ProxyConfig | undefined>;
}
