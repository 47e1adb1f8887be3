/**
 * Environment policy for the agent process.
 *
 * The agent starts from an empty environment. Only the variables below (and
 * anything under an allowed prefix) are copied from the parent; provider
 * credentials and proxy settings are added explicitly. Database URLs, tokens
 * and other daemon secrets therefore never reach the child.
 */

import type { LLMSettings, ProxyConfig } from '../types';
import { EXECUTION } from './constants';

export const SAFE_ENV_VARS: ReadonlySet<string> = new Set([
  // Shell basics
  'HOME',
  'USER',
  'PATH',
  'SHELL',
  'TERM',
  'TMPDIR',

  // Locale
  'LANG',
  'LC_ALL',
  'TZ',

  // XDG directories
  'XDG_CONFIG_HOME',
  'XDG_DATA_HOME',
  'XDG_CACHE_HOME',

  // Node and Python tooling used by skills
  'NODE_PATH',
  'NPM_CONFIG_PREFIX',
  'PYTHONPATH',
  'PYTHONDONTWRITEBYTECODE',

  // VCS author
  'GIT_AUTHOR_NAME',
  'GIT_AUTHOR_EMAIL',
  'GIT_COMMITTER_NAME',
  'GIT_COMMITTER_EMAIL',

  // Editor
  'EDITOR',
  'VISUAL',

  // Color
  'CLICOLOR',
  'FORCE_COLOR',
  'NO_COLOR',
  'COLORTERM',
  'TERM_PROGRAM',
]);

/**
 * Whether a parent variable is copied into the agent environment
 */
export function isEnvVarPassedThrough(
  varName: string,
  prefixes: readonly string[] = [EXECUTION.ENV_PREFIX]
): boolean {
  return SAFE_ENV_VARS.has(varName) || prefixes.some(prefix => varName.startsWith(prefix));
}

export interface AgentEnvironmentOptions {
  /** Parent environment to filter (default: process.env) */
  source?: NodeJS.ProcessEnv;

  /** Prefix namespaces passed through (default: CODEX_) */
  prefixes?: readonly string[];

  settings?: LLMSettings;
  proxy?: ProxyConfig;

  /** Explicit extras (incident id, gateway URL, ...); undefined values are skipped */
  extra?: Record<string, string | undefined>;
}

/**
 * Build the complete environment for one agent run
 */
export function buildAgentEnvironment(options: AgentEnvironmentOptions = {}): Record<string, string> {
  const source = options.source ?? process.env;
  const prefixes = options.prefixes ?? [EXECUTION.ENV_PREFIX];
  const env: Record<string, string> = {};

  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && isEnvVarPassedThrough(key, prefixes)) {
      env[key] = value;
    }
  }

  const { settings, proxy } = options;
  if (settings) {
    if (settings.apiKey) env.OPENAI_API_KEY = settings.apiKey;
    if (settings.model) env.CODEX_MODEL = settings.model;
    if (settings.reasoningEffort) env.CODEX_REASONING_EFFORT = settings.reasoningEffort;
    if (settings.baseUrl) env.OPENAI_BASE_URL = settings.baseUrl;
  }

  // Proxy applies to the model provider only when enabled for it
  if (proxy?.url && proxy.openaiEnabled) {
    env.HTTP_PROXY = proxy.url;
    env.HTTPS_PROXY = proxy.url;
  }
  if (proxy?.noProxy) {
    env.NO_PROXY = proxy.noProxy;
  }

  for (const [key, value] of Object.entries(options.extra ?? {})) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  return env;
}
