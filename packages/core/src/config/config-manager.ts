/**
 * Config Manager
 *
 * Loads ~/.triage/config.yaml, validates its shape and applies defaults plus
 * environment overrides. Environment variables win over the file.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ValidationError } from '../utils/errors';
import { expandPath, getTriageHome } from '../utils/path';
import { DAEMON, DATABASE, EXECUTION } from './constants';
import type { CredentialKey, ResolvedConfig, TriageConfig } from './types';

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getTriageHome(env), 'config.yaml');
}

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Section, key: string): Section | undefined {
  const value = root[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ValidationError(`config.${key} must be a mapping`, key);
  }
  return value;
}

function str(obj: Section | undefined, key: string, path: string): string | undefined {
  const value = obj?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`config.${path}.${key} must be a string`, `${path}.${key}`);
  }
  return value;
}

function num(obj: Section | undefined, key: string, path: string): number | undefined {
  const value = obj?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`config.${path}.${key} must be a number`, `${path}.${key}`);
  }
  return value;
}

function bool(obj: Section | undefined, key: string, path: string): boolean | undefined {
  const value = obj?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`config.${path}.${key} must be a boolean`, `${path}.${key}`);
  }
  return value;
}

function strList(obj: Section | undefined, key: string, path: string): string[] | undefined {
  const value = obj?.[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`config.${path}.${key} must be a list of strings`, `${path}.${key}`);
  }
  return value;
}

/**
 * Parse and validate YAML config text
 */
export function parseConfig(text: string): TriageConfig {
  const raw: unknown = parseYaml(text);
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ValidationError('config root must be a mapping');
  }

  const daemon = section(raw, 'daemon');
  const database = section(raw, 'database');
  const execution = section(raw, 'execution');
  const llm = section(raw, 'llm');
  const proxy = section(raw, 'proxy');
  const credentials = section(raw, 'credentials');

  return {
    daemon: daemon && {
      port: num(daemon, 'port', 'daemon'),
      host: str(daemon, 'host', 'daemon'),
    },
    database: database && {
      url: str(database, 'url', 'database'),
      authToken: str(database, 'authToken', 'database'),
    },
    execution: execution && {
      codexBin: str(execution, 'codexBin', 'execution'),
      workspaceDir: str(execution, 'workspaceDir', 'execution'),
      fallbackTimeoutMs: num(execution, 'fallbackTimeoutMs', 'execution'),
      envPrefixes: strList(execution, 'envPrefixes', 'execution'),
    },
    llm: llm && {
      provider: str(llm, 'provider', 'llm'),
      model: str(llm, 'model', 'llm'),
      reasoningEffort: str(llm, 'reasoningEffort', 'llm'),
      baseUrl: str(llm, 'baseUrl', 'llm'),
    },
    proxy: proxy && {
      url: str(proxy, 'url', 'proxy'),
      noProxy: str(proxy, 'noProxy', 'proxy'),
      openaiEnabled: bool(proxy, 'openaiEnabled', 'proxy'),
      slackEnabled: bool(proxy, 'slackEnabled', 'proxy'),
      zabbixEnabled: bool(proxy, 'zabbixEnabled', 'proxy'),
    },
    credentials: credentials && {
      OPENAI_API_KEY: str(credentials, 'OPENAI_API_KEY', 'credentials'),
    },
  };
}

/**
 * Load config.yaml; a missing file yields an empty config
 */
export async function loadConfig(path: string = getConfigPath()): Promise<TriageConfig> {
  let text: string;
  try {
    text = await readFile(expandPath(path), 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
  return parseConfig(text);
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`${key} must be a number, got "${value}"`, key);
  }
  return parsed;
}

/**
 * Apply defaults and environment overrides
 */
export function resolveConfig(
  config: TriageConfig,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const home = getTriageHome(env);

  return {
    daemon: {
      port: envNumber(env, 'TRIAGE_PORT') ?? config.daemon?.port ?? DAEMON.DEFAULT_PORT,
      host: env.TRIAGE_HOST || config.daemon?.host || DAEMON.DEFAULT_HOST,
    },
    database: {
      url: env.TRIAGE_DB_URL || config.database?.url || DATABASE.DEFAULT_URL,
      authToken: env.TRIAGE_DB_AUTH_TOKEN || config.database?.authToken,
    },
    execution: {
      codexBin: env.TRIAGE_CODEX_BIN || config.execution?.codexBin || EXECUTION.CODEX_BIN,
      workspaceDir: expandPath(
        env.TRIAGE_WORKSPACE_DIR ||
          config.execution?.workspaceDir ||
          join(home, EXECUTION.WORKSPACE_BASE_PATH)
      ),
      fallbackTimeoutMs:
        envNumber(env, 'TRIAGE_FALLBACK_TIMEOUT_MS') ??
        config.execution?.fallbackTimeoutMs ??
        EXECUTION.FALLBACK_TIMEOUT_MS,
      envPrefixes: config.execution?.envPrefixes ?? [EXECUTION.ENV_PREFIX],
    },
    llm: {
      ...config.llm,
      provider: config.llm?.provider ?? 'openai',
      model: env.CODEX_MODEL || config.llm?.model,
    },
    proxy: { ...config.proxy },
    credentials: { ...config.credentials },
  };
}

/**
 * Credential lookup: config.yaml first, then the environment
 */
export function getCredential(
  key: CredentialKey,
  config: TriageConfig,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const fromConfig = config.credentials?.[key];
  if (fromConfig) {
    console.log(`🔑 Using ${key} from config.yaml`);
    return fromConfig;
  }
  const fromEnv = env[key];
  if (fromEnv) {
    console.log(`🔑 Using environment variable for ${key}`);
    return fromEnv;
  }
  return undefined;
}
