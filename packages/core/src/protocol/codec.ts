/**
 * Worker protocol codec
 *
 * Envelopes travel as plain objects over socket.io (or as JSON text on a raw
 * transport). Encoding drops unset fields; decoding checks every known field's
 * type and keeps unknown `type` values so callers can log and skip them.
 */

import type {
  LLMSettings,
  ProxyConfig,
  WireProxyConfig,
  WorkerMessage,
} from '../types';
import { WorkerMessageType } from '../types';
import { ProtocolError } from '../utils/errors';

type Frame = Record<string, unknown>;

function isRecord(value: unknown): value is Frame {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(frame: Frame, key: keyof WorkerMessage): string | undefined {
  const value = frame[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ProtocolError(`field ${key} must be a string`);
  }
  return value;
}

function optionalNumber(frame: Frame, key: keyof WorkerMessage): number | undefined {
  const value = frame[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ProtocolError(`field ${key} must be a number`);
  }
  return value;
}

function decodeProxyConfig(value: unknown): WireProxyConfig | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value) || typeof value.url !== 'string') {
    throw new ProtocolError('field proxy_config must be an object with a url');
  }
  return {
    url: value.url,
    no_proxy: typeof value.no_proxy === 'string' ? value.no_proxy : undefined,
    openai_enabled: value.openai_enabled === true,
    slack_enabled: value.slack_enabled === true,
    zabbix_enabled: value.zabbix_enabled === true,
  };
}

function decodeSkills(value: unknown): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ProtocolError('field enabled_skills must be a list of strings');
  }
  return value;
}

/**
 * Copy of `value` without undefined or null fields, recursing into plain objects
 */
function omitUnset<T extends object>(value: T): T {
  const copy = { ...value };
  for (const key of Object.keys(copy)) {
    const field: unknown = Reflect.get(copy, key);
    if (field === undefined || field === null) {
      Reflect.deleteProperty(copy, key);
    } else if (isRecord(field)) {
      Reflect.set(copy, key, omitUnset(field));
    }
  }
  return copy;
}

/**
 * Wire form of a message: unset fields omitted
 */
export function encodeMessage(message: WorkerMessage): WorkerMessage {
  return omitUnset(message);
}

export function encodeMessageText(message: WorkerMessage): string {
  return JSON.stringify(encodeMessage(message));
}

/**
 * Decode one inbound frame (object, or JSON text)
 *
 * @throws ProtocolError when the frame is not an object with a string `type`
 *   or a known field has the wrong type
 */
export function decodeMessage(raw: unknown): WorkerMessage {
  let frame: unknown = raw;
  if (typeof raw === 'string') {
    try {
      frame = JSON.parse(raw);
    } catch (error) {
      throw new ProtocolError(`frame is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (!isRecord(frame)) {
    throw new ProtocolError('frame must be a JSON object');
  }
  if (typeof frame.type !== 'string' || frame.type === '') {
    throw new ProtocolError('frame has no message type');
  }

  const data = frame.data;
  if (data !== undefined && data !== null && !isRecord(data)) {
    throw new ProtocolError('field data must be an object');
  }

  return encodeMessage({
    type: frame.type,
    incident_id: optionalString(frame, 'incident_id'),
    task: optionalString(frame, 'task'),
    message: optionalString(frame, 'message'),
    output: optionalString(frame, 'output'),
    session_id: optionalString(frame, 'session_id'),
    error: optionalString(frame, 'error'),
    data: isRecord(data) ? data : undefined,
    tokens_used: optionalNumber(frame, 'tokens_used'),
    execution_time_ms: optionalNumber(frame, 'execution_time_ms'),
    provider: optionalString(frame, 'provider'),
    openai_api_key: optionalString(frame, 'openai_api_key'),
    model: optionalString(frame, 'model'),
    reasoning_effort: optionalString(frame, 'reasoning_effort'),
    base_url: optionalString(frame, 'base_url'),
    proxy_config: decodeProxyConfig(frame.proxy_config),
    enabled_skills: decodeSkills(frame.enabled_skills),
  });
}

const KNOWN_TYPES: ReadonlySet<string> = new Set(Object.values(WorkerMessageType));

export function isKnownMessageType(type: string): type is WorkerMessageType {
  return KNOWN_TYPES.has(type);
}

export function proxyConfigToWire(config: ProxyConfig): WireProxyConfig {
  return {
    url: config.url,
    no_proxy: config.noProxy || undefined,
    openai_enabled: config.openaiEnabled,
    slack_enabled: config.slackEnabled,
    zabbix_enabled: config.zabbixEnabled,
  };
}

export function proxyConfigFromWire(config: WireProxyConfig): ProxyConfig {
  return {
    url: config.url,
    noProxy: config.no_proxy ?? '',
    openaiEnabled: config.openai_enabled,
    slackEnabled: config.slack_enabled,
    zabbixEnabled: config.zabbix_enabled,
  };
}

/**
 * Provider fields of a start/continue envelope
 */
export function settingsToWire(
  settings: LLMSettings | undefined
): Pick<WorkerMessage, 'provider' | 'openai_api_key' | 'model' | 'reasoning_effort' | 'base_url'> {
  if (!settings) {
    return {};
  }
  return {
    provider: settings.provider,
    openai_api_key: settings.apiKey,
    model: settings.model,
    reasoning_effort: settings.reasoningEffort,
    base_url: settings.baseUrl,
  };
}

/**
 * Provider settings carried by an envelope, if it names a provider or key
 */
export function settingsFromWire(message: WorkerMessage): LLMSettings | undefined {
  if (!message.provider && !message.openai_api_key) {
    return undefined;
  }
  return {
    provider: message.provider ?? 'openai',
    apiKey: message.openai_api_key,
    model: message.model,
    reasoningEffort: message.reasoning_effort,
    baseUrl: message.base_url,
  };
}
