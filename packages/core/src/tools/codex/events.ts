/**
 * Codex `exec --json` event shapes
 *
 * One JSON object per line on stdout. Only the fields the folder reads are
 * modelled.
 */

import { EventDecodeError } from '../../utils/errors';

export const CodexEventType = {
  THREAD_STARTED: 'thread.started',
  ITEM_COMPLETED: 'item.completed',
  TURN_COMPLETED: 'turn.completed',
  ERROR: 'error',
} as const;

export const CodexItemType = {
  REASONING: 'reasoning',
  COMMAND_EXECUTION: 'command_execution',
  AGENT_MESSAGE: 'agent_message',
} as const;

export interface CodexItem {
  id?: string;
  type: string;
  text?: string;
  command?: string;
  aggregated_output?: string;
  exit_code?: number;
  status?: string;
}

export interface CodexEvent {
  type: string;
  thread_id?: string;
  message?: string;
  item?: CodexItem;
  usage?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

function parseItem(value: unknown): CodexItem | undefined {
  if (!isRecord(value) || typeof value.type !== 'string') {
    return undefined;
  }
  return {
    id: stringField(value, 'id'),
    type: value.type,
    text: stringField(value, 'text'),
    command: stringField(value, 'command'),
    aggregated_output: stringField(value, 'aggregated_output'),
    exit_code: typeof value.exit_code === 'number' ? value.exit_code : undefined,
    status: stringField(value, 'status'),
  };
}

/**
 * Decode one stdout line
 *
 * @param index - 1-based position of the event in the stream, for error reporting
 * @throws EventDecodeError when the line is not a JSON object
 */
export function parseCodexEvent(line: string, index: number): CodexEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new EventDecodeError(index, error);
  }
  if (!isRecord(parsed)) {
    throw new EventDecodeError(index, 'event is not a JSON object');
  }

  return {
    type: stringField(parsed, 'type') ?? '',
    thread_id: stringField(parsed, 'thread_id'),
    message: stringField(parsed, 'message'),
    item: parseItem(parsed.item),
    usage: parsed.usage,
  };
}
