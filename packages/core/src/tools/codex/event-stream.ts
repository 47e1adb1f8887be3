/**
 * Newline-delimited JSON reader for the agent's stdout.
 *
 * Lines are reassembled from arbitrary chunks with no size cap, since a
 * single event can embed megabytes of command output. The first line that
 * fails to decode ends decoding, but the stream is still read to EOF so the
 * child never blocks on a full pipe.
 */

import { StringDecoder } from 'node:string_decoder';
import { EventDecodeError, getErrorMessage } from '../../utils/errors';
import { type CodexEvent, parseCodexEvent } from './events';

export interface EventStreamSummary {
  /** Events decoded and delivered */
  eventCount: number;

  /** Set when decoding stopped early */
  decodeError?: EventDecodeError;

  /** Set when the stream itself failed while reading */
  readError?: Error;
}

/**
 * Split a chunked text stream into lines. The final line is emitted even
 * without a trailing newline.
 */
export async function* readLines(
  stream: AsyncIterable<Buffer | string>
): AsyncGenerator<string, void, undefined> {
  const decoder = new StringDecoder('utf8');
  // Pieces of the current, unterminated line; only new text is scanned for '\n'
  let pending: string[] = [];

  const takeLine = (last: string): string => {
    pending.push(last);
    const line = pending.join('');
    pending = [];
    return line.endsWith('\r') ? line.slice(0, -1) : line;
  };

  for await (const chunk of stream) {
    const text = typeof chunk === 'string' ? chunk : decoder.write(chunk);

    let start = 0;
    let newline = text.indexOf('\n');
    while (newline !== -1) {
      yield takeLine(text.slice(start, newline));
      start = newline + 1;
      newline = text.indexOf('\n', start);
    }
    if (start < text.length) {
      pending.push(text.slice(start));
    }
  }

  const rest = pending.join('') + decoder.end();
  if (rest.length > 0) {
    yield rest;
  }
}

/**
 * Decode every event on `stream`, handing each to `onEvent` in order.
 * Resolves once the stream has ended.
 */
export async function consumeEventStream(
  stream: AsyncIterable<Buffer | string>,
  onEvent: (event: CodexEvent) => void
): Promise<EventStreamSummary> {
  const summary: EventStreamSummary = { eventCount: 0 };

  try {
    for await (const line of readLines(stream)) {
      if (summary.decodeError || line.trim() === '') {
        continue;
      }

      try {
        const event = parseCodexEvent(line, summary.eventCount + 1);
        summary.eventCount++;
        onEvent(event);
      } catch (error) {
        if (!(error instanceof EventDecodeError)) {
          throw error;
        }
        console.warn(`⚠️  ${error.message}; ignoring the rest of the event stream`);
        summary.decodeError = error;
      }
    }
  } catch (error) {
    console.error(`❌ Event stream read failed: ${getErrorMessage(error)}`);
    summary.readError = error instanceof Error ? error : new Error(getErrorMessage(error));
  }

  return summary;
}
