/**
 * Folds decoded Codex events into the pieces of an ExecutionResult.
 *
 * The progress log is rebuilt in full for every callback, so a consumer that
 * simply replaces its display always shows the complete picture.
 */

import type { ProgressCallback } from '../../types';
import { logError } from '../../utils/errors';
import { type CodexEvent, CodexEventType, type CodexItem, CodexItemType } from './events';
import { countTurnTokens } from './usage';

function formatCommand(item: CodexItem): string {
  const prefix = item.status === 'completed' ? '✅ Ran' : '❌ Failed';
  const command = item.command ?? '';
  return item.aggregated_output
    ? `${prefix}: ${command}\nOutput:\n${item.aggregated_output}`
    : `${prefix}: ${command}`;
}

export class CodexEventFolder {
  private agentOutput = '';
  private lastReasoning = '';
  private readonly progressLines: string[] = [];

  readonly errorMessages: string[] = [];
  tokensUsed = 0;

  /** Session announced by a thread.started event, if any */
  threadId = '';

  constructor(private readonly onProgress?: ProgressCallback) {}

  apply(event: CodexEvent): void {
    switch (event.type) {
      case CodexEventType.THREAD_STARTED:
        if (event.thread_id) {
          this.threadId = event.thread_id;
        }
        break;

      case CodexEventType.ERROR:
        if (event.message) {
          this.errorMessages.push(event.message);
          this.progressLines.push(`❌ Error: ${event.message}`);
        }
        break;

      case CodexEventType.ITEM_COMPLETED:
        if (event.item) {
          this.applyItem(event.item);
        }
        break;

      case CodexEventType.TURN_COMPLETED: {
        // Last report wins; usage is not summed across turns
        const tokens = countTurnTokens(event.usage);
        if (tokens !== undefined) {
          this.tokensUsed = tokens;
        }
        break;
      }

      default:
        break;
    }
  }

  private applyItem(item: CodexItem): void {
    let line: string | undefined;

    switch (item.type) {
      case CodexItemType.AGENT_MESSAGE: {
        const text = item.text ?? '';
        if (this.agentOutput.length > 0) {
          this.agentOutput += '\n';
        }
        this.agentOutput += text;
        line = `📝 Response ready (${text.length} chars)`;
        break;
      }

      case CodexItemType.REASONING:
        this.lastReasoning = item.text ?? '';
        line = `🤔 ${this.lastReasoning}`;
        break;

      case CodexItemType.COMMAND_EXECUTION:
        line = formatCommand(item);
        break;

      default:
        break;
    }

    if (line === undefined) {
      return;
    }

    this.progressLines.push(line);
    if (this.onProgress) {
      try {
        this.onProgress(this.fullLog);
      } catch (error) {
        logError(error, 'codex progress callback');
      }
    }
  }

  get fullLog(): string {
    return this.progressLines.join('\n');
  }

  /**
   * Final output: agent messages, or the last reasoning fragment when the
   * agent never produced a message
   */
  get output(): string {
    const output = this.agentOutput.trim();
    return output === '' ? this.lastReasoning : output;
  }
}
