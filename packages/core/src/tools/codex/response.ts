/**
 * Caller-facing text for a finished run
 */

import type { ExecutionResult } from '../../types';
import { ExecutionCancelledError, formatUserError } from '../../utils/errors';
import { formatNumberedList } from '../../utils/format';

/**
 * Response for a run that completed: the agent output, or a summary of the
 * errors it reported, or a "no output" notice
 */
export function describeTaskOutput(result: Pick<ExecutionResult, 'output' | 'errorMessages'>): string {
  if (result.output !== '') {
    return result.output;
  }
  if (result.errorMessages.length > 0) {
    return `❌ **Task failed with errors:**\n\n${formatNumberedList(result.errorMessages)}`;
  }
  return '✅ Task completed (no output)';
}

/**
 * Message for a run that failed, with the agent's own error list appended
 */
export function describeTaskFailure(error: unknown, errorMessages: readonly string[] = []): string {
  if (error instanceof ExecutionCancelledError) {
    return '⚠️ Task was canceled';
  }
  const details =
    errorMessages.length > 0 ? `\n\n**Errors:**\n${formatNumberedList(errorMessages)}` : '';
  return `❌ Error executing task: ${formatUserError(error)}${details}`;
}
