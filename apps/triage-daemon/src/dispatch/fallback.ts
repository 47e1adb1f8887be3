/**
 * In-process fallback execution
 *
 * Used when no worker is attached (or the worker rejects a write). Runs the
 * agent inside the daemon through the same executor the worker uses, in a
 * per-incident workspace, bounded by a timeout.
 */

import { mkdir } from 'node:fs/promises';
import type { CodexExecutor } from '@triage/core/tools/codex';
import { describeTaskFailure, describeTaskOutput } from '@triage/core/tools/codex';
import type { IncidentCallbacks, IncidentID, IncidentLogSink, TaskEnvelope } from '@triage/core/types';
import { ExecutionTimeoutError, logError } from '@triage/core/utils/errors';
import { appendMetrics } from '@triage/core/utils/format';
import { resolveIncidentWorkspace } from '@triage/core/utils/path';

export interface FallbackRunnerConfig {
  executor: CodexExecutor;
  /** Root of per-incident working directories */
  workspaceDir: string;
  timeoutMs: number;
  /** Records the outcome of in-process runs */
  sink?: IncidentLogSink;
}

export class FallbackRunner {
  private readonly running = new Map<IncidentID, AbortController>();

  constructor(private readonly config: FallbackRunnerConfig) {}

  isRunning(incidentId: IncidentID): boolean {
    return this.running.has(incidentId);
  }

  /**
   * Run one task to completion. Progress goes to `onOutput`; exactly one of
   * `onCompleted` / `onError` fires before the returned promise resolves.
   */
  async run(envelope: TaskEnvelope, callbacks: IncidentCallbacks): Promise<void> {
    const { incidentId } = envelope;
    const controller = new AbortController();
    this.running.get(incidentId)?.abort();
    this.running.set(incidentId, controller);

    const timer = setTimeout(() => {
      console.warn(`⏰ Incident ${incidentId} timed out after ${this.config.timeoutMs}ms`);
      controller.abort(new ExecutionTimeoutError(this.config.timeoutMs));
    }, this.config.timeoutMs);

    try {
      const workingDir = resolveIncidentWorkspace(this.config.workspaceDir, incidentId);
      await mkdir(workingDir, { recursive: true });

      console.log(`🏠 Running incident ${incidentId} in-process (${workingDir})`);
      const result = await this.config.executor.execute({
        task: envelope.task,
        sessionId: envelope.sessionId,
        workingDir,
        settings: envelope.settings,
        proxy: envelope.proxy,
        signal: controller.signal,
        extraEnv: { INCIDENT_ID: incidentId, ENABLED_SKILLS: envelope.enabledSkills?.join(',') || undefined },
        onProgress: text => callbacks.onOutput(text),
      });

      if (result.error) {
        // A timeout aborts the run the same way a cancel does; report the timeout
        const reason: unknown = controller.signal.reason;
        const error = reason instanceof ExecutionTimeoutError ? reason : result.error;
        await this.fail(incidentId, callbacks, describeTaskFailure(error, result.errorMessages));
        return;
      }

      const response = appendMetrics(describeTaskOutput(result), result.durationMs, result.tokensUsed);
      this.settle(incidentId, () => callbacks.onCompleted(result.sessionId, response));
      await this.record(incidentId, sink =>
        sink.markCompleted(incidentId, {
          session_id: result.sessionId,
          response,
          tokens_used: result.tokensUsed,
          execution_time_ms: result.durationMs,
        })
      );
    } catch (error) {
      await this.fail(incidentId, callbacks, describeTaskFailure(error));
    } finally {
      clearTimeout(timer);
      if (this.running.get(incidentId) === controller) {
        this.running.delete(incidentId);
      }
    }
  }

  /**
   * Abort a running in-process execution
   *
   * @returns false when nothing is running for the incident
   */
  cancel(incidentId: IncidentID): boolean {
    const controller = this.running.get(incidentId);
    if (!controller) {
      return false;
    }
    console.log(`🛑 Cancelling in-process run for incident ${incidentId}`);
    controller.abort();
    return true;
  }

  /**
   * Abort every run (daemon shutdown)
   */
  cancelAll(): void {
    for (const controller of this.running.values()) {
      controller.abort();
    }
  }

  private async fail(incidentId: IncidentID, callbacks: IncidentCallbacks, message: string): Promise<void> {
    this.settle(incidentId, () => callbacks.onError(message));
    await this.record(incidentId, sink => sink.markFailed(incidentId, message));
  }

  private async record(
    incidentId: IncidentID,
    write: (sink: IncidentLogSink) => Promise<void>
  ): Promise<void> {
    const sink = this.config.sink;
    if (!sink) {
      return;
    }
    try {
      await write(sink);
    } catch (error) {
      logError(error, 'incident record', { incidentId });
    }
  }

  private settle(incidentId: IncidentID, notify: () => void): void {
    try {
      notify();
    } catch (error) {
      logError(error, 'fallback callback', { incidentId });
    }
  }
}
