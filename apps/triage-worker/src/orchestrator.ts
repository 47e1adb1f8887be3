/**
 * Worker Orchestrator
 *
 * Turns daemon frames into codex runs and reports the results back.
 *
 * Every incident run gets its own workspace directory and AbortController.
 * A cancel aborts the run; the run itself then reports the one terminal
 * `codex_error`, so a cancelled incident never sees two.
 */

import { mkdir } from 'node:fs/promises';
import { decodeMessage, proxyConfigFromWire, settingsFromWire } from '@triage/core/protocol';
import { type CodexExecutor, describeTaskOutput } from '@triage/core/tools/codex';
import {
  type IncidentID,
  type LLMSettings,
  type ProxyConfig,
  type WorkerMessage,
  WorkerMessageType,
} from '@triage/core/types';
import { ExecutionCancelledError, getErrorMessage, logError } from '@triage/core/utils/errors';
import { resolveIncidentWorkspace } from '@triage/core/utils/path';
import type { SessionStore } from './session-store';
import type { WorkerReporter } from './worker-client';

export interface WorkerOrchestratorConfig {
  reporter: WorkerReporter;
  executor: CodexExecutor;
  sessions: SessionStore;
  workspaceDir: string;
  mcpGatewayUrl?: string;
}

interface IncidentRun {
  task: string;
  sessionId?: string;
  settings?: LLMSettings;
  proxy?: ProxyConfig;
  enabledSkills?: string[];
}

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
}

export class WorkerOrchestrator {
  private readonly active = new Map<IncidentID, ActiveRun>();
  private proxy: ProxyConfig | undefined;

  constructor(private readonly config: WorkerOrchestratorConfig) {}

  get activeCount(): number {
    return this.active.size;
  }

  /** Last proxy settings pushed by the daemon */
  get proxyConfig(): ProxyConfig | undefined {
    return this.proxy;
  }

  handleMessage(raw: unknown): void {
    let message: WorkerMessage;
    try {
      message = decodeMessage(raw);
    } catch (error) {
      console.warn(`⚠️  Dropping daemon frame: ${getErrorMessage(error)}`);
      return;
    }

    const incidentId = message.incident_id ?? '';
    console.log(`📨 Received ${message.type}${incidentId ? ` for incident ${incidentId}` : ''}`);

    switch (message.type) {
      case WorkerMessageType.NEW_INCIDENT:
        this.start(incidentId, {
          task: message.task ?? '',
          settings: settingsFromWire(message),
          proxy: this.proxyFor(message),
          enabledSkills: message.enabled_skills,
        });
        return;

      case WorkerMessageType.CONTINUE_INCIDENT: {
        const sessionId = message.session_id || this.config.sessions.get(incidentId)?.session_id;
        if (!sessionId) {
          this.config.reporter.sendError(incidentId, 'No session found for incident');
          return;
        }
        this.start(incidentId, {
          task: message.message ?? '',
          sessionId,
          settings: settingsFromWire(message),
          proxy: this.proxyFor(message),
        });
        return;
      }

      case WorkerMessageType.CANCEL_INCIDENT:
        this.cancel(incidentId);
        return;

      case WorkerMessageType.PROXY_CONFIG_UPDATE:
        if (message.proxy_config) {
          this.proxy = proxyConfigFromWire(message.proxy_config);
          console.log(`🌐 Proxy config updated (${this.proxy.url || 'no proxy'})`);
        }
        return;

      default:
        console.warn(`⚠️  Unknown message type: ${message.type}`);
    }
  }

  /**
   * @returns false when nothing is running for the incident
   */
  cancel(incidentId: IncidentID): boolean {
    const run = this.active.get(incidentId);
    if (!run) {
      console.log(`   Incident ${incidentId} is not running, nothing to cancel`);
      return false;
    }
    console.log(`🛑 Cancelling incident ${incidentId}`);
    run.controller.abort();
    return true;
  }

  /**
   * Abort every run and wait for all of them to report
   */
  async stop(): Promise<void> {
    const runs = [...this.active.values()];
    for (const run of runs) {
      run.controller.abort();
    }
    await Promise.all(runs.map(run => run.done));
  }

  /**
   * Resolves once every run started so far has reported
   */
  async idle(): Promise<void> {
    await Promise.all([...this.active.values()].map(run => run.done));
  }

  private proxyFor(message: WorkerMessage): ProxyConfig | undefined {
    return message.proxy_config ? proxyConfigFromWire(message.proxy_config) : this.proxy;
  }

  private start(incidentId: IncidentID, run: IncidentRun): void {
    if (this.active.has(incidentId)) {
      this.config.reporter.sendError(incidentId, `Incident ${incidentId} is already running`);
      return;
    }

    const controller = new AbortController();
    const done = this.execute(incidentId, run, controller.signal)
      .catch(error => logError(error, 'incident run', { incidentId }))
      .finally(() => this.active.delete(incidentId));
    this.active.set(incidentId, { controller, done });
  }

  private async execute(incidentId: IncidentID, run: IncidentRun, signal: AbortSignal): Promise<void> {
    const { reporter, sessions } = this.config;

    if (run.sessionId) {
      await sessions.setRunning(incidentId, run.sessionId);
    } else {
      await sessions.create(incidentId);
    }

    try {
      const workingDir = resolveIncidentWorkspace(this.config.workspaceDir, incidentId);
      await mkdir(workingDir, { recursive: true });

      const result = await this.config.executor.execute({
        task: run.task,
        sessionId: run.sessionId,
        workingDir,
        settings: run.settings,
        proxy: run.proxy,
        signal,
        extraEnv: {
          MCP_GATEWAY_URL: this.config.mcpGatewayUrl,
          INCIDENT_ID: incidentId,
          ENABLED_SKILLS: run.enabledSkills?.join(',') || undefined,
        },
        onProgress: text => reporter.sendOutput(incidentId, text),
      });

      if (result.sessionId) {
        await sessions.setRunning(incidentId, result.sessionId);
      }

      if (result.error) {
        const error =
          result.error instanceof ExecutionCancelledError ? 'Execution cancelled' : result.error.message;
        console.error(`❌ Incident ${incidentId} failed: ${error}`);
        await sessions.setFailed(incidentId, error);
        reporter.sendError(incidentId, error);
        return;
      }

      const response = describeTaskOutput(result);
      await sessions.setCompleted(incidentId, response, result.fullLog);
      reporter.sendCompleted(incidentId, result.sessionId, response, result.tokensUsed, result.durationMs);
      console.log(
        `✅ Incident ${incidentId} completed (tokens: ${result.tokensUsed}, time: ${result.durationMs}ms)`
      );
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`❌ Incident ${incidentId} failed: ${message}`);
      await sessions.setFailed(incidentId, message);
      reporter.sendError(incidentId, message);
    }
  }
}
