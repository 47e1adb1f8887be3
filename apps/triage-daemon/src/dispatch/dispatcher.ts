/**
 * Incident Dispatcher
 *
 * Front door for running an incident: picks the worker when one is attached,
 * otherwise runs the agent in-process. A worker that rejects the write also
 * falls through to the in-process path.
 *
 * Whatever happens, the caller sees exactly one terminal callback per
 * dispatch. Caller callbacks are wrapped so a late or duplicate terminal event
 * is dropped.
 */

import type {
  IncidentCallbacks,
  IncidentID,
  SettingsProvider,
  TaskEnvelope,
} from '@triage/core/types';
import { formatUserError, getErrorMessage, logError } from '@triage/core/utils/errors';
import type { WorkerConnectionManager } from './connection-manager';
import type { FallbackRunner } from './fallback';

export type DispatchPath = 'worker' | 'local';

export type IncidentOutcome =
  | { status: 'completed'; sessionId: string; response: string }
  | { status: 'failed'; error: string };

export interface StartOptions {
  enabledSkills?: readonly string[];
}

export interface IncidentDispatcherConfig {
  manager: WorkerConnectionManager;
  fallback: FallbackRunner;
  settings: SettingsProvider;
}

/**
 * Wrap callbacks so that only the first terminal event reaches the caller
 */
function once(callbacks: IncidentCallbacks): IncidentCallbacks & { readonly settled: boolean } {
  let settled = false;
  return {
    get settled() {
      return settled;
    },
    onOutput(text) {
      if (!settled) {
        callbacks.onOutput(text);
      }
    },
    onCompleted(sessionId, response) {
      if (settled) {
        return;
      }
      settled = true;
      callbacks.onCompleted(sessionId, response);
    },
    onError(message) {
      if (settled) {
        return;
      }
      settled = true;
      callbacks.onError(message);
    },
  };
}

export class IncidentDispatcher {
  constructor(private readonly config: IncidentDispatcherConfig) {}

  /**
   * Start a new incident
   *
   * Resolves once the incident has been handed to the worker, or once the
   * in-process run has finished.
   */
  async start(
    incidentId: IncidentID,
    task: string,
    callbacks: IncidentCallbacks,
    options: StartOptions = {}
  ): Promise<DispatchPath> {
    return this.dispatch({ incidentId, task, enabledSkills: options.enabledSkills }, callbacks);
  }

  /**
   * Send a follow-up message into an existing agent session
   */
  async continue(
    incidentId: IncidentID,
    sessionId: string,
    message: string,
    callbacks: IncidentCallbacks
  ): Promise<DispatchPath> {
    return this.dispatch({ incidentId, task: message, sessionId }, callbacks);
  }

  /**
   * Start (or continue, with `sessionId`) and wait for the terminal outcome
   */
  run(
    incidentId: IncidentID,
    task: string,
    options: StartOptions & { sessionId?: string; onOutput?: (text: string) => void } = {}
  ): Promise<IncidentOutcome> {
    return new Promise<IncidentOutcome>(resolve => {
      const callbacks: IncidentCallbacks = {
        onOutput: text => options.onOutput?.(text),
        onCompleted: (sessionId, response) => resolve({ status: 'completed', sessionId, response }),
        onError: error => resolve({ status: 'failed', error }),
      };
      const dispatched = options.sessionId
        ? this.continue(incidentId, options.sessionId, task, callbacks)
        : this.start(incidentId, task, callbacks, options);
      dispatched.catch(error => resolve({ status: 'failed', error: getErrorMessage(error) }));
    });
  }

  /**
   * Cancel an incident on whichever path is running it
   *
   * @returns false when the incident is not known to be running
   */
  async cancel(incidentId: IncidentID): Promise<boolean> {
    if (this.config.fallback.isRunning(incidentId)) {
      return this.config.fallback.cancel(incidentId);
    }
    if (this.config.manager.isConnected()) {
      await this.config.manager.cancelIncident(incidentId);
      return true;
    }
    return false;
  }

  private async dispatch(envelope: TaskEnvelope, callbacks: IncidentCallbacks): Promise<DispatchPath> {
    const guarded = once(callbacks);
    const { incidentId } = envelope;

    let full: TaskEnvelope;
    try {
      full = {
        ...envelope,
        settings: await this.config.settings.getLLMSettings(),
        proxy: await this.config.settings.getProxyConfig(),
      };
    } catch (error) {
      logError(error, 'settings lookup', { incidentId });
      guarded.onError(`❌ Error executing task: ${formatUserError(error)}`);
      return 'local';
    }

    if (this.config.manager.isConnected()) {
      try {
        await this.sendToWorker(full, guarded);
        return 'worker';
      } catch (error) {
        console.warn(
          `⚠️  Failed to dispatch incident ${incidentId} to worker: ${getErrorMessage(error)}, falling back to local execution`
        );
      }
    } else {
      console.log(`🏠 No worker connected, running incident ${incidentId} locally`);
    }

    await this.runLocally(full, guarded);
    return 'local';
  }

  private sendToWorker(envelope: TaskEnvelope, callbacks: IncidentCallbacks): Promise<void> {
    const options = {
      settings: envelope.settings,
      proxy: envelope.proxy,
      enabledSkills: envelope.enabledSkills,
    };
    return envelope.sessionId
      ? this.config.manager.continueIncident(
          envelope.incidentId,
          envelope.sessionId,
          envelope.task,
          callbacks,
          options
        )
      : this.config.manager.startIncident(envelope.incidentId, envelope.task, callbacks, options);
  }

  private async runLocally(
    envelope: TaskEnvelope,
    callbacks: IncidentCallbacks & { readonly settled: boolean }
  ): Promise<void> {
    await this.config.fallback.run(envelope, callbacks);

    if (!callbacks.settled) {
      callbacks.onError('❌ Error executing task: run ended without a result');
    }
  }
}
