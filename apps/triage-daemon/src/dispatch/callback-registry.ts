/**
 * Callback Registry
 *
 * Maps an incident id to the caller callbacks of its in-flight dispatch.
 *
 * Terminal dispatches (completed / error) always remove the entry, whether or
 * not a handler was found, so a registration never outlives its incident.
 * Progress for an incident nobody is waiting on is written to the incident
 * log instead of being dropped.
 */

import type { IncidentCallbacks, IncidentID, IncidentLogSink } from '@triage/core/types';
import { logError } from '@triage/core/utils/errors';

export class CallbackRegistry {
  private readonly callbacks = new Map<IncidentID, IncidentCallbacks>();

  constructor(private readonly sink?: IncidentLogSink) {}

  /**
   * Register callbacks for an incident, replacing any earlier registration
   */
  register(incidentId: IncidentID, callbacks: IncidentCallbacks): void {
    if (this.callbacks.has(incidentId)) {
      console.warn(`⚠️  Replacing callbacks for incident ${incidentId}`);
    }
    this.callbacks.set(incidentId, callbacks);
  }

  unregister(incidentId: IncidentID): boolean {
    return this.callbacks.delete(incidentId);
  }

  has(incidentId: IncidentID): boolean {
    return this.callbacks.has(incidentId);
  }

  get size(): number {
    return this.callbacks.size;
  }

  /**
   * Deliver progress. With no registration the text goes to the incident log.
   */
  async dispatchOutput(incidentId: IncidentID, text: string): Promise<void> {
    const callbacks = this.callbacks.get(incidentId);
    if (callbacks) {
      try {
        callbacks.onOutput(text);
      } catch (error) {
        logError(error, 'onOutput', { incidentId });
      }
      return;
    }

    if (!this.sink) {
      console.debug(`   No callback for incident ${incidentId}, output dropped`);
      return;
    }
    try {
      await this.sink.updateLog(incidentId, text);
    } catch (error) {
      logError(error, 'incident log update', { incidentId });
    }
  }

  /**
   * @returns whether a registered handler was invoked
   */
  dispatchCompleted(incidentId: IncidentID, sessionId: string, response: string): boolean {
    const callbacks = this.take(incidentId);
    if (!callbacks) {
      return false;
    }
    try {
      callbacks.onCompleted(sessionId, response);
    } catch (error) {
      logError(error, 'onCompleted', { incidentId });
    }
    return true;
  }

  /**
   * @returns whether a registered handler was invoked
   */
  dispatchError(incidentId: IncidentID, message: string): boolean {
    const callbacks = this.take(incidentId);
    if (!callbacks) {
      return false;
    }
    try {
      callbacks.onError(message);
    } catch (error) {
      logError(error, 'onError', { incidentId });
    }
    return true;
  }

  private take(incidentId: IncidentID): IncidentCallbacks | undefined {
    const callbacks = this.callbacks.get(incidentId);
    this.callbacks.delete(incidentId);
    return callbacks;
  }
}
