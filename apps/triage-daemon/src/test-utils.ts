/**
 * In-process stand-ins shared by the daemon tests
 */

import type { WorkerConnection } from './dispatch/worker-connection';
import type {
  IncidentCallbacks,
  IncidentCompletion,
  IncidentID,
  IncidentLogSink,
  WorkerMessage,
} from '@triage/core/types';

export class MemoryLogSink implements IncidentLogSink {
  readonly logs = new Map<IncidentID, string>();
  readonly completed = new Map<IncidentID, IncidentCompletion>();
  readonly failed = new Map<IncidentID, string>();

  async updateLog(incidentId: IncidentID, fullLog: string): Promise<void> {
    this.logs.set(incidentId, fullLog);
  }

  async markCompleted(incidentId: IncidentID, outcome: IncidentCompletion): Promise<void> {
    this.completed.set(incidentId, outcome);
  }

  async markFailed(incidentId: IncidentID, response: string): Promise<void> {
    this.failed.set(incidentId, response);
  }
}

export type RecordedEvent =
  | { kind: 'output'; text: string }
  | { kind: 'completed'; sessionId: string; response: string }
  | { kind: 'error'; message: string };

/**
 * Callbacks that record every invocation in order
 */
export function recordingCallbacks(): IncidentCallbacks & { events: RecordedEvent[] } {
  const events: RecordedEvent[] = [];
  return {
    events,
    onOutput: text => events.push({ kind: 'output', text }),
    onCompleted: (sessionId, response) => events.push({ kind: 'completed', sessionId, response }),
    onError: message => events.push({ kind: 'error', message }),
  };
}

/**
 * Worker connection held entirely in memory. `receive` plays the worker side.
 */
export class FakeWorkerConnection implements WorkerConnection {
  readonly sent: WorkerMessage[] = [];
  closed = false;
  failWrites = false;
  /** Each send takes a turn of the event loop */
  slowWrites = false;
  /** Most sends seen in progress at once */
  maxInFlight = 0;

  private inFlight = 0;

  private messageHandler: ((raw: unknown) => void) | undefined;
  private closeHandler: ((reason: string) => void) | undefined;

  constructor(readonly id: string = 'fake-worker') {}

  async send(message: WorkerMessage): Promise<void> {
    if (this.failWrites) {
      throw new Error('socket closed');
    }
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.slowWrites) {
        await flush();
      }
      this.sent.push(message);
    } finally {
      this.inFlight--;
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closeHandler?.('server shutting down');
  }

  onMessage(handler: (raw: unknown) => void): void {
    this.messageHandler = handler;
  }

  onClose(handler: (reason: string) => void): void {
    this.closeHandler = handler;
  }

  receive(raw: unknown): void {
    this.messageHandler?.(raw);
  }

  /** Peer went away */
  drop(reason = 'transport close'): void {
    this.closed = true;
    this.closeHandler?.(reason);
  }
}

/**
 * Resolve once the microtask and immediate queues have drained
 */
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
