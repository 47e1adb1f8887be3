/**
 * Worker Connection Manager
 *
 * Owns the single worker connection and everything sent over it.
 *
 * **Connection handle:**
 * - At most one worker is attached; attaching another closes the old one first
 * - A closed connection clears the handle only if it is still the current one,
 *   so a late close from a replaced worker never evicts its successor
 *
 * **Outbound:**
 * - Callbacks are registered before the frame is written and rolled back if
 *   the write fails
 * - Writes are serialized through a promise chain (one frame at a time)
 *
 * **Inbound:**
 * - Frames of one connection are handled strictly in arrival order, so an
 *   incident's output always precedes its terminal event
 */

import { decodeMessage, proxyConfigToWire, settingsToWire } from '@triage/core/protocol';
import {
  type IncidentCallbacks,
  type IncidentID,
  type IncidentLogSink,
  type LLMSettings,
  type ProxyConfig,
  type WorkerMessage,
  WorkerMessageType,
} from '@triage/core/types';
import {
  getErrorMessage,
  logError,
  TransportError,
  WorkerNotConnectedError,
} from '@triage/core/utils/errors';
import { appendMetrics } from '@triage/core/utils/format';
import type { CallbackRegistry } from './callback-registry';
import type { WorkerConnection } from './worker-connection';

export type ConnectionState = 'ready' | 'closing' | 'closed';

interface ManagedConnection {
  connection: WorkerConnection;
  state: ConnectionState;
  /** Tail of this connection's inbound processing chain */
  inbound: Promise<void>;
}

export interface DispatchOptions {
  settings?: LLMSettings;
  proxy?: ProxyConfig;
  enabledSkills?: readonly string[];
}

export class WorkerConnectionManager {
  private current: ManagedConnection | undefined;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly registry: CallbackRegistry,
    private readonly sink?: IncidentLogSink
  ) {}

  /**
   * Install a newly connected worker, replacing the current one
   */
  attach(connection: WorkerConnection): void {
    const previous = this.current;
    if (previous) {
      console.log(`🔄 Replacing worker ${previous.connection.id} with ${connection.id}`);
      previous.state = 'closing';
      this.current = undefined;
      previous.connection.close();
    }

    const managed: ManagedConnection = {
      connection,
      state: 'ready',
      inbound: Promise.resolve(),
    };

    connection.onMessage(raw => {
      managed.inbound = managed.inbound
        .then(() => this.handleMessage(raw))
        .catch(error => logError(error, 'worker message', { worker: connection.id }));
    });
    connection.onClose(reason => {
      managed.state = 'closed';
      if (this.current === managed) {
        this.current = undefined;
        console.log(`🔌 Worker ${connection.id} disconnected (${reason})`);
      } else {
        console.debug(`   Replaced worker ${connection.id} closed (${reason})`);
      }
    });

    this.current = managed;
    console.log(`✅ Worker ${connection.id} connected`);
  }

  /**
   * Whether a worker is attached and ready. Not a liveness probe.
   */
  isConnected(): boolean {
    return this.current?.state === 'ready';
  }

  /**
   * Hand a new incident to the worker.
   *
   * @throws WorkerNotConnectedError with no worker attached
   * @throws TransportError when the frame cannot be written; the callbacks
   *   are unregistered before the error propagates
   */
  async startIncident(
    incidentId: IncidentID,
    task: string,
    callbacks: IncidentCallbacks,
    options: DispatchOptions = {}
  ): Promise<void> {
    await this.dispatch(incidentId, callbacks, {
      type: WorkerMessageType.NEW_INCIDENT,
      incident_id: incidentId,
      task,
      ...this.optionFields(options),
    });
    console.log(`📤 Sent incident ${incidentId} to worker`);
  }

  /**
   * Resume an incident's agent session with a follow-up message
   */
  async continueIncident(
    incidentId: IncidentID,
    sessionId: string,
    message: string,
    callbacks: IncidentCallbacks,
    options: DispatchOptions = {}
  ): Promise<void> {
    await this.dispatch(incidentId, callbacks, {
      type: WorkerMessageType.CONTINUE_INCIDENT,
      incident_id: incidentId,
      session_id: sessionId,
      message,
      ...this.optionFields(options),
    });
    console.log(`📤 Sent continuation for incident ${incidentId} to worker`);
  }

  /**
   * Ask the worker to stop an incident. Advisory: the terminal event still
   * arrives through the normal inbound path.
   */
  async cancelIncident(incidentId: IncidentID): Promise<void> {
    await this.write({ type: WorkerMessageType.CANCEL_INCIDENT, incident_id: incidentId });
    console.log(`🛑 Sent cancel for incident ${incidentId}`);
  }

  async broadcastProxyConfig(config: ProxyConfig): Promise<void> {
    await this.write({
      type: WorkerMessageType.PROXY_CONFIG_UPDATE,
      proxy_config: proxyConfigToWire(config),
    });
    console.log('📤 Sent proxy config update to worker');
  }

  /**
   * Close the current connection, if any
   */
  close(): void {
    const managed = this.current;
    if (!managed) {
      return;
    }
    managed.state = 'closing';
    this.current = undefined;
    managed.connection.close();
  }

  private optionFields(
    options: DispatchOptions
  ): Omit<WorkerMessage, 'type' | 'incident_id' | 'task' | 'message' | 'session_id'> {
    return {
      ...settingsToWire(options.settings),
      proxy_config: options.proxy ? proxyConfigToWire(options.proxy) : undefined,
      enabled_skills: options.enabledSkills ? [...options.enabledSkills] : undefined,
    };
  }

  private async dispatch(
    incidentId: IncidentID,
    callbacks: IncidentCallbacks,
    message: WorkerMessage
  ): Promise<void> {
    if (!this.isConnected()) {
      throw new WorkerNotConnectedError();
    }
    this.registry.register(incidentId, callbacks);
    try {
      await this.write(message);
    } catch (error) {
      this.registry.unregister(incidentId);
      throw error;
    }
  }

  /**
   * Write one frame under the write lock
   */
  private write(message: WorkerMessage): Promise<void> {
    const managed = this.current;
    if (!managed || managed.state !== 'ready') {
      return Promise.reject(new WorkerNotConnectedError());
    }

    const result = this.writeChain.then(async () => {
      if (managed.state !== 'ready') {
        throw new TransportError(`worker ${managed.connection.id} closed before write`);
      }
      try {
        await managed.connection.send(message);
      } catch (error) {
        throw new TransportError(`failed to send ${message.type}: ${getErrorMessage(error)}`, error);
      }
    });
    // Keep the chain alive after a failed write; the caller sees the failure
    this.writeChain = result.catch(() => undefined);
    return result;
  }

  private async handleMessage(raw: unknown): Promise<void> {
    let message: WorkerMessage;
    try {
      message = decodeMessage(raw);
    } catch (error) {
      console.warn(`⚠️  Dropping worker frame: ${getErrorMessage(error)}`);
      return;
    }

    const incidentId = message.incident_id ?? '';

    switch (message.type) {
      case WorkerMessageType.HEARTBEAT:
        console.debug('💓 Worker heartbeat');
        return;

      case WorkerMessageType.STATUS:
        console.log(`📊 Worker status: ${JSON.stringify(message.data ?? {})}`);
        return;

      case WorkerMessageType.CODEX_OUTPUT:
        await this.registry.dispatchOutput(incidentId, message.output ?? '');
        return;

      case WorkerMessageType.CODEX_COMPLETED: {
        const sessionId = message.session_id ?? '';
        const tokensUsed = message.tokens_used ?? 0;
        const executionTimeMs = message.execution_time_ms ?? 0;
        const response = appendMetrics(message.output ?? '', executionTimeMs, tokensUsed);

        console.log(`✅ Incident ${incidentId} completed (session: ${sessionId || 'none'})`);
        this.registry.dispatchCompleted(incidentId, sessionId, response);
        await this.record(incidentId, sink =>
          sink.markCompleted(incidentId, {
            session_id: sessionId,
            response,
            tokens_used: tokensUsed,
            execution_time_ms: executionTimeMs,
          })
        );
        return;
      }

      case WorkerMessageType.CODEX_ERROR: {
        const error = message.error ?? 'unknown worker error';
        console.error(`❌ Incident ${incidentId} failed: ${error}`);
        this.registry.dispatchError(incidentId, error);
        await this.record(incidentId, sink => sink.markFailed(incidentId, error));
        return;
      }

      default:
        console.warn(`⚠️  Unknown worker message type: ${message.type}`);
    }
  }

  private async record(
    incidentId: IncidentID,
    write: (sink: IncidentLogSink) => Promise<void>
  ): Promise<void> {
    if (!this.sink || incidentId === '') {
      return;
    }
    try {
      await write(this.sink);
    } catch (error) {
      logError(error, 'incident record', { incidentId });
    }
  }
}
