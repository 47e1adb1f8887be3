/**
 * Worker Client
 *
 * socket.io connection from the worker to the daemon's /worker namespace.
 *
 * - Reconnects on its own (socket.io reconnection, fixed delay)
 * - Announces `status: ready` on every (re)connect
 * - Sends a heartbeat while connected
 * - Acknowledges every inbound frame so the daemon's write completes
 */

import { WORKER } from '@triage/core/config';
import { encodeMessage } from '@triage/core/protocol';
import { type IncidentID, type WorkerMessage, WorkerMessageType } from '@triage/core/types';
import { io, type Socket } from 'socket.io-client';

export interface WorkerClientOptions {
  heartbeatIntervalMs?: number;
  reconnectDelayMs?: number;
  connectTimeoutMs?: number;
}

/**
 * Outbound side of the protocol, as used by the orchestrator
 */
export interface WorkerReporter {
  sendOutput(incidentId: IncidentID, output: string): void;
  sendCompleted(
    incidentId: IncidentID,
    sessionId: string,
    response: string,
    tokensUsed: number,
    executionTimeMs: number
  ): void;
  sendError(incidentId: IncidentID, error: string): void;
}

export class WorkerClient implements WorkerReporter {
  private readonly socket: Socket;
  private heartbeat: NodeJS.Timeout | undefined;
  private readonly heartbeatIntervalMs: number;

  constructor(daemonUrl: string, options: WorkerClientOptions = {}) {
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? WORKER.HEARTBEAT_INTERVAL_MS;
    const reconnectDelayMs = options.reconnectDelayMs ?? WORKER.RECONNECT_DELAY_MS;

    this.socket = io(new URL(WORKER.NAMESPACE, daemonUrl).toString(), {
      autoConnect: false,
      transports: ['websocket'],
      reconnection: true,
      reconnectionDelay: reconnectDelayMs,
      reconnectionDelayMax: reconnectDelayMs,
      timeout: options.connectTimeoutMs ?? WORKER.CONNECT_TIMEOUT_MS,
    });

    this.socket.on('connect', () => {
      console.log(`✅ Connected to daemon (${this.socket.id ?? 'unknown id'})`);
      this.sendStatus('ready');
      this.startHeartbeat();
    });
    this.socket.on('disconnect', reason => {
      console.log(`🔌 Disconnected from daemon: ${reason}`);
      this.stopHeartbeat();
      if (reason === 'io server disconnect') {
        // Server-side disconnects are not retried automatically
        console.log(`🔄 Reconnecting in ${reconnectDelayMs}ms`);
        setTimeout(() => this.socket.connect(), reconnectDelayMs).unref();
      }
    });
    this.socket.on('connect_error', error => {
      console.warn(`⚠️  Failed to connect to daemon: ${error.message}, retrying in ${reconnectDelayMs}ms`);
    });
  }

  get connected(): boolean {
    return this.socket.connected;
  }

  /**
   * Open the connection; resolves on the first successful connect.
   * Failed attempts are retried until then.
   */
  connect(): Promise<void> {
    return new Promise(resolve => {
      if (this.socket.connected) {
        resolve();
        return;
      }
      this.socket.once('connect', () => resolve());
      this.socket.connect();
    });
  }

  onMessage(handler: (raw: unknown) => void): void {
    this.socket.on(WORKER.MESSAGE_EVENT, (payload: unknown, ack?: unknown) => {
      if (typeof ack === 'function') {
        ack();
      }
      handler(payload);
    });
  }

  /**
   * Emit one frame. Frames sent while disconnected are buffered by socket.io
   * and flushed on reconnect.
   */
  send(message: WorkerMessage): void {
    this.socket.emit(WORKER.MESSAGE_EVENT, encodeMessage(message));
  }

  sendOutput(incidentId: IncidentID, output: string): void {
    this.send({ type: WorkerMessageType.CODEX_OUTPUT, incident_id: incidentId, output });
  }

  sendCompleted(
    incidentId: IncidentID,
    sessionId: string,
    response: string,
    tokensUsed: number,
    executionTimeMs: number
  ): void {
    this.send({
      type: WorkerMessageType.CODEX_COMPLETED,
      incident_id: incidentId,
      session_id: sessionId || undefined,
      output: response,
      tokens_used: tokensUsed,
      execution_time_ms: executionTimeMs,
    });
  }

  sendError(incidentId: IncidentID, error: string): void {
    this.send({ type: WorkerMessageType.CODEX_ERROR, incident_id: incidentId, error });
  }

  sendStatus(status: string): void {
    this.send({ type: WorkerMessageType.STATUS, data: { status } });
  }

  close(): void {
    this.stopHeartbeat();
    this.socket.disconnect();
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeat = setInterval(() => {
      if (this.socket.connected) {
        this.send({ type: WorkerMessageType.HEARTBEAT });
      }
    }, this.heartbeatIntervalMs);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = undefined;
    }
  }
}
