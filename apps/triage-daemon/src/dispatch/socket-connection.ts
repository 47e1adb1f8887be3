/**
 * socket.io transport for the worker connection
 *
 * Every envelope travels as the `message` event on the worker namespace.
 * Outbound frames are emitted with an acknowledgement so a write only
 * succeeds once the worker has received it.
 */

import { WORKER } from '@triage/core/config';
import { encodeMessage } from '@triage/core/protocol';
import type { WorkerMessage } from '@triage/core/types';
import { TransportError } from '@triage/core/utils/errors';
import type { Socket } from 'socket.io';
import type { WorkerConnection } from './worker-connection';

export class SocketWorkerConnection implements WorkerConnection {
  readonly id: string;

  constructor(
    private readonly socket: Socket,
    private readonly ackTimeoutMs: number = WORKER.ACK_TIMEOUT_MS
  ) {
    this.id = socket.id;
  }

  send(message: WorkerMessage): Promise<void> {
    if (this.socket.disconnected) {
      return Promise.reject(new TransportError(`worker socket ${this.id} is disconnected`));
    }
    return new Promise((resolve, reject) => {
      this.socket
        .timeout(this.ackTimeoutMs)
        .emit(WORKER.MESSAGE_EVENT, encodeMessage(message), (error: Error | null) => {
          if (error) {
            reject(new TransportError(`worker did not acknowledge ${message.type}`, error));
          } else {
            resolve();
          }
        });
    });
  }

  close(): void {
    this.socket.disconnect(true);
  }

  onMessage(handler: (raw: unknown) => void): void {
    this.socket.on(WORKER.MESSAGE_EVENT, (payload: unknown, ack?: unknown) => {
      if (typeof ack === 'function') {
        ack();
      }
      handler(payload);
    });
  }

  onClose(handler: (reason: string) => void): void {
    this.socket.on('disconnect', reason => handler(reason));
  }
}
