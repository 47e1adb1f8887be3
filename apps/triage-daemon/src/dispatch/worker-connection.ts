import type { WorkerMessage } from '@triage/core/types';

/**
 * One live, bidirectional link to a worker process.
 *
 * `send` resolves once the frame is written (acknowledged by the peer where
 * the transport supports it) and rejects on any write failure. Inbound frames
 * are handed over raw; decoding is the manager's job.
 */
export interface WorkerConnection {
  readonly id: string;
  send(message: WorkerMessage): Promise<void>;
  close(): void;
  onMessage(handler: (raw: unknown) => void): void;
  onClose(handler: (reason: string) => void): void;
}
