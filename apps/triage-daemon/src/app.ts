/**
 * Daemon application factory
 *
 * Wires the dispatch layer into a Feathers app:
 * - REST + socket.io for the `incidents` and `worker` services
 * - the `/worker` socket.io namespace, where the codex worker connects
 */

import { WORKER } from '@triage/core/config';
import type { IncidentRepository } from '@triage/core/db';
import {
  errorHandler,
  feathers,
  feathersExpress,
  json,
  notFound,
  rest,
  socketio,
  urlencoded,
} from '@triage/core/feathers';
import type { CodexExecutor } from '@triage/core/tools/codex';
import type { SettingsProvider } from '@triage/core/types';
import type { Server } from 'socket.io';
import type { Application, ServiceTypes } from './declarations';
import { CallbackRegistry } from './dispatch/callback-registry';
import { WorkerConnectionManager } from './dispatch/connection-manager';
import { IncidentDispatcher } from './dispatch/dispatcher';
import { FallbackRunner } from './dispatch/fallback';
import { SocketWorkerConnection } from './dispatch/socket-connection';
import { IncidentsService } from './services/incidents';
import { WorkerService } from './services/worker';

export interface DaemonOptions {
  repository: IncidentRepository;
  settings: SettingsProvider;
  executor: CodexExecutor;
  workspaceDir: string;
  fallbackTimeoutMs: number;
}

export interface Daemon {
  app: Application;
  manager: WorkerConnectionManager;
  dispatcher: IncidentDispatcher;
  /** Stop local runs, drop the worker and close the servers */
  close(): Promise<void>;
}

export function createDaemon(options: DaemonOptions): Daemon {
  const { repository } = options;

  const registry = new CallbackRegistry(repository);
  const manager = new WorkerConnectionManager(registry, repository);
  const fallback = new FallbackRunner({
    executor: options.executor,
    workspaceDir: options.workspaceDir,
    timeoutMs: options.fallbackTimeoutMs,
    sink: repository,
  });
  const dispatcher = new IncidentDispatcher({ manager, fallback, settings: options.settings });

  let io: Server | undefined;

  const app: Application = feathersExpress(feathers<ServiceTypes>());
  app.use(json());
  app.use(urlencoded({ extended: true }));
  app.configure(rest());
  app.configure(
    socketio({ cors: { origin: '*' } }, server => {
      io = server;
      server.of(WORKER.NAMESPACE).on('connection', socket => {
        console.log(`🔌 Worker socket connected: ${socket.id}`);
        manager.attach(new SocketWorkerConnection(socket));
      });
    })
  );

  app.use('incidents', new IncidentsService(repository, dispatcher));
  app.use('worker', new WorkerService(manager));

  app.use(notFound());
  app.use(errorHandler());

  return {
    app,
    manager,
    dispatcher,
    async close() {
      fallback.cancelAll();
      manager.close();
      const server = io;
      if (server) {
        await new Promise<void>(resolve => server.close(() => resolve()));
      }
    },
  };
}
