/**
 * End-to-end: daemon app, a socket.io worker on the /worker namespace and an
 * in-memory database, all in this process
 */

import { mkdtemp, rm } from 'node:fs/promises';
import type { AddressInfo } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDatabaseAsync, IncidentRepository } from '@triage/core/db';
import { CodexExecutor } from '@triage/core/tools/codex';
import { fakeSpawn } from '@triage/core/tools/codex/testing';
import type { SettingsProvider, WorkerMessage } from '@triage/core/types';
import { io as connect, type Socket } from 'socket.io-client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDaemon, type Daemon } from './app';

const settings: SettingsProvider = {
  getLLMSettings: async () => ({ provider: 'openai', apiKey: 'test-secret' }),
  getProxyConfig: async () => undefined,
};

describe('triage daemon', () => {
  let workspaceDir: string;
  let repository: IncidentRepository;
  let daemon: Daemon;
  let port: number;
  let worker: Socket | undefined;
  const spawn = fakeSpawn(child => {
    child.event({ type: 'thread.started', thread_id: 'local-thread' });
    child.event({ type: 'item.completed', item: { type: 'agent_message', text: 'Handled locally.' } });
    child.finish(0);
  });

  beforeEach(async () => {
    workspaceDir = await mkdtemp(join(tmpdir(), 'triage-daemon-'));
    repository = new IncidentRepository(await createDatabaseAsync({ url: ':memory:' }));
    daemon = createDaemon({
      repository,
      settings,
      executor: new CodexExecutor({ spawnFn: spawn.spawnFn, envSource: {} }),
      workspaceDir,
      fallbackTimeoutMs: 60_000,
    });
    const server = await daemon.app.listen(0);
    const address: AddressInfo | string | null = server.address();
    port = typeof address === 'object' && address !== null ? address.port : 0;
  });

  afterEach(async () => {
    worker?.close();
    worker = undefined;
    await daemon.close();
    await rm(workspaceDir, { recursive: true, force: true });
  });

  /**
   * Worker stand-in that answers every new incident with one progress
   * update and a completion
   */
  function connectWorker(received: WorkerMessage[]): Socket {
    const socket = connect(`http://127.0.0.1:${port}/worker`, { transports: ['websocket'] });
    socket.on('message', (message: WorkerMessage, ack?: () => void) => {
      ack?.();
      received.push(message);
      if (message.type !== 'new_incident') {
        return;
      }
      socket.emit('message', { type: 'codex_output', incident_id: message.incident_id, output: 'step 1' });
      socket.emit('message', {
        type: 'codex_completed',
        incident_id: message.incident_id,
        session_id: 'worker-session',
        output: 'Disk is fine.',
        tokens_used: 500,
        execution_time_ms: 2000,
      });
    });
    return socket;
  }

  it('dispatches an incident to the connected worker', async () => {
    const received: WorkerMessage[] = [];
    worker = connectWorker(received);
    await vi.waitFor(() => expect(daemon.manager.isConnected()).toBe(true));

    await daemon.app.service('incidents').create({ incident_id: 'inc-e2e', task: 'check disk' });

    await vi.waitFor(async () => {
      const incident = await repository.findById('inc-e2e');
      expect(incident?.status).toBe('completed');
      expect(incident?.full_log).toBe('step 1');
    });
    const incident = await repository.getById('inc-e2e');
    expect(incident.session_id).toBe('worker-session');
    expect(incident.response).toBe('Disk is fine.\n\n---\n⏱️ Time: 2.0s | 🎯 Tokens: 500');
    expect(received[0]).toMatchObject({
      type: 'new_incident',
      incident_id: 'inc-e2e',
      task: 'check disk',
      provider: 'openai',
      openai_api_key: 'test-secret',
    });
    expect(spawn.calls).toHaveLength(0);
  });

  it('runs the incident in-process when no worker is connected', async () => {
    expect(await daemon.app.service('worker').find()).toEqual({ connected: false });

    await daemon.app.service('incidents').create({ incident_id: 'inc-local', task: 'check disk' });

    await vi.waitFor(async () => {
      const incident = await repository.findById('inc-local');
      expect(incident?.status).toBe('completed');
    });
    const incident = await repository.getById('inc-local');
    expect(incident.session_id).toBe('local-thread');
    expect(incident.response.startsWith('Handled locally.\n\n---\n⏱️ Time: ')).toBe(true);
  });

  it('pushes proxy settings to the worker', async () => {
    const received: WorkerMessage[] = [];
    worker = connectWorker(received);
    await vi.waitFor(() => expect(daemon.manager.isConnected()).toBe(true));

    await daemon.app.service('worker').create({ url: 'http://proxy.internal:3128', openaiEnabled: true });

    expect(received).toEqual([
      {
        type: 'proxy_config_update',
        proxy_config: {
          url: 'http://proxy.internal:3128',
          openai_enabled: true,
          slack_enabled: false,
          zabbix_enabled: false,
        },
      },
    ]);
  });

  it('rejects an incident without a task', async () => {
    await expect(daemon.app.service('incidents').create({ task: '  ' })).rejects.toThrow('task is required');
  });
});
