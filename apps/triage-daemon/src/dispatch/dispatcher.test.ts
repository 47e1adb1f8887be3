import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CodexExecutor } from '@triage/core/tools/codex';
import { type FakeChild, fakeSpawn } from '@triage/core/tools/codex/testing';
import type { LLMSettings, SettingsProvider } from '@triage/core/types';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeWorkerConnection, flush, MemoryLogSink, recordingCallbacks } from '../test-utils';
import { CallbackRegistry } from './callback-registry';
import { WorkerConnectionManager } from './connection-manager';
import { IncidentDispatcher } from './dispatcher';
import { FallbackRunner } from './fallback';

const settings: LLMSettings = { provider: 'openai', apiKey: 'test-secret', model: 'gpt-5' };

const staticSettings: SettingsProvider = {
  getLLMSettings: async () => settings,
  getProxyConfig: async () => undefined,
};

function answering(text: string) {
  return fakeSpawn(child => {
    child.event({ type: 'thread.started', thread_id: 'thread-1' });
    child.event({ type: 'item.completed', item: { type: 'agent_message', text } });
    child.finish(0);
  });
}

describe('IncidentDispatcher', () => {
  let workspaceDir: string;
  let sink: MemoryLogSink;
  let registry: CallbackRegistry;
  let manager: WorkerConnectionManager;

  beforeEach(async () => {
    workspaceDir = await mkdtemp(join(tmpdir(), 'triage-dispatch-'));
    sink = new MemoryLogSink();
    registry = new CallbackRegistry(sink);
    manager = new WorkerConnectionManager(registry, sink);
  });

  afterEach(async () => {
    await rm(workspaceDir, { recursive: true, force: true });
  });

  function dispatcher(
    spawn: ReturnType<typeof fakeSpawn>,
    provider: SettingsProvider = staticSettings
  ): IncidentDispatcher {
    const fallback = new FallbackRunner({
      executor: new CodexExecutor({ spawnFn: spawn.spawnFn, envSource: {} }),
      workspaceDir,
      timeoutMs: 60_000,
      sink,
    });
    return new IncidentDispatcher({ manager, fallback, settings: provider });
  }

  it('runs in-process when no worker is connected', async () => {
    const spawn = answering('All good.');
    const callbacks = recordingCallbacks();

    const path = await dispatcher(spawn).start('inc-1', 'check', callbacks, { enabledSkills: ['zabbix', 'ssh'] });

    expect(path).toBe('local');
    expect(spawn.calls).toHaveLength(1);
    expect(spawn.calls[0].options.env).toMatchObject({
      OPENAI_API_KEY: 'test-secret',
      CODEX_MODEL: 'gpt-5',
      INCIDENT_ID: 'inc-1',
      ENABLED_SKILLS: 'zabbix,ssh',
    });
    const terminal = callbacks.events.filter(event => event.kind !== 'output');
    expect(terminal).toHaveLength(1);
    expect(terminal[0]).toMatchObject({ kind: 'completed', sessionId: 'thread-1' });
    expect(sink.completed.get('inc-1')?.session_id).toBe('thread-1');
  });

  it('hands the incident to a connected worker', async () => {
    const spawn = answering('unused');
    const worker = new FakeWorkerConnection();
    manager.attach(worker);
    const callbacks = recordingCallbacks();

    const path = await dispatcher(spawn).start('inc-1', 'check', callbacks, { enabledSkills: ['zabbix'] });

    expect(path).toBe('worker');
    expect(spawn.calls).toHaveLength(0);
    expect(worker.sent[0]).toMatchObject({
      type: 'new_incident',
      incident_id: 'inc-1',
      openai_api_key: 'test-secret',
      enabled_skills: ['zabbix'],
    });

    worker.receive({ type: 'codex_completed', incident_id: 'inc-1', session_id: 's-1', output: 'done' });
    worker.receive({ type: 'codex_error', incident_id: 'inc-1', error: 'late' });
    await flush();

    expect(callbacks.events).toEqual([
      { kind: 'completed', sessionId: 's-1', response: 'done\n\n---\n⏱️ Time: 0ms' },
    ]);
  });

  it('falls back to in-process execution when the worker write fails', async () => {
    const spawn = answering('Recovered locally.');
    const worker = new FakeWorkerConnection();
    worker.failWrites = true;
    manager.attach(worker);
    const callbacks = recordingCallbacks();

    const path = await dispatcher(spawn).start('inc-1', 'check', callbacks);

    expect(path).toBe('local');
    expect(registry.size).toBe(0);
    expect(callbacks.events.at(-1)).toMatchObject({ kind: 'completed', sessionId: 'thread-1' });
  });

  it('continues a session through the worker', async () => {
    const worker = new FakeWorkerConnection();
    manager.attach(worker);

    await dispatcher(answering('unused')).continue('inc-1', 'sess-9', 'what now?', recordingCallbacks());

    expect(worker.sent[0]).toMatchObject({
      type: 'continue_incident',
      incident_id: 'inc-1',
      session_id: 'sess-9',
      message: 'what now?',
    });
  });

  it('continues a session in-process', async () => {
    const spawn = answering('Next step.');

    await dispatcher(spawn).continue('inc-1', 'sess-9', 'what now?', recordingCallbacks());

    expect(spawn.calls[0].args.slice(0, 3)).toEqual(['exec', 'resume', 'sess-9']);
    expect(spawn.calls[0].args.at(-1)).toBe('what now?');
  });

  it('resolves run() once with the terminal outcome', async () => {
    const outputs: string[] = [];
    const outcome = await dispatcher(answering('Resolved.')).run('inc-1', 'check', {
      onOutput: text => outputs.push(text),
    });

    expect(outcome.status).toBe('completed');
    if (outcome.status === 'completed') {
      expect(outcome.sessionId).toBe('thread-1');
      expect(outcome.response.startsWith('Resolved.\n\n---\n⏱️ Time: ')).toBe(true);
    }
    expect(outputs).toEqual(['📝 Response ready (9 chars)']);
  });

  it('reports a settings failure as the terminal error', async () => {
    const spawn = answering('unused');
    const broken: SettingsProvider = {
      getLLMSettings: async () => {
        throw new Error('settings unavailable');
      },
      getProxyConfig: async () => undefined,
    };
    const callbacks = recordingCallbacks();

    await dispatcher(spawn, broken).start('inc-1', 'check', callbacks);

    expect(spawn.calls).toHaveLength(0);
    expect(callbacks.events).toEqual([
      { kind: 'error', message: '❌ Error executing task: settings unavailable' },
    ]);
  });

  it('cancels an in-process run', async () => {
    let spawned: (child: FakeChild) => void = () => {};
    const started = new Promise<FakeChild>(resolve => {
      spawned = resolve;
    });
    const spawn = fakeSpawn(child => spawned(child));
    const instance = dispatcher(spawn);
    const callbacks = recordingCallbacks();

    const running = instance.start('inc-1', 'long job', callbacks);
    const child = await started;

    expect(await instance.cancel('inc-1')).toBe(true);
    expect(await running).toBe('local');
    expect(child.killSignal).toBe('SIGTERM');
    expect(callbacks.events).toEqual([{ kind: 'error', message: '⚠️ Task was canceled' }]);
    expect(sink.failed.get('inc-1')).toBe('⚠️ Task was canceled');
  });

  it('still cancels a restarted in-process run after the earlier run ends', async () => {
    const children: FakeChild[] = [];
    let spawned: () => void = () => {};
    const nextSpawn = () =>
      new Promise<void>(resolve => {
        spawned = resolve;
      });
    const spawn = fakeSpawn(child => {
      children.push(child);
      spawned();
    });
    const instance = dispatcher(spawn);
    const firstCallbacks = recordingCallbacks();
    const secondCallbacks = recordingCallbacks();

    let started = nextSpawn();
    const first = instance.start('inc-1', 'first try', firstCallbacks);
    await started;
    started = nextSpawn();
    const second = instance.start('inc-1', 'second try', secondCallbacks);
    await started;

    expect(await first).toBe('local');
    expect(firstCallbacks.events).toEqual([{ kind: 'error', message: '⚠️ Task was canceled' }]);

    expect(await instance.cancel('inc-1')).toBe(true);
    expect(await second).toBe('local');
    expect(children).toHaveLength(2);
    expect(children[1].killSignal).toBe('SIGTERM');
    expect(secondCallbacks.events).toEqual([{ kind: 'error', message: '⚠️ Task was canceled' }]);
  });

  it('forwards cancel to the worker', async () => {
    const worker = new FakeWorkerConnection();
    manager.attach(worker);

    expect(await dispatcher(answering('unused')).cancel('inc-1')).toBe(true);
    expect(worker.sent).toEqual([{ type: 'cancel_incident', incident_id: 'inc-1' }]);
  });

  it('has nothing to cancel without a worker or a local run', async () => {
    expect(await dispatcher(answering('unused')).cancel('inc-1')).toBe(false);
  });
});
