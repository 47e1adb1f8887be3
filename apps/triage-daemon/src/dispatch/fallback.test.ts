import { spawn } from 'node:child_process';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CodexExecutor, type SpawnFn } from '@triage/core/tools/codex';
import { FakeChild, fakeSpawn } from '@triage/core/tools/codex/testing';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { recordingCallbacks } from '../test-utils';
import { FallbackRunner } from './fallback';

describe('FallbackRunner', () => {
  let workspaceDir: string;

  beforeEach(async () => {
    workspaceDir = await mkdtemp(join(tmpdir(), 'triage-fallback-'));
  });

  afterEach(async () => {
    await rm(workspaceDir, { recursive: true, force: true });
  });

  function runner(spawnFn: SpawnFn, timeoutMs = 60_000): FallbackRunner {
    return new FallbackRunner({
      executor: new CodexExecutor({ spawnFn, envSource: {} }),
      workspaceDir,
      timeoutMs,
    });
  }

  it('streams progress and completes with metrics appended', async () => {
    const { spawnFn, calls } = fakeSpawn(child => {
      child.event({ type: 'thread.started', thread_id: 'thread-1' });
      child.event({ type: 'item.completed', item: { type: 'reasoning', text: 'checking disk' } });
      child.event({ type: 'item.completed', item: { type: 'agent_message', text: 'Disk is 93% full.' } });
      child.event({ type: 'turn.completed', usage: { input_tokens: 1000, output_tokens: 234 } });
      child.finish(0);
    });
    const callbacks = recordingCallbacks();

    await runner(spawnFn).run({ incidentId: 'inc-1', task: 'check disk' }, callbacks);

    expect(callbacks.events.slice(0, 2)).toEqual([
      { kind: 'output', text: '🤔 checking disk' },
      { kind: 'output', text: '🤔 checking disk\n📝 Response ready (17 chars)' },
    ]);
    expect(callbacks.events).toHaveLength(3);
    const terminal = callbacks.events[2];
    expect(terminal.kind).toBe('completed');
    if (terminal.kind === 'completed') {
      expect(terminal.sessionId).toBe('thread-1');
      expect(terminal.response).toMatch(/^Disk is 93% full\.\n\n---\n⏱️ Time: \d+ms \| 🎯 Tokens: 1,234$/);
    }

    expect(calls[0].options.cwd).toBe(join(workspaceDir, 'inc-1'));
    expect((await stat(join(workspaceDir, 'inc-1'))).isDirectory()).toBe(true);
  });

  it('resumes the supplied session', async () => {
    const { spawnFn, calls } = fakeSpawn(child => {
      child.event({ type: 'item.completed', item: { type: 'agent_message', text: 'Still full.' } });
      child.finish(0);
    });
    const callbacks = recordingCallbacks();

    await runner(spawnFn).run({ incidentId: 'inc-1', task: 'and now?', sessionId: 'sess-9' }, callbacks);

    expect(calls[0].args.slice(0, 3)).toEqual(['exec', 'resume', 'sess-9']);
    expect(callbacks.events.at(-1)).toMatchObject({ kind: 'completed', sessionId: 'sess-9' });
  });

  it('reports a notice when the agent produced nothing', async () => {
    const { spawnFn } = fakeSpawn(child => child.finish(0));
    const callbacks = recordingCallbacks();

    await runner(spawnFn).run({ incidentId: 'inc-1', task: 'noop' }, callbacks);

    expect(callbacks.events).toHaveLength(1);
    const terminal = callbacks.events[0];
    expect(terminal.kind).toBe('completed');
    if (terminal.kind === 'completed') {
      expect(terminal.response).toMatch(/^✅ Task completed \(no output\)\n\n---\n⏱️ Time: \d+ms$/);
    }
  });

  it('reports a failed run with the agent errors listed', async () => {
    const { spawnFn } = fakeSpawn(child => {
      child.event({ type: 'error', message: 'rate limited' });
      child.finish(1);
    });
    const callbacks = recordingCallbacks();

    await runner(spawnFn).run({ incidentId: 'inc-1', task: 'go' }, callbacks);

    expect(callbacks.events).toEqual([
      {
        kind: 'error',
        message:
          '❌ Error executing task: codex exited with exit status 1: rate limited\n\n**Errors:**\n1. rate limited\n',
      },
    ]);
  });

  it('reports a binary that cannot be started', async () => {
    const spawnFn: SpawnFn = () => {
      const child = new FakeChild();
      setImmediate(() => child.emit('error', new Error('spawn codex ENOENT')));
      return child;
    };
    const callbacks = recordingCallbacks();

    await runner(spawnFn).run({ incidentId: 'inc-1', task: 'go' }, callbacks);

    expect(callbacks.events).toEqual([
      { kind: 'error', message: '❌ Error executing task: failed to start codex: spawn codex ENOENT' },
    ]);
  });

  it('rejects incident ids that would escape the workspace', async () => {
    const { spawnFn, calls } = fakeSpawn(child => child.finish(0));
    const callbacks = recordingCallbacks();

    await runner(spawnFn).run({ incidentId: '../etc', task: 'go' }, callbacks);

    expect(calls).toHaveLength(0);
    expect(callbacks.events).toEqual([
      { kind: 'error', message: '❌ Error executing task: invalid incident id for workspace: ../etc' },
    ]);
  });

  it('stops the agent when the run times out', async () => {
    let killed: FakeChild | undefined;
    const { spawnFn } = fakeSpawn(child => {
      killed = child;
    });
    const callbacks = recordingCallbacks();

    await runner(spawnFn, 50).run({ incidentId: 'inc-1', task: 'hang' }, callbacks);

    expect(killed?.killSignal).toBe('SIGTERM');
    expect(callbacks.events).toEqual([
      { kind: 'error', message: '❌ Error executing task: execution timed out after 50ms' },
    ]);
  });

  it('reports a timeout even while a background process keeps the pipes open', async () => {
    const sleeper = "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000);";
    const script = [
      "const { spawn } = require('node:child_process');",
      `spawn(process.execPath, ['-e', ${JSON.stringify(sleeper)}], { stdio: ['ignore', 'inherit', 'inherit'] });`,
      'setInterval(() => {}, 1000);',
    ].join('\n');
    const spawnFn: SpawnFn = (_command, _args, options) => spawn(process.execPath, ['-e', script], options);
    const fallback = new FallbackRunner({
      executor: new CodexExecutor({ spawnFn, envSource: {}, killGraceMs: 200 }),
      workspaceDir,
      timeoutMs: 500,
    });
    const callbacks = recordingCallbacks();
    const startedAt = Date.now();

    await fallback.run({ incidentId: 'inc-1', task: 'hang' }, callbacks);

    expect(Date.now() - startedAt).toBeLessThan(5000);
    expect(callbacks.events).toEqual([
      { kind: 'error', message: '❌ Error executing task: execution timed out after 500ms' },
    ]);
  });

  it('cancels a running execution', async () => {
    let spawned: () => void = () => {};
    const started = new Promise<void>(resolve => {
      spawned = resolve;
    });
    const { spawnFn } = fakeSpawn(() => spawned());
    const fallback = runner(spawnFn);
    const callbacks = recordingCallbacks();

    const run = fallback.run({ incidentId: 'inc-1', task: 'long job' }, callbacks);
    await started;

    expect(fallback.isRunning('inc-1')).toBe(true);
    expect(fallback.cancel('inc-1')).toBe(true);
    await run;

    expect(callbacks.events).toEqual([{ kind: 'error', message: '⚠️ Task was canceled' }]);
    expect(fallback.isRunning('inc-1')).toBe(false);
    expect(fallback.cancel('inc-1')).toBe(false);
  });
});
