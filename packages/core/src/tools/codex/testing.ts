/**
 * Test doubles for code that runs the agent through CodexExecutor
 */

import { ChildProcess, type SpawnOptions } from 'node:child_process';
import { PassThrough } from 'node:stream';
import type { SpawnFn } from './executor';

/**
 * Stand-in for a codex process: a real ChildProcess object whose pipes and
 * lifecycle events are driven by the test
 */
export class FakeChild extends ChildProcess {
  override stdout = new PassThrough();
  override stderr = new PassThrough();
  killSignal: NodeJS.Signals | number | undefined;

  event(payload: Record<string, unknown>): void {
    this.stdout.write(`${JSON.stringify(payload)}\n`);
  }

  /** End both pipes, then report the exit */
  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }

  override kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignal = signal;
    this.finish(null, 'SIGTERM');
    return true;
  }
}

export interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnOptions;
}

/**
 * SpawnFn that hands each new FakeChild to `script` once it has "spawned"
 */
export function fakeSpawn(script: (child: FakeChild) => void): { spawnFn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawnFn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    const child = new FakeChild();
    setImmediate(() => {
      child.emit('spawn');
      script(child);
    });
    return child;
  };
  return { spawnFn, calls };
}
