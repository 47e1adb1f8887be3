/**
 * Codex Process Executor
 *
 * Runs `codex exec --json` for one task and returns an ExecutionResult.
 *
 * **Process lifecycle:**
 * - The child gets a minimal environment (see config/env-allowlist)
 * - stdout (event stream) and stderr (session id, diagnostics) are drained by
 *   two independent readers
 * - Both readers finish before the process is joined, then `close` is awaited
 *
 * **Sessions:**
 * - No session token: `codex exec ... <task>` starts a new session
 * - Token given: `codex exec resume <token> ... <message>`
 * - The returned token is the one the agent announced, else the one supplied
 */

import { type ChildProcess, type SpawnOptions, spawn } from 'node:child_process';
import { buildAgentEnvironment } from '../../config/env-allowlist';
import { EXECUTION } from '../../config/constants';
import type { ExecutionResult, LLMSettings, ProgressCallback, ProxyConfig } from '../../types';
import {
  ExecutionCancelledError,
  getErrorMessage,
  ProcessExitError,
  ProcessStartError,
  TriageError,
} from '../../utils/errors';
import { consumeEventStream, readLines } from './event-stream';
import { CodexEventFolder } from './progress';

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

const SESSION_ID_PATTERN = /Session ID: ([a-zA-Z0-9-]+)/;

/** stderr lines kept for diagnostics */
const STDERR_TAIL_LINES = 20;

const COMMON_FLAGS = ['--skip-git-repo-check', '--dangerously-bypass-approvals-and-sandbox', '--json'];

export interface CodexExecutorConfig {
  /** Agent binary (default: codex) */
  codexBin?: string;
  /** Prefixes of parent variables passed through (default: CODEX_) */
  envPrefixes?: readonly string[];
  /** Parent environment to filter (default: process.env) */
  envSource?: NodeJS.ProcessEnv;
  /** SIGTERM to SIGKILL grace period on cancel */
  killGraceMs?: number;
  /** Process factory, injectable for tests */
  spawnFn?: SpawnFn;
}

export interface ExecuteOptions {
  task: string;
  /** Resume this agent session instead of starting a new one */
  sessionId?: string;
  workingDir: string;
  settings?: LLMSettings;
  proxy?: ProxyConfig;
  /** Extra variables set explicitly for this run */
  extraEnv?: Record<string, string | undefined>;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

interface StderrSummary {
  sessionId: string;
  tail: string[];
}

/**
 * Read stderr to EOF, picking up the session id (also from a final line
 * with no trailing newline)
 */
async function drainStderr(stream: AsyncIterable<Buffer | string>): Promise<StderrSummary> {
  const summary: StderrSummary = { sessionId: '', tail: [] };
  try {
    for await (const line of readLines(stream)) {
      const match = SESSION_ID_PATTERN.exec(line);
      if (match) {
        summary.sessionId = match[1];
        console.debug(`🔖 Codex session id: ${summary.sessionId}`);
      }
      summary.tail.push(line);
      if (summary.tail.length > STDERR_TAIL_LINES) {
        summary.tail.shift();
      }
    }
  } catch (error) {
    console.error(`❌ Codex stderr read failed: ${getErrorMessage(error)}`);
  }
  return summary;
}

/**
 * Signal the child's whole process group, or just the child where there is
 * no group to signal
 */
function signalProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid !== undefined && process.platform !== 'win32') {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      console.debug(`   Could not signal process group ${child.pid}: ${getErrorMessage(error)}`);
    }
  }
  child.kill(signal);
}

export function buildCodexArgs(task: string, sessionId?: string): string[] {
  return sessionId
    ? ['exec', 'resume', sessionId, ...COMMON_FLAGS, task]
    : ['exec', ...COMMON_FLAGS, task];
}

export class CodexExecutor {
  private readonly config: Required<Omit<CodexExecutorConfig, 'envSource'>> &
    Pick<CodexExecutorConfig, 'envSource'>;

  constructor(config: CodexExecutorConfig = {}) {
    this.config = {
      codexBin: config.codexBin ?? EXECUTION.CODEX_BIN,
      envPrefixes: config.envPrefixes ?? [EXECUTION.ENV_PREFIX],
      envSource: config.envSource,
      killGraceMs: config.killGraceMs ?? EXECUTION.KILL_GRACE_MS,
      spawnFn: config.spawnFn ?? spawn,
    };
  }

  /**
   * Run one task to completion.
   *
   * @throws ProcessStartError when the binary cannot be started; every other
   *   failure is reported through `result.error` with partial data attached
   */
  async execute(options: ExecuteOptions): Promise<ExecutionResult> {
    const { task, sessionId, workingDir, signal } = options;
    const folder = new CodexEventFolder(options.onProgress);

    if (signal?.aborted) {
      return {
        output: '',
        sessionId: sessionId ?? '',
        durationMs: 0,
        tokensUsed: 0,
        fullLog: '',
        errorMessages: [],
        error: new ExecutionCancelledError(),
      };
    }

    const args = buildCodexArgs(task, sessionId);
    const env = buildAgentEnvironment({
      source: this.config.envSource,
      prefixes: this.config.envPrefixes,
      settings: options.settings,
      proxy: options.proxy,
      extra: options.extraEnv,
    });

    console.log(
      sessionId
        ? `🔄 Resuming codex session ${sessionId} in ${workingDir}`
        : `🚀 Starting codex in ${workingDir}`
    );

    const startedAt = Date.now();
    const { child, exited } = await this.start(args, workingDir, env);
    console.debug(`   codex pid ${child.pid ?? 'unknown'}`);

    child.on('error', error => {
      console.error(`❌ codex process error: ${error.message}`);
    });

    let killTimer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      console.log(`🛑 Cancelling codex (pid ${child.pid ?? 'unknown'})`);
      signalProcessGroup(child, 'SIGTERM');
      // Descendants may still hold the pipes open; the drains below only end at EOF
      killTimer = setTimeout(() => {
        console.warn(`⚠️  codex still running ${this.config.killGraceMs}ms after SIGTERM, killing its process group`);
        signalProcessGroup(child, 'SIGKILL');
        child.stdout?.destroy();
        child.stderr?.destroy();
      }, this.config.killGraceMs);
      killTimer.unref();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      onAbort();
    }

    try {
      const [events, stderr] = await Promise.all([
        child.stdout ? consumeEventStream(child.stdout, event => folder.apply(event)) : { eventCount: 0 },
        child.stderr ? drainStderr(child.stderr) : { sessionId: '', tail: [] },
      ]);

      // Both pipes are at EOF; only now join the process
      const exit = await exited;
      const durationMs = Date.now() - startedAt;

      const output = folder.output;
      const result: ExecutionResult = {
        output,
        sessionId: stderr.sessionId || folder.threadId || sessionId || '',
        durationMs,
        tokensUsed: folder.tokensUsed,
        fullLog: folder.fullLog,
        errorMessages: [...folder.errorMessages],
      };

      if (signal?.aborted) {
        result.error = new ExecutionCancelledError();
      } else if (exit.code !== 0) {
        const detail = folder.errorMessages[0] ?? stderr.tail.at(-1);
        result.error = new ProcessExitError(exit.code, exit.signal, detail);
      } else if (output === '' && result.tokensUsed === 0 && result.errorMessages.length > 0) {
        result.error = new TriageError(result.errorMessages[0], 'AGENT_ERROR');
      }

      console.log(
        `✅ codex finished in ${durationMs}ms (events: ${events.eventCount}, tokens: ${result.tokensUsed}, output: ${output.length} chars)`
      );
      if (result.error) {
        console.warn(`⚠️  codex run failed: ${result.error.message}`);
        if (stderr.tail.length > 0) {
          console.debug(`   stderr tail:\n${stderr.tail.join('\n')}`);
        }
      }

      return result;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (killTimer) {
        clearTimeout(killTimer);
      }
    }
  }

  /**
   * Spawn the child and wait until it is running. The exit promise is
   * attached before anything else can observe the child.
   */
  private async start(
    args: string[],
    cwd: string,
    env: Record<string, string>
  ): Promise<{ child: ChildProcess; exited: Promise<ProcessExit> }> {
    let child: ChildProcess;
    try {
      child = this.config.spawnFn(this.config.codexBin, args, {
        cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        // Own process group, so a cancel reaches everything the agent started
        detached: process.platform !== 'win32',
        shell: false,
        windowsHide: true,
      });
    } catch (error) {
      throw new ProcessStartError(this.config.codexBin, error);
    }

    const exited = new Promise<ProcessExit>(resolve => {
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) =>
        resolve({ code, signal })
      );
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(new ProcessStartError(this.config.codexBin, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    return { child, exited };
  }
}
