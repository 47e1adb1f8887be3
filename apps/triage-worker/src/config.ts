/**
 * Worker configuration, read from the environment
 */

import { join } from 'node:path';
import { DAEMON, EXECUTION } from '@triage/core/config';
import { expandPath, getTriageHome } from '@triage/core/utils/path';

export interface WorkerConfig {
  /** Daemon base URL; the worker joins its /worker namespace */
  daemonUrl: string;
  /** Root of per-incident working directories */
  workspaceDir: string;
  /** JSON file holding per-incident agent sessions */
  sessionsFile: string;
  /** Passed to the agent as MCP_GATEWAY_URL when set */
  mcpGatewayUrl?: string;
  codexBin: string;
}

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const home = join(getTriageHome(env), 'worker');
  return {
    daemonUrl: env.DAEMON_URL || `http://${DAEMON.DEFAULT_HOST}:${DAEMON.DEFAULT_PORT}`,
    workspaceDir: expandPath(env.WORKSPACE_DIR || join(home, EXECUTION.WORKSPACE_BASE_PATH)),
    sessionsFile: expandPath(env.SESSIONS_FILE || join(home, 'sessions.json')),
    mcpGatewayUrl: env.MCP_GATEWAY_URL || undefined,
    codexBin: env.TRIAGE_CODEX_BIN || EXECUTION.CODEX_BIN,
  };
}
