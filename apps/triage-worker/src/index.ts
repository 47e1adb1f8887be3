/**
 * Triage Worker
 *
 * Connects to the daemon's /worker namespace and runs codex for every
 * incident the daemon dispatches.
 */

import { CodexExecutor } from '@triage/core/tools/codex';
import { getErrorMessage } from '@triage/core/utils/errors';
import { patchConsole } from '@triage/core/utils/logger';
import { loadWorkerConfig } from './config';
import { WorkerOrchestrator } from './orchestrator';
import { SessionStore } from './session-store';
import { WorkerClient } from './worker-client';

patchConsole();

async function main(): Promise<void> {
  const config = loadWorkerConfig();

  const sessions = new SessionStore(config.sessionsFile);
  await sessions.load();
  console.log(`📂 Sessions: ${config.sessionsFile} (${sessions.list().length} known)`);
  console.log(`📂 Workspaces: ${config.workspaceDir}`);

  const client = new WorkerClient(config.daemonUrl);
  const orchestrator = new WorkerOrchestrator({
    reporter: client,
    executor: new CodexExecutor({ codexBin: config.codexBin }),
    sessions,
    workspaceDir: config.workspaceDir,
    mcpGatewayUrl: config.mcpGatewayUrl,
  });

  client.onMessage(raw => orchestrator.handleMessage(raw));

  console.log(`🔌 Connecting to daemon at ${config.daemonUrl}`);
  await client.connect();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`\n🛑 Received ${signal}, shutting down...`);
    try {
      // Let cancelled runs report before the socket goes away
      await orchestrator.stop();
      client.close();
      console.log('✅ Shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error(`❌ Shutdown failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  };

  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch(error => {
  console.error(`❌ Failed to start worker: ${getErrorMessage(error)}`);
  process.exit(1);
});
