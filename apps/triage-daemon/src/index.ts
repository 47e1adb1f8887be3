/**
 * Triage Daemon
 *
 * Accepts incidents over REST/socket.io, dispatches them to the connected
 * codex worker, and runs them in-process when no worker is available.
 */

import { getConfigPath, loadConfig, resolveConfig } from '@triage/core/config';
import { createDatabaseAsync, IncidentRepository } from '@triage/core/db';
import { CodexExecutor } from '@triage/core/tools/codex';
import { getErrorMessage } from '@triage/core/utils/errors';
import { patchConsole } from '@triage/core/utils/logger';
import { createDaemon } from './app';
import { ConfigSettingsProvider } from './settings';

patchConsole();

async function main(): Promise<void> {
  const configPath = getConfigPath();
  const config = resolveConfig(await loadConfig(configPath));

  console.log(`📦 Database: ${config.database.url}`);
  const db = await createDatabaseAsync(config.database);

  const daemon = createDaemon({
    repository: new IncidentRepository(db),
    settings: new ConfigSettingsProvider(configPath),
    executor: new CodexExecutor({
      codexBin: config.execution.codexBin,
      envPrefixes: config.execution.envPrefixes,
    }),
    workspaceDir: config.execution.workspaceDir,
    fallbackTimeoutMs: config.execution.fallbackTimeoutMs,
  });

  const { port, host } = config.daemon;
  await daemon.app.listen(port);
  console.log(`🚀 Triage daemon running at http://${host}:${port}`);
  console.log(`   Worker endpoint: ws://${host}:${port}/worker`);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`\n🛑 Received ${signal}, shutting down...`);
    try {
      await daemon.close();
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
  console.error(`❌ Failed to start daemon: ${getErrorMessage(error)}`);
  process.exit(1);
});
