import { createManifestAuditJob } from './jobs/manifest-audit';
import { loadConfig } from './lib/config';
import type { AppConfig } from './lib/config';
import { ConfigError } from './lib/errors';
import { logger } from './lib/logger';
import { shutdownMetrics } from './lib/metrics';
import { createTriggerApp } from './server';

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Missing or invalid configuration');
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const runJob = createManifestAuditJob(config);
  const { app, abortActiveRun } = createTriggerApp(runJob);

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, dataset: config.datasetId, table: config.tableId, maxWorkers: config.maxWorkers },
      'Manifest audit worker listening'
    );
  });

  // ============ GRACEFUL SHUTDOWN ============
  // In-flight users finish and the sink flushes before the server closes
  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    logger.warn({ signal }, 'Received signal, shutting down');
    abortActiveRun(`Received ${signal}`);
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await shutdownMetrics();
  };

  const onSignal = (signal: NodeJS.Signals) => {
    stop(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}

main();
