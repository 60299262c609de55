import { logger, loadAppConfig } from '@toolweave/shared';
import { createApi } from './api.js';
import { createContainer } from './container.js';

const log = logger.child({ module: 'agent' });

async function main() {
  log.info('starting agent service');

  const config = await loadAppConfig();
  const container = await createContainer(config);

  const app = createApi({
    orchestrator: container.orchestrator,
    registry: container.registry,
    loadDefinitions: container.loadDefinitions,
  });

  const server = app.listen(config.port, () => {
    log.info({ port: config.port }, 'agent API listening');
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('shutting down');
    server.close();
    try {
      await container.shutdown();
    } catch (err) {
      log.error({ err }, 'error during shutdown');
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  log.fatal({ err }, 'agent failed to start');
  process.exit(1);
});
