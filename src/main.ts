import { createApp } from './app';
import { settings } from './config';
import { createLogger, errorMessage } from './logger';
import { GoTProcessor } from './application/gotProcessor';
import { createGraphRepository } from './infrastructure/graphRepositoryFactory';

const logger = createLogger('Main');

async function main(): Promise<void> {
  const repository = await createGraphRepository(settings);
  const processor = new GoTProcessor(settings, { repository });
  const app = createApp({ processor, repository, settings });
  const { host, port } = settings.app;

  const server = app.listen(port, host, () => {
    logger.info(`${settings.app.name} is running on http://${host}:${port} (graph store: ${repository.backend})`);
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}. Shutting down.`);
    server.close(() => {
      processor
        .shutdownResources()
        .then(() => repository.close())
        .then(() => {
          logger.info('Shutdown complete.');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error(`Error during shutdown: ${errorMessage(error)}`);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.error(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
});
