/**
 * catalog-ingest
 *
 * Entry point - starts the HTTP gateway and the upload worker
 */

import { createGateway } from './gateway/index';
import { loadConfig } from './utils/config';
import { logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 15_000;

async function main() {
  process.on('unhandledRejection', (reason) => logger.error({ reason }, 'Unhandled rejection'));
  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught exception');
    process.exit(1);
  });

  logger.info('Starting catalog ingest...');
  const config = loadConfig();
  const gateway = await createGateway(config);
  await gateway.start();
  logger.info({ port: config.port }, 'Catalog ingest is live');

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    try {
      await Promise.race([
        gateway.stop(),
        new Promise<void>((resolve) =>
          setTimeout(() => {
            logger.warn('Shutdown timeout');
            resolve();
          }, SHUTDOWN_TIMEOUT_MS),
        ),
      ]);
    } catch (e) {
      logger.error({ err: e }, 'Shutdown error');
    }
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  logger.error({ err }, 'Fatal error');
  process.exit(1);
});
