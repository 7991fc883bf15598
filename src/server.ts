/**
 * Server Entry Point
 * @module server
 */

import { buildApp } from './app.js';
import { initConfig } from './config/index.js';
import { Controller } from './controller.js';
import { closePool } from './db/connection.js';
import { getErrorMessage } from './errors/index.js';
import { getLogger, initLogger } from './logging/index.js';

/**
 * Start the controller and its operator API
 */
async function start(): Promise<void> {
  const config = await initConfig();
  const logger = initLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    environment: config.env,
  });

  const controller = new Controller({ config });
  const app = await buildApp({ controller });
  let shuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await controller.stop();
      await closePool();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  const onSignal = (signal: string) => () => {
    gracefulShutdown(signal).catch((error: unknown) => {
      logger.fatal({ err: error }, `Shutdown failed: ${getErrorMessage(error)}`);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal('SIGTERM'));
  process.on('SIGINT', onSignal('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    onSignal('unhandledRejection')();
  });

  await controller.start();
  await app.listen({ host: config.server.host, port: config.server.port });
  logger.info(
    { host: config.server.host, port: config.server.port },
    `Server listening on http://${config.server.host}:${config.server.port}`
  );
}

start().catch((error: unknown) => {
  getLogger().fatal({ err: error }, `Failed to start server: ${getErrorMessage(error)}`);
  process.exit(1);
});
