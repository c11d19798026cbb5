#!/usr/bin/env node
import { logger, LOG_LEVEL } from '../../common/logging';
import { AdServer } from './adServer';
import { loadServerConfig } from './config';
import { startServerShell } from './shell';

export { AdServer } from './adServer';
export type { AdServerOptions } from './adServer';
export type { OperatorRouter } from './router';

async function main(): Promise<void> {
  const config = loadServerConfig();
  const server = new AdServer({
    mediaDir: config.mediaDir,
    itemDuration: config.adDuration,
    scanInterval: config.scanInterval,
    sweepInterval: config.sweepInterval,
    staleAfter: config.staleAfter
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    server
      .shutdown()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    // Keep the server running despite uncaught exceptions
  });

  const address = await server.start(config.port, config.host);
  logger.info(`Ad sync server listening on ${address.address}:${address.port}`);
  logger.info(`Health check available at http://localhost:${address.port}/health`);
  logger.info(`Server process ID: ${process.pid}`);
  logger.info(`Log level: ${LOG_LEVEL} (change with --log=debug or LOG_LEVEL=debug environment variable)`);

  if (process.stdin.isTTY) {
    startServerShell(server, () => shutdown('exit'));
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('Server failed to start:', error);
    process.exit(1);
  });
}
