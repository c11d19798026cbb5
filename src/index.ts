#!/usr/bin/env node
import { logger, LOG_LEVEL } from '../common/logging';
import { createDisplayClient } from './client';
import { loadClientConfig, serverUrl } from './config';
import { startClientShell } from './shell';

export { createDisplayClient } from './client';
export type { DisplayClient } from './client';
export { ClientPlaybackEngine } from './playback/engine';
export { ReconnectionSupervisor } from './utils/websocket';

function main(): void {
  const config = loadClientConfig();
  const client = createDisplayClient(config);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    client.shutdown();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  logger.info(`Starting ad display client ${config.clientId}`);
  logger.info(`Server: ${serverUrl(config)}, cache: ${config.cacheDir}`);
  logger.info(
    `Idle timeout: ${config.idleTimeout > 0 ? `${config.idleTimeout} seconds` : 'never'}, log level: ${LOG_LEVEL}`
  );
  client.start();

  if (process.stdin.isTTY) {
    startClientShell(client.engine, client.display, () => shutdown('quit'));
  }
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    logger.error('Client failed to start:', error);
    process.exit(1);
  }
}
