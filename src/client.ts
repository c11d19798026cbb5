import { ClientConfig, serverUrl } from './config';
import { ConsoleDisplay } from './playback/display';
import { ClientPlaybackEngine } from './playback/engine';
import { MediaCache } from './utils/mediaCache';
import { ReconnectionSupervisor } from './utils/websocket';

/** Everything one display client owns. */
export interface DisplayClient {
  config: ClientConfig;
  display: ConsoleDisplay;
  media: MediaCache;
  engine: ClientPlaybackEngine;
  supervisor: ReconnectionSupervisor;
  start(): void;
  shutdown(): void;
}

export function createDisplayClient(config: ClientConfig): DisplayClient {
  const display = new ConsoleDisplay(config.clientId);
  const media = new MediaCache(config.cacheDir);
  const engine = new ClientPlaybackEngine({
    clientId: config.clientId,
    display,
    media,
    idleTimeout: config.idleTimeout
  });
  const supervisor = new ReconnectionSupervisor(engine, {
    url: serverUrl(config),
    reconnectInterval: config.reconnectInterval,
    driftInterval: config.driftInterval
  });

  return {
    config,
    display,
    media,
    engine,
    supervisor,
    start() {
      engine.start();
      supervisor.connect();
    },
    shutdown() {
      supervisor.stop();
      engine.stop();
      display.clear();
    }
  };
}
