import express from 'express';
import http from 'http';
import cors from 'cors';
import { AddressInfo } from 'net';
import { Mutex } from 'async-mutex';
import { WebSocketServer, WebSocket } from 'ws';
import { createExpressMiddleware } from '@trpc/server/adapters/express';

import { ProtocolChannel } from '../../common/channel';
import { createLogger, LOG_LEVEL } from '../../common/logging';
import { CLIENT_COMMANDS, ClientRequestSchema } from '../../common/schemas';
import {
  AdListMessage,
  ClientRequest,
  Clock,
  MediaEntry,
  ServerMessage,
  SyncMessage,
  assertNever,
  systemClock,
  toSyncMessage
} from '../../common/types';
import { AdCatalog, NewEntry } from './catalog';
import { PlaybackClock, PlaybackState, DEFAULT_ITEM_DURATION } from './clock';
import { OperatorApi, ServerStatus, createOperatorRouter } from './router';
import { DEFAULT_STALE_AFTER, SessionRegistry, SessionSummary, ServerChannel } from './sessions';

const log = createLogger('SERVER');

export interface AdServerOptions {
  mediaDir: string;
  itemDuration?: number;
  /** Seconds between media directory scans. */
  scanInterval?: number;
  /** Seconds between staleness sweeps. */
  sweepInterval?: number;
  staleAfter?: number;
  clock?: Clock;
}

/**
 * Owns catalog, playback clock, session registry, the lock that guards
 * catalog + clock, and every timer. Nothing here lives at module scope.
 */
export class AdServer implements OperatorApi {
  readonly catalog: AdCatalog;
  readonly playback: PlaybackClock;
  readonly sessions: SessionRegistry;
  readonly app: express.Express;
  readonly httpServer: http.Server;

  private readonly lock = new Mutex();
  private readonly wss: WebSocketServer;
  private readonly now: Clock;
  private readonly timers: NodeJS.Timeout[] = [];
  private connectionCounter = 0;
  private stopped = false;

  constructor(private readonly options: AdServerOptions) {
    this.now = options.clock ?? systemClock;
    this.catalog = new AdCatalog(options.mediaDir);
    this.playback = new PlaybackClock(this.now(), options.itemDuration ?? DEFAULT_ITEM_DURATION);
    this.sessions = new SessionRegistry(this.now, options.staleAfter ?? DEFAULT_STALE_AFTER);

    this.app = express();
    this.app.use(cors());

    // curl http://localhost:5000/health
    this.app.get('/health', (_req, res) => {
      res.status(200).json({
        status: 'ok',
        sessions: this.sessions.size,
        ads: this.catalog.length,
        playing: this.playback.isPlaying,
        timestamp: new Date().toISOString(),
        logLevel: LOG_LEVEL
      });
    });

    this.app.use(
      '/trpc',
      createExpressMiddleware({
        router: createOperatorRouter(this),
        createContext: () => ({})
      })
    );

    this.httpServer = http.createServer(this.app);
    this.wss = new WebSocketServer({ server: this.httpServer });
    this.wss.on('connection', (ws, req) => this.accept(ws, req.socket.remoteAddress ?? 'unknown'));
  }

  /** Loads the catalog, listens and arms the watcher and sweep timers. */
  async start(port: number, host = '0.0.0.0'): Promise<AddressInfo> {
    await this.lock.runExclusive(() => this.catalog.load());

    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    const scanEvery = (this.options.scanInterval ?? 5) * 1000;
    const sweepEvery = (this.options.sweepInterval ?? 30) * 1000;
    this.timers.push(
      setInterval(() => {
        log.debug('Checking for changes in ads directory...');
        this.rescan().catch((error) => log.error('Media directory scan failed:', error));
      }, scanEvery),
      setInterval(() => this.sessions.sweep(), sweepEvery)
    );

    const address = this.httpServer.address();
    if (address === null || typeof address === 'string') {
      throw new Error(`Unexpected listen address: ${address}`);
    }
    log.info(`Started on ${address.address}:${address.port}`);
    log.info(`Monitoring ads directory: ${this.catalog.mediaDir}`);
    return address;
  }

  /** Closes timers, sessions and sockets, then persists the catalog. */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    const wasListening = this.httpServer.listening;
    log.info('Shutting down...');

    for (const timer of this.timers.splice(0)) {
      clearInterval(timer);
    }
    this.sessions.closeAll('server shutdown');
    for (const ws of this.wss.clients) {
      ws.terminate();
    }
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
    if (wasListening) {
      const closed = new Promise<void>((resolve, reject) =>
        this.httpServer.close((error) => (error ? reject(error) : resolve()))
      );
      this.httpServer.closeAllConnections();
      await closed;
    }

    if (wasListening) {
      await this.lock.runExclusive(() => this.catalog.save());
    }
    log.info('Server closed');
  }

  async status(): Promise<ServerStatus> {
    return this.lock.runExclusive(() => {
      const snapshot = this.playback.snapshot(this.now(), this.catalog.length);
      return {
        isPlaying: snapshot.isPlaying,
        itemDuration: snapshot.itemDuration,
        catalogSize: this.catalog.length,
        sessions: this.sessions.size,
        currentIndex: snapshot.currentIndex,
        remaining: snapshot.remaining
      };
    });
  }

  listEntries(): MediaEntry[] {
    return this.catalog.entries();
  }

  listSessions(): SessionSummary[] {
    return this.sessions.summaries();
  }

  async togglePlayback(): Promise<Readonly<PlaybackState>> {
    const { state, message } = await this.lock.runExclusive(() => {
      const state = this.playback.toggle(this.now(), this.catalog.length);
      log.info(`Ad display ${state.isPlaying ? 'resumed' : 'paused'} at ${new Date().toISOString()}`);
      return { state, message: this.syncMessageLocked() };
    });
    this.sessions.broadcast(message);
    return state;
  }

  async setItemDuration(seconds: number): Promise<void> {
    const message = await this.lock.runExclusive(() => {
      this.playback.setItemDuration(seconds);
      log.info(`Ad duration set to ${seconds} seconds`);
      return this.syncMessageLocked();
    });
    this.sessions.broadcast(message);
  }

  async addEntry(entry: NewEntry): Promise<MediaEntry> {
    const { created, message } = await this.lock.runExclusive(async () => {
      const created = await this.catalog.add(entry);
      return { created, message: this.adListMessageLocked() };
    });
    log.info(`Added new ad ${created.id}: ${created.label} (File: ${created.path})`);
    this.sessions.broadcast(message);
    return created;
  }

  async removeEntry(id: number): Promise<boolean> {
    const { removed, message } = await this.lock.runExclusive(async () => {
      const removed = await this.catalog.remove(id);
      return { removed, message: this.adListMessageLocked() };
    });
    if (removed) {
      log.info(`Removed ad ID: ${id}`);
      this.sessions.broadcast(message);
    } else {
      log.warn(`No ad with ID ${id}`);
    }
    return removed;
  }

  async rescan(): Promise<boolean> {
    const { changed, message } = await this.lock.runExclusive(async () => {
      const changed = await this.catalog.rescan();
      return { changed, message: this.adListMessageLocked() };
    });
    if (changed) {
      log.info('Changes detected in ads directory, notifying clients...');
      this.sessions.broadcast(message);
    }
    return changed;
  }

  private accept(ws: WebSocket, remoteAddress: string): void {
    const channel = new ProtocolChannel<ClientRequest, ServerMessage>(ws, {
      label: `conn_${++this.connectionCounter}`,
      schema: ClientRequestSchema,
      knownCommands: CLIENT_COMMANDS,
      logger: log
    });

    this.sessions.register(channel, remoteAddress);
    channel.onActivity(() => this.sessions.touch(channel));
    channel.onMessage((request) => {
      this.handleRequest(channel, request).catch((error) =>
        log.error(`Error processing ${request.command} from ${channel.label}:`, error)
      );
    });
    channel.onClose((code) => this.sessions.evict(channel, `connection closed (${code})`));
    ws.on('error', (error) => log.error(`WebSocket ${channel.label} error:`, error));

    // cold start: the client gets the clock and the catalog without asking
    this.sendSync(channel)
      .then(() => this.sendAdList(channel))
      .catch((error) => log.error(`Initial sync to ${channel.label} failed:`, error));
  }

  private async handleRequest(channel: ServerChannel, request: ClientRequest): Promise<void> {
    this.sessions.touch(channel, request.client_id);
    const who = `client ${request.client_id ?? 'unknown'} (${channel.label})`;

    switch (request.command) {
      case 'get_sync':
        log.info(`Received 'get_sync' request from ${who}`);
        await this.sendSync(channel);
        break;
      case 'get_ads':
        log.info(`Received 'get_ads' request from ${who}`);
        await this.sendAdList(channel);
        break;
      case 'get_file':
        log.info(`Received 'get_file' request for '${request.filename}' from ${who}`);
        await this.sendFile(channel, request.filename);
        break;
      default:
        assertNever(request);
    }
  }

  private async sendSync(channel: ServerChannel): Promise<void> {
    const message = await this.lock.runExclusive(() => this.syncMessageLocked());
    if (this.sessions.send(channel, message)) {
      log.debug(
        `Sent sync data to ${channel.label} (current_ad: ${message.current_ad_index}, remaining: ${message.remaining_time.toFixed(1)}s)`
      );
    }
  }

  private async sendAdList(channel: ServerChannel): Promise<void> {
    const message = await this.lock.runExclusive(() => this.adListMessageLocked());
    if (this.sessions.send(channel, message)) {
      log.debug(`Sent ad list with ${message.ads.length} ads to ${channel.label}`);
    }
  }

  private async sendFile(channel: ServerChannel, filename: string): Promise<void> {
    const bytes = await this.catalog.readMedia(filename);
    if (!bytes) {
      log.error(`File not found: ${filename}`);
      return;
    }
    const sent = this.sessions.send(channel, {
      command: 'file_transfer',
      filename,
      content: bytes.toString('base64')
    });
    if (sent) {
      log.info(`Sent file '${filename}' (${bytes.length} bytes) to ${channel.label}`);
    }
  }

  /** Caller must hold the lock. */
  private syncMessageLocked(): SyncMessage {
    return toSyncMessage(this.playback.snapshot(this.now(), this.catalog.length));
  }

  /** Caller must hold the lock. */
  private adListMessageLocked(): AdListMessage {
    return { command: 'ad_list', ads: this.catalog.entries() };
  }
}
