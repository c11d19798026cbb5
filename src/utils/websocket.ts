import WebSocket from 'ws';
import { ProtocolChannel } from '../../common/channel';
import { TransportError } from '../../common/errors';
import { createLogger } from '../../common/logging';
import { SERVER_COMMANDS, ServerMessageSchema } from '../../common/schemas';
import { ClientRequest, ServerMessage } from '../../common/types';
import { ClientPlaybackEngine, PlaybackLink } from '../playback/engine';

const log = createLogger('CONNECTION');

export interface SupervisorOptions {
  url: string;
  /** Seconds between reconnect attempts. */
  reconnectInterval?: number;
  /** Seconds between the sync request and the catalog request after connecting. */
  catalogDelay?: number;
  /** Seconds between drift checks while connected. */
  driftInterval?: number;
}

type SupervisorState = 'disconnected' | 'connecting' | 'ready' | 'stopped';

/**
 * Owns the socket to the server. Reconnects with a fixed backoff after an
 * unexpected close, and stays down while the engine idles.
 */
export class ReconnectionSupervisor implements PlaybackLink {
  private ws: WebSocket | null = null;
  private channel: ProtocolChannel<ServerMessage, ClientRequest> | null = null;
  private state: SupervisorState = 'disconnected';
  private reconnectTimer: NodeJS.Timeout | null = null;
  private catalogTimer: NodeJS.Timeout | null = null;
  private driftTimer: NodeJS.Timeout | null = null;

  private readonly reconnectMs: number;
  private readonly catalogDelayMs: number;
  private readonly driftMs: number;

  constructor(
    private readonly engine: ClientPlaybackEngine,
    private readonly options: SupervisorOptions
  ) {
    this.reconnectMs = (options.reconnectInterval ?? 5) * 1000;
    this.catalogDelayMs = (options.catalogDelay ?? 0.5) * 1000;
    this.driftMs = (options.driftInterval ?? 300) * 1000;
    engine.bind(this);
  }

  get connected(): boolean {
    return this.state === 'ready';
  }

  connect(): void {
    if (this.state !== 'disconnected') return;
    if (this.engine.isIdle) {
      log.debug('Idle, not connecting');
      return;
    }
    this.clearReconnect();

    this.state = 'connecting';
    this.engine.markConnecting();
    log.info(`Connecting to ${this.options.url}...`);

    const ws = new WebSocket(this.options.url);
    const channel = new ProtocolChannel<ServerMessage, ClientRequest>(ws, {
      label: 'server',
      schema: ServerMessageSchema,
      knownCommands: SERVER_COMMANDS,
      logger: log
    });
    this.ws = ws;
    this.channel = channel;

    channel.onMessage((message) => {
      // frames still in flight on a socket released by close()
      if (ws !== this.ws) return;
      this.engine.handleMessage(message);
    });
    channel.onClose((code) => this.handleClose(ws, code));
    ws.on('open', () => this.handleOpen(ws));
    ws.on('error', (error) => log.warn(`Connection error: ${error.message}`));
  }

  send(request: ClientRequest): void {
    if (!this.channel) {
      throw new TransportError('Not connected to server');
    }
    this.channel.send(request);
  }

  /** Drops the connection without scheduling a reconnect. */
  close(): void {
    this.clearReconnect();
    const channel = this.channel;
    this.detach();
    if (this.state !== 'stopped') {
      this.state = 'disconnected';
    }
    this.engine.markDisconnected();
    if (channel) {
      channel.close('client idle');
      log.info('Socket disconnected');
    }
  }

  stop(): void {
    this.state = 'stopped';
    this.close();
  }

  private handleOpen(ws: WebSocket): void {
    if (ws !== this.ws) return;
    this.state = 'ready';
    this.engine.markConnected();
    log.info(`Connected to server at ${this.options.url}`);

    this.engine.requestSync();
    this.catalogTimer = setTimeout(() => {
      this.catalogTimer = null;
      this.engine.requestCatalog();
    }, this.catalogDelayMs);
    this.driftTimer = setInterval(() => this.engine.checkDrift(), this.driftMs);
  }

  private handleClose(ws: WebSocket, code: number): void {
    // a socket we already let go of
    if (ws !== this.ws) return;

    const wasReady = this.state === 'ready';
    this.detach();
    this.state = 'disconnected';
    this.engine.markDisconnected();
    log.warn(wasReady ? `Connection to server lost (${code})` : 'Could not connect to server');

    if (this.engine.isIdle) {
      log.info('In idle mode, will reconnect when needed');
      return;
    }
    log.info(`Retrying in ${this.reconnectMs / 1000} seconds...`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, this.reconnectMs);
  }

  private detach(): void {
    if (this.catalogTimer) {
      clearTimeout(this.catalogTimer);
      this.catalogTimer = null;
    }
    if (this.driftTimer) {
      clearInterval(this.driftTimer);
      this.driftTimer = null;
    }
    this.ws = null;
    this.channel = null;
  }

  private clearReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
