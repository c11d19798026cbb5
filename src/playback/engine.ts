import { createLogger, Logger } from '../../common/logging';
import { rotationPosition } from '../../common/rotation';
import {
  AdListMessage,
  ClientRequest,
  Clock,
  FileTransferMessage,
  MediaEntry,
  ServerMessage,
  SyncMessage,
  assertNever,
  systemClock
} from '../../common/types';
import { MediaLibrary } from '../utils/mediaCache';
import { DisplaySink } from './display';

export const DEFAULT_RENDER_INTERVAL_MS = 100;

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export type EngineStatus =
  | 'disconnected'
  | 'connecting'
  | 'playing'
  | 'paused_server'
  | 'paused_local'
  | 'idle';

/** Why the next sync re-anchors the local clock instead of a light update. */
export type ResyncReason = 'initial' | 'reconnect' | 'resume' | 'drift' | 'forced' | 'server_state';

/**
 * The connection the engine talks through. The reconnection supervisor
 * implements it; tests pass a recorder.
 */
export interface PlaybackLink {
  /** Throws when there is no open connection. */
  send(request: ClientRequest): void;
  connect(): void;
  close(): void;
}

export interface EngineOptions {
  clientId: string;
  display: DisplaySink;
  media: MediaLibrary;
  clock?: Clock;
  /** Seconds before idle mode resumes by itself. 0 keeps idling until asked. */
  idleTimeout?: number;
  renderIntervalMs?: number;
  logger?: Logger;
}

export interface EngineDescription {
  status: EngineStatus;
  connection: ConnectionState;
  isPlaying: boolean;
  locallyPaused: boolean;
  idle: boolean;
  catalogSize: number;
  currentIndex: number;
  currentLabel: string | null;
  elapsed: number;
  remaining: number;
  itemDuration: number;
  startTime: number;
  pauseElapsed: number;
  serverOffset: number;
}

/**
 * Client-side playback state. Every transition runs on the event loop, one
 * at a time: inbound frames, timers and user input never interleave, so the
 * state needs no lock.
 */
export class ClientPlaybackEngine {
  readonly clientId: string;

  private link: PlaybackLink | null = null;
  private connection: ConnectionState = 'disconnected';
  private idle = false;
  private locallyPaused = false;
  private isPlaying = false;
  private initialSyncDone = false;
  private pendingResync: ResyncReason | null = null;
  private lastServerPlaying: boolean | null = null;

  private startTime = 0;
  private pauseElapsed = 0;
  private serverOffset = 0;
  private itemDuration = 10;
  private catalog: MediaEntry[] = [];
  private lastRenderedIndex = -1;

  private idleTimer: NodeJS.Timeout | null = null;
  private renderTimer: NodeJS.Timeout | null = null;

  private readonly display: DisplaySink;
  private readonly media: MediaLibrary;
  private readonly now: Clock;
  private readonly idleTimeout: number;
  private readonly renderIntervalMs: number;
  private readonly log: Logger;

  constructor(options: EngineOptions) {
    this.clientId = options.clientId;
    this.display = options.display;
    this.media = options.media;
    this.now = options.clock ?? systemClock;
    this.idleTimeout = options.idleTimeout ?? 0;
    this.renderIntervalMs = options.renderIntervalMs ?? DEFAULT_RENDER_INTERVAL_MS;
    this.log = options.logger ?? createLogger(`CLIENT ${options.clientId}`);

    this.display.onInteraction(() => this.handleInteraction());
  }

  bind(link: PlaybackLink): void {
    this.link = link;
  }

  /** Arms the render loop. */
  start(): void {
    if (this.renderTimer) return;
    this.renderTimer = setInterval(() => this.tick(), this.renderIntervalMs);
  }

  stop(): void {
    if (this.renderTimer) {
      clearInterval(this.renderTimer);
      this.renderTimer = null;
    }
    this.cancelIdleTimer();
  }

  get isIdle(): boolean {
    return this.idle;
  }

  get connectionState(): ConnectionState {
    return this.connection;
  }

  get entries(): MediaEntry[] {
    return [...this.catalog];
  }

  status(): EngineStatus {
    if (this.idle) return 'idle';
    if (this.locallyPaused) return 'paused_local';
    if (this.connection !== 'connected') return this.connection;
    return this.isPlaying ? 'playing' : 'paused_server';
  }

  markConnecting(): void {
    this.connection = 'connecting';
  }

  markConnected(): void {
    this.connection = 'connected';
    if (this.initialSyncDone && !this.pendingResync) {
      this.pendingResync = 'reconnect';
    }
  }

  markDisconnected(): void {
    this.connection = 'disconnected';
  }

  requestSync(): boolean {
    return this.send({ command: 'get_sync', client_id: this.clientId });
  }

  requestCatalog(): boolean {
    return this.send({ command: 'get_ads', client_id: this.clientId });
  }

  requestFile(filename: string): boolean {
    this.log.info(`Requesting file: ${filename}`);
    return this.send({ command: 'get_file', client_id: this.clientId, filename });
  }

  handleMessage(message: ServerMessage, receivedAt = this.now()): void {
    switch (message.command) {
      case 'sync':
        this.handleSync(message, receivedAt);
        break;
      case 'ad_list':
        this.handleAdList(message);
        break;
      case 'file_transfer':
        this.handleFileTransfer(message);
        break;
      default:
        assertNever(message);
    }
  }

  /**
   * Full resync re-anchors the local start time to the server's elapsed
   * position. A light update only takes the flags and the offset, so the
   * running rotation does not jump.
   */
  handleSync(message: SyncMessage, receivedAt = this.now()): void {
    const reason = this.resyncReason(message);
    if (reason) {
      const delay = receivedAt - message.server_time;
      const anchor = message.timestamp - message.elapsed_time;
      this.startTime = anchor - delay;
      this.pauseElapsed = message.elapsed_time;
      this.lastRenderedIndex = -1;
      this.pendingResync = null;
      this.initialSyncDone = true;
      this.log.info(`Performing full timing synchronization (${reason}, network delay: ${delay.toFixed(3)}s)`);
    }

    this.serverOffset = message.server_time - receivedAt;
    this.itemDuration = message.ad_duration;
    this.lastServerPlaying = message.is_playing;
    if (!this.locallyPaused) {
      this.isPlaying = message.is_playing;
    }

    this.log.debug(
      `Sync: server ${message.is_playing ? 'playing' : 'paused'}, ad ${message.current_ad_index}, ` +
        `remaining ${message.remaining_time.toFixed(1)}s, offset ${this.serverOffset.toFixed(3)}s`
    );
  }

  handleAdList(message: AdListMessage): void {
    this.catalog = message.ads;
    this.lastRenderedIndex = -1;
    this.log.info(`Received ad list with ${message.ads.length} ads`);

    for (const entry of message.ads) {
      if (entry.path && !this.hasMedia(entry.path)) {
        this.requestFile(entry.path);
      }
    }
  }

  handleFileTransfer(message: FileTransferMessage): void {
    this.media
      .save(message.filename, message.content)
      .then((savedTo) => {
        this.log.info(`Saved file: ${savedTo}`);
        const current = this.currentEntry();
        if (current && current.path === message.filename) {
          this.lastRenderedIndex = -1;
        }
      })
      .catch((error) => this.log.error(`Error saving file ${message.filename}:`, error));
  }

  /** Pause locally if playing, resume from idle if locally paused. */
  toggleLocalPause(): void {
    if (this.locallyPaused || this.idle) {
      this.resume('user request');
      return;
    }
    if (!this.isPlaying) {
      this.log.info('Playback is paused by the server, nothing to pause locally');
      return;
    }
    this.pauseLocally();
  }

  handleInteraction(): void {
    if (this.idle || !this.isPlaying) return;
    this.log.info('User interaction detected, pausing ads');
    this.pauseLocally();
  }

  resume(why: string): void {
    if (!this.idle && !this.locallyPaused) return;
    this.log.info(`Resuming playback (${why})`);
    this.locallyPaused = false;
    this.exitIdle();
  }

  /** Periodic drift correction: the next sync re-anchors the clock. */
  checkDrift(): void {
    if (this.connection !== 'connected' || this.idle || !this.isPlaying || this.catalog.length === 0) {
      return;
    }
    this.log.info('Checking for time drift...');
    this.pendingResync = 'drift';
    this.requestSync();
  }

  forceSync(): void {
    if (this.idle) {
      this.resume('manual sync');
      return;
    }
    this.pendingResync = 'forced';
    this.requestSync();
    this.requestCatalog();
  }

  /** One render pass: shows the entry the local clock points at, on change. */
  tick(): void {
    if (this.idle || !this.isPlaying || !this.initialSyncDone || this.catalog.length === 0) return;

    const { index } = this.position();
    if (index === this.lastRenderedIndex) return;
    this.lastRenderedIndex = index;

    const entry = this.catalog[index];
    if (!entry) return;
    if (!entry.path || !this.hasMedia(entry.path)) {
      this.log.warn(`Skipping ad ${entry.id} (${entry.label}): file not available locally`);
      return;
    }
    this.display.show(entry, this.media.pathFor(entry.path));
  }

  describe(): EngineDescription {
    const position = this.position();
    return {
      status: this.status(),
      connection: this.connection,
      isPlaying: this.isPlaying,
      locallyPaused: this.locallyPaused,
      idle: this.idle,
      catalogSize: this.catalog.length,
      currentIndex: position.index,
      currentLabel: this.currentEntry()?.label ?? null,
      elapsed: position.elapsed,
      remaining: position.remaining,
      itemDuration: this.itemDuration,
      startTime: this.startTime,
      pauseElapsed: this.pauseElapsed,
      serverOffset: this.serverOffset
    };
  }

  private position(): { elapsed: number; index: number; remaining: number } {
    const raw = this.isPlaying ? this.now() - this.startTime : this.pauseElapsed;
    return rotationPosition(raw, this.itemDuration, this.catalog.length);
  }

  private currentEntry(): MediaEntry | undefined {
    if (this.catalog.length === 0) return undefined;
    return this.catalog[this.position().index];
  }

  private hasMedia(filename: string): boolean {
    try {
      return this.media.has(filename);
    } catch (error) {
      this.log.warn(`Cannot use media file ${filename}:`, error);
      return false;
    }
  }

  private resyncReason(message: SyncMessage): ResyncReason | null {
    if (!this.initialSyncDone) return 'initial';
    if (this.pendingResync) return this.pendingResync;
    if (this.lastServerPlaying !== null && message.is_playing !== this.lastServerPlaying) {
      return 'server_state';
    }
    return null;
  }

  private pauseLocally(): void {
    this.pauseElapsed = this.position().elapsed;
    this.isPlaying = false;
    this.locallyPaused = true;
    this.log.info('Ads paused locally');
    this.enterIdle();
  }

  private enterIdle(): void {
    if (this.idle) return;
    this.idle = true;
    this.lastRenderedIndex = -1;
    this.display.clear();
    this.log.info('Entering idle mode, disconnecting from server');
    this.link?.close();
    this.armIdleTimer();
  }

  private exitIdle(): void {
    if (!this.idle) return;
    this.cancelIdleTimer();
    this.idle = false;
    this.pendingResync = 'resume';
    this.log.info('Exiting idle mode');
    if (this.connection === 'disconnected') {
      this.link?.connect();
    } else {
      this.requestSync();
    }
  }

  private armIdleTimer(): void {
    this.cancelIdleTimer();
    if (this.idleTimeout <= 0) return;
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.resume(`idle timeout after ${this.idleTimeout}s`);
    }, this.idleTimeout * 1000);
  }

  private cancelIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private send(request: ClientRequest): boolean {
    if (!this.link || this.connection !== 'connected' || this.idle) {
      this.log.debug(`Not sending ${request.command}: ${this.idle ? 'idle' : this.connection}`);
      return false;
    }
    try {
      this.link.send(request);
      this.log.debug(`Sent ${request.command} request`);
      return true;
    } catch (error) {
      this.log.warn(`Failed to send ${request.command}:`, error);
      return false;
    }
  }
}
