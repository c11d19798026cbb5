import { TransportError } from '../../common/errors';
import { createLogger } from '../../common/logging';
import { Clock, ServerMessage } from '../../common/types';

const log = createLogger('SESSIONS');

/** The slice of ProtocolChannel the registry needs. */
export interface ServerChannel {
  readonly label: string;
  send(message: ServerMessage): void;
  probe(): boolean;
  close(reason?: string): void;
}

export interface ClientSession {
  channel: ServerChannel;
  remoteAddress: string;
  clientId: string | null;
  connectedAt: number;
  lastActive: number;
}

export interface SessionSummary {
  connection: string;
  remoteAddress: string;
  clientId: string | null;
  connectedAt: number;
  idleFor: number;
}

export const DEFAULT_STALE_AFTER = 60;

function describe(session: ClientSession): string {
  return `${session.clientId ?? 'unknown'} (${session.remoteAddress})`;
}

/**
 * Live client connections keyed by channel. Broadcasts iterate a copy of the
 * set, and a failed write evicts the session on the spot.
 */
export class SessionRegistry {
  private readonly sessions = new Map<ServerChannel, ClientSession>();

  constructor(
    private readonly clock: Clock,
    private readonly staleAfter = DEFAULT_STALE_AFTER
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  register(channel: ServerChannel, remoteAddress: string): ClientSession {
    const now = this.clock();
    const session: ClientSession = {
      channel,
      remoteAddress,
      clientId: null,
      connectedAt: now,
      lastActive: now
    };
    this.sessions.set(channel, session);
    log.info(`Client connected from ${remoteAddress} on ${channel.label}, ${this.sessions.size} live`);
    return session;
  }

  get(channel: ServerChannel): ClientSession | undefined {
    return this.sessions.get(channel);
  }

  /** Marks activity; a client id, when present, replaces the bound one. */
  touch(channel: ServerChannel, clientId?: string): void {
    const session = this.sessions.get(channel);
    if (!session) return;
    session.lastActive = this.clock();
    if (clientId && clientId !== session.clientId) {
      log.debug(`Bound client id ${clientId} to ${channel.label}`);
      session.clientId = clientId;
    }
  }

  evict(channel: ServerChannel, reason: string): boolean {
    const session = this.sessions.get(channel);
    if (!session) return false;
    this.sessions.delete(channel);
    channel.close(reason);
    log.info(`Client ${describe(session)} disconnected: ${reason}`);
    return true;
  }

  list(): ClientSession[] {
    return [...this.sessions.values()];
  }

  summaries(): SessionSummary[] {
    const now = this.clock();
    return this.list().map((session) => ({
      connection: session.channel.label,
      remoteAddress: session.remoteAddress,
      clientId: session.clientId,
      connectedAt: session.connectedAt,
      idleFor: now - session.lastActive
    }));
  }

  /** Sends to one session; a failure evicts it. Returns whether it was sent. */
  send(channel: ServerChannel, message: ServerMessage): boolean {
    try {
      channel.send(message);
      return true;
    } catch (error) {
      const session = this.sessions.get(channel);
      log.warn(
        `Failed to send ${message.command} to ${session ? describe(session) : channel.label}:`,
        error instanceof TransportError ? error.message : error
      );
      this.evict(channel, 'write failed');
      return false;
    }
  }

  broadcast(message: ServerMessage): number {
    const targets = this.list();
    let sent = 0;
    for (const session of targets) {
      if (this.send(session.channel, message)) sent++;
    }
    log.info(`Broadcast ${message.command} to ${sent}/${targets.length} clients`);
    return sent;
  }

  /**
   * Probes every session idle past the staleness threshold and evicts the
   * ones whose probe cannot be written. Returns the number evicted.
   */
  sweep(): number {
    const now = this.clock();
    const stale = this.list().filter((session) => now - session.lastActive > this.staleAfter);
    let evicted = 0;
    for (const session of stale) {
      if (!session.channel.probe()) {
        log.info(`Removing stale client ${describe(session)} - no response`);
        if (this.evict(session.channel, 'stale')) evicted++;
      }
    }
    return evicted;
  }

  closeAll(reason: string): void {
    for (const session of this.list()) {
      this.evict(session.channel, reason);
    }
  }
}
