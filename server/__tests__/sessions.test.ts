import { TransportError } from '../../common/errors';
import { ServerMessage } from '../../common/types';
import { ServerChannel, SessionRegistry } from '../src/sessions';

class FakeChannel implements ServerChannel {
  readonly sent: ServerMessage[] = [];
  closedWith: string | undefined;
  failWrites = false;
  probeResult = true;

  constructor(readonly label: string) {}

  send(message: ServerMessage): void {
    if (this.failWrites) throw new TransportError(`Connection ${this.label} is not open`);
    this.sent.push(message);
  }

  probe(): boolean {
    return this.probeResult;
  }

  close(reason?: string): void {
    this.closedWith = reason;
  }
}

const adList: ServerMessage = { command: 'ad_list', ads: [] };

describe('SessionRegistry', () => {
  let now: number;
  let registry: SessionRegistry;

  beforeEach(() => {
    now = 1000;
    registry = new SessionRegistry(() => now, 60);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('registers sessions and binds the latest client id', () => {
    const channel = new FakeChannel('conn_1');
    registry.register(channel, '10.0.0.5');
    now = 1005;
    registry.touch(channel, 'client_1111');
    now = 1010;
    registry.touch(channel, 'client_2222');
    registry.touch(channel);

    expect(registry.get(channel)).toMatchObject({
      clientId: 'client_2222',
      remoteAddress: '10.0.0.5',
      connectedAt: 1000,
      lastActive: 1010
    });
    now = 1013;
    expect(registry.summaries()).toEqual([
      { connection: 'conn_1', remoteAddress: '10.0.0.5', clientId: 'client_2222', connectedAt: 1000, idleFor: 3 }
    ]);
  });

  it('evicts once and closes the channel', () => {
    const channel = new FakeChannel('conn_1');
    registry.register(channel, 'a');
    expect(registry.evict(channel, 'bye')).toBe(true);
    expect(registry.evict(channel, 'again')).toBe(false);
    expect(channel.closedWith).toBe('bye');
    expect(registry.size).toBe(0);
  });

  it('broadcasts to every session and evicts the ones whose write fails', () => {
    const good = new FakeChannel('conn_1');
    const broken = new FakeChannel('conn_2');
    broken.failWrites = true;
    registry.register(good, 'a');
    registry.register(broken, 'b');

    expect(registry.broadcast(adList)).toBe(1);
    expect(good.sent).toEqual([adList]);
    expect(broken.closedWith).toBe('write failed');
    expect(registry.list().map((s) => s.channel)).toEqual([good]);
  });

  it('returns a copy from list', () => {
    const channel = new FakeChannel('conn_1');
    registry.register(channel, 'a');
    const snapshot = registry.list();
    registry.evict(channel, 'gone');
    expect(snapshot).toHaveLength(1);
    expect(registry.list()).toHaveLength(0);
  });

  it('sweeps only stale sessions whose probe fails', () => {
    const fresh = new FakeChannel('fresh');
    const staleAlive = new FakeChannel('stale-alive');
    const staleDead = new FakeChannel('stale-dead');
    staleDead.probeResult = false;
    fresh.probeResult = false;

    registry.register(staleAlive, 'a');
    registry.register(staleDead, 'b');
    now = 1050;
    registry.register(fresh, 'c');
    now = 1061;

    expect(registry.sweep()).toBe(1);
    expect(staleDead.closedWith).toBe('stale');
    expect(registry.size).toBe(2);
    expect(staleAlive.closedWith).toBeUndefined();
    expect(fresh.closedWith).toBeUndefined();
  });

  it('closes everything on closeAll', () => {
    const a = new FakeChannel('a');
    const b = new FakeChannel('b');
    registry.register(a, 'x');
    registry.register(b, 'y');
    registry.closeAll('server shutdown');
    expect([a.closedWith, b.closedWith]).toEqual(['server shutdown', 'server shutdown']);
    expect(registry.size).toBe(0);
  });
});
