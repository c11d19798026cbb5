import { loadClientConfig, serverUrl } from '../config';

describe('client config', () => {
  it('uses defaults', () => {
    const config = loadClientConfig([], {});
    expect(config).toMatchObject({
      server: 'localhost',
      port: 5000,
      idleTimeout: 0,
      reconnectInterval: 5,
      driftInterval: 300
    });
    expect(config.clientId).toMatch(/^client_\d{4}$/);
    expect(serverUrl(config)).toBe('ws://localhost:5000');
  });

  it('prefers flags over environment variables', () => {
    const config = loadClientConfig(['node', 'client', '--server=10.0.0.2', '--id=lobby', '--idle-timeout=45'], {
      AD_SERVER_HOST: 'ignored',
      AD_SERVER_PORT: '6001'
    });
    expect(config).toMatchObject({ server: '10.0.0.2', port: 6001, clientId: 'lobby', idleTimeout: 45 });
  });

  it('rejects invalid numbers', () => {
    expect(() => loadClientConfig(['--port=zero'], {})).toThrow();
    expect(() => loadClientConfig(['--reconnect-interval=0'], {})).toThrow();
  });
});
