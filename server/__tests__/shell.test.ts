import { runServerCommand, SERVER_HELP } from '../src/shell';
import { FakeOperatorApi } from './fakeApi';

describe('server shell', () => {
  let api: FakeOperatorApi;

  beforeEach(() => {
    api = new FakeOperatorApi();
  });

  it('toggles playback', async () => {
    expect(await runServerCommand(api, 'pause')).toEqual({ lines: ['Ad display paused'] });
    expect(await runServerCommand(api, 'play')).toEqual({ lines: ['Ad display playing'] });
  });

  it('lists ads', async () => {
    expect((await runServerCommand(api, 'list')).lines).toEqual([
      'Current ads (2):',
      '  ID: 1, Label: Coffee, File: coffee.png',
      '  ID: 2, Label: Tea, File: -'
    ]);
  });

  it('adds an ad with a multi-word label', async () => {
    expect((await runServerCommand(api, 'add  Spring   Sale')).lines).toEqual([
      'Added new ad: Spring Sale (ID: 3, File: ad_3.svg)'
    ]);
    expect((await runServerCommand(api, 'add')).lines).toEqual(['Usage: add <label>']);
  });

  it('removes an ad', async () => {
    expect((await runServerCommand(api, 'remove 1')).lines).toEqual(['Removed ad ID: 1']);
    expect((await runServerCommand(api, 'remove 1')).lines).toEqual(['No ad with ID 1']);
    expect((await runServerCommand(api, 'remove abc')).lines).toEqual(['Invalid ad ID']);
  });

  it('validates the duration', async () => {
    expect((await runServerCommand(api, 'duration x')).lines).toEqual(['Invalid duration value']);
    expect((await runServerCommand(api, 'duration -2')).lines).toEqual(['Duration must be greater than 0']);
    expect((await runServerCommand(api, 'duration 7.5')).lines).toEqual(['Ad duration set to 7.5 seconds']);
    expect(api.itemDuration).toBe(7.5);
  });

  it('reports scan results', async () => {
    expect((await runServerCommand(api, 'scan')).lines).toEqual(['No changes, 2 ads']);
    api.rescanResult = true;
    expect((await runServerCommand(api, 'scan')).lines).toEqual(['Updated ad list, now contains 2 ads']);
  });

  it('shows connected clients', async () => {
    api.sessions = [
      { connection: 'conn_1', remoteAddress: '127.0.0.1', clientId: null, connectedAt: 0, idleFor: 1.25 }
    ];
    expect((await runServerCommand(api, 'clients')).lines).toEqual([
      'Connected clients (1):',
      '  Client: unknown, Address: 127.0.0.1, Last active: 1.3s ago'
    ]);
  });

  it('shows the playback status', async () => {
    expect((await runServerCommand(api, 'STATUS')).lines).toEqual([
      'Playing | ad 2/2 | remaining 2.5s | duration 10s | 0 clients'
    ]);
  });

  it('prints help, exits and rejects unknown commands', async () => {
    expect(await runServerCommand(api, 'help')).toEqual({ lines: SERVER_HELP });
    expect(await runServerCommand(api, 'exit')).toEqual({ lines: [], exit: true });
    expect(await runServerCommand(api, '   ')).toEqual({ lines: [] });
    expect((await runServerCommand(api, 'reboot')).lines).toEqual([
      "Unknown command. Type 'help' for available commands."
    ]);
  });
});
