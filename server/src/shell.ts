import readline from 'readline';
import { OperatorApi } from './router';

export const SERVER_HELP = [
  'Commands:',
  '  play/pause         - Toggle between playing and pausing ad display',
  '  list               - Show the current ad list',
  '  add <label>        - Add a new ad with a placeholder image',
  '  remove <id>        - Remove an ad by ID',
  '  scan               - Scan the ads directory for new files',
  '  duration <seconds> - Set the duration for each ad',
  '  clients            - Show connected clients',
  '  status             - Show the playback position',
  '  help               - Show this help',
  '  exit               - Shutdown the server'
];

export interface ShellResult {
  lines: string[];
  exit?: boolean;
}

/** Runs one operator command line and returns what to print. */
export async function runServerCommand(api: OperatorApi, input: string): Promise<ShellResult> {
  const line = input.trim();
  const [word = '', ...rest] = line.split(/\s+/);
  const argument = rest.join(' ');

  switch (word.toLowerCase()) {
    case '':
      return { lines: [] };
    case 'play':
    case 'pause': {
      const state = await api.togglePlayback();
      return { lines: [`Ad display ${state.isPlaying ? 'playing' : 'paused'}`] };
    }
    case 'list': {
      const ads = api.listEntries();
      return {
        lines: [
          `Current ads (${ads.length}):`,
          ...ads.map((ad) => `  ID: ${ad.id}, Label: ${ad.label}, File: ${ad.path ?? '-'}`)
        ]
      };
    }
    case 'add': {
      if (!argument) return { lines: ['Usage: add <label>'] };
      const created = await api.addEntry({ label: argument });
      return { lines: [`Added new ad: ${created.label} (ID: ${created.id}, File: ${created.path})`] };
    }
    case 'remove': {
      const id = Number(argument);
      if (!Number.isInteger(id) || id <= 0) return { lines: ['Invalid ad ID'] };
      const removed = await api.removeEntry(id);
      return { lines: [removed ? `Removed ad ID: ${id}` : `No ad with ID ${id}`] };
    }
    case 'scan': {
      const changed = await api.rescan();
      const size = api.listEntries().length;
      return { lines: [changed ? `Updated ad list, now contains ${size} ads` : `No changes, ${size} ads`] };
    }
    case 'duration': {
      const seconds = Number(argument);
      if (!argument || !Number.isFinite(seconds)) return { lines: ['Invalid duration value'] };
      if (seconds <= 0) return { lines: ['Duration must be greater than 0'] };
      await api.setItemDuration(seconds);
      return { lines: [`Ad duration set to ${seconds} seconds`] };
    }
    case 'clients': {
      const sessions = api.listSessions();
      return {
        lines: [
          `Connected clients (${sessions.length}):`,
          ...sessions.map(
            (s) =>
              `  Client: ${s.clientId ?? 'unknown'}, Address: ${s.remoteAddress}, Last active: ${s.idleFor.toFixed(1)}s ago`
          )
        ]
      };
    }
    case 'status': {
      const status = await api.status();
      return {
        lines: [
          `${status.isPlaying ? 'Playing' : 'Paused'} | ad ${status.currentIndex + 1}/${status.catalogSize}` +
            ` | remaining ${status.remaining.toFixed(1)}s | duration ${status.itemDuration}s | ${status.sessions} clients`
        ]
      };
    }
    case 'help':
      return { lines: SERVER_HELP };
    case 'exit':
      return { lines: [], exit: true };
    default:
      return { lines: ["Unknown command. Type 'help' for available commands."] };
  }
}

export function startServerShell(
  api: OperatorApi,
  onExit: () => void,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): readline.Interface {
  const rl = readline.createInterface({ input, output, prompt: '> ' });
  output.write(['Ad Server CLI', ...SERVER_HELP, ''].join('\n'));
  rl.prompt();

  rl.on('line', (line) => {
    runServerCommand(api, line)
      .then((result) => {
        if (result.lines.length > 0) output.write(result.lines.join('\n') + '\n');
        if (result.exit) {
          rl.close();
          onExit();
          return;
        }
        rl.prompt();
      })
      .catch((error) => {
        output.write(`Command failed: ${error instanceof Error ? error.message : String(error)}\n`);
        rl.prompt();
      });
  });
  return rl;
}
