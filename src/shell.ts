import readline from 'readline';
import { ConsoleDisplay } from './playback/display';
import { ClientPlaybackEngine } from './playback/engine';

export const CLIENT_HELP = [
  'Keys:',
  '  p - Pause or resume ads',
  '  s - Force a full sync with the server',
  '  i - Show playback status',
  '  x - Simulate a click on the display',
  '  q - Quit',
  '  ? - Show this help'
];

export interface KeyResult {
  lines: string[];
  quit?: boolean;
}

export function runClientKey(engine: ClientPlaybackEngine, display: ConsoleDisplay, key: string): KeyResult {
  switch (key.trim().toLowerCase()) {
    case '':
      return { lines: [] };
    case 'p':
      engine.toggleLocalPause();
      return { lines: [`Status: ${engine.status()}`] };
    case 's':
      engine.forceSync();
      return { lines: ['Sync requested'] };
    case 'i': {
      const d = engine.describe();
      return {
        lines: [
          `Client ${engine.clientId}: ${d.status} (connection: ${d.connection}, idle: ${d.idle ? 'yes' : 'no'})`,
          `Server playback: ${d.isPlaying ? 'playing' : 'paused'}${d.locallyPaused ? ' (paused locally)' : ''}`,
          d.catalogSize === 0
            ? 'No ads received yet'
            : `Ad ${d.currentIndex + 1}/${d.catalogSize}: ${d.currentLabel ?? '-'}` +
              ` | elapsed ${d.elapsed.toFixed(1)}s | remaining ${d.remaining.toFixed(1)}s | duration ${d.itemDuration}s`
        ]
      };
    }
    case 'x':
      display.interact();
      return { lines: [`Status: ${engine.status()}`] };
    case '?':
    case 'help':
      return { lines: CLIENT_HELP };
    case 'q':
    case 'quit':
      return { lines: [], quit: true };
    default:
      return { lines: ["Unknown key. Type '?' for help."] };
  }
}

export function startClientShell(
  engine: ClientPlaybackEngine,
  display: ConsoleDisplay,
  onQuit: () => void,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): readline.Interface {
  const rl = readline.createInterface({ input, output });
  output.write([`Ad Display Client ${engine.clientId}`, ...CLIENT_HELP, ''].join('\n'));

  rl.on('line', (line) => {
    const result = runClientKey(engine, display, line);
    if (result.lines.length > 0) output.write(result.lines.join('\n') + '\n');
    if (result.quit) {
      rl.close();
      onQuit();
    }
  });
  return rl;
}
