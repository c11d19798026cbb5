import { Logger, createLogger } from '../../common/logging';
import { MediaEntry } from '../../common/types';

/**
 * Where entries end up on screen. Rendering and window management live
 * behind this interface; the engine only hands over an entry and its file.
 */
export interface DisplaySink {
  show(entry: MediaEntry, localPath: string): void;
  clear(): void;
  /** Key presses or clicks on the display surface. */
  onInteraction(listener: () => void): void;
}

/** Prints what would be on screen. Interactions come from the key shell. */
export class ConsoleDisplay implements DisplaySink {
  private readonly listeners: Array<() => void> = [];
  private current: MediaEntry | null = null;
  private readonly log: Logger;

  constructor(clientId: string, log?: Logger) {
    this.log = log ?? createLogger(`DISPLAY ${clientId}`);
  }

  show(entry: MediaEntry, localPath: string): void {
    this.current = entry;
    this.log.info(`DISPLAYING AD ${entry.id}: ${entry.label} (${localPath})`);
  }

  clear(): void {
    if (this.current) {
      this.log.info('Display cleared');
    }
    this.current = null;
  }

  onInteraction(listener: () => void): void {
    this.listeners.push(listener);
  }

  interact(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
