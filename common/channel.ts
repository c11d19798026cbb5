import WebSocket, { RawData } from 'ws';
import { z } from 'zod';
import { TransportError } from './errors';
import { FrameDecoder, decodeFrame, encodeFrame } from './framing';
import { Logger } from './logging';

export interface ChannelOptions<In> {
  /** Name used in log lines, e.g. a connection id. */
  label: string;
  schema: z.ZodType<In, z.ZodTypeDef, unknown>;
  knownCommands: readonly string[];
  logger: Logger;
}

function toText(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Newline-delimited JSON over one WebSocket. Inbound messages go through a
 * FrameDecoder, so several frames per message, or one frame spread over
 * several messages, both decode. Bad frames are logged and dropped.
 */
export class ProtocolChannel<In, Out extends object> {
  private readonly decoder = new FrameDecoder();
  private handler: ((message: In) => void) | null = null;

  constructor(
    private readonly socket: WebSocket,
    private readonly options: ChannelOptions<In>
  ) {
    socket.on('message', (data) => this.receive(data));
  }

  get label(): string {
    return this.options.label;
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  onMessage(handler: (message: In) => void): void {
    this.handler = handler;
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.socket.once('close', (code, reason) => listener(code, reason.toString()));
  }

  /** Fires on every inbound message, valid or not, and on every pong. */
  onActivity(listener: () => void): void {
    this.socket.on('message', listener);
    this.socket.on('pong', listener);
  }

  /**
   * Writes one frame. Throws TransportError when the connection is not open;
   * a write that fails later terminates the socket, which surfaces as a close.
   */
  send(message: Out): void {
    if (!this.isOpen) {
      throw new TransportError(`Connection ${this.label} is not open`);
    }
    const frame = encodeFrame(message);
    try {
      this.socket.send(frame, (error) => {
        if (error) {
          this.options.logger.error(`Write to ${this.label} failed:`, error);
          this.socket.terminate();
        }
      });
    } catch (error) {
      throw new TransportError(`Write to ${this.label} failed`, error);
    }
    this.options.logger.debug(`Sent ${frame.length} bytes to ${this.label}`);
  }

  /** Liveness probe. False means the ping could not be written. */
  probe(): boolean {
    if (!this.isOpen) {
      return false;
    }
    try {
      this.socket.ping(undefined, undefined, (error) => {
        if (error) {
          this.options.logger.warn(`Ping to ${this.label} failed:`, error);
          this.socket.terminate();
        }
      });
      return true;
    } catch (error) {
      this.options.logger.warn(`Ping to ${this.label} failed:`, error);
      return false;
    }
  }

  close(reason = 'closing'): void {
    this.decoder.reset();
    if (this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.terminate();
    } else if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(1000, reason);
    }
  }

  private receive(data: RawData): void {
    const text = toText(data);
    this.options.logger.debug(
      `Received from ${this.label}: ${text.substring(0, 100)}${text.length > 100 ? '...' : ''}`
    );

    for (const frame of this.decoder.push(text)) {
      const result = decodeFrame(frame, this.options.schema, this.options.knownCommands);
      switch (result.kind) {
        case 'ok':
          this.dispatch(result.message);
          break;
        case 'unknown':
          this.options.logger.warn(`Unknown command '${result.command}' from ${this.label}`);
          break;
        case 'malformed':
          this.options.logger.error(
            `Invalid message format from ${this.label} (${result.error.code}): ${frame.substring(0, 100)}`
          );
          break;
      }
    }
  }

  private dispatch(message: In): void {
    if (!this.handler) {
      this.options.logger.warn(`No handler attached on ${this.label}, dropping frame`);
      return;
    }
    try {
      this.handler(message);
    } catch (error) {
      this.options.logger.error(`Error processing message from ${this.label}:`, error);
    }
  }
}
