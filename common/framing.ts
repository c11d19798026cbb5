import { z } from 'zod';
import { ProtocolError } from './errors';

export const FRAME_DELIMITER = '\n';

/**
 * Accumulates raw chunks and hands back every complete newline-terminated
 * frame. A trailing partial frame stays buffered until the next push.
 */
export class FrameDecoder {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const frames: string[] = [];
    let newline = this.buffer.indexOf(FRAME_DELIMITER);
    while (newline !== -1) {
      const frame = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      if (frame.trim().length > 0) {
        frames.push(frame);
      }
      newline = this.buffer.indexOf(FRAME_DELIMITER);
    }
    return frames;
  }

  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = '';
  }
}

export function encodeFrame(message: object): string {
  return JSON.stringify(message) + FRAME_DELIMITER;
}

export type DecodeResult<T> =
  | { kind: 'ok'; message: T }
  | { kind: 'unknown'; command: string }
  | { kind: 'malformed'; error: ProtocolError };

/**
 * Parses one frame against a closed set of commands. Unknown command names are
 * reported separately from malformed payloads so callers can log them apart.
 */
export function decodeFrame<T>(
  frame: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  knownCommands: readonly string[]
): DecodeResult<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (error) {
    return {
      kind: 'malformed',
      error: new ProtocolError(
        `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'invalid_json'
      )
    };
  }

  const command = typeof raw === 'object' && raw !== null && 'command' in raw ? raw.command : undefined;
  if (typeof command !== 'string') {
    return {
      kind: 'malformed',
      error: new ProtocolError('Frame has no command field', 'missing_command')
    };
  }

  if (!knownCommands.includes(command)) {
    return { kind: 'unknown', command };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      kind: 'malformed',
      error: new ProtocolError(`Invalid ${command} payload`, 'invalid_payload', {
        issues: result.error.issues
      })
    };
  }
  return { kind: 'ok', message: result.data };
}
