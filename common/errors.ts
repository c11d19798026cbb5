/**
 * Raised when a frame is written to a connection that is no longer open.
 * Callers treat it as "this session is dead"; nothing retries internally.
 */
export class TransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export type ProtocolErrorCode = 'invalid_json' | 'missing_command' | 'invalid_payload';

export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code: ProtocolErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

export class CatalogError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CatalogError';
    Object.setPrototypeOf(this, CatalogError.prototype);
  }
}

export class MediaCacheError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MediaCacheError';
    Object.setPrototypeOf(this, MediaCacheError.prototype);
  }
}
