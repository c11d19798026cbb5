import { z } from 'zod';
import {
  MediaEntrySchema,
  GetSyncSchema,
  GetAdsSchema,
  GetFileSchema,
  SyncSchema,
  AdListSchema,
  FileTransferSchema,
  ClientRequestSchema,
  ServerMessageSchema
} from './schemas';

export type MediaEntry = z.infer<typeof MediaEntrySchema>;

// client -> server
export type GetSyncRequest = z.infer<typeof GetSyncSchema>;
export type GetAdsRequest = z.infer<typeof GetAdsSchema>;
export type GetFileRequest = z.infer<typeof GetFileSchema>;

// server -> client
export type SyncMessage = z.infer<typeof SyncSchema>;
export type AdListMessage = z.infer<typeof AdListSchema>;
export type FileTransferMessage = z.infer<typeof FileTransferSchema>;

export type ClientRequest = z.infer<typeof ClientRequestSchema>;
export type ServerMessage = z.infer<typeof ServerMessageSchema>;

/** Seconds since the epoch, fractional. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

/**
 * Point-in-time projection of the server's playback state. Only used to
 * reconcile clients; never stored.
 */
export interface SyncSnapshot {
  sentAt: number;
  serverTime: number;
  isPlaying: boolean;
  currentIndex: number;
  remaining: number;
  itemDuration: number;
  elapsed: number;
  startTime: number | null;
  pauseElapsed: number | null;
}

export function toSyncMessage(snapshot: SyncSnapshot): SyncMessage {
  return {
    command: 'sync',
    timestamp: snapshot.sentAt,
    server_time: snapshot.serverTime,
    is_playing: snapshot.isPlaying,
    current_ad_index: snapshot.currentIndex,
    remaining_time: snapshot.remaining,
    ad_duration: snapshot.itemDuration,
    elapsed_time: snapshot.elapsed,
    start_time: snapshot.startTime,
    pause_time: snapshot.pauseElapsed
  };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
