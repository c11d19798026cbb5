import { z } from 'zod';

export const MediaEntrySchema = z.object({
  id: z.number().int().positive(),
  label: z.string(),
  path: z.string().nullable()
});

export const CatalogFileSchema = z.array(MediaEntrySchema);

// client → server
export const GetSyncSchema = z.object({
  command: z.literal('get_sync'),
  client_id: z.string().optional()
});

export const GetAdsSchema = z.object({
  command: z.literal('get_ads'),
  client_id: z.string().optional()
});

export const GetFileSchema = z.object({
  command: z.literal('get_file'),
  client_id: z.string().optional(),
  filename: z.string().min(1)
});

// server → client
export const SyncSchema = z.object({
  command: z.literal('sync'),
  timestamp: z.number(),
  server_time: z.number(),
  is_playing: z.boolean(),
  current_ad_index: z.number().int().nonnegative(),
  remaining_time: z.number().nonnegative(),
  ad_duration: z.number().positive(),
  elapsed_time: z.number().nonnegative(),
  start_time: z.number().nullable(),
  pause_time: z.number().nullable()
});

export const AdListSchema = z.object({
  command: z.literal('ad_list'),
  ads: z.array(MediaEntrySchema)
});

export const FileTransferSchema = z.object({
  command: z.literal('file_transfer'),
  filename: z.string().min(1),
  content: z.string()
});

export const ClientRequestSchema = z.discriminatedUnion('command', [
  GetSyncSchema,
  GetAdsSchema,
  GetFileSchema
]);

export const ServerMessageSchema = z.discriminatedUnion('command', [
  SyncSchema,
  AdListSchema,
  FileTransferSchema
]);

export const CLIENT_COMMANDS = ['get_sync', 'get_ads', 'get_file'] as const;
export const SERVER_COMMANDS = ['sync', 'ad_list', 'file_transfer'] as const;
