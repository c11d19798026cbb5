import path from 'path';
import { z } from 'zod';
import { setting } from '../common/config';

function randomClientId(): string {
  return `client_${1000 + Math.floor(Math.random() * 9000)}`;
}

export const ClientConfigSchema = z.object({
  server: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(5000),
  clientId: z.string().min(1).default(randomClientId),
  idleTimeout: z.coerce.number().min(0).default(0),
  cacheDir: z.string().min(1).default(path.join(process.cwd(), 'ads_local')),
  reconnectInterval: z.coerce.number().positive().default(5),
  driftInterval: z.coerce.number().positive().default(300)
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export function loadClientConfig(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  return ClientConfigSchema.parse({
    server: setting(argv, env, 'server', 'AD_SERVER_HOST'),
    port: setting(argv, env, 'port', 'AD_SERVER_PORT'),
    clientId: setting(argv, env, 'id'),
    idleTimeout: setting(argv, env, 'idle-timeout'),
    cacheDir: setting(argv, env, 'cache-dir'),
    reconnectInterval: setting(argv, env, 'reconnect-interval'),
    driftInterval: setting(argv, env, 'drift-interval')
  });
}

export function serverUrl(config: Pick<ClientConfig, 'server' | 'port'>): string {
  return `ws://${config.server}:${config.port}`;
}
