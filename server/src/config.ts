import path from 'path';
import { z } from 'zod';
import { setting } from '../../common/config';

export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(5000),
  host: z.string().min(1).default('0.0.0.0'),
  mediaDir: z.string().min(1).default(path.join(process.cwd(), 'ads')),
  adDuration: z.coerce.number().positive().default(10),
  scanInterval: z.coerce.number().positive().default(5),
  sweepInterval: z.coerce.number().positive().default(30),
  staleAfter: z.coerce.number().positive().default(60)
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function loadServerConfig(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  return ServerConfigSchema.parse({
    port: setting(argv, env, 'port', 'PORT'),
    host: setting(argv, env, 'host', 'HOST'),
    mediaDir: setting(argv, env, 'media-dir', 'MEDIA_DIR'),
    adDuration: setting(argv, env, 'ad-duration', 'AD_DURATION'),
    scanInterval: setting(argv, env, 'scan-interval'),
    sweepInterval: setting(argv, env, 'sweep-interval'),
    staleAfter: setting(argv, env, 'stale-after')
  });
}
