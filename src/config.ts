import 'dotenv/config';
import { tmpdir } from 'os';
import path from 'path';
import { z } from 'zod';

export const APP_NAME = 'termfeed';
export const APP_VERSION = '0.1.0';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // The UI owns the terminal, so logs always go to a file.
  LOG_FILE: z.string().default(path.join(tmpdir(), `${APP_NAME}.log`)),
  FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  FEED_USER_AGENT: z.string().default(`${APP_NAME}/${APP_VERSION}`),
});

export type EnvConfig = z.infer<typeof envSchema>;

let _config: EnvConfig | null = null;

export function getConfig(): EnvConfig {
  if (!_config) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      console.error('Invalid environment configuration:');
      for (const issue of result.error.issues) {
        console.error(`  ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    _config = result.data;
  }
  return _config;
}
