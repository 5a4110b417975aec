/**
 * CLI Configuration
 *
 * Loaded before anything that logs: the shared logger reads LOG_LEVEL
 * and NODE_ENV when it is first imported.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';

// .env from the working directory
dotenvConfig({ path: resolve(process.cwd(), '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),

  // Settings location
  VIDSHRINK_CONFIG_DIR: z.string().min(1).default(join(homedir(), '.vidshrink')),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

process.env['NODE_ENV'] = env.NODE_ENV;
process.env['LOG_LEVEL'] = env.LOG_LEVEL;

export const config = {
  env: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,

  tools: {
    ffmpeg: env.FFMPEG_PATH,
    ffprobe: env.FFPROBE_PATH,
  },

  configDir: env.VIDSHRINK_CONFIG_DIR,
  configFile: join(env.VIDSHRINK_CONFIG_DIR, 'config.json'),
} as const;

export type Config = typeof config;
