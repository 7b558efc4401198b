import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_VIDEO_PROMPT =
  'smooth animation, natural movement, facial reactions and actions only, NO Lip movement, high quality';
export const DEFAULT_SOUND_PROMPT = 'cinematic sound effects, ambient sounds, facial reactions, actions';
export const DEFAULT_SOUND_NEGATIVE_PROMPT = 'speech, talking, dialogue, vocals, words';

// Parent directory first: each service runs from its own workspace folder
const envPaths = [
  resolve(process.cwd(), '../.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(process.cwd(), '.env')
];

/**
 * Load the first `.env` file found, letting its values override the shell.
 *
 * @returns The path that was loaded, or null when none of the candidates exist.
 */
export function loadEnvFiles(): string | null {
  for (const envPath of envPaths) {
    const result = loadEnv({ path: envPath, override: true });
    if (!result.error) {
      logger.debug({ envPath }, 'Loaded .env file');
      return envPath;
    }
  }

  logger.debug({ envPaths }, 'No .env file found');
  return null;
}

const requiredSecret = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const schema = z.object({
  RUNWARE_API_KEY: requiredSecret('RUNWARE_API_KEY'),
  MIRELO_API_KEY: requiredSecret('MIRELO_API_KEY'),
  RUNWARE_BASE_URL: z.string().url().default('https://api.runware.ai/v1'),
  MIRELO_BASE_URL: z.string().url().default('https://api.mirelo.ai'),

  VIDEO_MODEL: z.string().min(1).default('bytedance:1@1'),
  VIDEO_WIDTH: z.coerce.number().int().positive().default(1248),
  VIDEO_HEIGHT: z.coerce.number().int().positive().default(704),
  VIDEO_FPS: z.coerce.number().int().positive().default(24),
  VIDEO_DURATION_SECONDS: z.coerce.number().int().positive().default(5),
  VIDEO_OUTPUT_FORMAT: z.enum(['mp4', 'webm']).default('mp4'),
  VIDEO_OUTPUT_QUALITY: z.coerce.number().int().min(20).max(99).default(95),
  VIDEO_FRAME_POSITION: z.enum(['first', 'last']).default('first'),
  VIDEO_SYSTEM_PROMPT: z.string().min(1).default(DEFAULT_VIDEO_PROMPT),
  VIDEO_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
  POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(10),
  POLL_ERROR_BACKOFF_SECONDS: z.coerce.number().positive().default(5),

  SOUND_DURATION_SECONDS: z.coerce.number().int().min(1).max(10).default(5),
  SOUND_SAMPLES: z.coerce.number().int().min(1).default(1),
  SOUND_MODEL_VERSION: z.string().min(1).default('1.5'),
  SOUND_CREATIVITY: z.coerce.number().int().min(1).max(10).default(6),
  SOUND_TEXT_PROMPT: z.string().min(1).default(DEFAULT_SOUND_PROMPT),
  SOUND_NEGATIVE_PROMPT: z.string().default(DEFAULT_SOUND_NEGATIVE_PROMPT),
  SOUND_STEPS: z.coerce.number().int().positive().default(25),
  SOUND_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),

  MAX_CONCURRENT_WORKERS: z.coerce.number().int().min(1).default(3),
  OUTPUT_DIR: z.string().min(1).default('output'),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional()
});

export type RuntimeConfig = z.infer<typeof schema>;

/**
 * Validate the environment into a runtime config.
 *
 * Throws ConfigurationError listing every invalid variable; nothing else in the
 * pipeline touches the network before this has succeeded.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = schema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
  throw new ConfigurationError(`Configuration validation failed: ${issues.join(', ')}`, issues);
}
