import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { ConfigError } from '../errors.js';
import { SteamIdService } from '../services/steamid.service.js';

export const DEFAULT_REMOTE_LIST_URL =
  'https://raw.githubusercontent.com/AveraFox/Tom/refs/heads/main/reported_ids.txt';

const NODE_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

// Load .env from the working directory, or the one named by DOTENV_PATH
function loadDotenv() {
  const possiblePaths = [
    process.env.DOTENV_PATH,
    resolve(process.cwd(), '.env'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  for (const envPath of possiblePaths) {
    if (existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        throw new ConfigError([`${envPath}: ${result.error.message}`], result.error);
      }
      break;
    }
  }
}

const envSchema = z.object({
  // Steam Web API (enrichment is disabled when absent)
  STEAM_API_KEY: z.string().min(1).optional(),

  // SteamHistory SourceBans lookups (optional)
  STEAMHISTORY_API_KEY: z.string().min(1).optional(),

  // The local player's own SteamID32, used for the party indicator
  SELF_STEAMID: z
    .string()
    .refine((value) => SteamIdService.isSteamId32(value), 'must look like U:1:12345')
    .optional(),

  // Persisted files
  CONFIG_DIR: z.string().min(1).default('cfg'),
  PLAYER_LIST_FILE: z.string().min(1).default('playerlist.json'),
  REGEX_LIST_FILE: z.string().min(1).default('regx.txt'),

  // Community list of reported accounts, imported into the external record set
  REMOTE_LIST_URL: z.string().url().default(DEFAULT_REMOTE_LIST_URL),

  // Scheduling
  REFRESH_PERIOD_SECONDS: z.string().regex(/^\d+(\.\d+)?$/).transform(Number).default('10'),
  ENRICHMENT_MAX_CONCURRENCY: z.string().regex(/^\d+$/).transform(Number).default('0'),

  // Runtime
  NODE_ENV: z.enum(NODE_ENVS).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type Env = z.infer<typeof envSchema>;

// The logger is built on import, so its settings fall back instead of failing
const logSettingsSchema = z.object({
  NODE_ENV: z.string().catch('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch('info'),
});

export type LogSettings = z.infer<typeof logSettingsSchema>;

// Empty strings in .env files mean "unset"
function dropEmpty(source: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Parse an environment object. Throws a ZodError when a variable is invalid.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(dropEmpty(source));
}

export function readLogSettings(source: NodeJS.ProcessEnv = process.env): LogSettings {
  return logSettingsSchema.parse(dropEmpty(source));
}

let cachedEnv: Env | null = null;

/**
 * Load `.env` and validate `process.env` on first use. Throws ConfigError
 * listing every invalid variable.
 */
export function validateEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  loadDotenv();
  try {
    cachedEnv = parseEnv(process.env);
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(
        error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
        error
      );
    }
    throw error;
  }
}
