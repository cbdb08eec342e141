import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname, isAbsolute } from 'path';
import { fileURLToPath } from 'url';

import type { Result } from './formatting.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

/** Labels involved in the MSC process, in lifecycle order. */
export const DEFAULT_TRACKED_LABELS = [
  'proposal',
  'proposal-in-review',
  'proposed-final-comment-period',
  'final-comment-period',
  'finished-final-comment-period',
  'spec-pr-missing',
  'spec-pr-in-review',
  'merged',
] as const;

const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

const envSchema = z.object({
  // Matrix
  MATRIX_USER_ID: z.string().regex(/^@[^:\s]+:\S+$/, 'MATRIX_USER_ID must look like @user:server'),
  MATRIX_ACCESS_TOKEN: z.string().min(1, 'MATRIX_ACCESS_TOKEN is required (set in .env)'),
  MATRIX_HOMESERVER_URL: z.string().url().optional(),
  // Only m.text notifies most clients; m.notice is the polite bot default
  MATRIX_MESSAGE_TYPE: z.enum(['m.text', 'm.notice']).default('m.notice'),
  SYNC_INTERVAL_SECONDS: z.coerce.number().int().positive().default(5),
  // "mscbot" means a user writes "mscbot: show all"
  BOT_COMMAND: z.string().min(1).default('mscbot'),

  // GitHub
  GITHUB_REPO: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'GITHUB_REPO must be in the form owner/repo')
    .default('matrix-org/matrix-doc'),
  GITHUB_TOKEN: z.string().optional(),
  // Comma-separated list of labels whose changes show up in news digests
  GITHUB_LABELS: z.string().default(DEFAULT_TRACKED_LABELS.join(',')),

  // External feeds
  REVIEW_FEED_URL: z.string().url(),
  ANNOUNCEMENT_FEED_URL: z.string().url()
    .default('https://matrix.org/blog/category/this-week-in-matrix/feed/'),

  // MSC process
  FCP_LENGTH_DAYS: z.coerce.number().int().positive().default(5),
  FCP_BOT_USER_ID: z.coerce.number().int().positive().default(40832866),
  DAILY_SUMMARY_TIME: z.string().regex(TIME_OF_DAY, 'DAILY_SUMMARY_TIME must be HH:MM (24h)').default('07:00'),

  // Storage
  ROOM_DATA_PATH: z.string().default('data/room_data.json'),
  MENTIONS_PATH: z.string().default('config/mentions.json'),

  LOG_LEVEL: z.enum(['fatal', 'trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

type ParsedEnv = z.infer<typeof envSchema>;

export interface AppConfig extends Omit<ParsedEnv, 'MATRIX_HOMESERVER_URL' | 'GITHUB_LABELS'> {
  MATRIX_HOMESERVER_URL: string;
  GITHUB_LABELS: string[];
}

function toProjectPath(path: string): string {
  return isAbsolute(path) ? path : resolve(PROJECT_ROOT, path);
}

/**
 * Validate an environment map into the bot configuration.
 * Returns every problem found rather than stopping at the first.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Result<AppConfig, string[]> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  const labels = Array.from(new Set(
    parsed.data.GITHUB_LABELS
      .split(',')
      .map((label) => label.trim())
      .filter(Boolean),
  ));

  if (labels.length === 0) {
    return { ok: false, error: ['GITHUB_LABELS: must include at least one label'] };
  }

  const serverName = parsed.data.MATRIX_USER_ID.split(':').slice(1).join(':');

  return {
    ok: true,
    value: {
      ...parsed.data,
      MATRIX_HOMESERVER_URL: (parsed.data.MATRIX_HOMESERVER_URL ?? `https://${serverName}`).replace(/\/+$/, ''),
      REVIEW_FEED_URL: parsed.data.REVIEW_FEED_URL.replace(/\/+$/, ''),
      GITHUB_LABELS: labels,
      ROOM_DATA_PATH: toProjectPath(parsed.data.ROOM_DATA_PATH),
      MENTIONS_PATH: toProjectPath(parsed.data.MENTIONS_PATH),
    },
  };
}

/**
 * Load `.env` from the project root and validate the process environment.
 * Exits the process on invalid configuration.
 */
export function loadConfig(): AppConfig {
  loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

  const result = parseConfig(process.env);
  if (!result.ok) {
    console.error('❌ Invalid environment variables:');
    for (const issue of result.error) {
      console.error(`   ${issue}`);
    }
    process.exit(1);
  }

  return result.value;
}

export { PROJECT_ROOT };
