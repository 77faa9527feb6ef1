import { z } from 'zod';
import { MAX_SLEEP_SECS } from '../services/DelayPolicy';
import { DEFAULT_MAX_CONTENT_BYTES } from '../services/Fetcher';

export const MIN_INTERVAL_SECS = 1;
export const MAX_INTERVAL_SECS = 3000;

const flag = (fallback: boolean) =>
    z
        .enum(['true', 'false', '1', '0'])
        .default(fallback ? 'true' : 'false')
        .transform((v) => v === 'true' || v === '1');

const schema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    DB_TYPE: z.enum(['postgres', 'sqlite']).default('postgres'),
    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().default('postgres'),
    DB_NAME: z.string().default('site_watcher'),
    DB_PATH: z.string().default('scraper.db'),
    UPDATE_CACHE_SIZE: z.coerce.number().int().min(1).default(5),
    DEFAULT_INTERVAL_SECS: z.coerce.number().int().min(MIN_INTERVAL_SECS).max(MAX_INTERVAL_SECS).default(60),
    INTERVAL_JITTER_MAX_MS: z.coerce.number().int().min(0).max(MAX_SLEEP_SECS * 1000 - MAX_INTERVAL_SECS * 1000).default(1500),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    MAX_CONTENT_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_CONTENT_BYTES),
    MAX_BACKOFF_SECS: z.coerce.number().int().min(MAX_INTERVAL_SECS).max(MAX_SLEEP_SECS).default(24 * 60 * 60),
    PREVIEW_LENGTH: z.coerce.number().int().min(40).default(400),
    SUBSCRIBER_QUEUE_SIZE: z.coerce.number().int().min(1).default(100),
    SEED_DEFAULT_SITES: flag(true),
    RESET_DB: flag(false),
});

export type DatabaseConfig =
    | { type: 'postgres'; host: string; port: number; username: string; password: string; database: string }
    | { type: 'sqlite'; path: string };

export interface AppConfig {
    port: number;
    database: DatabaseConfig;
    updateCacheSize: number;
    defaultIntervalSecs: number;
    intervalJitterMaxMs: number;
    fetchTimeoutMs: number;
    maxContentBytes: number;
    maxBackoffSecs: number;
    previewLength: number;
    subscriberQueueSize: number;
    seedDefaultSites: boolean;
    resetDb: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Empty strings count as unset so that `FOO=` in .env falls back to the default
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = schema.safeParse(present);
    if (!parsed.success) {
        const errs = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
        throw new Error(`Invalid configuration: ${errs}`);
    }

    const c = parsed.data;
    return {
        port: c.PORT,
        database:
            c.DB_TYPE === 'sqlite'
                ? { type: 'sqlite', path: c.DB_PATH }
                : {
                      type: 'postgres',
                      host: c.DB_HOST,
                      port: c.DB_PORT,
                      username: c.DB_USER,
                      password: c.DB_PASSWORD,
                      database: c.DB_NAME,
                  },
        updateCacheSize: c.UPDATE_CACHE_SIZE,
        defaultIntervalSecs: c.DEFAULT_INTERVAL_SECS,
        intervalJitterMaxMs: c.INTERVAL_JITTER_MAX_MS,
        fetchTimeoutMs: c.FETCH_TIMEOUT_MS,
        maxContentBytes: c.MAX_CONTENT_BYTES,
        maxBackoffSecs: c.MAX_BACKOFF_SECS,
        previewLength: c.PREVIEW_LENGTH,
        subscriberQueueSize: c.SUBSCRIBER_QUEUE_SIZE,
        seedDefaultSites: c.SEED_DEFAULT_SITES,
        resetDb: c.RESET_DB,
    };
}
