import 'dotenv/config';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors/config.error';

type Env = Record<string, string | undefined>;

const flag = (value: string | undefined, fallback: boolean): boolean =>
    value === undefined || value === '' ? fallback : /^(1|true|yes|on)$/i.test(value);

const optional = (value: string | undefined): string | undefined => value || undefined;

function int(env: Env, name: string, fallback: number, min = 0): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = z.coerce.number().int().min(min).safeParse(raw.trim());
    if (!parsed.success) throw new ConfigError(name, raw, `an integer >= ${min}`);
    return parsed.data;
}

// Central Configuration
export function loadConfig(env: Env = process.env) {
    return {
        storeDir: env.TASK_STORE_DIR || path.join(process.cwd(), '.seedferry'),
        databaseUrl: optional(env.DATABASE_URL),
        redisUrl: optional(env.REDIS_URL),
        leaderTtlSeconds: int(env, 'LEADER_TTL_SECONDS', 30, 2),

        // seconds
        checkInterval: int(env, 'CHECK_INTERVAL', 300, 1),
        // seconds, 0 for no limit
        maxRuntime: int(env, 'MAX_RUNTIME', 0),

        maxConsecutiveFailures: int(env, 'MAX_CONSECUTIVE_FAILURES', 5, 1),
        retryBackoffMs: int(env, 'RETRY_BACKOFF_MS', 30000),
        retryBackoffMaxMs: int(env, 'RETRY_BACKOFF_MAX_MS', 900000),
        purgeOnComplete: flag(env.PURGE_ON_COMPLETE, false),

        transmission: {
            url: env.TRANSMISSION_URL || 'http://localhost:9091/transmission/rpc',
            username: optional(env.TRANSMISSION_USERNAME),
            password: optional(env.TRANSMISSION_PASSWORD),
            downloadDir: path.resolve(env.DOWNLOAD_DIR || './downloads'),
            // KB/s
            maxDownloadRate: int(env, 'MAX_DOWNLOAD_RATE', 0),
            maxUploadRate: int(env, 'MAX_UPLOAD_RATE', 50),
        },

        onedrive: {
            clientId: env.ONEDRIVE_CLIENT_ID || '',
            tenantId: env.ONEDRIVE_TENANT_ID || 'consumers',
            uploadFolder: env.ONEDRIVE_UPLOAD_FOLDER || '/BTDownloads',
            tokenPath: env.ONEDRIVE_TOKEN_PATH || 'onedrive_token.json',
            token: optional(env.ONEDRIVE_TOKEN),
            interactive: flag(env.ONEDRIVE_INTERACTIVE, false),
        },
    };
}

export type Config = ReturnType<typeof loadConfig>;
