import { Redis } from 'ioredis';
import { Config } from './config';
import { createPool, createRedis } from './db';
import { createMsalClient, OneDriveAuth } from './gateways/onedrive.auth';
import { OneDriveUploadGateway } from './gateways/onedrive.gateway';
import { TransmissionDownloadGateway } from './gateways/transmission.gateway';
import { ControlSurface } from './control';
import { FileTaskStore } from './repositories/file-task.store';
import { PgTaskStore } from './repositories/pg-task.store';
import { TaskStore } from './repositories/task.store';
import { LeaderElector, Orchestrator } from './services';

const TAG = '[seedferry]';

export interface App {
    control: ControlSurface;
    store: TaskStore;
    close(): Promise<void>;
}

export interface AppOptions {
    /** Allow the device-code sign-in (the `auth` command). */
    interactive?: boolean;
    /** Take the Redis lease; only the polling loop needs it. */
    withLease?: boolean;
}

// Lease keys and logs name the database without its credentials.
function describeDatabase(url: string): string {
    try {
        const parsed = new URL(url);
        return `postgres:${parsed.host}${parsed.pathname}`;
    } catch {
        return 'postgres';
    }
}

async function createStore(cfg: Config): Promise<TaskStore> {
    if (!cfg.databaseUrl) return new FileTaskStore(cfg.storeDir);
    const store = new PgTaskStore(createPool(cfg.databaseUrl), describeDatabase(cfg.databaseUrl));
    await store.init();
    return store;
}

export async function createApp(cfg: Config, options: AppOptions = {}): Promise<App> {
    const store = await createStore(cfg);
    const interactive = options.interactive ?? cfg.onedrive.interactive;

    const downloads = new TransmissionDownloadGateway(cfg.transmission);
    const uploads = new OneDriveUploadGateway(
        new OneDriveAuth(createMsalClient({ ...cfg.onedrive, interactive }), interactive),
    );

    const orchestrator = new Orchestrator({
        store,
        downloads,
        uploads,
        config: {
            remoteFolder: cfg.onedrive.uploadFolder,
            purgeOnComplete: cfg.purgeOnComplete,
            retry: {
                maxConsecutiveFailures: cfg.maxConsecutiveFailures,
                backoff: {
                    initialIntervalMs: cfg.retryBackoffMs,
                    multiplier: 4,
                    maxIntervalMs: cfg.retryBackoffMaxMs,
                },
            },
        },
    });

    let redis: Redis | null = null;
    let lease: LeaderElector | null = null;
    if (options.withLease && cfg.redisUrl) {
        redis = createRedis(cfg.redisUrl);
        lease = new LeaderElector(redis, store.location, cfg.leaderTtlSeconds);
    }

    const control = new ControlSurface({ store, orchestrator, uploads, lease });
    console.debug(`${TAG} task store: ${store.location}`);

    return {
        control,
        store,
        async close() {
            await store.close();
            if (redis) await redis.quit();
        },
    };
}
