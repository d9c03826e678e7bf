import { Redis } from 'ioredis';

const TAG = '[lease]';
const KEY_PREFIX = 'seedferry:orchestrator:';

/** Exclusive right to drive one task store. */
export interface Lease {
    /** `onLost` runs if the lease expires or is taken over while held. */
    tryAcquire(onLost?: () => void): Promise<boolean>;
    release(): Promise<void>;
}

// Only release / renew if we still hold the key (Lua for atomicity).
const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

/**
 * Redis-backed lease so that two polling loops never drive the same store.
 * The key names the store location; the lease expires on its own if the
 * holder dies without releasing it.
 */
export class LeaderElector implements Lease {
    private readonly key: string;
    private readonly holderId: string;
    private renewalInterval: NodeJS.Timeout | null = null;
    private onLost: (() => void) | null = null;

    constructor(
        private readonly redis: Redis,
        storeLocation: string,
        private readonly ttlSeconds: number = 30,
        holderId?: string,
    ) {
        this.key = `${KEY_PREFIX}${storeLocation}`;
        this.holderId = holderId || `orchestrator-${process.pid}-${Date.now()}`;
    }

    get leaseKey(): string {
        return this.key;
    }

    async tryAcquire(onLost?: () => void): Promise<boolean> {
        this.onLost = onLost ?? null;
        // SET NX with TTL - atomic
        const result = await this.redis.set(this.key, this.holderId, 'EX', this.ttlSeconds, 'NX');

        if (result === 'OK') {
            this.startRenewal();
            console.log(`${TAG} acquired ${this.key} as ${this.holderId}`);
            return true;
        }

        // Same holder id after a restart within the TTL
        const current = await this.redis.get(this.key);
        if (current === this.holderId) {
            this.startRenewal();
            return true;
        }
        console.warn(`${TAG} ${this.key} is held by ${current}`);
        return false;
    }

    async release(): Promise<void> {
        this.stopRenewal();
        this.onLost = null;
        await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.holderId);
        console.log(`${TAG} released ${this.key}`);
    }

    private startRenewal(): void {
        this.stopRenewal();
        // Renew at half the TTL
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(() => {
            this.renew().then(stillHeld => {
                if (!stillHeld) {
                    console.error(`${TAG} lost ${this.key}`);
                    this.stopRenewal();
                    this.onLost?.();
                }
            }).catch(err => console.error(`${TAG} renewal failed:`, err));
        }, renewalMs);
        this.renewalInterval.unref();
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }

    private async renew(): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, this.key, this.holderId, this.ttlSeconds);
        return result === 1;
    }
}
