import { createClient, RedisClientType } from 'redis';
import { logger } from '../logging';

export interface IdempotencyGuard {
    /** True the first time a key is seen within the TTL, false for repeats. */
    markResolutionProcessed(key: string): Promise<boolean>;
    /** Frees a claimed key so a retry after a failed resolution goes through. */
    releaseResolution(key: string): Promise<void>;
}

export class RedisCoordinator implements IdempotencyGuard {
    private client: RedisClientType | null = null;
    private connected = false;

    constructor(
        private readonly url: string | undefined,
        private readonly ttlSeconds: number
    ) {}

    async init(): Promise<void> {
        if (!this.url) {
            logger.warn('Redis disabled (REDIS_URL not set), idempotency running in local-only mode');
            return;
        }

        this.client = createClient({ url: this.url });
        this.client.on('error', (error) => logger.error('Redis client error', { error }));
        await this.client.connect();
        this.connected = true;
        logger.info('Redis coordinator connected');
    }

    async close(): Promise<void> {
        if (this.client && this.connected) {
            await this.client.quit();
            this.connected = false;
        }
    }

    async markResolutionProcessed(key: string): Promise<boolean> {
        if (!this.client || !this.connected) return true;
        const result = await this.client.set(
            `idem:resolution:${key}`,
            '1',
            { NX: true, EX: this.ttlSeconds }
        );
        return result === 'OK';
    }

    async releaseResolution(key: string): Promise<void> {
        if (!this.client || !this.connected) return;
        await this.client.del(`idem:resolution:${key}`);
    }
}
