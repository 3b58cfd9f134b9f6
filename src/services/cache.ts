import Redis from 'ioredis';
import { CacheConfig } from '../models/config';
import { ErrorHandler } from '../utils/errors';
import { logger } from '../utils/logger';
import { EmbeddingCacheStore } from './completion';

export interface CacheStats {
    hits: number;
    misses: number;
    hitRate: number;
    errors: number;
}

/** The Redis commands the cache issues. */
export interface RedisCommands {
    get(key: string): Promise<string | null>;
    setex(key: string, seconds: number, value: string): Promise<unknown>;
    quit(): Promise<unknown>;
}

export function createRedisClient(config: CacheConfig): Redis {
    const redis = new Redis(config.redisUrl, {
        maxRetriesPerRequest: 3,
        lazyConnect: true,
        keepAlive: 30000,
        connectTimeout: 10000,
        commandTimeout: 5000
    });

    redis.on('connect', () => logger.info('Redis cache connected'));
    redis.on('error', (error: Error) => logger.warn('Redis cache error', { error: error.message }));
    redis.on('reconnecting', () => logger.debug('Redis cache reconnecting'));

    return redis;
}

/**
 * Embedding cache backed by Redis. Read and write failures are counted and
 * logged, then treated as misses.
 */
export class CacheManager implements EmbeddingCacheStore {
    private redis: RedisCommands;
    private stats: CacheStats = { hits: 0, misses: 0, hitRate: 0, errors: 0 };

    constructor(redis: RedisCommands) {
        this.redis = redis;
    }

    public async get(key: string): Promise<string | null> {
        try {
            const value = await this.redis.get(key);
            if (value === null) {
                this.stats.misses++;
            } else {
                this.stats.hits++;
            }
            this.updateHitRate();
            return value;
        } catch (error) {
            this.stats.errors++;
            logger.warn('Cache read failed', { key, error: ErrorHandler.toError(error).message });
            return null;
        }
    }

    public async setex(key: string, seconds: number, value: string): Promise<void> {
        try {
            await this.redis.setex(key, seconds, value);
        } catch (error) {
            this.stats.errors++;
            logger.warn('Cache write failed', { key, error: ErrorHandler.toError(error).message });
        }
    }

    public getStats(): CacheStats {
        return { ...this.stats };
    }

    public async disconnect(): Promise<void> {
        await this.redis.quit();
    }

    private updateHitRate(): void {
        const total = this.stats.hits + this.stats.misses;
        this.stats.hitRate = total > 0 ? this.stats.hits / total : 0;
    }
}
