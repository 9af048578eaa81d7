import Redis from 'ioredis';
import type { IKeyValueStore } from '../services/DependencyInjection';
import { StorageError, toError, withRetry, DEFAULT_RETRY_POLICIES } from '../errors';
import { logger } from '../services/logger';
import { validateRequired } from '../utils/validation';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379/0';

/**
 * Redis connection configuration
 */
export interface RedisConfig {
    url: string;
    connectTimeoutMs: number;
    maxRetriesPerRequest: number;
}

/**
 * Reconnect backoff. Until the first successful connection ioredis must not
 * reconnect on its own: connect() drives those attempts through withRetry,
 * and a client stuck reconnecting rejects every further connect().
 */
export function reconnectDelay(attempt: number, established: boolean): number | null {
    if (!established) return null;
    return Math.min(attempt * 200, 2000);
}

export interface StoreHealth {
    connected: boolean;
    activeOperations: number;
}

/**
 * Mask credentials before a connection URL reaches the logs
 */
export function sanitizeRedisUrl(url: string): string {
    if (!url.includes('@')) return url;
    const scheme = url.includes('://') ? url.split('://')[0] : 'redis';
    const host = url.split('@').pop();
    return `${scheme}://****:****@${host}`;
}

/**
 * Key-value store on Redis.
 *
 * Every operation runs inside a lease on the shared client that is released
 * on all exit paths. Backend failures are logged and turned into the
 * operation's sentinel value, so callers never see a storage exception.
 */
export class RedisStore implements IKeyValueStore {
    private client: Redis | null = null;
    private leases = 0;
    private established = false;
    private readonly config: RedisConfig;

    /**
     * @param config Connection settings; `url` falls back to REDIS_URL
     * @param client Pre-built client (tests inject an in-process one)
     */
    constructor(config?: Partial<RedisConfig>, client?: Redis) {
        this.config = {
            url: config?.url || process.env.REDIS_URL || DEFAULT_REDIS_URL,
            connectTimeoutMs: config?.connectTimeoutMs ?? 5000,
            maxRetriesPerRequest: config?.maxRetriesPerRequest ?? 2
        };
        if (client) {
            this.client = client;
        }
    }

    /**
     * Establishes the connection up front so startup fails early
     * @throws {StorageError} If connection fails after retries
     */
    public async connect(): Promise<void> {
        validateRequired(this.config.url, 'REDIS_URL');
        const client = this.getClient();
        // 'end' is where a failed first attempt leaves the client
        if (client.status !== 'wait' && client.status !== 'end') return;

        try {
            await withRetry(
                async () => {
                    try {
                        await client.connect();
                    } catch (error) {
                        throw new StorageError('Redis connection attempt failed', toError(error));
                    }
                },
                DEFAULT_RETRY_POLICIES.STORAGE_ERROR,
                'Redis connection'
            );
            logger.info(`[RedisStore] Connected to ${sanitizeRedisUrl(this.config.url)}`);
        } catch (error) {
            const storageError = new StorageError('Failed to connect to Redis after retries', toError(error));
            logger.error('[RedisStore] Connection failed:', storageError.message);
            throw storageError;
        }
    }

    public async disconnect(): Promise<void> {
        if (!this.client) return;
        if (this.leases > 0) {
            logger.warn(`[RedisStore] Disconnecting with ${this.leases} operation(s) in flight`);
        }
        const client = this.client;
        this.client = null;
        await client.quit();
        logger.info('[RedisStore] Disconnected');
    }

    public isConnected(): boolean {
        return this.client?.status === 'ready';
    }

    public get activeOperations(): number {
        return this.leases;
    }

    public getHealth(): StoreHealth {
        return { connected: this.isConnected(), activeOperations: this.leases };
    }

    public async setJson(key: string, value: unknown, ttlSeconds?: number): Promise<boolean> {
        return this.withConnection(`set ${key}`, false, async conn => {
            const payload = JSON.stringify(value);
            if (payload === undefined) {
                throw new Error('value is not JSON-serializable');
            }
            if (ttlSeconds && ttlSeconds > 0) {
                await conn.set(key, payload, 'EX', ttlSeconds);
            } else {
                await conn.set(key, payload);
            }
            return true;
        });
    }

    public async getJson(key: string): Promise<unknown | null> {
        return this.withConnection<unknown | null>(`get ${key}`, null, async conn => {
            const data = await conn.get(key);
            if (data === null) return null;
            const parsed: unknown = JSON.parse(data);
            return parsed;
        });
    }

    public async delete(key: string): Promise<boolean> {
        return this.withConnection(`delete ${key}`, false, async conn => {
            await conn.del(key);
            return true;
        });
    }

    public async exists(key: string): Promise<boolean> {
        return this.withConnection(`exists ${key}`, false, async conn => (await conn.exists(key)) > 0);
    }

    public async keys(pattern: string): Promise<string[]> {
        return this.withConnection<string[]>(`keys ${pattern}`, [], async conn => {
            const keys = await conn.keys(pattern);
            return keys.sort();
        });
    }

    public async addToSet(key: string, ...values: string[]): Promise<number> {
        if (values.length === 0) return 0;
        return this.withConnection(`sadd ${key}`, 0, conn => conn.sadd(key, ...values));
    }

    /**
     * Which of `keys` exist, checked on one lease
     * @returns null if the store could not answer
     */
    public async existingKeys(keys: string[]): Promise<Set<string> | null> {
        if (keys.length === 0) return new Set();
        return this.withConnection<Set<string> | null>(`exists ${keys.length} key(s)`, null, async conn => {
            const counts = await Promise.all(keys.map(key => conn.exists(key)));
            return new Set(keys.filter((_, i) => counts[i] > 0));
        });
    }

    public async getSetMembers(key: string): Promise<Set<string>> {
        return this.withConnection(`smembers ${key}`, new Set<string>(), async conn => new Set(await conn.smembers(key)));
    }

    public async removeFromSet(key: string, ...values: string[]): Promise<number> {
        if (values.length === 0) return 0;
        return this.withConnection(`srem ${key}`, 0, conn => conn.srem(key, ...values));
    }

    private async withConnection<T>(
        operation: string,
        fallback: T,
        fn: (conn: Redis) => Promise<T>
    ): Promise<T> {
        this.leases++;
        try {
            return await fn(this.getClient());
        } catch (error) {
            logger.error(`[RedisStore] ${operation} failed`, toError(error).message);
            return fallback;
        } finally {
            this.leases--;
        }
    }

    private getClient(): Redis {
        if (!this.client) {
            const client = new Redis(this.config.url, {
                lazyConnect: true,
                connectTimeout: this.config.connectTimeoutMs,
                maxRetriesPerRequest: this.config.maxRetriesPerRequest,
                retryStrategy: attempt => reconnectDelay(attempt, this.established)
            });
            client.on('ready', () => {
                this.established = true;
            });
            client.on('error', (error: Error) => {
                logger.error('[RedisStore] Client error', error.message);
            });
            this.client = client;
            logger.info(`[RedisStore] Client initialized with URL: ${sanitizeRedisUrl(this.config.url)}`);
        }
        return this.client;
    }
}
