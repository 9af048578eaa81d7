/**
 * Dependency Injection Interfaces
 *
 * Contracts between the store, the registry and the price lookups, so that
 * the API composition root can wire one instance of each and tests can
 * substitute fakes.
 */

import type {
    Position,
    PositionClose,
    PositionCreate,
    PositionUpdate,
    PlatformType
} from '../types/Position';
import type { PriceQuote } from '../types/PriceQuote';

/**
 * Key-value store with JSON values, per-key TTL and string sets.
 * Failures never throw: they are logged and reported as the sentinel
 * (false / null / 0 / empty).
 */
export interface IKeyValueStore {
    setJson(key: string, value: unknown, ttlSeconds?: number): Promise<boolean>;
    getJson(key: string): Promise<unknown | null>;
    delete(key: string): Promise<boolean>;
    exists(key: string): Promise<boolean>;
    /** null when the store cannot tell, never an empty set */
    existingKeys(keys: string[]): Promise<Set<string> | null>;
    keys(pattern: string): Promise<string[]>;
    addToSet(key: string, ...values: string[]): Promise<number>;
    getSetMembers(key: string): Promise<Set<string>>;
    removeFromSet(key: string, ...values: string[]): Promise<number>;
}

/**
 * Repository interface for position data access
 */
export interface IPositionRepository {
    createPosition(data: PositionCreate): Promise<Position | null>;
    getPosition(positionId: string): Promise<Position | null>;
    updatePosition(positionId: string, patch: PositionUpdate): Promise<Position | null>;
    stopPosition(positionId: string): Promise<Position | null>;
    closePosition(positionId: string, fields?: PositionClose): Promise<Position | null>;
    deletePosition(positionId: string): Promise<boolean>;
    getUserPositions(userId: string, platform: PlatformType, includeStopped?: boolean): Promise<Position[]>;
    getUserActivePositions(userId: string, platform: PlatformType): Promise<Position[]>;
    reconcileUserIndex(userId: string, platform: PlatformType): Promise<{ removed: string[] }>;
}

/**
 * Upstream quote source. Throws UpstreamError when the feed is unavailable;
 * symbols the feed does not know are simply absent from the result.
 */
export interface IPriceFeed {
    readonly name: string;
    fetchQuotes(symbols: string[], currency: string): Promise<Record<string, PriceQuote>>;
}

/**
 * Logger interface for consistent logging
 */
export interface ILogger {
    debug(message: string, meta?: unknown): void;
    info(message: string, meta?: unknown): void;
    warn(message: string, meta?: unknown): void;
    error(message: string, meta?: unknown): void;
}
