/**
 * Price Cache
 *
 * Keeps the latest quote per (symbol, currency) in memory and goes to the
 * upstream feed only for entries older than what the caller accepts.
 * Freshness is decided at read time against the caller's maxAgeSeconds, so
 * callers with different requirements share one cache. Entries are never
 * mutated; a refresh replaces the whole entry.
 */

import type { IPriceFeed } from './DependencyInjection';
import type { PriceQuote, SymbolPrice } from '../types/PriceQuote';
import { toError } from '../errors';
import { logger } from './logger';
import { validatePositiveNumber } from '../utils/validation';

export const DEFAULT_CACHE_TTL_SECONDS = 300;

// Longest first, so BTCBUSD loses BUSD rather than USD
const QUOTE_SUFFIXES = ['USDT', 'USDC', 'BUSD', 'USD'];

interface CacheEntry {
    quote: PriceQuote;
    fetchedAt: number;
}

export interface PriceCacheOptions {
    feed: IPriceFeed;
    defaultMaxAgeSeconds?: number;
    now?: () => number;
}

/**
 * Upper-case a trading symbol and strip one quote-currency suffix when a
 * base symbol remains (BTCUSDT -> BTC). A symbol that is itself a suffix
 * (USD, USDT, BUSD) is returned unchanged.
 */
export function normalizeSymbol(symbol: string): string {
    const normalized = symbol.trim().toUpperCase();
    if (QUOTE_SUFFIXES.includes(normalized)) return normalized;

    for (const suffix of QUOTE_SUFFIXES) {
        if (normalized.endsWith(suffix) && normalized.length > suffix.length) {
            return normalized.slice(0, -suffix.length);
        }
    }
    return normalized;
}

export class PriceCache {
    private entries: Map<string, CacheEntry> = new Map();
    private readonly feed: IPriceFeed;
    private readonly defaultMaxAgeSeconds: number;
    private readonly now: () => number;

    constructor(options: PriceCacheOptions) {
        this.feed = options.feed;
        this.defaultMaxAgeSeconds = options.defaultMaxAgeSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
        this.now = options.now ?? Date.now;
        validatePositiveNumber(this.defaultMaxAgeSeconds, 'defaultMaxAgeSeconds');
    }

    public static cacheKey(symbol: string, currency: string): string {
        return `${symbol}:${currency}`;
    }

    /**
     * Quote for one symbol
     *
     * @param maxAgeSeconds Oldest cached quote the caller accepts
     * @returns The cached object itself on a hit; a stale quote when the
     *          feed fails; null when the feed fails with nothing cached or
     *          does not know the symbol
     */
    public async getCryptoPrice(
        symbol: string,
        currency: string = 'USD',
        maxAgeSeconds: number = this.defaultMaxAgeSeconds
    ): Promise<PriceQuote | null> {
        const normalized = normalizeSymbol(symbol);
        const convert = currency.trim().toUpperCase();
        const key = PriceCache.cacheKey(normalized, convert);
        const cached = this.entries.get(key);

        if (cached && this.isFresh(cached, maxAgeSeconds)) {
            logger.debug(`[PriceCache] Using cached price data for ${normalized}`);
            return cached.quote;
        }

        try {
            const quotes = await this.feed.fetchQuotes([normalized], convert);
            const quote = quotes[normalized];
            if (!quote) {
                logger.warn(`[PriceCache] ${this.feed.name} has no quote for ${normalized}`);
                return null;
            }
            this.entries.set(key, { quote, fetchedAt: this.now() });
            return quote;
        } catch (error) {
            if (cached) {
                logger.warn(`[PriceCache] ${this.feed.name} failed, serving stale ${key}`, toError(error).message);
                return cached.quote;
            }
            logger.error(`[PriceCache] Error fetching price data for ${key}`, toError(error).message);
            return null;
        }
    }

    /**
     * Quotes for several symbols, keyed by normalized symbol. All misses go
     * to the feed in a single call; if it fails, the result holds what the
     * cache could provide, stale entries included.
     */
    public async getMultipleCryptoPrices(
        symbols: string[],
        currency: string = 'USD',
        maxAgeSeconds: number = this.defaultMaxAgeSeconds
    ): Promise<Record<string, PriceQuote>> {
        const convert = currency.trim().toUpperCase();
        const normalized = [...new Set(symbols.map(normalizeSymbol))];
        const result: Record<string, PriceQuote> = {};
        const misses: string[] = [];

        for (const symbol of normalized) {
            const cached = this.entries.get(PriceCache.cacheKey(symbol, convert));
            if (cached && this.isFresh(cached, maxAgeSeconds)) {
                result[symbol] = cached.quote;
            } else {
                misses.push(symbol);
            }
        }

        if (misses.length === 0) return result;

        try {
            const quotes = await this.feed.fetchQuotes(misses, convert);
            const fetchedAt = this.now();
            for (const symbol of misses) {
                const quote = quotes[symbol];
                if (!quote) {
                    logger.warn(`[PriceCache] ${this.feed.name} has no quote for ${symbol}`);
                    continue;
                }
                this.entries.set(PriceCache.cacheKey(symbol, convert), { quote, fetchedAt });
                result[symbol] = quote;
            }
        } catch (error) {
            logger.error(`[PriceCache] Error fetching ${misses.join(',')}`, toError(error).message);
            for (const symbol of misses) {
                const stale = this.entries.get(PriceCache.cacheKey(symbol, convert));
                if (stale) result[symbol] = stale.quote;
            }
        }

        return result;
    }

    /**
     * Just the price, e.g. to show next to a position's entry
     */
    public async getPriceBySymbol(symbol: string, currency: string = 'USD'): Promise<SymbolPrice> {
        const quote = await this.getCryptoPrice(symbol, currency);
        return quote
            ? { price: quote.price, currency: quote.currency }
            : { price: null, currency: currency.trim().toUpperCase() };
    }

    /**
     * Remove entries older than maxAgeSeconds
     * @returns Number of entries removed
     */
    public pruneStale(maxAgeSeconds: number = this.defaultMaxAgeSeconds): number {
        let pruned = 0;
        for (const [key, entry] of this.entries.entries()) {
            if (!this.isFresh(entry, maxAgeSeconds)) {
                this.entries.delete(key);
                pruned++;
            }
        }
        return pruned;
    }

    public get size(): number {
        return this.entries.size;
    }

    /**
     * Clear all entries (tests, forced refresh)
     */
    public clear(): void {
        this.entries.clear();
        logger.info('[PriceCache] Price cache cleared');
    }

    private isFresh(entry: CacheEntry, maxAgeSeconds: number): boolean {
        return this.now() - entry.fetchedAt < maxAgeSeconds * 1000;
    }
}

/**
 * Periodically drop entries no caller would accept any more.
 * Entries otherwise live until clear().
 */
export function startPriceCacheSweep(
    cache: PriceCache,
    intervalMs: number,
    maxAgeSeconds: number = DEFAULT_CACHE_TTL_SECONDS
): ReturnType<typeof setInterval> {
    const timer = setInterval(() => {
        const pruned = cache.pruneStale(maxAgeSeconds);
        if (pruned > 0) {
            logger.info(`[PriceCache] Pruned ${pruned} stale quotes`);
        }
    }, intervalMs);
    timer.unref();
    return timer;
}
