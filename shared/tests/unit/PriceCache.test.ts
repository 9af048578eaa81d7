import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PriceCache, normalizeSymbol, startPriceCacheSweep } from '../../src/services/PriceCache';
import { ValidationError } from '../../src/errors';
import type { PriceQuote } from '../../src/types/PriceQuote';

const PRICES: Record<string, number> = { BTC: 42000, ETH: 2500, SOL: 120 };

function quote(symbol: string, currency: string): PriceQuote {
    return {
        symbol,
        name: `${symbol} Coin`,
        price: PRICES[symbol],
        percentChange1h: 0.5,
        percentChange24h: -1.2,
        percentChange7d: 3.4,
        marketCap: 1_000_000,
        volume24h: 50_000,
        lastUpdated: '2024-05-01T12:00:00.000Z',
        currency
    };
}

function createFeed() {
    return {
        name: 'fake',
        fetchQuotes: vi.fn(async (symbols: string[], currency: string) => {
            const result: Record<string, PriceQuote> = {};
            for (const symbol of symbols) {
                if (symbol in PRICES) result[symbol] = quote(symbol, currency);
            }
            return result;
        })
    };
}

describe('normalizeSymbol', () => {
    it.each([
        ['btcusdt', 'BTC'],
        [' ethusd ', 'ETH'],
        ['BTCBUSD', 'BTC'],
        ['SOLUSDC', 'SOL'],
        ['USDCUSDT', 'USDC'],
        ['sol', 'SOL']
    ])('%s -> %s', (input, expected) => {
        expect(normalizeSymbol(input)).toBe(expected);
    });

    it.each(['USD', 'USDT', 'BUSD', 'usdc'])('keeps the bare quote currency %s', symbol => {
        expect(normalizeSymbol(symbol)).toBe(symbol.toUpperCase());
    });
});

describe('PriceCache', () => {
    let clock: number;
    let feed: ReturnType<typeof createFeed>;
    let cache: PriceCache;

    beforeEach(() => {
        clock = 1_000_000;
        feed = createFeed();
        cache = new PriceCache({ feed, now: () => clock });
    });

    it('rejects a non-positive default max age', () => {
        expect(() => new PriceCache({ feed, defaultMaxAgeSeconds: 0 })).toThrow(ValidationError);
    });

    describe('getCryptoPrice', () => {
        it('fetches on a miss and serves the same object while fresh', async () => {
            const first = await cache.getCryptoPrice('btcusdt');
            clock += 299_000;
            const second = await cache.getCryptoPrice('BTC');

            expect(first).toEqual(quote('BTC', 'USD'));
            expect(second).toBe(first);
            expect(feed.fetchQuotes).toHaveBeenCalledTimes(1);
            expect(feed.fetchQuotes).toHaveBeenCalledWith(['BTC'], 'USD');
        });

        it('refetches once the entry reaches the max age', async () => {
            await cache.getCryptoPrice('BTC');
            clock += 300_000;
            await cache.getCryptoPrice('BTC');

            expect(feed.fetchQuotes).toHaveBeenCalledTimes(2);
        });

        it('honours a caller-specific max age', async () => {
            await cache.getCryptoPrice('BTC');
            clock += 11_000;

            await cache.getCryptoPrice('BTC', 'USD', 60);
            expect(feed.fetchQuotes).toHaveBeenCalledTimes(1);

            await cache.getCryptoPrice('BTC', 'USD', 10);
            expect(feed.fetchQuotes).toHaveBeenCalledTimes(2);
        });

        it('keeps currencies apart', async () => {
            await cache.getCryptoPrice('BTC', 'usd');
            const eur = await cache.getCryptoPrice('BTC', 'EUR');

            expect(eur?.currency).toBe('EUR');
            expect(feed.fetchQuotes).toHaveBeenNthCalledWith(2, ['BTC'], 'EUR');
            expect(cache.size).toBe(2);
        });

        it('returns null for a symbol the feed does not know', async () => {
            expect(await cache.getCryptoPrice('NOPE')).toBeNull();
            expect(cache.size).toBe(0);
        });

        it('serves the stale entry when the feed fails', async () => {
            const first = await cache.getCryptoPrice('BTC');
            clock += 600_000;
            feed.fetchQuotes.mockRejectedValueOnce(new Error('upstream down'));

            expect(await cache.getCryptoPrice('BTC')).toBe(first);
        });

        it('returns null when the feed fails with nothing cached', async () => {
            feed.fetchQuotes.mockRejectedValueOnce(new Error('upstream down'));
            expect(await cache.getCryptoPrice('BTC')).toBeNull();
        });
    });

    describe('getMultipleCryptoPrices', () => {
        it('fetches all misses in one call and keys results by normalized symbol', async () => {
            const btc = await cache.getCryptoPrice('BTC');
            feed.fetchQuotes.mockClear();

            const quotes = await cache.getMultipleCryptoPrices(['BTC', 'ethusdt', 'ETH', 'SOL', 'NOPE']);

            expect(feed.fetchQuotes).toHaveBeenCalledTimes(1);
            expect(feed.fetchQuotes).toHaveBeenCalledWith(['ETH', 'SOL', 'NOPE'], 'USD');
            expect(Object.keys(quotes).sort()).toEqual(['BTC', 'ETH', 'SOL']);
            expect(quotes.BTC).toBe(btc);
            expect(quotes.ETH.price).toBe(2500);
        });

        it('does not call the feed when everything is fresh', async () => {
            await cache.getMultipleCryptoPrices(['BTC', 'ETH']);
            await cache.getMultipleCryptoPrices(['btcusdt', 'ethusdt']);

            expect(feed.fetchQuotes).toHaveBeenCalledTimes(1);
        });

        it('falls back to cached entries, stale included, when the feed fails', async () => {
            await cache.getCryptoPrice('BTC');
            clock += 400_000;
            await cache.getCryptoPrice('ETH');
            feed.fetchQuotes.mockRejectedValueOnce(new Error('upstream down'));

            const quotes = await cache.getMultipleCryptoPrices(['BTC', 'ETH', 'SOL']);

            expect(feed.fetchQuotes).toHaveBeenLastCalledWith(['BTC', 'SOL'], 'USD');
            expect(Object.keys(quotes).sort()).toEqual(['BTC', 'ETH']);
        });
    });

    describe('getPriceBySymbol', () => {
        it('returns the price and currency', async () => {
            expect(await cache.getPriceBySymbol('ethusdt')).toEqual({ price: 2500, currency: 'USD' });
        });

        it('returns a null price for an unknown symbol', async () => {
            expect(await cache.getPriceBySymbol('NOPE', ' eur ')).toEqual({ price: null, currency: 'EUR' });
        });
    });

    describe('housekeeping', () => {
        it('prunes entries older than the given age', async () => {
            await cache.getCryptoPrice('BTC');
            clock += 100_000;
            await cache.getCryptoPrice('ETH');
            clock += 50_000;

            expect(cache.pruneStale(120)).toBe(1);
            expect(cache.size).toBe(1);
        });

        it('clears everything', async () => {
            await cache.getMultipleCryptoPrices(['BTC', 'ETH']);
            cache.clear();

            expect(cache.size).toBe(0);
            await cache.getCryptoPrice('BTC');
            expect(feed.fetchQuotes).toHaveBeenCalledTimes(2);
        });
    });
});

describe('startPriceCacheSweep', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('drops entries once they reach the max age', async () => {
        vi.useFakeTimers();
        const cache = new PriceCache({ feed: createFeed() });
        await cache.getCryptoPrice('BTC');

        const timer = startPriceCacheSweep(cache, 1000, 5);

        vi.advanceTimersByTime(4000);
        expect(cache.size).toBe(1);

        vi.advanceTimersByTime(1000);
        expect(cache.size).toBe(0);

        clearInterval(timer);
    });
});
