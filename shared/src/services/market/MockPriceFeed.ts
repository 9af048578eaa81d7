import type { IPriceFeed } from '../DependencyInjection';
import type { PriceQuote } from '../../types/PriceQuote';

/** Plausible price bands for well-known coins; others use DEFAULT_RANGE */
export const MOCK_PRICE_RANGES: Readonly<Record<string, readonly [number, number]>> = {
    BTC: [35000, 45000],
    ETH: [1800, 2400],
    XRP: [0.4, 0.7],
    SOL: [80, 150],
    ADA: [0.3, 0.5],
    DOGE: [0.05, 0.15],
    DOT: [5, 15],
    MATIC: [0.5, 1.5],
    LTC: [50, 100],
    LINK: [10, 20]
};

const DEFAULT_RANGE: readonly [number, number] = [1, 100];

/**
 * Synthetic quotes for running without a CoinMarketCap key
 */
export class MockPriceFeed implements IPriceFeed {
    public readonly name = 'mock';

    constructor(private readonly random: () => number = Math.random) {}

    async fetchQuotes(symbols: string[], currency: string): Promise<Record<string, PriceQuote>> {
        const result: Record<string, PriceQuote> = {};
        for (const symbol of symbols) {
            result[symbol] = this.quote(symbol, currency);
        }
        return result;
    }

    private quote(symbol: string, currency: string): PriceQuote {
        const [low, high] = MOCK_PRICE_RANGES[symbol] ?? DEFAULT_RANGE;
        const price = this.uniform(low, high);

        return {
            symbol,
            name: `${symbol} Coin`,
            price,
            percentChange1h: this.uniform(-5, 5),
            percentChange24h: this.uniform(-10, 10),
            percentChange7d: this.uniform(-20, 20),
            marketCap: price * this.uniform(1_000_000, 100_000_000),
            volume24h: price * this.uniform(100_000, 10_000_000),
            lastUpdated: new Date().toISOString(),
            currency
        };
    }

    private uniform(min: number, max: number): number {
        return min + (max - min) * this.random();
    }
}
