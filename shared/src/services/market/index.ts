import type { IPriceFeed } from '../DependencyInjection';
import { logger } from '../logger';
import { CoinMarketCapOptions, CoinMarketCapPriceFeed } from './CoinMarketCapPriceFeed';
import { MockPriceFeed } from './MockPriceFeed';

export * from './CoinMarketCapPriceFeed';
export * from './MockPriceFeed';

/**
 * CoinMarketCap when a key is configured, synthetic quotes otherwise
 */
export function createPriceFeed(apiKey?: string, options?: CoinMarketCapOptions): IPriceFeed {
    if (!apiKey) {
        logger.warn('No CoinMarketCap API key found, using mock price data');
        return new MockPriceFeed();
    }
    return new CoinMarketCapPriceFeed(apiKey, options);
}
