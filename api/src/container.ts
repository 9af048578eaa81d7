import {
    PositionRepository,
    PositionService,
    PriceCache,
    RedisStore,
    createPriceFeed
} from '@chartdesk/shared';
import type { AppConfig } from './config/env';

/**
 * The process-wide instances. Built once at startup and handed to the
 * controllers; nothing below reaches for a global.
 */
export interface AppServices {
    store: RedisStore;
    positionService: PositionService;
    priceCache: PriceCache;
}

export function createServices(config: AppConfig): AppServices {
    const store = new RedisStore({ url: config.REDIS_URL });
    const repository = new PositionRepository(store, config.POSITION_KEY_PREFIX);
    const feed = createPriceFeed(config.CMC_API_KEY, { baseURL: config.CMC_BASE_URL });

    return {
        store,
        positionService: new PositionService(repository),
        priceCache: new PriceCache({ feed, defaultMaxAgeSeconds: config.PRICE_CACHE_TTL_SECONDS })
    };
}
