import { describe, it, expect } from 'vitest';
import { PositionService, PriceCache, RedisStore } from '@chartdesk/shared';
import { ConfigService } from '../../src/config/env';
import { createServices } from '../../src/container';

describe('createServices', () => {
    it('wires one instance of each service without connecting', () => {
        const services = createServices(new ConfigService({ PRICE_CACHE_TTL_SECONDS: '30' }).values);

        expect(services.store).toBeInstanceOf(RedisStore);
        expect(services.store.isConnected()).toBe(false);
        expect(services.positionService).toBeInstanceOf(PositionService);
        expect(services.priceCache).toBeInstanceOf(PriceCache);
        expect(services.priceCache.size).toBe(0);
    });

    it('uses synthetic quotes without an API key', async () => {
        const { priceCache } = createServices(new ConfigService({}).values);

        const quote = await priceCache.getCryptoPrice('BTC');

        expect(quote?.name).toBe('BTC Coin');
    });
});
