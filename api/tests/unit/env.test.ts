import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@chartdesk/shared';
import { ConfigService } from '../../src/config/env';

describe('ConfigService', () => {
    it('fills in defaults', () => {
        const config = new ConfigService({});

        expect(config.values).toEqual({
            NODE_ENV: 'development',
            PORT: 3000,
            LOG_LEVEL: 'info',
            CORS_ORIGIN: '*',
            REDIS_URL: 'redis://localhost:6379/0',
            POSITION_KEY_PREFIX: 'position',
            CMC_API_KEY: undefined,
            CMC_BASE_URL: 'https://pro-api.coinmarketcap.com',
            PRICE_CACHE_TTL_SECONDS: 300,
            PRICE_CACHE_SWEEP_INTERVAL_MS: 0
        });
    });

    it('coerces numeric settings from strings', () => {
        const config = new ConfigService({ PORT: '8080', PRICE_CACHE_TTL_SECONDS: '60' });

        expect(config.get('PORT')).toBe(8080);
        expect(config.get('PRICE_CACHE_TTL_SECONDS')).toBe(60);
    });

    it('treats an empty API key as absent', () => {
        expect(new ConfigService({ CMC_API_KEY: '' }).get('CMC_API_KEY')).toBeUndefined();
        expect(new ConfigService({ CMC_API_KEY: 'test-secret' }).get('CMC_API_KEY')).toBe('test-secret');
    });

    it('rejects invalid values', () => {
        expect(() => new ConfigService({ PORT: 'eighty' })).toThrow(ConfigurationError);
        expect(() => new ConfigService({ LOG_LEVEL: 'verbose' })).toThrow(/^Configuration Validation Failed: LOG_LEVEL/);
    });
});
