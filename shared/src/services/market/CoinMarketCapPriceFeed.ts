import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import type { IPriceFeed } from '../DependencyInjection';
import type { PriceQuote } from '../../types/PriceQuote';
import { DEFAULT_RETRY_POLICIES, RetryPolicy, UpstreamError, withRetry } from '../../errors';
import { logger } from '../logger';

export const CMC_BASE_URL = 'https://pro-api.coinmarketcap.com';
const QUOTES_PATH = '/v1/cryptocurrency/quotes/latest';

const NullableNumber = z.number().nullable().transform(value => value ?? 0);

const CmcQuoteSchema = z.object({
    price: z.number(),
    percent_change_1h: NullableNumber,
    percent_change_24h: NullableNumber,
    percent_change_7d: NullableNumber,
    market_cap: NullableNumber,
    volume_24h: NullableNumber,
    last_updated: z.string()
});

const CmcAssetSchema = z.object({
    symbol: z.string(),
    name: z.string(),
    quote: z.record(z.unknown())
});

const CmcResponseSchema = z.object({
    data: z.record(z.unknown())
});

const CmcErrorSchema = z.object({
    status: z.object({ error_message: z.string().nullable().optional() })
});

export interface CoinMarketCapOptions {
    baseURL?: string;
    timeoutMs?: number;
    retryPolicy?: RetryPolicy;
    /** Transport override, used to run the feed without network access */
    adapter?: AxiosAdapter;
}

/**
 * CoinMarketCap quotes feed
 *
 * One request per call, symbols comma-joined. Transport failures are
 * normalized into UpstreamError; 5xx, 429 and network errors are retried.
 */
export class CoinMarketCapPriceFeed implements IPriceFeed {
    public readonly name = 'CoinMarketCap';
    private client: AxiosInstance;
    private readonly retryPolicy: RetryPolicy;

    constructor(apiKey: string, options: CoinMarketCapOptions = {}) {
        this.client = axios.create({
            baseURL: options.baseURL ?? CMC_BASE_URL,
            timeout: options.timeoutMs ?? 10000,
            headers: { 'X-CMC_PRO_API_KEY': apiKey, Accept: 'application/json' },
            adapter: options.adapter
        });
        this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICIES.UPSTREAM_ERROR;

        // Add interceptor for error normalization
        this.client.interceptors.response.use(
            response => response,
            (error: unknown) => {
                throw this.toUpstreamError(error);
            }
        );
    }

    async fetchQuotes(symbols: string[], currency: string): Promise<Record<string, PriceQuote>> {
        if (symbols.length === 0) return {};

        const response = await withRetry(
            () => this.client.get<unknown>(QUOTES_PATH, {
                params: { symbol: symbols.join(','), convert: currency }
            }),
            this.retryPolicy,
            `${this.name} quotes for ${symbols.join(',')}`
        );

        const body = CmcResponseSchema.safeParse(response.data);
        if (!body.success) {
            throw new UpstreamError(`[${this.name}] Response has no data`, this.name, undefined, false);
        }

        const result: Record<string, PriceQuote> = {};
        for (const symbol of symbols) {
            const quote = this.toQuote(body.data.data[symbol], currency);
            if (!quote) {
                logger.warn(`[${this.name}] Symbol ${symbol} not found in API response`);
                continue;
            }
            result[symbol] = quote;
        }
        return result;
    }

    private toQuote(raw: unknown, currency: string): PriceQuote | null {
        const asset = CmcAssetSchema.safeParse(raw);
        if (!asset.success) return null;

        const quote = CmcQuoteSchema.safeParse(asset.data.quote[currency]);
        if (!quote.success) return null;

        return {
            symbol: asset.data.symbol,
            name: asset.data.name,
            price: quote.data.price,
            percentChange1h: quote.data.percent_change_1h,
            percentChange24h: quote.data.percent_change_24h,
            percentChange7d: quote.data.percent_change_7d,
            marketCap: quote.data.market_cap,
            volume24h: quote.data.volume_24h,
            lastUpdated: quote.data.last_updated,
            currency
        };
    }

    private toUpstreamError(error: unknown): UpstreamError {
        if (!axios.isAxiosError(error)) {
            const cause = error instanceof Error ? error : new Error(String(error));
            return new UpstreamError(`[${this.name}] ${cause.message}`, this.name, cause, false);
        }

        const status = error.response?.status;
        const body = CmcErrorSchema.safeParse(error.response?.data);
        const message = (body.success && body.data.status.error_message) || error.message;
        const retryable = status === undefined || status >= 500 || status === 429;

        return new UpstreamError(`[${this.name}] ${message}`, this.name, error, retryable);
    }
}
