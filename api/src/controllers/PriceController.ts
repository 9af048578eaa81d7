import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { PriceCache, parseWithSchema } from '@chartdesk/shared';

const PriceQuerySchema = z.object({
    currency: z.string().trim().min(1).default('USD'),
    maxAge: z.coerce.number().positive().optional()
});

const BatchQuerySchema = PriceQuerySchema.extend({
    symbols: z
        .string()
        .transform(value => value.split(',').map(symbol => symbol.trim()).filter(symbol => symbol.length > 0))
        .pipe(z.array(z.string()).min(1, 'at least one symbol is required').max(100))
});

export class PriceController {
    constructor(private readonly prices: PriceCache) {}

    /**
     * GET /api/v1/prices/:symbol?currency=USD&maxAge=300
     */
    public async getPrice(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { currency, maxAge } = parseWithSchema(PriceQuerySchema, req.query, 'query');
            const { symbol } = req.params;

            const quote = await this.prices.getCryptoPrice(symbol, currency, maxAge);
            if (!quote) {
                res.status(404).json({ status: 'fail', message: `No price data for ${symbol}` });
                return;
            }
            res.status(200).json({ status: 'success', data: { quote } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * GET /api/v1/prices?symbols=BTC,ETH&currency=USD
     */
    public async getPrices(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { symbols, currency, maxAge } = parseWithSchema(BatchQuerySchema, req.query, 'query');

            const quotes = await this.prices.getMultipleCryptoPrices(symbols, currency, maxAge);
            res.status(200).json({ status: 'success', results: Object.keys(quotes).length, data: { quotes } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * DELETE /api/v1/prices/cache
     */
    public async clearCache(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            this.prices.clear();
            res.status(200).json({ status: 'success', message: 'Price cache cleared' });
        } catch (error) {
            next(error);
        }
    }
}
