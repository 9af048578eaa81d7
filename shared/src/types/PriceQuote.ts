/**
 * Price snapshot for a symbol in a quote currency
 */
export interface PriceQuote {
    symbol: string;
    name: string;
    price: number;
    percentChange1h: number;
    percentChange24h: number;
    percentChange7d: number;
    marketCap: number;
    volume24h: number;
    lastUpdated: string;     // ISO-8601, as reported by the feed
    currency: string;
}

export interface SymbolPrice {
    price: number | null;
    currency: string;
}
