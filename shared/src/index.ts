export * from './types/Position';
export * from './types/PriceQuote';
export * from './errors';
export * from './utils/validation';
export * from './services/logger';
export * from './services/DependencyInjection';
export * from './services/PositionService';
export * from './services/PriceCache';
export * from './services/market';
export * from './db/RedisStore';
export * from './db/PositionRepository';
