import { z } from 'zod';
import dotenv from 'dotenv';
import {
    CMC_BASE_URL,
    ConfigurationError,
    DEFAULT_CACHE_TTL_SECONDS,
    DEFAULT_POSITION_PREFIX,
    DEFAULT_REDIS_URL,
    formatZodError
} from '@chartdesk/shared';

dotenv.config();

const configSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    CORS_ORIGIN: z.string().default('*'),
    // Storage
    REDIS_URL: z.string().url().default(DEFAULT_REDIS_URL),
    POSITION_KEY_PREFIX: z.string().min(1).default(DEFAULT_POSITION_PREFIX),
    // Market data; no key means synthetic quotes
    CMC_API_KEY: z.string().optional().transform(value => value || undefined),
    CMC_BASE_URL: z.string().url().default(CMC_BASE_URL),
    PRICE_CACHE_TTL_SECONDS: z.coerce.number().positive().default(DEFAULT_CACHE_TTL_SECONDS),
    PRICE_CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0)
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigService {
    private static instance: ConfigService;
    public readonly values: AppConfig;

    constructor(env: NodeJS.ProcessEnv = process.env) {
        const parsed = configSchema.safeParse(env);
        if (!parsed.success) {
            throw new ConfigurationError(`Configuration Validation Failed: ${formatZodError(parsed.error)}`);
        }
        this.values = parsed.data;
    }

    public static getInstance(): ConfigService {
        if (!ConfigService.instance) {
            ConfigService.instance = new ConfigService();
        }
        return ConfigService.instance;
    }

    public get<K extends keyof AppConfig>(key: K): AppConfig[K] {
        return this.values[key];
    }
}
