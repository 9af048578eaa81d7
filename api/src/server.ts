import express, { Express, Router } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { Server as HttpServer } from 'http';
import { NotFoundError, logger, startPriceCacheSweep, toError } from '@chartdesk/shared';
import type { AppConfig } from './config/env';
import type { AppServices } from './container';
import { errorHandler } from './middleware/errorHandler';
import { PositionController } from './controllers/PositionController';
import { PriceController } from './controllers/PriceController';
import { createPositionRoutes } from './routes/positionRoutes';
import { createPriceRoutes } from './routes/priceRoutes';

export const API_VERSION = '1.0.0';

export class App {
    public app: Express;
    private server?: HttpServer;
    private sweepTimer?: ReturnType<typeof setInterval>;

    constructor(
        private readonly config: AppConfig,
        private readonly services: AppServices
    ) {
        this.app = express();
        this.setupMiddleware();
        this.setupRoutes();
        this.setupErrorHandling();
    }

    private setupMiddleware() {
        this.app.use(helmet());
        this.app.use(cors({ origin: this.config.CORS_ORIGIN }));
        this.app.use(morgan('tiny', { stream: logger.stream() }));
        this.app.use(express.json({ limit: '1mb' }));
    }

    private setupRoutes() {
        this.app.get('/health', (req, res) => {
            const store = this.services.store.getHealth();
            res.status(store.connected ? 200 : 503).json({
                status: store.connected ? 'healthy' : 'degraded',
                version: API_VERSION,
                store,
                priceCacheEntries: this.services.priceCache.size
            });
        });

        const apiRouter = Router();
        apiRouter.use('/v1/positions', createPositionRoutes(new PositionController(this.services.positionService)));
        apiRouter.use('/v1/prices', createPriceRoutes(new PriceController(this.services.priceCache)));
        this.app.use('/api', apiRouter);

        this.app.all('*', (req, res, next) => {
            next(new NotFoundError('Route', req.originalUrl));
        });
    }

    private setupErrorHandling() {
        this.app.use(errorHandler);
    }

    public async start(): Promise<void> {
        // Fail early if the store is down
        await this.services.store.connect();

        const sweepInterval = this.config.PRICE_CACHE_SWEEP_INTERVAL_MS;
        if (sweepInterval > 0) {
            this.sweepTimer = startPriceCacheSweep(
                this.services.priceCache,
                sweepInterval,
                this.config.PRICE_CACHE_TTL_SECONDS
            );
        }

        const port = this.config.PORT;
        this.server = this.app.listen(port, () => {
            logger.info(`Server running on port ${port}`);
        });

        this.setupGracefulShutdown();
    }

    public async stop(): Promise<void> {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = undefined;
        }

        const server = this.server;
        if (server) {
            await new Promise<void>((resolve, reject) =>
                server.close(error => (error ? reject(error) : resolve()))
            );
            this.server = undefined;
            logger.info('HTTP server closed.');
        }

        await this.services.store.disconnect();
    }

    private setupGracefulShutdown() {
        const shutdown = (signal: string) => {
            logger.info(`${signal} received. Shutting down gracefully...`);

            // Force close after 10s
            setTimeout(() => {
                logger.error('Could not close connections in time, forcefully shutting down');
                process.exit(1);
            }, 10000).unref();

            this.stop()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('Shutdown failed', toError(error).message);
                    process.exit(1);
                });
        };

        process.on('SIGTERM', () => shutdown('SIGTERM'));
        process.on('SIGINT', () => shutdown('SIGINT'));

        process.on('unhandledRejection', (reason: unknown) => {
            logger.error('UNHANDLED REJECTION! Shutting down...', toError(reason));
            shutdown('UNHANDLED_REJECTION');
        });
    }
}
