import { logger, toError } from '@chartdesk/shared';
import { ConfigService } from './config/env';
import { createServices } from './container';
import { App } from './server';

const config = ConfigService.getInstance();
logger.setLevel(config.get('LOG_LEVEL'));

const app = new App(config.values, createServices(config.values));

app.start().catch((error: unknown) => {
    logger.error('Failed to start server', toError(error).message);
    process.exit(1);
});
