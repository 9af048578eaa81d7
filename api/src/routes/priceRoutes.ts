import { Router } from 'express';
import { PriceController } from '../controllers/PriceController';

export function createPriceRoutes(controller: PriceController): Router {
    const router = Router();

    router.get('/', controller.getPrices.bind(controller));
    router.delete('/cache', controller.clearCache.bind(controller));
    router.get('/:symbol', controller.getPrice.bind(controller));

    return router;
}
