import { Router } from 'express';
import { PositionController } from '../controllers/PositionController';
import { requireRequester } from '../middleware/requesterContext';

export function createPositionRoutes(controller: PositionController): Router {
    const router = Router();

    // POST /api/v1/positions - Create a position
    router.post('/', controller.createPosition.bind(controller));

    // POST /api/v1/positions/from-chart - Create from a chart analysis payload
    router.post('/from-chart', requireRequester, controller.createFromChart.bind(controller));

    // Per-user views
    router.get('/user/:platform/:userId', controller.getUserPositions.bind(controller));
    router.get('/user/:platform/:userId/active', controller.getUserActivePositions.bind(controller));
    router.get('/user/:platform/:userId/summary', controller.getPositionsSummary.bind(controller));
    router.get('/user/:platform/:userId/symbol/:symbol', controller.getPositionBySymbol.bind(controller));
    router.post('/user/:platform/:userId/reconcile', controller.reconcileUserIndex.bind(controller));

    // GET /api/v1/positions/:id - Get specific position
    router.get('/:id', controller.getPosition.bind(controller));

    // Mutations act on behalf of the requesting chat user
    router.patch('/:id', requireRequester, controller.updatePosition.bind(controller));
    router.delete('/:id', requireRequester, controller.stopPosition.bind(controller));
    router.post('/:id/close', requireRequester, controller.closePosition.bind(controller));
    router.delete('/:id/permanent', requireRequester, controller.deletePosition.bind(controller));

    return router;
}
