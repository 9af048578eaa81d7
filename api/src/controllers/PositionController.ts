import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
    PlatformTypeSchema,
    PositionService,
    PositionStatusSchema,
    parseWithSchema,
    validateUUID
} from '@chartdesk/shared';
import { getRequester } from '../middleware/requesterContext';

const UserParamsSchema = z.object({
    platform: PlatformTypeSchema,
    userId: z.string().min(1)
});

const ListQuerySchema = z.object({
    includeStopped: z.enum(['true', 'false']).default('false').transform(value => value === 'true')
});

const SymbolQuerySchema = z.object({
    status: PositionStatusSchema.default('active')
});

const ChartDataSchema = z.record(z.unknown());

function positionId(req: Request): string {
    const { id } = req.params;
    validateUUID(id);
    return id;
}

function notFound(res: Response): void {
    res.status(404).json({ status: 'fail', message: 'Position not found' });
}

export class PositionController {
    constructor(private readonly positions: PositionService) {}

    /**
     * POST /api/v1/positions
     */
    public async createPosition(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const position = await this.positions.createPosition(req.body);
            res.status(201).json({ status: 'success', data: { position } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * POST /api/v1/positions/from-chart
     * Body is the chart analysis payload; the requester becomes the owner.
     */
    public async createFromChart(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { userId, platform } = getRequester(req);
            const chartData = parseWithSchema(ChartDataSchema, req.body, 'chart data');

            const position = await this.positions.createPositionFromChartData(userId, platform, chartData);
            if (!position) {
                res.status(422).json({ status: 'fail', message: 'Chart data does not describe a valid position' });
                return;
            }

            res.status(201).json({ status: 'success', data: { position } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * GET /api/v1/positions/:id
     */
    public async getPosition(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const position = await this.positions.getPosition(positionId(req));
            if (!position) {
                notFound(res);
                return;
            }
            res.status(200).json({ status: 'success', data: { position } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * PATCH /api/v1/positions/:id
     */
    public async updatePosition(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const position = await this.positions.updatePosition(positionId(req), req.body, getRequester(req));
            if (!position) {
                notFound(res);
                return;
            }
            res.status(200).json({ status: 'success', data: { position } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * DELETE /api/v1/positions/:id (soft delete)
     */
    public async stopPosition(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const position = await this.positions.stopPosition(positionId(req), getRequester(req));
            if (!position) {
                notFound(res);
                return;
            }
            res.status(200).json({ status: 'success', data: { position } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * POST /api/v1/positions/:id/close
     */
    public async closePosition(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const position = await this.positions.closePosition(positionId(req), req.body ?? {}, getRequester(req));
            if (!position) {
                notFound(res);
                return;
            }
            res.status(200).json({ status: 'success', data: { position } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * DELETE /api/v1/positions/:id/permanent
     */
    public async deletePosition(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const id = positionId(req);
            const deleted = await this.positions.deletePosition(id, getRequester(req));
            if (!deleted) {
                notFound(res);
                return;
            }
            res.status(200).json({ status: 'success', data: { id, deleted } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * GET /api/v1/positions/user/:platform/:userId?includeStopped=true
     */
    public async getUserPositions(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { platform, userId } = parseWithSchema(UserParamsSchema, req.params, 'path');
            const { includeStopped } = parseWithSchema(ListQuerySchema, req.query, 'query');

            const positions = await this.positions.getUserPositions(userId, platform, includeStopped);
            res.status(200).json({ status: 'success', results: positions.length, data: { positions } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * GET /api/v1/positions/user/:platform/:userId/active
     */
    public async getUserActivePositions(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { platform, userId } = parseWithSchema(UserParamsSchema, req.params, 'path');

            const positions = await this.positions.getUserActivePositions(userId, platform);
            res.status(200).json({ status: 'success', results: positions.length, data: { positions } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * GET /api/v1/positions/user/:platform/:userId/summary
     */
    public async getPositionsSummary(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { platform, userId } = parseWithSchema(UserParamsSchema, req.params, 'path');

            const summary = await this.positions.getPositionsSummary(userId, platform);
            res.status(200).json({ status: 'success', data: { summary } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * GET /api/v1/positions/user/:platform/:userId/symbol/:symbol?status=active
     */
    public async getPositionBySymbol(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { platform, userId } = parseWithSchema(UserParamsSchema, req.params, 'path');
            const { status } = parseWithSchema(SymbolQuerySchema, req.query, 'query');

            const position = await this.positions.getPositionBySymbolForUser(userId, platform, req.params.symbol, status);
            if (!position) {
                notFound(res);
                return;
            }
            res.status(200).json({ status: 'success', data: { position } });
        } catch (error) {
            next(error);
        }
    }

    /**
     * POST /api/v1/positions/user/:platform/:userId/reconcile
     */
    public async reconcileUserIndex(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { platform, userId } = parseWithSchema(UserParamsSchema, req.params, 'path');

            const { removed } = await this.positions.reconcileUserIndex(userId, platform);
            res.status(200).json({ status: 'success', results: removed.length, data: { removed } });
        } catch (error) {
            next(error);
        }
    }
}
