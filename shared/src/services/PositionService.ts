import { z } from 'zod';
import {
    Position,
    PositionCloseSchema,
    PositionCreate,
    PositionCreateInput,
    PositionCreateSchema,
    PositionStatus,
    PositionUpdateInput,
    PositionUpdateSchema,
    PositionsSummary,
    PlatformType,
    Requester,
    isTerminalStatus
} from '../types/Position';
import type { IPositionRepository } from './DependencyInjection';
import { AppError, InvalidTransitionError, OwnershipError, StorageError } from '../errors';
import { logger } from './logger';
import { parseWithSchema } from '../utils/validation';

type PositionCloseInput = z.input<typeof PositionCloseSchema>;

// Chart analysis leaves blanks as null, '' or 0
const OptionalLevelSchema = z.preprocess(
    value => (value === undefined || value === null || value === '' || value === 0 ? null : value),
    z.coerce.number().nullable()
);

const ChartDataSchema = z.object({
    symbol: z.string().default('UNKNOWN'),
    entry: z.coerce.number(),
    take_profit: OptionalLevelSchema,
    stop_loss: OptionalLevelSchema,
    position_type: z.string().default('long')
});

/**
 * Business rules on top of the position repository: ownership checks and
 * status transition legality. The API creates one instance per process and
 * hands it to every consumer.
 */
export class PositionService {
    constructor(private readonly repository: IPositionRepository) {}

    /**
     * Create a new position from raw fields or a normalized request
     * @throws {ValidationError} If the fields do not form a valid position
     * @throws {StorageError} If the record could not be written
     */
    public async createPosition(data: PositionCreateInput | PositionCreate): Promise<Position> {
        const request = parseWithSchema(PositionCreateSchema, data, 'position');
        const position = await this.repository.createPosition(request);
        if (!position) {
            throw new StorageError(`Position for ${request.platform} user ${request.userId} could not be stored`);
        }
        return position;
    }

    /**
     * Create a position from a chart analysis payload. The payload is kept
     * as the position's metadata. Returns null when it cannot be turned
     * into a valid position.
     */
    public async createPositionFromChartData(
        userId: string,
        platform: PlatformType,
        chartData: Record<string, unknown>
    ): Promise<Position | null> {
        const parsed = ChartDataSchema.safeParse(chartData);
        if (!parsed.success) {
            logger.warn(`[PositionService] Chart data for ${platform} user ${userId} has no usable entry`);
            return null;
        }

        const chart = parsed.data;
        try {
            return await this.createPosition({
                userId,
                platform,
                symbol: chart.symbol,
                type: chart.position_type.toLowerCase() === 'long' ? 'long' : 'short',
                entryPrice: chart.entry,
                takeProfit: chart.take_profit,
                stopLoss: chart.stop_loss,
                metadata: chartData
            });
        } catch (error) {
            if (error instanceof AppError) {
                logger.error(`[PositionService] Error creating position from chart data: ${error.message}`);
                return null;
            }
            throw error;
        }
    }

    public async getPosition(positionId: string): Promise<Position | null> {
        return this.repository.getPosition(positionId);
    }

    /**
     * Update the provided fields of a position
     * @throws {OwnershipError} If the requester does not own the position
     * @throws {InvalidTransitionError} If a terminal position would change status
     */
    public async updatePosition(
        positionId: string,
        data: PositionUpdateInput,
        requester?: Requester
    ): Promise<Position | null> {
        const patch = parseWithSchema(PositionUpdateSchema, data, 'position update');
        const current = await this.loadOwned(positionId, requester);
        if (!current) return null;

        if (patch.status && patch.status !== current.status && isTerminalStatus(current.status)) {
            throw new InvalidTransitionError(current, patch.status);
        }

        return this.expectWritten(await this.repository.updatePosition(positionId, patch), positionId, 'updated');
    }

    /**
     * Stop (soft-delete) an active position
     * @throws {InvalidTransitionError} If the position is already closed or stopped
     */
    public async stopPosition(positionId: string, requester?: Requester): Promise<Position | null> {
        const current = await this.loadOwned(positionId, requester);
        if (!current) return null;
        this.assertActive(current, 'stopped');

        return this.expectWritten(await this.repository.stopPosition(positionId), positionId, 'stopped');
    }

    /**
     * Close an active position, applying any extra fields
     * @throws {InvalidTransitionError} If the position is already closed or stopped
     */
    public async closePosition(
        positionId: string,
        fields: PositionCloseInput = {},
        requester?: Requester
    ): Promise<Position | null> {
        const changes = parseWithSchema(PositionCloseSchema, fields, 'close fields');
        const current = await this.loadOwned(positionId, requester);
        if (!current) return null;
        this.assertActive(current, 'closed');

        return this.expectWritten(await this.repository.closePosition(positionId, changes), positionId, 'closed');
    }

    /**
     * Delete a position permanently
     * @returns false if it did not exist
     */
    public async deletePosition(positionId: string, requester?: Requester): Promise<boolean> {
        const current = await this.loadOwned(positionId, requester);
        if (!current) return false;

        if (!(await this.repository.deletePosition(positionId))) {
            throw new StorageError(`Position ${positionId} could not be deleted`);
        }
        return true;
    }

    public async getUserPositions(
        userId: string,
        platform: PlatformType,
        includeStopped: boolean = false
    ): Promise<Position[]> {
        return this.repository.getUserPositions(userId, platform, includeStopped);
    }

    public async getUserActivePositions(userId: string, platform: PlatformType): Promise<Position[]> {
        return this.repository.getUserActivePositions(userId, platform);
    }

    /**
     * First of the user's positions (index order) with the given symbol,
     * compared case-insensitively, and status
     */
    public async getPositionBySymbolForUser(
        userId: string,
        platform: PlatformType,
        symbol: string,
        status: PositionStatus = 'active'
    ): Promise<Position | null> {
        const wanted = symbol.trim().toUpperCase();
        const positions = await this.getUserPositions(userId, platform, status === 'stopped');

        return positions.find(position => position.symbol.toUpperCase() === wanted && position.status === status) ?? null;
    }

    public async getPositionsSummary(userId: string, platform: PlatformType): Promise<PositionsSummary> {
        const positions = await this.getUserPositions(userId, platform, true);
        const count = (status: PositionStatus) => positions.filter(position => position.status === status).length;

        return {
            total: positions.length,
            active: count('active'),
            closed: count('closed'),
            stopped: count('stopped')
        };
    }

    public async reconcileUserIndex(userId: string, platform: PlatformType): Promise<{ removed: string[] }> {
        return this.repository.reconcileUserIndex(userId, platform);
    }

    private async loadOwned(positionId: string, requester?: Requester): Promise<Position | null> {
        const position = await this.repository.getPosition(positionId);
        if (!position) return null;

        if (requester && (position.userId !== requester.userId || position.platform !== requester.platform)) {
            logger.warn(`[PositionService] ${requester.platform} user ${requester.userId} tried to modify position ${positionId}`);
            throw new OwnershipError(positionId, requester.userId, requester.platform);
        }
        return position;
    }

    private assertActive(position: Position, requestedStatus: PositionStatus): void {
        if (isTerminalStatus(position.status)) {
            throw new InvalidTransitionError(position, requestedStatus);
        }
    }

    private expectWritten(position: Position | null, positionId: string, action: string): Position {
        if (!position) {
            throw new StorageError(`Position ${positionId} could not be ${action}`);
        }
        return position;
    }
}
