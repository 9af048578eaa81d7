import { randomUUID } from 'crypto';
import {
    Position,
    PositionClose,
    PositionCreate,
    PositionSchema,
    PositionStatus,
    PositionUpdate,
    PlatformType
} from '../types/Position';
import type { IKeyValueStore, IPositionRepository } from '../services/DependencyInjection';
import { logger } from '../services/logger';
import { formatZodError, validateRequired } from '../utils/validation';

export const DEFAULT_POSITION_PREFIX = 'position';

function merge<T>(change: T | undefined, current: T): T {
    return change === undefined ? current : change;
}

/**
 * Apply the provided fields of `changes` to `position`, refresh `updatedAt`
 * and keep `closedAt` set exactly while the status is closed.
 */
export function applyPositionChanges(position: Position, changes: PositionUpdate, now: string): Position {
    const status: PositionStatus = merge(changes.status, position.status);

    return {
        ...position,
        symbol: merge(changes.symbol, position.symbol),
        type: merge(changes.type, position.type),
        entryPrice: merge(changes.entryPrice, position.entryPrice),
        takeProfit: merge(changes.takeProfit, position.takeProfit),
        stopLoss: merge(changes.stopLoss, position.stopLoss),
        quantity: merge(changes.quantity, position.quantity),
        leverage: merge(changes.leverage, position.leverage),
        notes: merge(changes.notes, position.notes),
        metadata: merge(changes.metadata, position.metadata),
        status,
        updatedAt: now,
        closedAt: status === 'closed' ? position.closedAt ?? now : null
    };
}

/**
 * Position records on a key-value store.
 *
 * Layout:
 *   `<prefix>:<id>`                          JSON record
 *   `<prefix>:user:<platform>:<userId>`      set of the owner's position ids
 *
 * Record and index are written separately, record first: a crash in between
 * leaves a position that is fetchable by id but missing from listings, never
 * an index entry pointing at nothing that was just created.
 */
export class PositionRepository implements IPositionRepository {
    constructor(
        private readonly store: IKeyValueStore,
        private readonly prefix: string = DEFAULT_POSITION_PREFIX
    ) {
        validateRequired(store, 'store');
        validateRequired(prefix, 'prefix');
    }

    public positionKey(positionId: string): string {
        return `${this.prefix}:${positionId}`;
    }

    public userPositionsKey(userId: string, platform: PlatformType): string {
        return `${this.prefix}:user:${platform}:${userId}`;
    }

    /**
     * Create a new active position
     * @returns The stored position, or null if the record could not be written
     */
    public async createPosition(data: PositionCreate): Promise<Position | null> {
        const now = new Date().toISOString();
        const position: Position = {
            id: randomUUID(),
            userId: data.userId,
            platform: data.platform,
            symbol: data.symbol,
            type: data.type,
            entryPrice: data.entryPrice,
            takeProfit: data.takeProfit,
            stopLoss: data.stopLoss,
            quantity: data.quantity,
            leverage: data.leverage,
            status: 'active',
            createdAt: now,
            updatedAt: now,
            closedAt: null,
            notes: data.notes,
            metadata: data.metadata
        };

        if (!(await this.save(position))) {
            logger.error(`[PositionRepository] Failed to write position for user ${data.userId} on ${data.platform}`);
            return null;
        }

        const added = await this.store.addToSet(this.userPositionsKey(position.userId, position.platform), position.id);
        if (added === 0) {
            logger.warn(`[PositionRepository] Position ${position.id} stored but missing from the index of ${position.platform} user ${position.userId}`);
        }

        logger.info(`[PositionRepository] Created position ${position.id} for user ${position.userId} on ${position.platform}`);
        return position;
    }

    /**
     * Get a position by ID; records that no longer parse are treated as missing
     */
    public async getPosition(positionId: string): Promise<Position | null> {
        const data = await this.store.getJson(this.positionKey(positionId));
        if (data === null) return null;

        const parsed = PositionSchema.safeParse(data);
        if (!parsed.success) {
            logger.error(`[PositionRepository] Corrupt record for position ${positionId}`, formatZodError(parsed.error));
            return null;
        }
        return parsed.data;
    }

    /**
     * Merge the provided fields into a position
     * @returns The updated position, or null if missing or not written
     */
    public async updatePosition(positionId: string, patch: PositionUpdate): Promise<Position | null> {
        const position = await this.getPosition(positionId);
        if (!position) return null;

        const updated = applyPositionChanges(position, patch, new Date().toISOString());
        if (!(await this.save(updated))) return null;

        logger.info(`[PositionRepository] Updated position ${updated.id} for user ${updated.userId}`);
        return updated;
    }

    /**
     * Soft-delete a position. Already stopped records are rewritten as is.
     */
    public async stopPosition(positionId: string): Promise<Position | null> {
        const position = await this.getPosition(positionId);
        if (!position) return null;

        const stopped = applyPositionChanges(position, { status: 'stopped' }, new Date().toISOString());
        if (!(await this.save(stopped))) return null;

        logger.info(`[PositionRepository] Stopped position ${stopped.id} for user ${stopped.userId}`);
        return stopped;
    }

    /**
     * Close a position; `closedAt` keeps the time of the first close
     */
    public async closePosition(positionId: string, fields: PositionClose = {}): Promise<Position | null> {
        const position = await this.getPosition(positionId);
        if (!position) return null;

        const closed = applyPositionChanges(position, { ...fields, status: 'closed' }, new Date().toISOString());
        if (!(await this.save(closed))) return null;

        logger.info(`[PositionRepository] Closed position ${closed.id} for user ${closed.userId}`);
        return closed;
    }

    /**
     * Delete a position permanently, record and index entry
     * @returns false if the record did not exist or could not be deleted
     */
    public async deletePosition(positionId: string): Promise<boolean> {
        const position = await this.getPosition(positionId);
        if (!position) return false;

        if (!(await this.store.delete(this.positionKey(position.id)))) {
            logger.error(`[PositionRepository] Failed to delete position ${position.id}`);
            return false;
        }
        await this.store.removeFromSet(this.userPositionsKey(position.userId, position.platform), position.id);

        logger.info(`[PositionRepository] Deleted position ${position.id} for user ${position.userId}`);
        return true;
    }

    /**
     * All positions of a user in index order. Index entries whose record is
     * gone are skipped.
     */
    public async getUserPositions(
        userId: string,
        platform: PlatformType,
        includeStopped: boolean = false
    ): Promise<Position[]> {
        const positionIds = await this.store.getSetMembers(this.userPositionsKey(userId, platform));
        const positions = await Promise.all([...positionIds].map(id => this.getPosition(id)));

        return positions.filter(
            (position): position is Position =>
                position !== null && (includeStopped || position.status !== 'stopped')
        );
    }

    public async getUserActivePositions(userId: string, platform: PlatformType): Promise<Position[]> {
        const positions = await this.getUserPositions(userId, platform);
        return positions.filter(position => position.status === 'active');
    }

    /**
     * Drop index entries whose record is gone, or that point at a record
     * owned by someone else. An id is only pruned on a definite answer from
     * the store: records that fail to read or no longer parse stay indexed.
     */
    public async reconcileUserIndex(userId: string, platform: PlatformType): Promise<{ removed: string[] }> {
        const indexKey = this.userPositionsKey(userId, platform);
        const positionIds = [...(await this.store.getSetMembers(indexKey))];
        if (positionIds.length === 0) return { removed: [] };

        const existing = await this.store.existingKeys(positionIds.map(id => this.positionKey(id)));
        if (!existing) {
            logger.warn(`[PositionRepository] Skipped reconciling ${indexKey}: store did not answer`);
            return { removed: [] };
        }

        const removed: string[] = [];
        for (const id of positionIds) {
            if (!existing.has(this.positionKey(id))) {
                removed.push(id);
                continue;
            }
            const position = await this.getPosition(id);
            if (position && (position.userId !== userId || position.platform !== platform)) {
                removed.push(id);
            }
        }

        if (removed.length > 0) {
            await this.store.removeFromSet(indexKey, ...removed);
            logger.warn(`[PositionRepository] Pruned ${removed.length} dangling id(s) from ${indexKey}`);
        }
        return { removed };
    }

    private save(position: Position): Promise<boolean> {
        return this.store.setJson(this.positionKey(position.id), position);
    }
}
