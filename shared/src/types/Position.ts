import { z } from 'zod';

export const PlatformTypeSchema = z.enum(['discord', 'telegram']);
export const PositionStatusSchema = z.enum(['active', 'closed', 'stopped']);
export const PositionTypeSchema = z.enum(['long', 'short']);

export type PlatformType = z.infer<typeof PlatformTypeSchema>;
export type PositionStatus = z.infer<typeof PositionStatusSchema>;
export type PositionType = z.infer<typeof PositionTypeSchema>;

/** Statuses a position never leaves once reached */
export const TERMINAL_STATUSES: readonly PositionStatus[] = ['closed', 'stopped'];

export function isTerminalStatus(status: PositionStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

const SymbolSchema = z
    .string()
    .trim()
    .min(1, 'symbol is required')
    .transform(symbol => symbol.toUpperCase());

const PriceLevelSchema = z.number().finite().positive();

/**
 * A stored trading position, as persisted under `position:<id>`
 */
export const PositionSchema = z.object({
    id: z.string().uuid(),
    userId: z.string().min(1),          // Discord or Telegram user id
    platform: PlatformTypeSchema,
    symbol: z.string().min(1),
    type: PositionTypeSchema,
    entryPrice: PriceLevelSchema,
    takeProfit: PriceLevelSchema.nullable(),
    stopLoss: PriceLevelSchema.nullable(),
    quantity: PriceLevelSchema.nullable(),
    leverage: PriceLevelSchema.nullable(),
    status: PositionStatusSchema,
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
    closedAt: z.string().datetime().nullable(),
    notes: z.string().nullable(),
    metadata: z.record(z.unknown())
});

export type Position = z.infer<typeof PositionSchema>;

export const PositionCreateSchema = z.object({
    userId: z.string().trim().min(1, 'userId is required'),
    platform: PlatformTypeSchema,
    symbol: SymbolSchema,
    type: PositionTypeSchema,
    entryPrice: PriceLevelSchema,
    takeProfit: PriceLevelSchema.nullable().default(null),
    stopLoss: PriceLevelSchema.nullable().default(null),
    quantity: PriceLevelSchema.nullable().default(null),
    leverage: PriceLevelSchema.nullable().default(null),
    notes: z.string().nullable().default(null),
    metadata: z.record(z.unknown()).default({})
});

/** Normalized creation request */
export type PositionCreate = z.infer<typeof PositionCreateSchema>;
/** Raw creation fields as received from a bot command or HTTP body */
export type PositionCreateInput = z.input<typeof PositionCreateSchema>;

export const PositionUpdateSchema = z
    .object({
        symbol: SymbolSchema.optional(),
        type: PositionTypeSchema.optional(),
        entryPrice: PriceLevelSchema.optional(),
        takeProfit: PriceLevelSchema.nullable().optional(),
        stopLoss: PriceLevelSchema.nullable().optional(),
        quantity: PriceLevelSchema.nullable().optional(),
        leverage: PriceLevelSchema.nullable().optional(),
        status: PositionStatusSchema.optional(),
        notes: z.string().nullable().optional(),
        metadata: z.record(z.unknown()).optional()
    })
    .strict();

export type PositionUpdate = z.infer<typeof PositionUpdateSchema>;
export type PositionUpdateInput = z.input<typeof PositionUpdateSchema>;

/** Extra fields accepted when closing; the status is implied */
export const PositionCloseSchema = PositionUpdateSchema.omit({ status: true });

export type PositionClose = z.infer<typeof PositionCloseSchema>;

/**
 * Identity of the user asking for a mutation
 */
export interface Requester {
    userId: string;
    platform: PlatformType;
}

export interface PositionsSummary {
    total: number;
    active: number;
    closed: number;
    stopped: number;
}
