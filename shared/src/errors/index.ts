/**
 * Custom error classes for ChartDesk
 * Provides structured error handling with proper error hierarchies
 */

import type { Position, PositionStatus, PlatformType } from '../types/Position';
import { logger } from '../services/logger';

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number = 500,
        public readonly isOperational: boolean = true
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Validation errors for invalid input data
 */
export class ValidationError extends AppError {
    constructor(message: string, public readonly field?: string) {
        super(message, 'VALIDATION_ERROR', 400);
    }
}

/**
 * The record exists but belongs to another (userId, platform) pair
 */
export class OwnershipError extends AppError {
    constructor(
        public readonly positionId: string,
        public readonly userId: string,
        public readonly platform: PlatformType
    ) {
        super(`Position ${positionId} does not belong to ${platform} user ${userId}`, 'OWNERSHIP_MISMATCH', 403);
    }
}

/**
 * Close/stop/status change requested on a position that is already terminal.
 * The position is left untouched; `position` is its current state.
 */
export class InvalidTransitionError extends AppError {
    constructor(
        public readonly position: Position,
        public readonly requestedStatus: PositionStatus
    ) {
        super(
            `Position ${position.id} is already ${position.status} and cannot become ${requestedStatus}`,
            'INVALID_TRANSITION',
            409
        );
    }
}

/**
 * Backing store failures surfaced to a caller as a generic failure
 */
export class StorageError extends AppError {
    constructor(message: string, public readonly originalError?: Error) {
        super(message, 'STORAGE_ERROR', 503);
    }
}

/**
 * Upstream price feed errors (HTTP failures, rate limits, etc.)
 */
export class UpstreamError extends AppError {
    constructor(
        message: string,
        public readonly provider: string,
        public readonly originalError?: Error,
        public readonly isRetryable: boolean = true
    ) {
        super(message, 'UPSTREAM_ERROR', 502);
    }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR', 500, false);
    }
}

/**
 * Resource not found errors
 */
export class NotFoundError extends AppError {
    constructor(resource: string, identifier: string) {
        super(`${resource} not found: ${identifier}`, 'NOT_FOUND', 404);
    }
}

/**
 * Retry policy configuration
 */
export interface RetryPolicy {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
}

/**
 * Default retry policies for different error types
 */
export const DEFAULT_RETRY_POLICIES = {
    UPSTREAM_ERROR: {
        maxRetries: 2,
        initialDelayMs: 500,
        maxDelayMs: 4000,
        backoffMultiplier: 2
    },
    STORAGE_ERROR: {
        maxRetries: 3,
        initialDelayMs: 500,
        maxDelayMs: 5000,
        backoffMultiplier: 2
    }
} satisfies Record<string, RetryPolicy>;

/**
 * Utility to determine if an error should be retried
 */
export function isRetryableError(error: unknown): boolean {
    if (error instanceof UpstreamError) {
        return error.isRetryable;
    }
    if (error instanceof StorageError) {
        return true;
    }
    return false;
}

/**
 * Sleep utility for retry delays
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    policy: RetryPolicy,
    context: string
): Promise<T> {
    let lastError: unknown;
    let delay = policy.initialDelayMs;

    for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error;

            // Don't retry on final attempt or non-retryable errors
            if (attempt === policy.maxRetries || !isRetryableError(error)) {
                break;
            }

            logger.warn(
                `[Retry] ${context} failed (attempt ${attempt + 1}/${policy.maxRetries + 1}). ` +
                `Retrying in ${delay}ms...`,
                toError(error).message
            );

            await sleep(delay);
            delay = Math.min(delay * policy.backoffMultiplier, policy.maxDelayMs);
        }
    }

    throw lastError;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
