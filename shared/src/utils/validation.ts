/**
 * Input validation utilities for registry and price operations
 */

import { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Validate a required field
 */
export function validateRequired(value: unknown, fieldName: string): void {
    if (value === undefined || value === null || value === '') {
        throw new ValidationError(`${fieldName} is required`, fieldName);
    }
}

/**
 * Validate a positive number
 */
export function validatePositiveNumber(value: number, fieldName: string): void {
    if (typeof value !== 'number' || isNaN(value) || value <= 0) {
        throw new ValidationError(`${fieldName} must be a positive number`, fieldName);
    }
}

/**
 * Validate UUID format
 */
export function validateUUID(id: string, fieldName: string = 'id'): void {
    if (!id || typeof id !== 'string') {
        throw new ValidationError(`${fieldName} is required`, fieldName);
    }

    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
    if (!uuidRegex.test(id)) {
        throw new ValidationError(`${fieldName} must be a valid UUID`, fieldName);
    }
}

/**
 * Turn a zod failure into a ValidationError naming each offending field
 */
export function formatZodError(error: z.ZodError): string {
    return error.errors
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join(', ');
}

/**
 * Parse input against a schema
 * @throws {ValidationError} If the input does not match
 */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, input: unknown, context: string): z.infer<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const first = result.error.errors[0];
        throw new ValidationError(
            `Invalid ${context}: ${formatZodError(result.error)}`,
            first && first.path.length > 0 ? first.path.join('.') : undefined
        );
    }
    return result.data;
}
