import { describe, it, expect, vi } from 'vitest';
import {
    AppError,
    NotFoundError,
    StorageError,
    UpstreamError,
    ValidationError,
    isRetryableError,
    toError,
    withRetry
} from '../../src/errors';

const NO_WAIT = { maxRetries: 2, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 };

describe('error hierarchy', () => {
    it('carries code and status', () => {
        const error = new NotFoundError('Position', 'abc');

        expect(error).toBeInstanceOf(AppError);
        expect(error).toMatchObject({
            name: 'NotFoundError',
            code: 'NOT_FOUND',
            statusCode: 404,
            message: 'Position not found: abc',
            isOperational: true
        });
    });

    it('records the offending field on validation errors', () => {
        expect(new ValidationError('bad', 'entryPrice')).toMatchObject({ statusCode: 400, field: 'entryPrice' });
    });
});

describe('isRetryableError', () => {
    it('follows the upstream error flag', () => {
        expect(isRetryableError(new UpstreamError('down', 'feed'))).toBe(true);
        expect(isRetryableError(new UpstreamError('bad key', 'feed', undefined, false))).toBe(false);
    });

    it('retries storage errors only among the rest', () => {
        expect(isRetryableError(new StorageError('unreachable'))).toBe(true);
        expect(isRetryableError(new ValidationError('bad'))).toBe(false);
        expect(isRetryableError(new Error('plain'))).toBe(false);
    });
});

describe('withRetry', () => {
    it('returns the first successful result', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new StorageError('unreachable'))
            .mockResolvedValueOnce('ok');

        expect(await withRetry(fn, NO_WAIT, 'test')).toBe('ok');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('rethrows the last error once retries run out', async () => {
        const last = new StorageError('still unreachable');
        const fn = vi.fn()
            .mockRejectedValueOnce(new StorageError('unreachable'))
            .mockRejectedValueOnce(new StorageError('unreachable'))
            .mockRejectedValueOnce(last);

        await expect(withRetry(fn, NO_WAIT, 'test')).rejects.toBe(last);
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('does not retry errors that are not retryable', async () => {
        const fn = vi.fn().mockRejectedValue(new ValidationError('bad'));

        await expect(withRetry(fn, NO_WAIT, 'test')).rejects.toBeInstanceOf(ValidationError);
        expect(fn).toHaveBeenCalledTimes(1);
    });
});

describe('toError', () => {
    it('passes errors through and wraps anything else', () => {
        const error = new Error('boom');

        expect(toError(error)).toBe(error);
        expect(toError('boom')).toEqual(new Error('boom'));
    });
});
