import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppError, PlatformTypeSchema, Requester, logger } from '@chartdesk/shared';

export const USER_ID_HEADER = 'x-user-id';
export const PLATFORM_HEADER = 'x-platform';

const RequesterHeadersSchema = z.object({
    [USER_ID_HEADER]: z.string().trim().min(1),
    [PLATFORM_HEADER]: z.string().trim().toLowerCase().pipe(PlatformTypeSchema)
});

/**
 * Identifies the chat user on whose behalf a bot calls the API.
 * Webhook and bot authentication happen in front of this service.
 */
export const requireRequester = (req: Request, res: Response, next: NextFunction) => {
    const parsed = RequesterHeadersSchema.safeParse(req.headers);

    if (!parsed.success) {
        logger.warn('Rejected request without requester headers', { path: req.path, method: req.method });
        res.status(401).json({
            status: 'fail',
            message: `Missing or invalid ${USER_ID_HEADER} / ${PLATFORM_HEADER} headers`
        });
        return;
    }

    req.requester = {
        userId: parsed.data[USER_ID_HEADER],
        platform: parsed.data[PLATFORM_HEADER]
    };
    next();
};

/**
 * Requester attached by requireRequester
 * @throws {AppError} 401 if the middleware did not run
 */
export function getRequester(req: Request): Requester {
    if (!req.requester) {
        throw new AppError('Requester identity is required', 'UNAUTHORIZED', 401);
    }
    return req.requester;
}
