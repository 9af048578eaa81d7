import { Request, Response, NextFunction } from 'express';
import { AppError, InvalidTransitionError, ValidationError, logger } from '@chartdesk/shared';

function isBodyParseError(err: Error): boolean {
    return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction): void => {
    if (isBodyParseError(err)) {
        res.status(400).json({ status: 'fail', code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
        return;
    }

    if (err instanceof AppError) {
        if (err.statusCode >= 500) {
            logger.error(err.message, { stack: err.stack, path: req.path, method: req.method });
        } else {
            logger.warn(err.message, { path: req.path, method: req.method });
        }

        res.status(err.statusCode).json({
            status: err.statusCode >= 500 ? 'error' : 'fail',
            code: err.code,
            message: err.message,
            ...(err instanceof ValidationError && err.field ? { field: err.field } : {}),
            ...(err instanceof InvalidTransitionError ? { data: { position: err.position } } : {})
        });
        return;
    }

    logger.error(err.message, { stack: err.stack, path: req.path, method: req.method });

    // Fallback for unhandled errors
    res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
