import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../../utils/errors';
import { logger } from '../../services/logging';

export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) {
    if (err instanceof AppError) {
        if (err.statusCode >= 500) {
            logger.error('Request failed', { method: req.method, path: req.path, code: err.code, error: err });
        }
        return res.status(err.statusCode).json({
            status: 'error',
            code: err.code,
            message: err.message
        });
    }

    if (err instanceof ZodError) {
        return res.status(422).json({
            status: 'error',
            code: 'validation_error',
            message: err.issues.map(i => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; ')
        });
    }

    logger.error('Unexpected error', { method: req.method, path: req.path, error: err });

    return res.status(500).json({
        status: 'error',
        code: 'internal_error',
        message: 'Internal server error'
    });
}

export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
