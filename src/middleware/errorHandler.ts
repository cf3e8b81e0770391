/**
 * Error Handler Middleware
 *
 * Last middleware in the chain. Maps operational errors to their HTTP
 * status and the standard error body:
 *   { success: false, error, code, retryable, details? }
 * Anything else is a bug: logged with its stack and answered with 500.
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, InvalidEventError, QueueFullError } from '../utils/appError';
import { logger } from '../services/observabilityService';
import { errorResponse } from '../utils/response';

export function notFoundHandler(req: Request, res: Response): void {
    errorResponse(res, 404, {
        error: `Route ${req.method} ${req.path} not found`,
        code: 'NOT_FOUND',
        retryable: false
    });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    const correlationId = req.correlationId;

    if (err instanceof ZodError) {
        errorResponse(res, 400, {
            error: 'Validation failed',
            code: 'VALIDATION_FAILED',
            retryable: false,
            details: err.issues.map((issue) => ({
                field: issue.path.join('.'),
                message: issue.message
            }))
        });
        return;
    }

    if (err instanceof AppError) {
        if (err.statusCode >= 500) {
            logger.error(`[HTTP] ${err.code}: ${err.message}`, err, { correlationId, path: req.path });
        } else {
            logger.warn(`[HTTP] ${err.code}: ${err.message}`, { correlationId, path: req.path });
        }

        if (err instanceof QueueFullError) {
            res.setHeader('Retry-After', String(err.retryAfterSeconds));
        }

        errorResponse(res, err.statusCode, {
            error: err.message,
            code: err.code,
            retryable: err.retryable,
            ...(err instanceof InvalidEventError ? { details: err.details } : {})
        });
        return;
    }

    logger.error('[HTTP] Unhandled error', err, { correlationId, path: req.path, method: req.method });
    errorResponse(res, 500, {
        error: 'Internal Server Error',
        code: 'INTERNAL',
        retryable: false
    });
}
