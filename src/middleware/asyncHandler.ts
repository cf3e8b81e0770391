/**
 * Async Handler Middleware
 *
 * Wraps async route handlers so that rejected promises are forwarded to the
 * Express error handler. Controllers throw AppErrors instead of writing
 * error responses themselves.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
