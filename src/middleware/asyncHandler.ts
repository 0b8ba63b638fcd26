/**
 * Async Handler Middleware
 *
 * Wraps async route handlers so that rejected promises are forwarded to the
 * Express error handler. Controllers need no try/catch of their own.
 */

import { Request, Response, NextFunction } from 'express';

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<unknown>;

export function asyncHandler(fn: AsyncRequestHandler) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
