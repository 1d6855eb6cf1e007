import type { Request, Response, NextFunction } from 'express';
import { ValidationError, errorResponse, logError, logger, toApplicationError } from '@webpilot/shared';

/**
 * Global error handler middleware
 * Must be registered last in middleware chain
 */
export function globalErrorHandler(
    error: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    logError(error, {
        requestId: req.id,
        method: req.method,
        path: req.path
    });

    const appError = toApplicationError(error);
    const details = appError instanceof ValidationError ? appError.validationErrors : appError.context;

    res.status(appError.statusCode).json(errorResponse(
        appError.code,
        appError.message,
        details,
        req.id
    ));
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
    logger.warn({
        requestId: req.id,
        method: req.method,
        path: req.path
    }, 'Route not found');

    res.status(404).json(errorResponse(
        'NOT_FOUND',
        `Route ${req.method} ${req.path} not found`,
        undefined,
        req.id
    ));
}
