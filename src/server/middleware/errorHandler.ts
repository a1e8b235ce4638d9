import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { ErrorResponse, NotFoundError, toAppError } from '../types/errors.js';

const STATUS_LABELS: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    422: 'Unprocessable Entity',
    500: 'Internal Server Error',
    502: 'Bad Gateway',
};

/**
 * Transform any error into the standardized response body
 */
export function transformErrorToResponse(err: unknown, req: Request, includeStack: boolean): ErrorResponse {
    const appError = toAppError(err);
    const response: ErrorResponse = {
        error: STATUS_LABELS[appError.statusCode] ?? 'Error',
        code: appError.code,
        // Internal failures keep their details in the log only
        message: appError.isOperational ? appError.message : 'An unexpected error occurred',
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.path,
    };
    if (includeStack && appError.stack) {
        response.stack = appError.stack;
    }
    return response;
}

/**
 * Fallback for requests no route matched
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    // NotFoundError is an expected scenario (artifact not produced yet), so log at info level
    if (err instanceof NotFoundError) {
        logger.info({
            message: err.message,
            code: err.code,
            path: req.path,
            method: req.method,
        }, 'Resource not found (expected scenario)');
    } else {
        logger.error({
            error: err,
            message: err instanceof Error ? err.message : String(err),
            path: req.path,
            method: req.method,
        }, 'Unhandled error');
    }

    if (res.headersSent) {
        // Streaming already started; let Express tear down the connection
        next(err);
        return;
    }

    const errorResponse = transformErrorToResponse(err, req, process.env.NODE_ENV === 'development');
    res.status(errorResponse.statusCode).json(errorResponse);
}
