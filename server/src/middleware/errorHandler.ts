/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { isInventoryError } from '@batchkeep/shared/errors';
import {
    ValidationError,
    NotFoundError,
    ConflictError,
    BusinessLogicError,
    DatabaseError,
    fromInventoryError,
    isCustomError,
} from '../utils/errors.js';
import { httpLogger } from '../utils/logger.js';

/**
 * Error log structure for consistent logging
 */
interface ErrorLog {
    method: string;
    path: string;
    error: string;
    type: string;
    code?: string;
    stack?: string;
}

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    thrown: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const original = thrown instanceof Error ? thrown : new Error(String(thrown));
    const code = isInventoryError(original) ? original.code : undefined;
    // Core errors are answered through the matching HTTP error class
    const err = isInventoryError(original) ? fromInventoryError(original) : original;

    const errorLog: ErrorLog = {
        method: req.method,
        path: req.path,
        error: err.message,
        type: err.name,
        code,
    };

    // Include stack trace in development
    if (process.env.NODE_ENV === 'development') {
        errorLog.stack = original.stack;
    }

    if (isCustomError(err) && err.statusCode < 500) {
        httpLogger.warn(errorLog, 'Request failed');
    } else {
        httpLogger.error(errorLog, 'Request error');
    }

    // Handle custom error types
    if (err instanceof ValidationError) {
        res.status(400).json({
            error: err.message,
            type: 'ValidationError',
            code,
            details: err.details
        });
        return;
    }

    if (err instanceof NotFoundError) {
        res.status(404).json({
            error: err.message,
            type: 'NotFoundError',
            code,
            resourceType: err.resourceType,
            resourceId: err.resourceId
        });
        return;
    }

    if (err instanceof ConflictError) {
        res.status(409).json({
            error: err.message,
            type: 'ConflictError',
            code,
            conflictType: err.conflictType
        });
        return;
    }

    if (err instanceof BusinessLogicError) {
        res.status(422).json({
            error: err.message,
            type: 'BusinessLogicError',
            code,
            rule: err.rule,
            details: err.details
        });
        return;
    }

    if (err instanceof DatabaseError) {
        res.status(500).json({
            error: 'Database operation failed',
            type: 'DatabaseError',
            code,
            // Don't expose internal DB errors in production
            ...(process.env.NODE_ENV === 'development' && {
                details: err.message
            })
        });
        return;
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            type: 'ValidationError',
            details: err.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message
            }))
        });
        return;
    }

    // Default 500 error
    const statusCode = isCustomError(err) ? err.statusCode : 500;
    const response: {
        error: string;
        type: string;
        stack?: string;
    } = {
        error: err.message || 'Internal server error',
        type: err.name || 'Error'
    };

    // Include stack trace in development
    if (process.env.NODE_ENV === 'development') {
        response.stack = err.stack;
    }

    res.status(statusCode).json(response);
};

export default errorHandler;
