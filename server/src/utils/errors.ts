/**
 * Custom error classes for better error handling
 * Use these instead of generic Error for specific error types
 */

import { INVENTORY_ERROR_CODES } from '@batchkeep/shared/errors';
import type { InventoryError, InventoryErrorCode } from '@batchkeep/shared/errors';

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Validation error - thrown when input validation fails
 *
 * @example
 * throw new ValidationError('Batch ID must be a positive whole number', { id: 'abc' });
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Not found error - thrown when a resource is not found
 *
 * @example
 * throw new NotFoundError('Batch not found', 'Batch', 12);
 */
export class NotFoundError extends Error implements CustomError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | number | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | number | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * Conflict error - thrown when operation conflicts with current state
 *
 * @example
 * throw new ConflictError('Batch 4 is already shipped', 'ALREADY_SHIPPED');
 */
export class ConflictError extends Error implements CustomError {
    readonly name = 'ConflictError' as const;
    readonly statusCode = 409 as const;
    readonly conflictType: string | null;

    constructor(message: string = 'Conflict', conflictType: string | null = null) {
        super(message);
        this.conflictType = conflictType;
        Object.setPrototypeOf(this, ConflictError.prototype);
    }
}

/**
 * Business logic error - thrown when business rules are violated
 *
 * @example
 * throw new BusinessLogicError('Insufficient Matcha: need 20, have 5', 'INVENTORY_INSUFFICIENT_STOCK');
 */
export class BusinessLogicError extends Error implements CustomError {
    readonly name = 'BusinessLogicError' as const;
    readonly statusCode = 422 as const;
    readonly rule: string | null;
    readonly details: unknown;

    constructor(message: string, rule: string | null = null, details: unknown = null) {
        super(message);
        this.rule = rule;
        this.details = details;
        Object.setPrototypeOf(this, BusinessLogicError.prototype);
    }
}

/**
 * Database error - thrown when database operations fail
 *
 * @example
 * throw new DatabaseError('Transaction failed', originalError);
 */
export class DatabaseError extends Error implements CustomError {
    readonly name = 'DatabaseError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, DatabaseError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}

// ============================================
// INVENTORY CORE → HTTP
// ============================================

const NOT_FOUND_RESOURCES: Partial<Record<InventoryErrorCode, { type: string; key: string }>> = {
    [INVENTORY_ERROR_CODES.MATERIAL_NOT_FOUND]: { type: 'Material', key: 'materialName' },
    [INVENTORY_ERROR_CODES.RECIPE_NOT_FOUND]: { type: 'Recipe', key: 'productName' },
    [INVENTORY_ERROR_CODES.BATCH_NOT_FOUND]: { type: 'Batch', key: 'batchId' },
};

function contextId(context: Record<string, unknown> | undefined, key: string): string | number | null {
    const value = context?.[key];
    return typeof value === 'string' || typeof value === 'number' ? value : null;
}

/**
 * Translate a core InventoryError into the HTTP error class for its code.
 *
 * not found → 404, name/id clashes and in-use deletes → 409,
 * stock shortfalls → 422, bad quantities → 400, storage → 500
 */
export function fromInventoryError(err: InventoryError): CustomError {
    const notFound = NOT_FOUND_RESOURCES[err.code];
    if (notFound) {
        return new NotFoundError(err.message, notFound.type, contextId(err.context, notFound.key));
    }

    switch (err.code) {
        case INVENTORY_ERROR_CODES.MATERIAL_EXISTS:
        case INVENTORY_ERROR_CODES.MATERIAL_IN_USE:
        case INVENTORY_ERROR_CODES.RECIPE_EXISTS:
        case INVENTORY_ERROR_CODES.DUPLICATE_BATCH_ID:
            return new ConflictError(err.message, err.code);
        case INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK:
        case INVENTORY_ERROR_CODES.INGREDIENT_UNRESOLVED:
            return new BusinessLogicError(err.message, err.code, err.context ?? null);
        case INVENTORY_ERROR_CODES.INVALID_QUANTITY:
            return new ValidationError(err.message, err.context ?? null);
        default:
            return new DatabaseError(err.message, err.cause instanceof Error ? err.cause : null);
    }
}
