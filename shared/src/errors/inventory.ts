/**
 * Inventory Error Utilities
 *
 * Error codes, user-friendly messages, and InventoryError class for the
 * stock, recipe and batch ledgers, plus the result shape writes that can
 * warn (recipe saves) report through.
 */

// ============================================
// ERROR CODES
// ============================================

export const INVENTORY_ERROR_CODES = {
  // Not found
  MATERIAL_NOT_FOUND: 'INVENTORY_MATERIAL_NOT_FOUND',
  RECIPE_NOT_FOUND: 'INVENTORY_RECIPE_NOT_FOUND',
  BATCH_NOT_FOUND: 'INVENTORY_BATCH_NOT_FOUND',

  // Conflicts
  MATERIAL_EXISTS: 'INVENTORY_MATERIAL_EXISTS',
  MATERIAL_IN_USE: 'INVENTORY_MATERIAL_IN_USE',
  RECIPE_EXISTS: 'INVENTORY_RECIPE_EXISTS',
  DUPLICATE_BATCH_ID: 'INVENTORY_DUPLICATE_BATCH_ID',

  // Stock
  INSUFFICIENT_STOCK: 'INVENTORY_INSUFFICIENT_STOCK',
  INGREDIENT_UNRESOLVED: 'INVENTORY_INGREDIENT_UNRESOLVED',

  // Validation
  INVALID_QUANTITY: 'INVENTORY_INVALID_QUANTITY',

  // General
  STORAGE_FAILURE: 'INVENTORY_STORAGE_FAILURE',
} as const;

export type InventoryErrorCode = (typeof INVENTORY_ERROR_CODES)[keyof typeof INVENTORY_ERROR_CODES];

// ============================================
// USER-FRIENDLY MESSAGES
// ============================================

export const INVENTORY_ERROR_MESSAGES: Record<InventoryErrorCode, string> = {
  [INVENTORY_ERROR_CODES.MATERIAL_NOT_FOUND]: 'Material not found',
  [INVENTORY_ERROR_CODES.RECIPE_NOT_FOUND]: 'No recipe found for this product',
  [INVENTORY_ERROR_CODES.BATCH_NOT_FOUND]: 'Batch not found',

  [INVENTORY_ERROR_CODES.MATERIAL_EXISTS]: 'A material with this name and lot already exists',
  [INVENTORY_ERROR_CODES.MATERIAL_IN_USE]: 'Material is referenced by recorded batches and cannot be deleted',
  [INVENTORY_ERROR_CODES.RECIPE_EXISTS]: 'A recipe for this product already exists',
  [INVENTORY_ERROR_CODES.DUPLICATE_BATCH_ID]: 'This batch ID is already in use',

  [INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK]: 'Not enough stock for this operation',
  [INVENTORY_ERROR_CODES.INGREDIENT_UNRESOLVED]: 'A recipe ingredient is not in the stock ledger',

  [INVENTORY_ERROR_CODES.INVALID_QUANTITY]: 'Quantity must be a positive whole number',

  [INVENTORY_ERROR_CODES.STORAGE_FAILURE]: 'The operation failed and no changes were saved',
};

// ============================================
// HELPER FUNCTIONS
// ============================================

export function getInventoryErrorMessage(code: string, fallback?: string): string {
  return isInventoryErrorCode(code) ? INVENTORY_ERROR_MESSAGES[code] : fallback || 'An error occurred';
}

export function isInventoryErrorCode(code: unknown): code is InventoryErrorCode {
  return (
    typeof code === 'string' &&
    Object.values(INVENTORY_ERROR_CODES).some((known) => known === code)
  );
}

// ============================================
// INVENTORY ERROR CLASS
// ============================================

/**
 * Structured error for the inventory core.
 * Carries a technical message (for logs), a user-friendly message (for UI)
 * and a context record, e.g. `{ materialName, required, available }` for
 * an insufficient-stock failure.
 */
export class InventoryError extends Error {
  readonly code: InventoryErrorCode;
  readonly userMessage: string;
  readonly context?: Record<string, unknown>;

  constructor(
    code: InventoryErrorCode,
    options?: {
      technicalMessage?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    const userMessage = getInventoryErrorMessage(code);
    super(options?.technicalMessage || userMessage, { cause: options?.cause });
    this.name = 'InventoryError';
    this.code = code;
    this.userMessage = userMessage;
    this.context = options?.context;
    Object.setPrototypeOf(this, InventoryError.prototype);
  }

  toResult(): InventoryErrorResult {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}

export function isInventoryError(err: unknown): err is InventoryError {
  return err instanceof InventoryError;
}

/**
 * Wrap anything thrown inside a multi-step write into STORAGE_FAILURE.
 * InventoryErrors pass through untouched.
 */
export function toInventoryError(err: unknown, operation: string): InventoryError {
  if (err instanceof InventoryError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new InventoryError(INVENTORY_ERROR_CODES.STORAGE_FAILURE, {
    technicalMessage: `${operation} failed and was rolled back: ${detail}`,
    context: { operation },
    cause: err,
  });
}

// ============================================
// RESULT TYPE
// ============================================

export interface InventoryErrorResult {
  success: false;
  error: {
    code: InventoryErrorCode;
    message: string;
  };
}
