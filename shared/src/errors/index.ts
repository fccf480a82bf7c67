/**
 * Shared Error Utilities
 *
 * Export barrel for domain-specific error utilities.
 */

export {
  // Error codes
  INVENTORY_ERROR_CODES,
  type InventoryErrorCode,
  // Messages
  INVENTORY_ERROR_MESSAGES,
  getInventoryErrorMessage,
  isInventoryErrorCode,
  // Error class
  InventoryError,
  isInventoryError,
  toInventoryError,
  // Result type
  type InventoryErrorResult,
} from './inventory.js';
