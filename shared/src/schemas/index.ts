/**
 * Zod schemas barrel
 */

export * from './inventory.js';
