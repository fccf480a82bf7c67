/**
 * @batchkeep/shared - core of the batchkeep inventory tracker
 *
 * Database adapter, stock/recipe/batch ledgers, the batch orchestrator,
 * domain rules, the error taxonomy and Zod input schemas. Shared between
 * the web server and the CLI.
 */

export * from './database/index.js';
export * from './domain/index.js';
export * from './errors/index.js';
export * from './schemas/index.js';
export * from './services/index.js';
