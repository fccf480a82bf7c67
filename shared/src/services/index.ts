/**
 * Core services barrel
 *
 * Every operation takes the Kysely handle as its first argument; the caller
 * owns the handle's lifecycle (see withDatabase).
 */

export {
    addMaterial,
    adjustStockById,
    decreaseStock,
    deleteMaterial,
    getMaterial,
    increaseStock,
    listLowStock,
    listMaterials,
    type AddMaterialParams,
    type Material,
    type MaterialKey,
    type StockAdjustmentParams,
} from './inventory/stockLedger.js';

export {
    addRecipe,
    changeRecipe,
    deleteRecipe,
    getRecipe,
    listRecipes,
    type DeletedRecipe,
    type Recipe,
    type RecipeLine,
    type RecipeLineParams,
    type RecipeParams,
    type RecipeWriteOutcome,
} from './recipes/recipeCatalog.js';

export {
    batchExists,
    getBatch,
    getBatchHeader,
    listBatchConsumption,
    listReadyBatches,
    listShippedBatches,
    markShipped,
    type Batch,
    type BatchConsumption,
    type BatchDetail,
} from './batches/batchLedger.js';

export { nextBatchId, reserveBatchId, BATCH_SEQUENCE } from './batches/batchSequence.js';

export {
    createBatch,
    deleteBatch,
    type ConsumedMaterial,
    type CreateBatchParams,
    type CreatedBatch,
    type DeleteBatchOptions,
    type DeletedBatch,
    type ReallocatedMaterial,
} from './batches/batchOrchestrator.js';
