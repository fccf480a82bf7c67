/**
 * Batch Orchestrator
 *
 * Creates and deletes production batches as single all-or-nothing units
 * across the Recipe Catalog, the Stock Ledger and the Batch Ledger.
 *
 * Creation is two-pass: every ingredient is checked for sufficiency before
 * any stock is deducted, so a shortage on the fourth ingredient can never
 * leave the first three drained. Everything runs in one transaction; any
 * throw rolls back the batch header too.
 *
 * Deletion with reallocation adds back the quantity_used recorded at
 * creation, never a figure recomputed from the current recipe, so later
 * recipe edits cannot skew what goes back on the shelf.
 */

import type { KyselyDB } from '../../database/createKysely.js';
import { INITIAL_BATCH_STATUS } from '../../domain/batches/stateMachine.js';
import { computeRequirements, isValidBatchQuantity } from '../../domain/recipes/requirements.js';
import { INVENTORY_ERROR_CODES, InventoryError, toInventoryError } from '../../errors/inventory.js';
import type { Material } from '../inventory/stockLedger.js';
import { adjustStockById, getMaterial } from '../inventory/stockLedger.js';
import { getRecipe } from '../recipes/recipeCatalog.js';
import { batchExists, getBatchHeader, listBatchConsumption } from './batchLedger.js';
import { nextBatchId, reserveBatchId } from './batchSequence.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CreateBatchParams {
    productName: string;
    /** Units produced */
    quantity: number;
    notes?: string | null;
    /** Caller-supplied id; omitted → next id from the batch sequence */
    batchId?: number | null;
    /** false records the batch without touching stock. Default true */
    deductResources?: boolean;
    completedAt?: Date;
}

export interface ConsumedMaterial {
    materialId: number;
    materialName: string;
    quantityUsed: number;
    /** Stock level after the deduction */
    remainingStock: number;
}

export interface CreatedBatch {
    batchId: number;
    productName: string;
    quantity: number;
    consumed: ConsumedMaterial[];
}

export interface DeleteBatchOptions {
    /** Put the batch's recorded consumption back into stock */
    reallocate: boolean;
}

export interface ReallocatedMaterial {
    materialId: number;
    materialName: string | null;
    quantityRestored: number;
    /** Stock level after the restore */
    stockLevel: number;
}

export interface DeletedBatch {
    batchId: number;
    productName: string;
    quantity: number;
    reallocated: ReallocatedMaterial[];
}

interface DeductionPlan {
    material: Material;
    required: number;
}

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

function assertPositiveWhole(value: number, field: 'quantity' | 'batchId'): void {
    if (isValidBatchQuantity(value)) return;
    throw new InventoryError(INVENTORY_ERROR_CODES.INVALID_QUANTITY, {
        technicalMessage: `${field} must be a positive whole number, got ${value}`,
        context: { field, value },
    });
}

/**
 * Pass one: resolve every requirement and check it against current stock.
 * Throws on the first ingredient that is missing or short; writes nothing.
 */
async function planDeductions(
    trx: KyselyDB,
    productName: string,
    requirements: ReturnType<typeof computeRequirements>,
): Promise<DeductionPlan[]> {
    const plan: DeductionPlan[] = [];

    for (const { materialName, required } of requirements) {
        const material = await getMaterial(trx, { name: materialName });
        if (!material) {
            throw new InventoryError(INVENTORY_ERROR_CODES.INGREDIENT_UNRESOLVED, {
                technicalMessage: `Material ${materialName}: not found in inventory`,
                context: { productName, materialName, required },
            });
        }

        if (material.stockLevel < required) {
            throw new InventoryError(INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK, {
                technicalMessage: `Insufficient ${materialName}: need ${required}, have ${material.stockLevel}`,
                context: {
                    productName,
                    materialName,
                    unit: material.unit,
                    required,
                    available: material.stockLevel,
                },
            });
        }

        plan.push({ material, required });
    }

    return plan;
}

/**
 * Record a production batch and consume its ingredients.
 *
 * @throws InventoryError
 *   INVALID_QUANTITY      quantity or batch id not a positive whole number
 *   RECIPE_NOT_FOUND      no recipe for the product
 *   DUPLICATE_BATCH_ID    caller-supplied id already used
 *   INGREDIENT_UNRESOLVED a recipe line names a material not in the ledger
 *   INSUFFICIENT_STOCK    first ingredient whose stock is short
 *   STORAGE_FAILURE       anything else; the transaction was rolled back
 */
export async function createBatch(db: KyselyDB, params: CreateBatchParams): Promise<CreatedBatch> {
    const { productName, quantity, deductResources = true } = params;
    assertPositiveWhole(quantity, 'quantity');
    if (params.batchId != null) assertPositiveWhole(params.batchId, 'batchId');

    try {
        return await db.transaction().execute(async (trx) => {
            const recipe = await getRecipe(trx, productName);
            if (!recipe) {
                throw new InventoryError(INVENTORY_ERROR_CODES.RECIPE_NOT_FOUND, {
                    technicalMessage: `No recipe found for ${productName}`,
                    context: { productName },
                });
            }

            let batchId: number;
            if (params.batchId != null) {
                if (await batchExists(trx, params.batchId)) {
                    throw new InventoryError(INVENTORY_ERROR_CODES.DUPLICATE_BATCH_ID, {
                        technicalMessage: `Batch ID ${params.batchId} already exists.`,
                        context: { batchId: params.batchId },
                    });
                }
                await reserveBatchId(trx, params.batchId);
                batchId = params.batchId;
            } else {
                batchId = await nextBatchId(trx);
            }

            await trx
                .insertInto('batches')
                .values({
                    batchId,
                    productName,
                    quantity,
                    dateCompleted: (params.completedAt ?? new Date()).toISOString(),
                    status: INITIAL_BATCH_STATUS,
                    notes: params.notes ?? null,
                    dateShipped: null,
                })
                .execute();

            if (!deductResources) {
                return { batchId, productName, quantity, consumed: [] };
            }

            const plan = await planDeductions(trx, productName, computeRequirements(recipe.lines, quantity));

            // Pass two: every ingredient is covered, deduct and record
            const consumed: ConsumedMaterial[] = [];
            for (const { material, required } of plan) {
                const remainingStock = await adjustStockById(trx, material.materialId, -required);
                if (remainingStock === null) {
                    // Stock moved between the check and the update
                    throw new InventoryError(INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK, {
                        technicalMessage: `Insufficient ${material.name}: stock changed during batch creation`,
                        context: { productName, materialName: material.name, required },
                    });
                }

                await trx
                    .insertInto('batchMaterials')
                    .values({ batchId, materialId: material.materialId, quantityUsed: required })
                    .execute();

                consumed.push({
                    materialId: material.materialId,
                    materialName: material.name,
                    quantityUsed: required,
                    remainingStock,
                });
            }

            return { batchId, productName, quantity, consumed };
        });
    } catch (err) {
        throw toInventoryError(err, 'createBatch');
    }
}

// ---------------------------------------------------------------------------
// Delete
// ---------------------------------------------------------------------------

/**
 * Delete a batch and its consumption records, optionally putting the
 * consumed materials back into stock. One transaction: a failed restore
 * leaves the batch in place.
 *
 * @throws InventoryError BATCH_NOT_FOUND | MATERIAL_NOT_FOUND | STORAGE_FAILURE
 */
export async function deleteBatch(
    db: KyselyDB,
    batchId: number,
    options: DeleteBatchOptions,
): Promise<DeletedBatch> {
    try {
        return await db.transaction().execute(async (trx) => {
            const batch = await getBatchHeader(trx, batchId);
            if (!batch) {
                throw new InventoryError(INVENTORY_ERROR_CODES.BATCH_NOT_FOUND, {
                    technicalMessage: `Batch ID ${batchId} not found in batches.`,
                    context: { batchId },
                });
            }

            const reallocated: ReallocatedMaterial[] = [];
            if (options.reallocate) {
                const consumption = await listBatchConsumption(trx, batchId);
                for (const record of consumption) {
                    const stockLevel = await adjustStockById(trx, record.materialId, record.quantityUsed);
                    if (stockLevel === null) {
                        throw new InventoryError(INVENTORY_ERROR_CODES.MATERIAL_NOT_FOUND, {
                            technicalMessage: `Cannot reallocate to material ${record.materialId}: row is gone`,
                            context: { batchId, materialId: record.materialId },
                        });
                    }
                    reallocated.push({
                        materialId: record.materialId,
                        materialName: record.materialName,
                        quantityRestored: record.quantityUsed,
                        stockLevel,
                    });
                }
            }

            await trx.deleteFrom('batchMaterials').where('batchId', '=', batchId).execute();
            await trx.deleteFrom('batches').where('batchId', '=', batchId).execute();

            return {
                batchId,
                productName: batch.productName,
                quantity: batch.quantity,
                reallocated,
            };
        });
    } catch (err) {
        throw toInventoryError(err, 'deleteBatch');
    }
}
