/**
 * Stock Ledger
 *
 * Raw-material rows and their stock levels. A material is addressed by name
 * plus an optional lot; an unqualified lookup (no lot) addresses the
 * canonical lot-less row, not "any lot".
 *
 * Exported mutations open their own transaction, so they must be given the
 * root handle. The `*ById` / lookup helpers take any handle, including an
 * open transaction, and are what the batch orchestrator composes.
 */

import { sql } from 'kysely';
import type { ExpressionBuilder } from 'kysely';
import type { KyselyDB } from '../../database/createKysely.js';
import type { DB, MaterialRow } from '../../database/types.js';
import { rankLowStock } from '../../domain/materials/lowStock.js';
import { INVENTORY_ERROR_CODES, InventoryError, toInventoryError } from '../../errors/inventory.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Material = MaterialRow;

export interface MaterialKey {
    name: string;
    /** Omitted/null addresses the canonical (lot-less) row */
    lotNumber?: number | null;
}

export interface AddMaterialParams extends MaterialKey {
    category?: string | null;
    stockLevel: number;
    unit?: string | null;
    reorderLevel: number;
    costPerUnit: number;
    supplier?: string | null;
}

export interface StockAdjustmentParams extends MaterialKey {
    amount: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function matchesKey(eb: ExpressionBuilder<DB, 'materials'>, key: MaterialKey) {
    return eb.and([
        eb('materials.name', '=', key.name),
        key.lotNumber == null
            ? eb('materials.lotNumber', 'is', null)
            : eb('materials.lotNumber', '=', key.lotNumber),
    ]);
}

function describeKey(key: MaterialKey): string {
    return key.lotNumber == null ? key.name : `${key.name} (lot ${key.lotNumber})`;
}

function materialNotFound(key: MaterialKey): InventoryError {
    return new InventoryError(INVENTORY_ERROR_CODES.MATERIAL_NOT_FOUND, {
        technicalMessage: `${describeKey(key)} not found in materials`,
        context: { materialName: key.name, lotNumber: key.lotNumber ?? null },
    });
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export async function getMaterial(db: KyselyDB, key: MaterialKey): Promise<Material | null> {
    const row = await db
        .selectFrom('materials')
        .selectAll()
        .where((eb) => matchesKey(eb, key))
        .orderBy('materialId')
        .executeTakeFirst();
    return row ?? null;
}

/**
 * All materials ordered by category, then name, then lot.
 * Null categories and lots sort first on every engine.
 */
export async function listMaterials(db: KyselyDB): Promise<Material[]> {
    return db
        .selectFrom('materials')
        .selectAll()
        .orderBy(sql`coalesce(category, '')`)
        .orderBy('name')
        .orderBy(sql`coalesce(lot_number, -1)`)
        .execute();
}

/**
 * Materials at or below their reorder level, most urgent first.
 * @see rankLowStock for the ordering policy
 */
export async function listLowStock(db: KyselyDB): Promise<Material[]> {
    const rows = await db
        .selectFrom('materials')
        .selectAll()
        .whereRef('stockLevel', '<=', 'reorderLevel')
        .execute();
    return rankLowStock(rows);
}

// ---------------------------------------------------------------------------
// Composable writes (no own transaction)
// ---------------------------------------------------------------------------

/**
 * Apply a signed delta to one material row.
 *
 * A negative delta only applies while stock covers it; the guard lives in the
 * UPDATE itself so a concurrent writer cannot drive the level below zero.
 *
 * @returns The new stock level, or null when the row is missing or the guard refused
 */
export async function adjustStockById(
    db: KyselyDB,
    materialId: number,
    delta: number,
): Promise<number | null> {
    let query = db
        .updateTable('materials')
        .set((eb) => ({ stockLevel: eb('stockLevel', '+', delta) }))
        .where('materialId', '=', materialId);

    if (delta < 0) {
        query = query.where('stockLevel', '>=', -delta);
    }

    const row = await query.returning('stockLevel').executeTakeFirst();
    return row?.stockLevel ?? null;
}

// ---------------------------------------------------------------------------
// Core Operations
// ---------------------------------------------------------------------------

/**
 * Insert a new material.
 *
 * @returns The new material_id
 * @throws InventoryError MATERIAL_EXISTS when the same name and lot is already stocked
 */
export async function addMaterial(db: KyselyDB, params: AddMaterialParams): Promise<number> {
    if (params.stockLevel < 0) {
        throw new InventoryError(INVENTORY_ERROR_CODES.INVALID_QUANTITY, {
            technicalMessage: `Opening stock for ${params.name} cannot be negative`,
            context: { materialName: params.name, stockLevel: params.stockLevel },
        });
    }

    try {
        return await db.transaction().execute(async (trx) => {
            const existing = await getMaterial(trx, params);
            if (existing) {
                throw new InventoryError(INVENTORY_ERROR_CODES.MATERIAL_EXISTS, {
                    technicalMessage: `${describeKey(params)} already exists (material ${existing.materialId})`,
                    context: { materialId: existing.materialId, materialName: params.name },
                });
            }

            const inserted = await trx
                .insertInto('materials')
                .values({
                    name: params.name,
                    category: params.category ?? null,
                    stockLevel: params.stockLevel,
                    unit: params.unit ?? null,
                    reorderLevel: params.reorderLevel,
                    costPerUnit: params.costPerUnit,
                    supplier: params.supplier ?? null,
                    lotNumber: params.lotNumber ?? null,
                })
                .returning('materialId')
                .executeTakeFirstOrThrow();

            return inserted.materialId;
        });
    } catch (err) {
        throw toInventoryError(err, 'addMaterial');
    }
}

/**
 * Add stock to a material. The amount is not validated here; rejecting zero
 * or negative adjustments is the presentation layer's job.
 *
 * @returns The new stock level
 * @throws InventoryError MATERIAL_NOT_FOUND
 */
export async function increaseStock(db: KyselyDB, params: StockAdjustmentParams): Promise<number> {
    try {
        return await db.transaction().execute(async (trx) => {
            const material = await getMaterial(trx, params);
            if (!material) throw materialNotFound(params);

            const newLevel = await adjustStockById(trx, material.materialId, params.amount);
            if (newLevel === null) throw materialNotFound(params);
            return newLevel;
        });
    } catch (err) {
        throw toInventoryError(err, 'increaseStock');
    }
}

/**
 * Remove stock from a material, only when the current level covers it.
 * This is the same sufficiency gate batch consumption goes through.
 *
 * @returns The new stock level
 * @throws InventoryError MATERIAL_NOT_FOUND | INSUFFICIENT_STOCK (stock untouched)
 */
export async function decreaseStock(db: KyselyDB, params: StockAdjustmentParams): Promise<number> {
    try {
        return await db.transaction().execute(async (trx) => {
            const material = await getMaterial(trx, params);
            if (!material) throw materialNotFound(params);

            const insufficient = (available: number) =>
                new InventoryError(INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK, {
                    technicalMessage: `Insufficient stock: ${describeKey(params)} has ${available}, but ${params.amount} is needed`,
                    context: {
                        materialName: material.name,
                        lotNumber: material.lotNumber,
                        unit: material.unit,
                        required: params.amount,
                        available,
                    },
                });

            if (material.stockLevel < params.amount) throw insufficient(material.stockLevel);

            const newLevel = await adjustStockById(trx, material.materialId, -params.amount);
            if (newLevel === null) throw insufficient(material.stockLevel);
            return newLevel;
        });
    } catch (err) {
        throw toInventoryError(err, 'decreaseStock');
    }
}

/**
 * Delete a material.
 *
 * Materials consumed by a recorded batch stay, so batch history never points
 * at a missing row. Recipe lines naming the material are detached (their
 * material_id cleared, their name kept) and re-resolve by name later.
 *
 * @returns false when no such material exists
 * @throws InventoryError MATERIAL_IN_USE
 */
export async function deleteMaterial(db: KyselyDB, key: MaterialKey): Promise<boolean> {
    try {
        return await db.transaction().execute(async (trx) => {
            const material = await getMaterial(trx, key);
            if (!material) return false;

            const consumers = await trx
                .selectFrom('batchMaterials')
                .select('batchId')
                .distinct()
                .where('materialId', '=', material.materialId)
                .orderBy('batchId')
                .execute();

            if (consumers.length > 0) {
                const batchIds = consumers.map((c) => c.batchId);
                throw new InventoryError(INVENTORY_ERROR_CODES.MATERIAL_IN_USE, {
                    technicalMessage: `${describeKey(key)} was consumed by batches ${batchIds.join(', ')}`,
                    context: { materialId: material.materialId, materialName: material.name, batchIds },
                });
            }

            await trx
                .updateTable('recipeLines')
                .set({ materialId: null })
                .where('materialId', '=', material.materialId)
                .execute();

            await trx
                .deleteFrom('materials')
                .where('materialId', '=', material.materialId)
                .execute();

            return true;
        });
    } catch (err) {
        throw toInventoryError(err, 'deleteMaterial');
    }
}
