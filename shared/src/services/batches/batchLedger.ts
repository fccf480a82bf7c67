/**
 * Batch Ledger
 *
 * Production batch records and the materials each one consumed.
 * Creation and deletion live in the orchestrator; this module owns reads
 * and the Ready → Shipped transition.
 */

import type { KyselyDB } from '../../database/createKysely.js';
import type { BatchRow } from '../../database/types.js';
import { isValidBatchTransition } from '../../domain/batches/stateMachine.js';
import { toInventoryError } from '../../errors/inventory.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Batch = BatchRow;

export interface BatchConsumption {
    batchMaterialId: number;
    materialId: number;
    /** Null only if the material row has gone missing */
    materialName: string | null;
    quantityUsed: number;
}

export interface BatchDetail extends Batch {
    materials: BatchConsumption[];
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export async function getBatchHeader(db: KyselyDB, batchId: number): Promise<Batch | null> {
    const row = await db
        .selectFrom('batches')
        .selectAll()
        .where('batchId', '=', batchId)
        .executeTakeFirst();
    return row ?? null;
}

export async function batchExists(db: KyselyDB, batchId: number): Promise<boolean> {
    const row = await db
        .selectFrom('batches')
        .select('batchId')
        .where('batchId', '=', batchId)
        .executeTakeFirst();
    return row !== undefined;
}

export async function listBatchConsumption(db: KyselyDB, batchId: number): Promise<BatchConsumption[]> {
    return db
        .selectFrom('batchMaterials')
        .leftJoin('materials', 'materials.materialId', 'batchMaterials.materialId')
        .select([
            'batchMaterials.batchMaterialId',
            'batchMaterials.materialId',
            'materials.name as materialName',
            'batchMaterials.quantityUsed',
        ])
        .where('batchMaterials.batchId', '=', batchId)
        .orderBy('batchMaterials.batchMaterialId')
        .execute();
}

/**
 * Batch header plus its consumption records
 */
export async function getBatch(db: KyselyDB, batchId: number): Promise<BatchDetail | null> {
    const header = await getBatchHeader(db, batchId);
    if (!header) return null;
    return { ...header, materials: await listBatchConsumption(db, batchId) };
}

/**
 * Batches waiting to ship, oldest first
 */
export async function listReadyBatches(db: KyselyDB): Promise<Batch[]> {
    return db
        .selectFrom('batches')
        .selectAll()
        .where('status', '=', 'Ready')
        .orderBy('dateCompleted')
        .orderBy('batchId')
        .execute();
}

/**
 * Shipped batches, most recently shipped first
 */
export async function listShippedBatches(db: KyselyDB): Promise<Batch[]> {
    return db
        .selectFrom('batches')
        .selectAll()
        .where('status', '=', 'Shipped')
        .orderBy('dateShipped', 'desc')
        .orderBy('batchId', 'desc')
        .execute();
}

// ---------------------------------------------------------------------------
// Status transitions
// ---------------------------------------------------------------------------

/**
 * Ready → Shipped, stamping date_shipped.
 *
 * @returns false when the batch does not exist or is already shipped
 *          (the original date_shipped is kept)
 */
export async function markShipped(
    db: KyselyDB,
    batchId: number,
    shippedAt: Date = new Date(),
): Promise<boolean> {
    try {
        return await db.transaction().execute(async (trx) => {
            const batch = await getBatchHeader(trx, batchId);
            if (!batch || !isValidBatchTransition(batch.status, 'Shipped')) return false;

            const result = await trx
                .updateTable('batches')
                .set({ status: 'Shipped', dateShipped: shippedAt.toISOString() })
                .where('batchId', '=', batchId)
                .where('status', '=', batch.status)
                .executeTakeFirst();

            return result.numUpdatedRows > 0n;
        });
    } catch (err) {
        throw toInventoryError(err, 'markShipped');
    }
}
