/**
 * Batch Orchestrator: creation and deletion as all-or-nothing units
 */

import { sql } from 'kysely';
import type { KyselyDB } from '../../../database/createKysely.js';
import { INVENTORY_ERROR_CODES } from '../../../errors/inventory.js';
import { decreaseStock } from '../../inventory/stockLedger.js';
import { addRecipe, changeRecipe } from '../../recipes/recipeCatalog.js';
import {
    createTestDatabase,
    seedMatchaLatte,
    snapshotLedgers,
    stockOf,
} from '../../__tests__/helpers/testDatabase.js';
import { getBatch, listReadyBatches, listShippedBatches, markShipped } from '../batchLedger.js';
import { createBatch, deleteBatch } from '../batchOrchestrator.js';

let db: KyselyDB;

beforeEach(async () => {
    db = await createTestDatabase();
    await seedMatchaLatte(db);
});

afterEach(async () => {
    await db.destroy();
});

async function levels() {
    return {
        Matcha: await stockOf(db, 'Matcha'),
        Milk: await stockOf(db, 'Milk'),
        Sugar: await stockOf(db, 'Sugar'),
    };
}

describe('createBatch', () => {
    it('deducts every ingredient and records one consumption row per material', async () => {
        const completedAt = new Date('2026-03-02T09:00:00.000Z');
        const created = await createBatch(db, { productName: 'Matcha Latte', quantity: 10, completedAt });

        expect(created).toEqual({
            batchId: 1,
            productName: 'Matcha Latte',
            quantity: 10,
            consumed: [
                { materialId: 1, materialName: 'Matcha', quantityUsed: 20, remainingStock: 980 },
                { materialId: 2, materialName: 'Milk', quantityUsed: 300, remainingStock: 4700 },
                { materialId: 3, materialName: 'Sugar', quantityUsed: 50, remainingStock: 1950 },
            ],
        });
        expect(await levels()).toEqual({ Matcha: 980, Milk: 4700, Sugar: 1950 });

        const batch = await getBatch(db, 1);
        expect(batch).toMatchObject({
            batchId: 1,
            status: 'Ready',
            dateCompleted: '2026-03-02T09:00:00.000Z',
            dateShipped: null,
            notes: null,
        });
        expect(batch?.materials.map((m) => [m.materialName, m.quantityUsed])).toEqual([
            ['Matcha', 20],
            ['Milk', 300],
            ['Sugar', 50],
        ]);
    });

    it('fails with INSUFFICIENT_STOCK naming the first shortfall and changes nothing', async () => {
        const before = await snapshotLedgers(db);

        await expect(createBatch(db, { productName: 'Matcha Latte', quantity: 10000 })).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK,
            context: { materialName: 'Matcha', required: 20000, available: 1000, unit: 'g' },
        });
        expect(await snapshotLedgers(db)).toEqual(before);
    });

    it('does not deduct earlier ingredients when a later one is short', async () => {
        await decreaseStock(db, { name: 'Sugar', amount: 1990 });
        const before = await snapshotLedgers(db);

        await expect(createBatch(db, { productName: 'Matcha Latte', quantity: 10 })).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK,
            context: { materialName: 'Sugar', required: 50, available: 10 },
        });
        expect(await snapshotLedgers(db)).toEqual(before);
        expect(await levels()).toEqual({ Matcha: 1000, Milk: 5000, Sugar: 10 });
    });

    it('fails with RECIPE_NOT_FOUND for an unknown product and writes nothing', async () => {
        const before = await snapshotLedgers(db);

        await expect(createBatch(db, { productName: 'Unknown Product', quantity: 5 })).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.RECIPE_NOT_FOUND,
            context: { productName: 'Unknown Product' },
        });
        expect(await snapshotLedgers(db)).toEqual(before);
    });

    it('fails with INGREDIENT_UNRESOLVED when a recipe names an unstocked material', async () => {
        await addRecipe(db, {
            productName: 'Vanilla Latte',
            lines: [
                { materialName: 'Milk', quantityNeeded: 30 },
                { materialName: 'Vanilla', quantityNeeded: 1 },
            ],
        });
        const before = await snapshotLedgers(db);

        await expect(createBatch(db, { productName: 'Vanilla Latte', quantity: 2 })).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.INGREDIENT_UNRESOLVED,
            context: { materialName: 'Vanilla', required: 2 },
        });
        expect(await snapshotLedgers(db)).toEqual(before);
    });

    it('rejects a caller-supplied batch id that is already used', async () => {
        await createBatch(db, { productName: 'Matcha Latte', quantity: 10, batchId: 67 });

        await expect(
            createBatch(db, { productName: 'Matcha Latte', quantity: 10, batchId: 67 }),
        ).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.DUPLICATE_BATCH_ID,
            context: { batchId: 67 },
        });
        expect((await listReadyBatches(db)).map((b) => b.batchId)).toEqual([67]);
        expect(await levels()).toEqual({ Matcha: 980, Milk: 4700, Sugar: 1950 });
    });

    it('continues auto ids past caller-supplied ones and never reuses them', async () => {
        await createBatch(db, { productName: 'Matcha Latte', quantity: 1, batchId: 67 });
        const auto = await createBatch(db, { productName: 'Matcha Latte', quantity: 1 });
        expect(auto.batchId).toBe(68);

        await deleteBatch(db, 68, { reallocate: false });
        const next = await createBatch(db, { productName: 'Matcha Latte', quantity: 1 });
        expect(next.batchId).toBe(69);
    });

    it('records the batch without touching stock when deduction is off', async () => {
        const created = await createBatch(db, {
            productName: 'Matcha Latte',
            quantity: 10000,
            notes: 'Counted from the shelf',
            deductResources: false,
        });

        expect(created.consumed).toEqual([]);
        expect(await levels()).toEqual({ Matcha: 1000, Milk: 5000, Sugar: 2000 });
        expect(await getBatch(db, created.batchId)).toMatchObject({
            status: 'Ready',
            quantity: 10000,
            notes: 'Counted from the shelf',
            materials: [],
        });
    });

    it('sums repeated ingredients before checking and deducting', async () => {
        await addRecipe(db, {
            productName: 'Double Matcha',
            lines: [
                { materialName: 'Matcha', quantityNeeded: 2 },
                { materialName: 'Matcha', quantityNeeded: 3 },
            ],
        });

        const created = await createBatch(db, { productName: 'Double Matcha', quantity: 10 });

        expect(created.consumed).toEqual([
            { materialId: 1, materialName: 'Matcha', quantityUsed: 50, remainingStock: 950 },
        ]);
    });

    it.each([0, -3, 2.5])('rejects quantity %s before any write', async (quantity) => {
        const before = await snapshotLedgers(db);

        await expect(createBatch(db, { productName: 'Matcha Latte', quantity })).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.INVALID_QUANTITY,
            context: { field: 'quantity', value: quantity },
        });
        expect(await snapshotLedgers(db)).toEqual(before);
    });

    it('rolls back the header and earlier deductions when a later write fails', async () => {
        await sql`
            CREATE TRIGGER fail_milk_consumption BEFORE INSERT ON batch_materials
            WHEN NEW.material_id = 2
            BEGIN SELECT RAISE(ABORT, 'boom'); END
        `.execute(db);
        const before = await snapshotLedgers(db);

        await expect(createBatch(db, { productName: 'Matcha Latte', quantity: 10 })).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.STORAGE_FAILURE,
        });

        expect(await snapshotLedgers(db)).toEqual(before);
        expect(await levels()).toEqual({ Matcha: 1000, Milk: 5000, Sugar: 2000 });
        expect(await getBatch(db, 1)).toBeNull();
    });
});

describe('deleteBatch', () => {
    it('restores every consumed material when reallocating', async () => {
        const { batchId } = await createBatch(db, { productName: 'Matcha Latte', quantity: 10 });

        const deleted = await deleteBatch(db, batchId, { reallocate: true });

        expect(deleted).toEqual({
            batchId,
            productName: 'Matcha Latte',
            quantity: 10,
            reallocated: [
                { materialId: 1, materialName: 'Matcha', quantityRestored: 20, stockLevel: 1000 },
                { materialId: 2, materialName: 'Milk', quantityRestored: 300, stockLevel: 5000 },
                { materialId: 3, materialName: 'Sugar', quantityRestored: 50, stockLevel: 2000 },
            ],
        });
        expect(await levels()).toEqual({ Matcha: 1000, Milk: 5000, Sugar: 2000 });
        expect(await listReadyBatches(db)).toEqual([]);
        expect(await listShippedBatches(db)).toEqual([]);
        expect(await db.selectFrom('batchMaterials').selectAll().execute()).toEqual([]);
    });

    it('keeps the deduction when not reallocating', async () => {
        const { batchId } = await createBatch(db, { productName: 'Matcha Latte', quantity: 10 });

        const deleted = await deleteBatch(db, batchId, { reallocate: false });

        expect(deleted.reallocated).toEqual([]);
        expect(await levels()).toEqual({ Matcha: 980, Milk: 4700, Sugar: 1950 });
        expect(await getBatch(db, batchId)).toBeNull();
        expect(await db.selectFrom('batchMaterials').selectAll().execute()).toEqual([]);
    });

    it('reallocates the quantities frozen at creation, not the current recipe', async () => {
        const { batchId } = await createBatch(db, { productName: 'Matcha Latte', quantity: 10 });
        await changeRecipe(db, {
            productName: 'Matcha Latte',
            lines: [{ materialName: 'Matcha', quantityNeeded: 9 }],
        });

        await deleteBatch(db, batchId, { reallocate: true });

        expect(await levels()).toEqual({ Matcha: 1000, Milk: 5000, Sugar: 2000 });
    });

    it('reallocates a shipped batch too', async () => {
        const { batchId } = await createBatch(db, { productName: 'Matcha Latte', quantity: 5 });
        await markShipped(db, batchId);

        await deleteBatch(db, batchId, { reallocate: true });

        expect(await levels()).toEqual({ Matcha: 1000, Milk: 5000, Sugar: 2000 });
        expect(await listShippedBatches(db)).toEqual([]);
    });

    it('fails with BATCH_NOT_FOUND for an unknown id', async () => {
        await expect(deleteBatch(db, 404, { reallocate: true })).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.BATCH_NOT_FOUND,
            context: { batchId: 404 },
        });
    });

    it('keeps the batch and its deductions when the header delete fails', async () => {
        const { batchId } = await createBatch(db, { productName: 'Matcha Latte', quantity: 10 });
        await sql`
            CREATE TRIGGER fail_batch_delete BEFORE DELETE ON batches
            BEGIN SELECT RAISE(ABORT, 'boom'); END
        `.execute(db);
        const before = await snapshotLedgers(db);

        await expect(deleteBatch(db, batchId, { reallocate: true })).rejects.toMatchObject({
            code: INVENTORY_ERROR_CODES.STORAGE_FAILURE,
        });

        expect(await snapshotLedgers(db)).toEqual(before);
        expect(await levels()).toEqual({ Matcha: 980, Milk: 4700, Sugar: 1950 });
        expect(await getBatch(db, batchId)).not.toBeNull();
    });
});
