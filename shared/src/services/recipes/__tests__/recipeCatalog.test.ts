/**
 * Recipe Catalog against an in-memory SQLite store
 */

import type { KyselyDB } from '../../../database/createKysely.js';
import { INVENTORY_ERROR_CODES } from '../../../errors/inventory.js';
import { addMaterial } from '../../inventory/stockLedger.js';
import { createTestDatabase, seedMatchaLatte } from '../../__tests__/helpers/testDatabase.js';
import { addRecipe, changeRecipe, deleteRecipe, getRecipe, listRecipes } from '../recipeCatalog.js';

let db: KyselyDB;

beforeEach(async () => {
    db = await createTestDatabase();
    await seedMatchaLatte(db);
});

afterEach(async () => {
    await db.destroy();
});

describe('getRecipe', () => {
    it('returns lines resolved to current material ids, ordered by material name', async () => {
        expect(await getRecipe(db, 'Matcha Latte')).toEqual({
            recipeId: 1,
            productName: 'Matcha Latte',
            notes: null,
            lines: [
                { materialId: 1, materialName: 'Matcha', quantityNeeded: 2 },
                { materialId: 2, materialName: 'Milk', quantityNeeded: 30 },
                { materialId: 3, materialName: 'Sugar', quantityNeeded: 5 },
            ],
        });
    });

    it('returns null for an unknown product', async () => {
        expect(await getRecipe(db, 'Hojicha Latte')).toBeNull();
    });
});

describe('addRecipe', () => {
    it('reports ok when every ingredient resolves', async () => {
        const outcome = await addRecipe(db, {
            productName: 'Sweet Milk',
            lines: [
                { materialName: 'Sugar', quantityNeeded: 10 },
                { materialName: 'Milk', quantityNeeded: 250 },
            ],
            notes: 'Kids menu',
        });

        expect(outcome).toEqual({ status: 'ok', recipeId: 2 });
        expect((await getRecipe(db, 'Sweet Milk'))?.notes).toBe('Kids menu');
    });

    it('stores unresolved ingredients and reports them as a warning', async () => {
        const outcome = await addRecipe(db, {
            productName: 'Vanilla Latte',
            lines: [
                { materialName: 'Vanilla', quantityNeeded: 1 },
                { materialName: 'Milk', quantityNeeded: 30 },
            ],
        });

        expect(outcome).toEqual({ status: 'warning', recipeId: 2, unresolved: ['Vanilla'] });
        expect((await getRecipe(db, 'Vanilla Latte'))?.lines).toEqual([
            { materialId: 2, materialName: 'Milk', quantityNeeded: 30 },
            { materialId: null, materialName: 'Vanilla', quantityNeeded: 1 },
        ]);
    });

    it('resolves a previously unresolved ingredient once the material is stocked', async () => {
        await addRecipe(db, {
            productName: 'Vanilla Latte',
            lines: [{ materialName: 'Vanilla', quantityNeeded: 1 }],
        });
        const vanillaId = await addMaterial(db, {
            name: 'Vanilla', stockLevel: 50, reorderLevel: 5, costPerUnit: 2,
        });

        expect((await getRecipe(db, 'Vanilla Latte'))?.lines).toEqual([
            { materialId: vanillaId, materialName: 'Vanilla', quantityNeeded: 1 },
        ]);
    });

    it('does not resolve against lotted rows', async () => {
        await addMaterial(db, {
            name: 'Yuzu', stockLevel: 50, reorderLevel: 5, costPerUnit: 2, lotNumber: 1,
        });

        const outcome = await addRecipe(db, {
            productName: 'Yuzu Soda',
            lines: [{ materialName: 'Yuzu', quantityNeeded: 3 }],
        });

        expect(outcome).toEqual({ status: 'warning', recipeId: 2, unresolved: ['Yuzu'] });
    });

    it('returns an error outcome when the product already has a recipe', async () => {
        const outcome = await addRecipe(db, {
            productName: 'Matcha Latte',
            lines: [{ materialName: 'Matcha', quantityNeeded: 4 }],
        });

        expect(outcome).toEqual({
            status: 'error',
            error: {
                code: INVENTORY_ERROR_CODES.RECIPE_EXISTS,
                message: 'A recipe for Matcha Latte already exists (recipe 1)',
            },
        });
        expect((await getRecipe(db, 'Matcha Latte'))?.lines).toHaveLength(3);
    });
});

describe('changeRecipe', () => {
    it('replaces the whole line set and the notes', async () => {
        const outcome = await changeRecipe(db, {
            productName: 'Matcha Latte',
            lines: [
                { materialName: 'Milk', quantityNeeded: 40 },
                { materialName: 'Matcha', quantityNeeded: 3 },
            ],
            notes: 'Less sweet',
        });

        expect(outcome).toEqual({ status: 'ok', recipeId: 1 });
        expect(await getRecipe(db, 'Matcha Latte')).toEqual({
            recipeId: 1,
            productName: 'Matcha Latte',
            notes: 'Less sweet',
            lines: [
                { materialId: 1, materialName: 'Matcha', quantityNeeded: 3 },
                { materialId: 2, materialName: 'Milk', quantityNeeded: 40 },
            ],
        });
    });

    it('clears notes when none are given', async () => {
        await changeRecipe(db, {
            productName: 'Matcha Latte',
            lines: [{ materialName: 'Matcha', quantityNeeded: 2 }],
            notes: 'first',
        });
        await changeRecipe(db, {
            productName: 'Matcha Latte',
            lines: [{ materialName: 'Matcha', quantityNeeded: 2 }],
        });

        expect((await getRecipe(db, 'Matcha Latte'))?.notes).toBeNull();
    });

    it('returns RECIPE_NOT_FOUND for an unknown product', async () => {
        const outcome = await changeRecipe(db, {
            productName: 'Hojicha Latte',
            lines: [{ materialName: 'Milk', quantityNeeded: 30 }],
        });

        expect(outcome).toEqual({
            status: 'error',
            error: {
                code: INVENTORY_ERROR_CODES.RECIPE_NOT_FOUND,
                message: 'No recipe found for Hojicha Latte',
            },
        });
        expect(await getRecipe(db, 'Hojicha Latte')).toBeNull();
    });
});

describe('deleteRecipe', () => {
    it('removes the recipe and returns the deleted lines', async () => {
        expect(await deleteRecipe(db, 'Matcha Latte')).toEqual({
            recipeId: 1,
            productName: 'Matcha Latte',
            notes: null,
            lines: [
                { materialName: 'Matcha', quantityNeeded: 2 },
                { materialName: 'Milk', quantityNeeded: 30 },
                { materialName: 'Sugar', quantityNeeded: 5 },
            ],
        });
        expect(await getRecipe(db, 'Matcha Latte')).toBeNull();
        expect(await db.selectFrom('recipeLines').selectAll().execute()).toEqual([]);
    });

    it('returns null when there is no such recipe', async () => {
        expect(await deleteRecipe(db, 'Hojicha Latte')).toBeNull();
    });
});

describe('listRecipes', () => {
    it('lists every recipe by product name with its lines', async () => {
        await addRecipe(db, {
            productName: 'Iced Milk',
            lines: [{ materialName: 'Milk', quantityNeeded: 200 }],
        });

        const recipes = await listRecipes(db);
        expect(recipes.map((r) => r.productName)).toEqual(['Iced Milk', 'Matcha Latte']);
        expect(recipes[0]?.lines).toEqual([{ materialId: 2, materialName: 'Milk', quantityNeeded: 200 }]);
        expect(recipes[1]?.lines).toHaveLength(3);
    });
});
