/**
 * Recipe Catalog
 *
 * Bill of materials per product: one recipe per product name, each line the
 * amount of a material needed for ONE unit of product.
 *
 * Lines store the material name as written; the material id is resolved
 * against the Stock Ledger's canonical (lot-less) row at read time, so a
 * material defined after the recipe is picked up without editing it.
 *
 * Writes return a RecipeWriteOutcome instead of throwing: unresolved
 * ingredient names are a warning, not a failure, because a recipe may be
 * entered before its materials are stocked.
 */

import type { KyselyDB } from '../../database/createKysely.js';
import type { NewRecipeLineRow } from '../../database/types.js';
import {
    INVENTORY_ERROR_CODES,
    InventoryError,
    toInventoryError,
} from '../../errors/inventory.js';
import type { InventoryErrorResult } from '../../errors/inventory.js';
import { getMaterial } from '../inventory/stockLedger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecipeLineParams {
    materialName: string;
    quantityNeeded: number;
}

export interface RecipeLine extends RecipeLineParams {
    /** Current canonical material row for the name; null when not stocked */
    materialId: number | null;
}

export interface Recipe {
    recipeId: number;
    productName: string;
    notes: string | null;
    lines: RecipeLine[];
}

export interface RecipeParams {
    productName: string;
    lines: readonly RecipeLineParams[];
    notes?: string | null;
}

export type RecipeWriteOutcome =
    | { status: 'ok'; recipeId: number }
    | { status: 'warning'; recipeId: number; unresolved: string[] }
    | { status: 'error'; error: InventoryErrorResult['error'] };

export interface DeletedRecipe {
    recipeId: number;
    productName: string;
    notes: string | null;
    lines: RecipeLineParams[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function findRecipeRow(db: KyselyDB, productName: string) {
    const row = await db
        .selectFrom('recipes')
        .selectAll()
        .where('productName', '=', productName)
        .orderBy('recipeId')
        .executeTakeFirst();
    return row ?? null;
}

async function selectResolvedLines(db: KyselyDB, recipeIds: readonly number[]) {
    if (recipeIds.length === 0) return [];
    return db
        .selectFrom('recipeLines')
        .leftJoin('materials', (join) =>
            join
                .onRef('materials.name', '=', 'recipeLines.materialName')
                .on('materials.lotNumber', 'is', null))
        .select([
            'recipeLines.recipeId',
            'recipeLines.materialName',
            'recipeLines.quantityNeeded',
            'materials.materialId',
        ])
        .where('recipeLines.recipeId', 'in', [...recipeIds])
        .orderBy('recipeLines.materialName')
        .orderBy('recipeLines.recipeLineId')
        .execute();
}

/**
 * Insert the line set for a recipe, resolving each name against the ledger.
 * @returns Names that did not resolve
 */
async function insertLines(
    db: KyselyDB,
    recipeId: number,
    lines: readonly RecipeLineParams[],
): Promise<string[]> {
    const unresolved: string[] = [];
    const rows: NewRecipeLineRow[] = [];

    for (const line of lines) {
        const material = await getMaterial(db, { name: line.materialName });
        if (!material) unresolved.push(line.materialName);
        rows.push({
            recipeId,
            materialId: material?.materialId ?? null,
            materialName: line.materialName,
            quantityNeeded: line.quantityNeeded,
        });
    }

    if (rows.length > 0) {
        await db.insertInto('recipeLines').values(rows).execute();
    }
    return unresolved;
}

function toOutcome(recipeId: number, unresolved: string[]): RecipeWriteOutcome {
    return unresolved.length > 0
        ? { status: 'warning', recipeId, unresolved }
        : { status: 'ok', recipeId };
}

function toErrorOutcome(err: unknown, operation: string): RecipeWriteOutcome {
    return { status: 'error', error: toInventoryError(err, operation).toResult().error };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export async function getRecipe(db: KyselyDB, productName: string): Promise<Recipe | null> {
    const recipe = await findRecipeRow(db, productName);
    if (!recipe) return null;

    const lines = await selectResolvedLines(db, [recipe.recipeId]);
    return {
        recipeId: recipe.recipeId,
        productName: recipe.productName,
        notes: recipe.notes,
        lines: lines.map((l) => ({
            materialId: l.materialId,
            materialName: l.materialName,
            quantityNeeded: l.quantityNeeded,
        })),
    };
}

/**
 * Every recipe with its resolved lines, ordered by product name.
 */
export async function listRecipes(db: KyselyDB): Promise<Recipe[]> {
    const recipes = await db
        .selectFrom('recipes')
        .selectAll()
        .orderBy('productName')
        .orderBy('recipeId')
        .execute();

    const lines = await selectResolvedLines(db, recipes.map((r) => r.recipeId));
    const linesByRecipe = new Map<number, RecipeLine[]>();
    for (const l of lines) {
        const list = linesByRecipe.get(l.recipeId) ?? [];
        list.push({ materialId: l.materialId, materialName: l.materialName, quantityNeeded: l.quantityNeeded });
        linesByRecipe.set(l.recipeId, list);
    }

    return recipes.map((r) => ({
        recipeId: r.recipeId,
        productName: r.productName,
        notes: r.notes,
        lines: linesByRecipe.get(r.recipeId) ?? [],
    }));
}

// ---------------------------------------------------------------------------
// Core Operations
// ---------------------------------------------------------------------------

/**
 * Create a recipe with its full line set.
 * Fails with RECIPE_EXISTS when the product already has one.
 */
export async function addRecipe(db: KyselyDB, params: RecipeParams): Promise<RecipeWriteOutcome> {
    try {
        return await db.transaction().execute(async (trx) => {
            const existing = await findRecipeRow(trx, params.productName);
            if (existing) {
                throw new InventoryError(INVENTORY_ERROR_CODES.RECIPE_EXISTS, {
                    technicalMessage: `A recipe for ${params.productName} already exists (recipe ${existing.recipeId})`,
                    context: { productName: params.productName, recipeId: existing.recipeId },
                });
            }

            const { recipeId } = await trx
                .insertInto('recipes')
                .values({ productName: params.productName, notes: params.notes ?? null })
                .returning('recipeId')
                .executeTakeFirstOrThrow();

            const unresolved = await insertLines(trx, recipeId, params.lines);
            return toOutcome(recipeId, unresolved);
        });
    } catch (err) {
        return toErrorOutcome(err, 'addRecipe');
    }
}

/**
 * Replace a recipe: notes are overwritten and every existing line is dropped
 * before the new set is inserted. This is a full replacement, not a merge.
 */
export async function changeRecipe(db: KyselyDB, params: RecipeParams): Promise<RecipeWriteOutcome> {
    try {
        return await db.transaction().execute(async (trx) => {
            const recipe = await findRecipeRow(trx, params.productName);
            if (!recipe) {
                throw new InventoryError(INVENTORY_ERROR_CODES.RECIPE_NOT_FOUND, {
                    technicalMessage: `No recipe found for ${params.productName}`,
                    context: { productName: params.productName },
                });
            }

            await trx
                .updateTable('recipes')
                .set({ notes: params.notes ?? null })
                .where('recipeId', '=', recipe.recipeId)
                .execute();

            await trx
                .deleteFrom('recipeLines')
                .where('recipeId', '=', recipe.recipeId)
                .execute();

            const unresolved = await insertLines(trx, recipe.recipeId, params.lines);
            return toOutcome(recipe.recipeId, unresolved);
        });
    } catch (err) {
        return toErrorOutcome(err, 'changeRecipe');
    }
}

/**
 * Remove a recipe and all its lines.
 * @returns The deleted line set for confirmation display, or null when there was no recipe
 */
export async function deleteRecipe(db: KyselyDB, productName: string): Promise<DeletedRecipe | null> {
    try {
        return await db.transaction().execute(async (trx) => {
            const recipe = await findRecipeRow(trx, productName);
            if (!recipe) return null;

            const lines = await trx
                .selectFrom('recipeLines')
                .select(['materialName', 'quantityNeeded'])
                .where('recipeId', '=', recipe.recipeId)
                .orderBy('materialName')
                .orderBy('recipeLineId')
                .execute();

            await trx.deleteFrom('recipeLines').where('recipeId', '=', recipe.recipeId).execute();
            await trx.deleteFrom('recipes').where('recipeId', '=', recipe.recipeId).execute();

            return {
                recipeId: recipe.recipeId,
                productName: recipe.productName,
                notes: recipe.notes,
                lines,
            };
        });
    } catch (err) {
        throw toInventoryError(err, 'deleteRecipe');
    }
}
