/**
 * @module routes/recipes
 * Recipe Catalog over HTTP.
 *
 * Writes answer 201/200 with `unresolved` listing ingredient names that are
 * not stocked yet; such a recipe is saved but cannot produce until they are.
 */
import { Router } from 'express';
import type { Request, Response } from 'express';
import { InventoryError } from '@batchkeep/shared/errors';
import { addRecipe, changeRecipe, deleteRecipe, getRecipe, listRecipes } from '@batchkeep/shared/services';
import type { RecipeWriteOutcome } from '@batchkeep/shared/services';
import { changeRecipeSchema, createRecipeSchema } from '@batchkeep/shared/schemas';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { NotFoundError } from '../utils/errors.js';
import { recipeLogger } from '../utils/logger.js';

const router: Router = Router();

/**
 * Unwrap a write outcome: errors become thrown InventoryErrors for errorHandler
 */
function settle(outcome: RecipeWriteOutcome, productName: string): { recipeId: number; unresolved: string[] } {
    if (outcome.status === 'error') {
        throw new InventoryError(outcome.error.code, {
            technicalMessage: outcome.error.message,
            context: { productName },
        });
    }
    if (outcome.status === 'warning') {
        recipeLogger.warn({ productName, unresolved: outcome.unresolved }, 'Recipe names materials that are not stocked');
        return { recipeId: outcome.recipeId, unresolved: outcome.unresolved };
    }
    return { recipeId: outcome.recipeId, unresolved: [] };
}

router.get('/', asyncHandler(async (req: Request, res: Response) => {
    res.json(await listRecipes(req.db));
}));

router.get('/:productName', asyncHandler(async (req: Request, res: Response) => {
    const { productName } = req.params;
    const recipe = await getRecipe(req.db, productName);
    if (!recipe) {
        throw new NotFoundError(`No recipe found for ${productName}`, 'Recipe', productName);
    }
    res.json(recipe);
}));

router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const input = createRecipeSchema.parse(req.body);
    const result = settle(await addRecipe(req.db, input), input.productName);
    recipeLogger.info({ productName: input.productName, recipeId: result.recipeId }, 'Recipe added');
    res.status(201).json({ productName: input.productName, ...result });
}));

router.put('/:productName', asyncHandler(async (req: Request, res: Response) => {
    const { productName } = req.params;
    const input = changeRecipeSchema.parse(req.body);
    const result = settle(await changeRecipe(req.db, { productName, ...input }), productName);
    recipeLogger.info({ productName, recipeId: result.recipeId }, 'Recipe changed');
    res.json({ productName, ...result });
}));

router.delete('/:productName', asyncHandler(async (req: Request, res: Response) => {
    const { productName } = req.params;
    const deleted = await deleteRecipe(req.db, productName);
    if (!deleted) {
        throw new NotFoundError(`No recipe found for ${productName}`, 'Recipe', productName);
    }
    recipeLogger.info({ productName, recipeId: deleted.recipeId }, 'Recipe deleted');
    res.json(deleted);
}));

export default router;
