import { Command } from 'commander';
import { InventoryError } from '@batchkeep/shared/errors';
import { addRecipe, changeRecipe, deleteRecipe, getRecipe, listRecipes } from '@batchkeep/shared/services';
import type { RecipeWriteOutcome } from '@batchkeep/shared/services';
import { createRecipeSchema, parseRecipeLineArg } from '@batchkeep/shared/schemas';
import { error, field, heading, json, success, table, warn } from '../format.js';
import { withStore } from '../store.js';

interface WriteOptions {
  notes?: string;
}

function report(outcome: RecipeWriteOutcome, verb: string, productName: string): void {
  if (outcome.status === 'error') {
    throw new InventoryError(outcome.error.code, { technicalMessage: outcome.error.message });
  }
  success(`${verb} recipe for ${productName} (recipe ${outcome.recipeId})`);
  if (outcome.status === 'warning') {
    warn(`Not in stock yet: ${outcome.unresolved.join(', ')}`);
  }
}

function parseRecipe(productName: string, lineArgs: string[], notes: string | undefined) {
  return createRecipeSchema.parse({
    productName,
    lines: lineArgs.map(parseRecipeLineArg),
    notes,
  });
}

export function registerRecipeCommands(program: Command): void {
  const recipes = program
    .command('recipes')
    .description('Product recipes; lines are given as "Material=quantity" per unit');

  recipes
    .command('list')
    .description('All recipes by product name')
    .option('--json', 'Output raw JSON')
    .action((opts: { json?: boolean }) =>
      withStore(async (db) => {
        const rows = await listRecipes(db);
        if (opts.json) return json(rows);
        heading(`Recipes (${rows.length})`);
        table(
          rows.map((r) => ({
            Product: r.productName,
            Lines: r.lines.map((l) => `${l.materialName} ${l.quantityNeeded}`).join(', '),
            Notes: r.notes ?? '',
          }))
        );
        console.log();
      })
    );

  recipes
    .command('show <product>')
    .description('One recipe with its lines')
    .action((product: string) =>
      withStore(async (db) => {
        const recipe = await getRecipe(db, product);
        if (!recipe) {
          error(`No recipe found for ${product}`);
          process.exitCode = 1;
          return;
        }
        heading(recipe.productName);
        field('Recipe ID', recipe.recipeId);
        field('Notes', recipe.notes);
        table(
          recipe.lines.map((l) => ({
            Material: l.materialName,
            'Per unit': l.quantityNeeded,
            Stocked: l.materialId === null ? 'no' : 'yes',
          }))
        );
        console.log();
      })
    );

  recipes
    .command('add <product> <lines...>')
    .description('Create a recipe, e.g. recipes add "Matcha Latte" Matcha=2 Milk=30')
    .option('-n, --notes <text>', 'Notes')
    .action((product: string, lines: string[], opts: WriteOptions) =>
      withStore(async (db) => {
        const input = parseRecipe(product, lines, opts.notes);
        report(await addRecipe(db, input), 'Added', input.productName);
      })
    );

  recipes
    .command('change <product> <lines...>')
    .description('Replace every line (and the notes) of a recipe')
    .option('-n, --notes <text>', 'Notes')
    .action((product: string, lines: string[], opts: WriteOptions) =>
      withStore(async (db) => {
        const input = parseRecipe(product, lines, opts.notes);
        report(await changeRecipe(db, input), 'Changed', input.productName);
      })
    );

  recipes
    .command('delete <product>')
    .description('Delete a recipe; recorded batches are untouched')
    .action((product: string) =>
      withStore(async (db) => {
        const deleted = await deleteRecipe(db, product);
        if (!deleted) {
          error(`No recipe found for ${product}`);
          process.exitCode = 1;
          return;
        }
        success(`Deleted recipe for ${deleted.productName} (${deleted.lines.length} lines)`);
      })
    );
}
