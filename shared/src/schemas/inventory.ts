/**
 * Inventory Zod Schemas
 *
 * Input validation for the presentation layers (web routes, CLI).
 * The core trusts its callers to have run these.
 */

import { z } from 'zod';

const trimmedName = z.string().trim().min(1, 'Name is required');

export const lotNumberSchema = z.coerce.number().int().nonnegative();

export const batchIdSchema = z.coerce.number().int().positive('Batch ID must be a positive whole number');

// ============================================
// MATERIALS
// ============================================

export const createMaterialSchema = z.object({
  name: trimmedName,
  category: z.string().trim().min(1).nullish(),
  stockLevel: z.coerce.number().nonnegative('Stock level cannot be negative'),
  unit: z.string().trim().min(1).nullish(),
  reorderLevel: z.coerce.number().nonnegative('Reorder level cannot be negative').default(0),
  costPerUnit: z.coerce.number().nonnegative('Cost cannot be negative').default(0),
  supplier: z.string().trim().min(1).nullish(),
  lotNumber: lotNumberSchema.nullish(),
});

export type CreateMaterialInput = z.infer<typeof createMaterialSchema>;

/** Manual stock adjustments must move stock; zero or negative amounts are rejected here */
export const stockAdjustmentSchema = z.object({
  amount: z.coerce.number().positive('Amount must be greater than zero'),
  lotNumber: lotNumberSchema.nullish(),
});

export type StockAdjustmentInput = z.infer<typeof stockAdjustmentSchema>;

export const materialLookupQuerySchema = z.object({
  lot: lotNumberSchema.optional(),
});

// ============================================
// RECIPES
// ============================================

export const recipeLineSchema = z.object({
  materialName: trimmedName,
  quantityNeeded: z.coerce.number().positive('Quantity needed must be greater than zero'),
});

export type RecipeLineInput = z.infer<typeof recipeLineSchema>;

export const recipeLinesSchema = z
  .array(recipeLineSchema)
  .min(1, 'A recipe needs at least one material')
  .refine(
    (lines) => new Set(lines.map((l) => l.materialName)).size === lines.length,
    { message: 'Each material may appear only once in a recipe' }
  );

export const createRecipeSchema = z.object({
  productName: trimmedName,
  lines: recipeLinesSchema,
  notes: z.string().trim().min(1).nullish(),
});

export type CreateRecipeInput = z.infer<typeof createRecipeSchema>;

export const changeRecipeSchema = createRecipeSchema.omit({ productName: true });

// ============================================
// BATCHES
// ============================================

export const createBatchSchema = z.object({
  productName: trimmedName,
  quantity: z.coerce.number().int('Quantity must be a whole number').positive('Quantity must be greater than zero'),
  notes: z.string().trim().min(1).nullish(),
  batchId: batchIdSchema.nullish(),
  deductResources: z.boolean().default(true),
});

export type CreateBatchInput = z.infer<typeof createBatchSchema>;

export const deleteBatchQuerySchema = z.object({
  reallocate: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

/**
 * Parse a CLI recipe line of the form "Matcha=2" (name may contain spaces).
 */
export function parseRecipeLineArg(arg: string): RecipeLineInput {
  const separator = arg.lastIndexOf('=');
  if (separator <= 0) {
    throw new z.ZodError([
      {
        code: z.ZodIssueCode.custom,
        path: ['lines'],
        message: `Expected "Material=quantity", got "${arg}"`,
      },
    ]);
  }
  return recipeLineSchema.parse({
    materialName: arg.slice(0, separator),
    quantityNeeded: arg.slice(separator + 1),
  });
}
