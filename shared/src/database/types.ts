/**
 * Database table interfaces for Kysely.
 *
 * Column names are declared in camelCase; CamelCasePlugin maps them to the
 * snake_case columns created by the migrations.
 */

import type { Generated, Insertable, Selectable } from 'kysely';

export type BatchStatus = 'Ready' | 'Shipped';

export interface MaterialsTable {
    materialId: Generated<number>;
    name: string;
    category: string | null;
    stockLevel: number;
    unit: string | null;
    reorderLevel: number;
    costPerUnit: number;
    supplier: string | null;
    lotNumber: number | null;
}

export interface RecipesTable {
    recipeId: Generated<number>;
    productName: string;
    notes: string | null;
}

export interface RecipeLinesTable {
    recipeLineId: Generated<number>;
    recipeId: number;
    /** Material row the line resolved to when written; null when unresolved */
    materialId: number | null;
    materialName: string;
    /** Amount needed for ONE unit of product */
    quantityNeeded: number;
}

export interface BatchesTable {
    batchId: number;
    productName: string;
    quantity: number;
    dateCompleted: string;
    status: BatchStatus;
    notes: string | null;
    dateShipped: string | null;
}

export interface BatchMaterialsTable {
    batchMaterialId: Generated<number>;
    batchId: number;
    materialId: number;
    /** Absolute amount deducted for the batch, frozen at creation */
    quantityUsed: number;
}

export interface IdSequencesTable {
    name: string;
    lastValue: number;
}

export interface DB {
    materials: MaterialsTable;
    recipes: RecipesTable;
    recipeLines: RecipeLinesTable;
    batches: BatchesTable;
    batchMaterials: BatchMaterialsTable;
    idSequences: IdSequencesTable;
}

export type MaterialRow = Selectable<MaterialsTable>;
export type NewRecipeLineRow = Insertable<RecipeLinesTable>;
export type BatchRow = Selectable<BatchesTable>;
