/**
 * 001: initial schema
 *
 * Tables: materials, recipes, recipe_lines, batches, batch_materials,
 * id_sequences.
 */

import { sql } from 'kysely';
import type { ColumnDefinitionBuilder, Kysely, Migration } from 'kysely';
import type { DatabaseDialect } from '../createKysely.js';

export function initialSchema(dialect: DatabaseDialect): Migration {
    // PostgreSQL has no AUTOINCREMENT keyword; serial is its equivalent
    const idType: 'serial' | 'integer' = dialect === 'postgres' ? 'serial' : 'integer';
    const idColumn = (col: ColumnDefinitionBuilder): ColumnDefinitionBuilder =>
        dialect === 'postgres' ? col.primaryKey() : col.primaryKey().autoIncrement();

    return {
        async up(db: Kysely<unknown>): Promise<void> {
            await db.schema
                .createTable('materials')
                .ifNotExists()
                .addColumn('material_id', idType, idColumn)
                .addColumn('name', 'text', (col) => col.notNull())
                .addColumn('category', 'text')
                .addColumn('stock_level', 'double precision', (col) => col.notNull().defaultTo(0))
                .addColumn('unit', 'text')
                .addColumn('reorder_level', 'double precision', (col) => col.notNull().defaultTo(0))
                .addColumn('cost_per_unit', 'double precision', (col) => col.notNull().defaultTo(0))
                .addColumn('supplier', 'text')
                .addColumn('lot_number', 'integer')
                .addCheckConstraint('materials_stock_non_negative', sql`stock_level >= 0`)
                .execute();

            await db.schema
                .createIndex('materials_name_lot_idx')
                .ifNotExists()
                .on('materials')
                .columns(['name', 'lot_number'])
                .execute();

            await db.schema
                .createTable('recipes')
                .ifNotExists()
                .addColumn('recipe_id', idType, idColumn)
                .addColumn('product_name', 'text', (col) => col.notNull())
                .addColumn('notes', 'text')
                .execute();

            await db.schema
                .createIndex('recipes_product_name_idx')
                .ifNotExists()
                .on('recipes')
                .column('product_name')
                .execute();

            await db.schema
                .createTable('recipe_lines')
                .ifNotExists()
                .addColumn('recipe_line_id', idType, idColumn)
                .addColumn('recipe_id', 'integer', (col) =>
                    col.notNull().references('recipes.recipe_id').onDelete('cascade'))
                .addColumn('material_id', 'integer', (col) => col.references('materials.material_id'))
                .addColumn('material_name', 'text', (col) => col.notNull())
                .addColumn('quantity_needed', 'double precision', (col) => col.notNull())
                .execute();

            // batch_id is assigned from id_sequences, never by the engine
            await db.schema
                .createTable('batches')
                .ifNotExists()
                .addColumn('batch_id', 'integer', (col) => col.primaryKey())
                .addColumn('product_name', 'text', (col) => col.notNull())
                .addColumn('quantity', 'integer', (col) => col.notNull())
                .addColumn('date_completed', 'text', (col) => col.notNull())
                .addColumn('status', 'text', (col) => col.notNull().defaultTo('Ready'))
                .addColumn('notes', 'text')
                .addColumn('date_shipped', 'text')
                .addCheckConstraint('batches_status_valid', sql`status in ('Ready', 'Shipped')`)
                .execute();

            await db.schema
                .createTable('batch_materials')
                .ifNotExists()
                .addColumn('batch_material_id', idType, idColumn)
                .addColumn('batch_id', 'integer', (col) =>
                    col.notNull().references('batches.batch_id').onDelete('cascade'))
                .addColumn('material_id', 'integer', (col) =>
                    col.notNull().references('materials.material_id'))
                .addColumn('quantity_used', 'double precision', (col) => col.notNull())
                .execute();

            await db.schema
                .createIndex('batch_materials_material_idx')
                .ifNotExists()
                .on('batch_materials')
                .column('material_id')
                .execute();

            await db.schema
                .createTable('id_sequences')
                .ifNotExists()
                .addColumn('name', 'text', (col) => col.primaryKey())
                .addColumn('last_value', 'integer', (col) => col.notNull().defaultTo(0))
                .execute();
        },

        async down(db: Kysely<unknown>): Promise<void> {
            await db.schema.dropTable('id_sequences').ifExists().execute();
            await db.schema.dropTable('batch_materials').ifExists().execute();
            await db.schema.dropTable('batches').ifExists().execute();
            await db.schema.dropTable('recipe_lines').ifExists().execute();
            await db.schema.dropTable('recipes').ifExists().execute();
            await db.schema.dropTable('materials').ifExists().execute();
        },
    };
}
