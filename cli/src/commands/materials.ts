import { Command } from 'commander';
import {
  addMaterial,
  decreaseStock,
  deleteMaterial,
  getMaterial,
  increaseStock,
  listLowStock,
  listMaterials,
} from '@batchkeep/shared/services';
import type { Material } from '@batchkeep/shared/services';
import { createMaterialSchema, lotNumberSchema, stockAdjustmentSchema } from '@batchkeep/shared/schemas';
import { error, field, heading, json, stockColor, success, table } from '../format.js';
import { withStore } from '../store.js';

interface LotOption {
  lot?: string;
}

interface ListOptions {
  json?: boolean;
}

interface AddOptions extends LotOption {
  stock: string;
  unit?: string;
  category?: string;
  reorder?: string;
  cost?: string;
  supplier?: string;
}

function materialKey(name: string, opts: LotOption) {
  return { name, lotNumber: opts.lot === undefined ? null : lotNumberSchema.parse(opts.lot) };
}

function materialRows(materials: Material[]) {
  return materials.map((m) => ({
    Name: m.name,
    Lot: m.lotNumber ?? '—',
    Category: m.category ?? '—',
    Stock: stockColor(m.stockLevel, m.reorderLevel),
    Unit: m.unit ?? '',
    Reorder: m.reorderLevel,
    Supplier: m.supplier ?? '—',
  }));
}

export function registerMaterialCommands(program: Command): void {
  const materials = program.command('materials').description('Raw materials and stock levels');

  materials
    .command('list')
    .description('All materials by category, name and lot')
    .option('--json', 'Output raw JSON')
    .action((opts: ListOptions) =>
      withStore(async (db) => {
        const rows = await listMaterials(db);
        if (opts.json) return json(rows);
        heading(`Materials (${rows.length})`);
        table(materialRows(rows));
        console.log();
      })
    );

  materials
    .command('low')
    .description('Materials at or below their reorder level, most urgent first')
    .option('--json', 'Output raw JSON')
    .action((opts: ListOptions) =>
      withStore(async (db) => {
        const rows = await listLowStock(db);
        if (opts.json) return json(rows);
        heading(`Low stock (${rows.length})`);
        table(materialRows(rows));
        console.log();
      })
    );

  materials
    .command('show <name>')
    .description('One material')
    .option('--lot <n>', 'Lot number')
    .action((name: string, opts: LotOption) =>
      withStore(async (db) => {
        const material = await getMaterial(db, materialKey(name, opts));
        if (!material) {
          error(`Material "${name}" not found`);
          process.exitCode = 1;
          return;
        }
        heading(material.name);
        field('ID', material.materialId);
        field('Lot', material.lotNumber);
        field('Category', material.category);
        field('Stock', `${stockColor(material.stockLevel, material.reorderLevel)} ${material.unit ?? ''}`.trim());
        field('Reorder level', material.reorderLevel);
        field('Cost per unit', material.costPerUnit);
        field('Supplier', material.supplier);
        console.log();
      })
    );

  materials
    .command('add <name>')
    .description('Add a material')
    .requiredOption('-s, --stock <n>', 'Opening stock level')
    .option('-u, --unit <unit>', 'Unit of measure (g, ml, pcs)')
    .option('-c, --category <category>', 'Category')
    .option('-r, --reorder <n>', 'Reorder level', '0')
    .option('--cost <n>', 'Cost per unit', '0')
    .option('--supplier <name>', 'Supplier')
    .option('--lot <n>', 'Lot number')
    .action((name: string, opts: AddOptions) =>
      withStore(async (db) => {
        const input = createMaterialSchema.parse({
          name,
          stockLevel: opts.stock,
          unit: opts.unit,
          category: opts.category,
          reorderLevel: opts.reorder,
          costPerUnit: opts.cost,
          supplier: opts.supplier,
          lotNumber: opts.lot,
        });
        const materialId = await addMaterial(db, input);
        success(`Added ${input.name} (material ${materialId})`);
      })
    );

  materials
    .command('increase <name> <amount>')
    .description('Add stock')
    .option('--lot <n>', 'Lot number')
    .action((name: string, amount: string, opts: LotOption) =>
      withStore(async (db) => {
        const key = materialKey(name, opts);
        const adjustment = stockAdjustmentSchema.parse({ amount });
        const level = await increaseStock(db, { ...key, amount: adjustment.amount });
        success(`${name}: +${adjustment.amount} → ${level}`);
      })
    );

  materials
    .command('decrease <name> <amount>')
    .description('Remove stock; refused when stock does not cover it')
    .option('--lot <n>', 'Lot number')
    .action((name: string, amount: string, opts: LotOption) =>
      withStore(async (db) => {
        const key = materialKey(name, opts);
        const adjustment = stockAdjustmentSchema.parse({ amount });
        const level = await decreaseStock(db, { ...key, amount: adjustment.amount });
        success(`${name}: -${adjustment.amount} → ${level}`);
      })
    );

  materials
    .command('delete <name>')
    .description('Delete a material not consumed by any batch')
    .option('--lot <n>', 'Lot number')
    .action((name: string, opts: LotOption) =>
      withStore(async (db) => {
        const deleted = await deleteMaterial(db, materialKey(name, opts));
        if (!deleted) {
          error(`Material "${name}" not found`);
          process.exitCode = 1;
          return;
        }
        success(`Deleted ${name}`);
      })
    );
}
