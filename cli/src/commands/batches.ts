import { Command } from 'commander';
import {
  createBatch,
  deleteBatch,
  getBatch,
  listReadyBatches,
  listShippedBatches,
  markShipped,
} from '@batchkeep/shared/services';
import type { Batch } from '@batchkeep/shared/services';
import { batchIdSchema, createBatchSchema } from '@batchkeep/shared/schemas';
import { error, field, heading, json, statusColor, success, table, warn } from '../format.js';
import { withStore } from '../store.js';

interface CreateOptions {
  id?: string;
  notes?: string;
  deduct: boolean;
}

function batchRows(batches: Batch[]) {
  return batches.map((b) => ({
    ID: b.batchId,
    Product: b.productName,
    Qty: b.quantity,
    Status: statusColor(b.status),
    Completed: b.dateCompleted.slice(0, 10),
    Shipped: b.dateShipped?.slice(0, 10) ?? '—',
    Notes: b.notes ?? '',
  }));
}

export function registerBatchCommands(program: Command): void {
  const batches = program.command('batches').description('Production batches');

  batches
    .command('ready')
    .description('Batches waiting to ship, oldest first')
    .option('--json', 'Output raw JSON')
    .action((opts: { json?: boolean }) =>
      withStore(async (db) => {
        const rows = await listReadyBatches(db);
        if (opts.json) return json(rows);
        heading(`Ready (${rows.length})`);
        table(batchRows(rows));
        console.log();
      })
    );

  batches
    .command('shipped')
    .description('Shipped batches, most recent first')
    .option('--json', 'Output raw JSON')
    .action((opts: { json?: boolean }) =>
      withStore(async (db) => {
        const rows = await listShippedBatches(db);
        if (opts.json) return json(rows);
        heading(`Shipped (${rows.length})`);
        table(batchRows(rows));
        console.log();
      })
    );

  batches
    .command('show <id>')
    .description('One batch and the materials it consumed')
    .action((id: string) =>
      withStore(async (db) => {
        const batchId = batchIdSchema.parse(id);
        const batch = await getBatch(db, batchId);
        if (!batch) {
          error(`Batch ${batchId} not found`);
          process.exitCode = 1;
          return;
        }
        heading(`Batch ${batch.batchId}`);
        field('Product', batch.productName);
        field('Quantity', batch.quantity);
        field('Status', statusColor(batch.status));
        field('Completed', batch.dateCompleted);
        field('Shipped', batch.dateShipped);
        field('Notes', batch.notes);
        table(
          batch.materials.map((m) => ({
            Material: m.materialName ?? `#${m.materialId}`,
            Used: m.quantityUsed,
          }))
        );
        console.log();
      })
    );

  batches
    .command('create <product> <quantity>')
    .description('Record a batch and consume its ingredients, all or nothing')
    .option('--id <n>', 'Use this batch ID instead of the next one')
    .option('-n, --notes <text>', 'Notes')
    .option('--no-deduct', 'Record the batch without consuming stock')
    .action((product: string, quantity: string, opts: CreateOptions) =>
      withStore(async (db) => {
        const input = createBatchSchema.parse({
          productName: product,
          quantity,
          batchId: opts.id,
          notes: opts.notes,
          deductResources: opts.deduct,
        });
        const created = await createBatch(db, input);
        success(`Batch ${created.batchId}: ${created.quantity} × ${created.productName}`);
        if (created.consumed.length === 0) {
          warn('No stock consumed');
          return;
        }
        table(
          created.consumed.map((c) => ({
            Material: c.materialName,
            Used: c.quantityUsed,
            Remaining: c.remainingStock,
          }))
        );
      })
    );

  batches
    .command('ship <id>')
    .description('Mark a Ready batch as shipped')
    .action((id: string) =>
      withStore(async (db) => {
        const batchId = batchIdSchema.parse(id);
        if (!(await markShipped(db, batchId))) {
          error(`Batch ${batchId} is not a Ready batch`);
          process.exitCode = 1;
          return;
        }
        success(`Batch ${batchId} shipped`);
      })
    );

  batches
    .command('delete <id>')
    .description('Delete a batch')
    .option('--reallocate', 'Put the consumed materials back into stock')
    .action((id: string, opts: { reallocate?: boolean }) =>
      withStore(async (db) => {
        const batchId = batchIdSchema.parse(id);
        const deleted = await deleteBatch(db, batchId, { reallocate: opts.reallocate === true });
        success(`Deleted batch ${deleted.batchId} (${deleted.quantity} × ${deleted.productName})`);
        for (const r of deleted.reallocated) {
          console.log(`  ${r.materialName ?? `#${r.materialId}`}: +${r.quantityRestored} → ${r.stockLevel}`);
        }
      })
    );
}
