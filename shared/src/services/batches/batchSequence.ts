/**
 * Batch id sequence
 *
 * Caller-supplied and auto-assigned batch ids share one id space. The
 * `batches` row in id_sequences records the highest id ever handed out, so:
 * - an auto id is max(sequence, highest live batch_id) + 1
 * - a caller-supplied id pushes the sequence up to at least that id
 * and a deleted batch's id is never handed out again.
 *
 * Must run inside the transaction that inserts the batch.
 */

import type { KyselyDB } from '../../database/createKysely.js';

export const BATCH_SEQUENCE = 'batches';

async function readSequence(db: KyselyDB): Promise<number | null> {
    const row = await db
        .selectFrom('idSequences')
        .select('lastValue')
        .where('name', '=', BATCH_SEQUENCE)
        .executeTakeFirst();
    return row ? Number(row.lastValue) : null;
}

async function highestBatchId(db: KyselyDB): Promise<number> {
    const row = await db
        .selectFrom('batches')
        .select((eb) => eb.fn.max('batchId').as('maxId'))
        .executeTakeFirst();
    return row?.maxId == null ? 0 : Number(row.maxId);
}

async function advanceSequence(db: KyselyDB, current: number | null, value: number): Promise<void> {
    if (current === null) {
        await db.insertInto('idSequences').values({ name: BATCH_SEQUENCE, lastValue: value }).execute();
        return;
    }
    if (value > current) {
        await db
            .updateTable('idSequences')
            .set({ lastValue: value })
            .where('name', '=', BATCH_SEQUENCE)
            .execute();
    }
}

export async function nextBatchId(db: KyselyDB): Promise<number> {
    const current = await readSequence(db);
    const next = Math.max(current ?? 0, await highestBatchId(db)) + 1;
    await advanceSequence(db, current, next);
    return next;
}

export async function reserveBatchId(db: KyselyDB, batchId: number): Promise<void> {
    await advanceSequence(db, await readSequence(db), batchId);
}
