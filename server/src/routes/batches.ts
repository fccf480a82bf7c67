/**
 * @module routes/batches
 * Production batches: creation with ingredient consumption, shipping, and
 * deletion with optional reallocation of the consumed stock.
 *
 * Status flow:
 *   Ready -> Shipped
 *
 * Creation and deletion are all-or-nothing; a failure answers with the
 * InventoryError code and leaves every ledger as it was.
 */
import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    createBatch,
    deleteBatch,
    getBatch,
    listReadyBatches,
    listShippedBatches,
    markShipped,
} from '@batchkeep/shared/services';
import { batchIdSchema, createBatchSchema, deleteBatchQuerySchema } from '@batchkeep/shared/schemas';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import { productionLogger } from '../utils/logger.js';

const router: Router = Router();

function parseBatchId(req: Request): number {
    const result = batchIdSchema.safeParse(req.params.id);
    if (!result.success) {
        throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid batch ID', { id: req.params.id });
    }
    return result.data;
}

router.get('/ready', asyncHandler(async (req: Request, res: Response) => {
    res.json(await listReadyBatches(req.db));
}));

router.get('/shipped', asyncHandler(async (req: Request, res: Response) => {
    res.json(await listShippedBatches(req.db));
}));

router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const batchId = parseBatchId(req);
    const batch = await getBatch(req.db, batchId);
    if (!batch) {
        throw new NotFoundError('Batch not found', 'Batch', batchId);
    }
    res.json(batch);
}));

router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const input = createBatchSchema.parse(req.body);
    const created = await createBatch(req.db, input);
    productionLogger.info(
        { batchId: created.batchId, productName: created.productName, quantity: created.quantity, consumed: created.consumed.length },
        'Batch created'
    );
    res.status(201).json(created);
}));

router.post('/:id/ship', asyncHandler(async (req: Request, res: Response) => {
    const batchId = parseBatchId(req);
    const shipped = await markShipped(req.db, batchId);
    if (!shipped) {
        const batch = await getBatch(req.db, batchId);
        if (!batch) {
            throw new NotFoundError('Batch not found', 'Batch', batchId);
        }
        throw new ConflictError(`Batch ${batchId} is already ${batch.status}`, 'ALREADY_SHIPPED');
    }
    productionLogger.info({ batchId }, 'Batch shipped');
    res.json(await getBatch(req.db, batchId));
}));

router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
    const batchId = parseBatchId(req);
    const { reallocate } = deleteBatchQuerySchema.parse(req.query);
    const deleted = await deleteBatch(req.db, batchId, { reallocate });
    productionLogger.info({ batchId, reallocate, restored: deleted.reallocated.length }, 'Batch deleted');
    res.json(deleted);
}));

export default router;
