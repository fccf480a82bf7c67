/**
 * @module routes/materials
 * Stock Ledger over HTTP: raw materials and their stock levels.
 *
 * A material is addressed by name; `?lot=N` selects a lot row, no `lot`
 * selects the canonical lot-less row.
 */
import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    addMaterial,
    decreaseStock,
    deleteMaterial,
    getMaterial,
    increaseStock,
    listLowStock,
    listMaterials,
} from '@batchkeep/shared/services';
import {
    createMaterialSchema,
    materialLookupQuerySchema,
    stockAdjustmentSchema,
} from '@batchkeep/shared/schemas';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { NotFoundError } from '../utils/errors.js';
import { inventoryLogger } from '../utils/logger.js';

const router: Router = Router();

function lotFromQuery(req: Request): number | null {
    return materialLookupQuerySchema.parse(req.query).lot ?? null;
}

router.get('/', asyncHandler(async (req: Request, res: Response) => {
    res.json(await listMaterials(req.db));
}));

router.get('/low-stock', asyncHandler(async (req: Request, res: Response) => {
    res.json(await listLowStock(req.db));
}));

router.get('/:name', asyncHandler(async (req: Request, res: Response) => {
    const key = { name: req.params.name, lotNumber: lotFromQuery(req) };
    const material = await getMaterial(req.db, key);
    if (!material) {
        throw new NotFoundError('Material not found', 'Material', key.name);
    }
    res.json(material);
}));

router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const input = createMaterialSchema.parse(req.body);
    const materialId = await addMaterial(req.db, input);
    inventoryLogger.info({ materialId, name: input.name, lotNumber: input.lotNumber ?? null }, 'Material added');
    res.status(201).json(await getMaterial(req.db, input));
}));

router.post('/:name/increase', asyncHandler(async (req: Request, res: Response) => {
    const { amount, lotNumber } = stockAdjustmentSchema.parse(req.body);
    const key = { name: req.params.name, lotNumber: lotNumber ?? lotFromQuery(req) };
    const stockLevel = await increaseStock(req.db, { ...key, amount });
    inventoryLogger.info({ ...key, amount, stockLevel }, 'Stock increased');
    res.json({ ...key, stockLevel });
}));

router.post('/:name/decrease', asyncHandler(async (req: Request, res: Response) => {
    const { amount, lotNumber } = stockAdjustmentSchema.parse(req.body);
    const key = { name: req.params.name, lotNumber: lotNumber ?? lotFromQuery(req) };
    const stockLevel = await decreaseStock(req.db, { ...key, amount });
    inventoryLogger.info({ ...key, amount, stockLevel }, 'Stock decreased');
    res.json({ ...key, stockLevel });
}));

router.delete('/:name', asyncHandler(async (req: Request, res: Response) => {
    const key = { name: req.params.name, lotNumber: lotFromQuery(req) };
    const deleted = await deleteMaterial(req.db, key);
    if (!deleted) {
        throw new NotFoundError('Material not found', 'Material', key.name);
    }
    inventoryLogger.info(key, 'Material deleted');
    res.status(204).end();
}));

export default router;
