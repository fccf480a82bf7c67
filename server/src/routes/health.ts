/**
 * @module routes/health
 * Liveness plus a round trip to the store.
 */
import { Router } from 'express';
import type { Request, Response } from 'express';
import { sql } from 'kysely';
import { asyncHandler } from '../middleware/asyncHandler.js';

const router: Router = Router();

router.get('/', asyncHandler(async (req: Request, res: Response) => {
    await sql`select 1`.execute(req.db);
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
}));

export default router;
