/**
 * Express application
 *
 * Built around an already-open store handle so the same app serves
 * PostgreSQL in production and an in-memory SQLite store under test.
 */
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { KyselyDB } from '@batchkeep/shared/database';
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './utils/logger.js';
import { NotFoundError } from './utils/errors.js';
import batchRoutes from './routes/batches.js';
import healthRoutes from './routes/health.js';
import materialRoutes from './routes/materials.js';
import recipeRoutes from './routes/recipes.js';

export function createApp(db: KyselyDB): Express {
    const app = express();

    app.use(express.json({ limit: '1mb' }));
    app.use(requestLogger);
    app.use((req: Request, _res: Response, next: NextFunction) => {
        req.db = db;
        next();
    });

    app.use('/api/health', healthRoutes);
    app.use('/api/materials', materialRoutes);
    app.use('/api/recipes', recipeRoutes);
    app.use('/api/batches', batchRoutes);

    app.use('/api', (req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`No route for ${req.method} ${req.originalUrl}`));
    });

    // Error handler must be last
    app.use(errorHandler);

    return app;
}
