/**
 * Server entry point
 *
 * Loads config, opens the store, migrates it, and serves the API until
 * SIGTERM/SIGINT, then drains in-flight requests and closes the store.
 */
import type { Server } from 'node:http';
import { createDatabase, migrateToLatest, resolveDatabaseConfig } from '@batchkeep/shared/database';
import { env } from './config/env.js';
import { createApp } from './app.js';
import logger from './utils/logger.js';
import shutdownCoordinator from './utils/shutdownCoordinator.js';

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}

async function main(): Promise<void> {
    const config = resolveDatabaseConfig({ DATABASE_URL: env.DATABASE_URL, SQLITE_PATH: env.SQLITE_PATH });
    const db = createDatabase(config);

    const migrations = await migrateToLatest(db, config.dialect);
    logger.info(
        { dialect: config.dialect, applied: migrations.map((m) => m.migrationName) },
        'Database ready'
    );

    const app = createApp(db);
    const server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server listening');
    });

    // Stop accepting requests before the store goes away
    shutdownCoordinator.register('server', async () => {
        await closeServer(server);
        await db.destroy();
    }, 15000);

    const onSignal = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Shutdown signal received');
        shutdownCoordinator.shutdown().then(
            () => process.exit(0),
            (err: unknown) => {
                logger.error({ err }, 'Shutdown failed');
                process.exit(1);
            }
        );
    };
    process.once('SIGTERM', onSignal);
    process.once('SIGINT', onSignal);
}

main().catch((err: unknown) => {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
});
