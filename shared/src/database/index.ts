/**
 * Database adapter barrel
 */

export {
    createDatabase,
    withDatabase,
    resolveDatabaseConfig,
    DEFAULT_SQLITE_PATH,
    type DatabaseConfig,
    type DatabaseDialect,
    type PostgresConfig,
    type SqliteConfig,
    type KyselyDB,
} from './createKysely.js';
export { migrateToLatest } from './migrator.js';
export type * from './types.js';
