/**
 * Kysely Factory
 *
 * Opens a Kysely handle on either PostgreSQL (hosted) or SQLite (local).
 * The handle is owned by the caller: nothing here is cached on module scope,
 * so every opened handle must be destroyed by whoever opened it. Prefer
 * `withDatabase()`, which does that automatically.
 *
 * Usage:
 *   const config = resolveDatabaseConfig(process.env);
 *   const level = await withDatabase(config, (db) => increaseStock(db, { name: 'Milk', amount: 500 }));
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { CamelCasePlugin, Kysely, PostgresDialect, SqliteDialect } from 'kysely';
import type { Dialect } from 'kysely';
import pg from 'pg';
import SQLite from 'better-sqlite3';
import type { DB } from './types.js';
import { migrateToLatest } from './migrator.js';

export const DEFAULT_SQLITE_PATH = 'data/inventory.db';

export interface PostgresConfig {
    dialect: 'postgres';
    connectionString: string;
    /** Pool size, defaults to 10 */
    poolSize?: number;
}

export interface SqliteConfig {
    dialect: 'sqlite';
    /** File path, or ':memory:' for a throwaway store */
    filename: string;
}

export type DatabaseConfig = PostgresConfig | SqliteConfig;

export type DatabaseDialect = DatabaseConfig['dialect'];

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance or transaction
 */
export type KyselyDB = Kysely<DB>;

/**
 * Pick the backing engine from environment variables.
 *
 * DATABASE_URL set → PostgreSQL (hosted); otherwise SQLite at SQLITE_PATH.
 * Hosting providers hand out `postgres://` URLs, pg accepts both schemes
 * but we normalise to `postgresql://` for log readability.
 */
export function resolveDatabaseConfig(
    env: Record<string, string | undefined>,
): DatabaseConfig {
    const url = env.DATABASE_URL?.trim();
    if (url) {
        return {
            dialect: 'postgres',
            connectionString: url.replace(/^postgres:\/\//, 'postgresql://'),
        };
    }

    return {
        dialect: 'sqlite',
        filename: env.SQLITE_PATH?.trim() || DEFAULT_SQLITE_PATH,
    };
}

function createDialect(config: DatabaseConfig): Dialect {
    if (config.dialect === 'postgres') {
        return new PostgresDialect({
            pool: new pg.Pool({
                connectionString: config.connectionString,
                max: config.poolSize ?? 10,
            }),
        });
    }

    return new SqliteDialect({
        database: async () => {
            if (config.filename !== ':memory:') {
                mkdirSync(dirname(config.filename), { recursive: true });
            }
            const database = new SQLite(config.filename);
            // SQLite leaves foreign keys off unless asked per connection
            database.pragma('foreign_keys = ON');
            return database;
        },
    });
}

/**
 * Open a new Kysely handle. The caller owns it and must call `destroy()`.
 */
export function createDatabase(config: DatabaseConfig): KyselyDB {
    return new Kysely<DB>({
        dialect: createDialect(config),
        plugins: [new CamelCasePlugin()],
    });
}

/**
 * Scoped acquisition: open the store, bring the schema up to date, run `fn`,
 * and always close the handle, whether `fn` resolves or throws.
 */
export async function withDatabase<T>(
    config: DatabaseConfig,
    fn: (db: KyselyDB) => Promise<T>,
): Promise<T> {
    const db = createDatabase(config);
    try {
        await migrateToLatest(db, config.dialect);
        return await fn(db);
    } finally {
        await db.destroy();
    }
}
