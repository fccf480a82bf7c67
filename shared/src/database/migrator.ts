/**
 * Schema migrations
 *
 * Migrations are kept in code (not read from a folder) so the same list runs
 * from the server, the CLI and the tests without any file-system lookup.
 */

import { Migrator } from 'kysely';
import type { Migration, MigrationProvider, MigrationResult } from 'kysely';
import type { DatabaseDialect, KyselyDB } from './createKysely.js';
import { initialSchema } from './migrations/001_initial.js';

class InlineMigrationProvider implements MigrationProvider {
    constructor(private readonly dialect: DatabaseDialect) {}

    async getMigrations(): Promise<Record<string, Migration>> {
        return {
            '001_initial': initialSchema(this.dialect),
        };
    }
}

/**
 * Bring the schema up to date. Already-applied migrations are skipped.
 *
 * @returns The migrations executed by this call
 */
export async function migrateToLatest(
    db: KyselyDB,
    dialect: DatabaseDialect,
): Promise<MigrationResult[]> {
    const migrator = new Migrator({
        db,
        provider: new InlineMigrationProvider(dialect),
    });

    const { error, results } = await migrator.migrateToLatest();
    if (error) {
        throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
    }
    return results ?? [];
}
