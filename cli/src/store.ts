/**
 * Store access for commands
 *
 * Each command opens the store, migrates it, does its work and closes it.
 * Failures print one line and set a non-zero exit code; nothing is thrown
 * back into commander.
 */

import dotenv from 'dotenv';
import { ZodError } from 'zod';
import { resolveDatabaseConfig, withDatabase } from '@batchkeep/shared/database';
import type { KyselyDB } from '@batchkeep/shared/database';
import { isInventoryError } from '@batchkeep/shared/errors';
import { error } from './format.js';

dotenv.config();

/**
 * One-line description of a failure for the terminal
 */
export function describeFailure(err: unknown): string {
  if (isInventoryError(err)) {
    return `${err.message} [${err.code}]`;
  }
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

export async function withStore(fn: (db: KyselyDB) => Promise<void>): Promise<void> {
  try {
    await withDatabase(resolveDatabaseConfig(process.env), fn);
  } catch (err) {
    error(describeFailure(err));
    process.exitCode = 1;
  }
}
