/**
 * Centralized Environment Variable Validation
 *
 * This module validates ALL environment variables at startup using Zod.
 * If validation fails, the application will fail fast with clear error messages.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 * - Storage selection goes through `resolveDatabaseConfig(env)` from the shared
 *   database module, never through ad-hoc reads of DATABASE_URL
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

export const envSchema = z.object({
    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(3001),

    /** pino level; defaults to debug in development and info elsewhere */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // ----------------------------------------
    // STORAGE
    // ----------------------------------------

    /** PostgreSQL connection string (hosted). Unset → local SQLite */
    DATABASE_URL: z.string().optional(),

    /** SQLite database file used when DATABASE_URL is unset */
    SQLITE_PATH: z.string().optional(),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parse a raw environment. Throws ZodError on invalid values.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    return envSchema.parse(source);
}

/**
 * Parsed and validated environment variables.
 *
 * Exits the process at startup with one line per failing variable.
 */
function loadEnv(): Env {
    try {
        return parseEnv(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues.map(issue => {
                const path = issue.path.join('.');
                return `  - ${path}: ${issue.message}`;
            }).join('\n');

            console.error('Environment validation failed:\n' + issues);
            process.exit(1);
        }
        throw error;
    }
}

export const env = loadEnv();
