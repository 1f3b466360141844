/**
 * Centralized Environment Variable Validation
 *
 * Validates the process environment once at startup with Zod and exits
 * with a readable list of problems when it does not parse.
 *
 * USAGE:
 * - `import { env } from './config/env.js'`
 * - Only the entry point reads `env`; services take their settings as
 *   constructor options so tests never go through here.
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add a JSDoc comment explaining the variable
 */

// Load dotenv FIRST - ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // CORE
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(3001),

    /** Pino level override (defaults to debug in development, info in production) */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // ----------------------------------------
    // STORAGE
    // ----------------------------------------

    /** Document store backend. `memory` keeps everything in-process */
    STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),

    /** PostgreSQL connection string, required for the postgres driver */
    DATABASE_URL: z.string().optional(),

    // ----------------------------------------
    // SYNC
    // ----------------------------------------

    /** Minutes between catalog marker checks */
    CATALOG_SYNC_INTERVAL_MINUTES: z.coerce.number().positive().default(5),

    /** Delay before the first catalog marker check */
    CATALOG_SYNC_STARTUP_DELAY_MS: z.coerce.number().int().nonnegative().default(30_000),

    /** Upper bound on a single write to the POS mirror */
    POS_WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    /** Minutes between sync outbox reconciliation runs */
    OUTBOX_RECONCILE_INTERVAL_MINUTES: z.coerce.number().positive().default(2),

    // ----------------------------------------
    // FEATURE FLAGS
    // ----------------------------------------

    /** Disable background workers (useful when several instances share a database) */
    DISABLE_BACKGROUND_WORKERS: z.enum(['true', 'false']).default('false'),
}).superRefine((value, ctx) => {
    if (value.STORE_DRIVER === 'postgres' && !value.DATABASE_URL) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['DATABASE_URL'],
            message: 'DATABASE_URL is required when STORE_DRIVER is postgres',
        });
    }
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

function parseEnv(): Env {
    try {
        return envSchema.parse(process.env);
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

export const env = parseEnv();
