/**
 * Centralized Environment Variable Validation
 *
 * Validates the environment once at startup using Zod.
 * Import `env` for typed access: `import { env } from './config/env.js'`
 *
 * Nothing here is required at import time: tests and the offline CLI run
 * without a database or spreadsheet. Callers that need a connection string or
 * credentials raise a ConfigurationError when the value is missing.
 */

// Load dotenv FIRST - ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const booleanFlag = z.enum(['true', 'false']);

const envSchema = z.object({
    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Pino log level override (e.g. 'silent' in tests) */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // ----------------------------------------
    // DATABASE
    // ----------------------------------------

    /** PostgreSQL connection string */
    DATABASE_URL: z.string().optional(),

    // ----------------------------------------
    // GOOGLE SHEETS
    // ----------------------------------------

    /** URL (or bare ID) of the shipment spreadsheet */
    SHIPMENT_SPREADSHEET_URL: z.string().optional(),

    /** Service account key as a JSON string (CI / hosted) */
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().optional(),

    /** Path to a service account key file (local dev) */
    GOOGLE_SERVICE_ACCOUNT_PATH: z.string().default('config/google-service-account.json'),

    /** Fixed UTC offset of the sheet's business timezone */
    SHEET_TIMEZONE_OFFSET_HOURS: z.coerce.number().int().min(-12).max(14).default(7),

    /** Link attached to the archive annotation text */
    SHEET_ANNOTATION_LINK_URI: z.string().url().optional(),

    // ----------------------------------------
    // BACKGROUND PULL SYNC
    // ----------------------------------------

    /** Run the scheduled pull sync worker */
    ENABLE_SHEET_PULL_SYNC: booleanFlag.default('false'),

    /** Minutes between scheduled pull syncs */
    SHEET_PULL_SYNC_INTERVAL_MINUTES: z.coerce.number().int().positive().default(15),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parse the environment, printing every failing variable and exiting
 * when validation fails.
 */
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
