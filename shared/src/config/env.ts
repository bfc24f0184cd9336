/**
 * Centralized Environment Configuration
 *
 * This module is the SINGLE SOURCE OF TRUTH for all environment variables.
 * All environment variable access MUST go through this module.
 *
 * Features:
 * - Zod schema validation with type safety
 * - Default values for every setting
 * - Cross-field validation (background threshold must not exceed the fresh window)
 *
 * Usage:
 *   import { CACHE_FRESH_WINDOW_MS, TASK_API_BASE_URL } from '@taskdesk/shared';
 *
 * DO NOT use process.env directly elsewhere in the codebase.
 */

import { z } from 'zod';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Helper to parse optional boolean env vars with default
 */
const optionalBoolean = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', ''])
    .optional()
    .transform((val) => (val === undefined || val === '' ? defaultValue : val === 'true'));

/**
 * Helper to parse integer env vars with default
 */
const integerWithDefault = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : defaultValue))
    .refine((val) => !isNaN(val), { message: 'Must be a valid integer' })
    .refine((val) => val >= 0, { message: 'Must not be negative' });

/**
 * Helper for optional string with default
 */
const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Main environment configuration schema
 */
const envSchema = z
  .object({
    // -------------------------------------------------------------------------
    // Node Environment
    // -------------------------------------------------------------------------
    NODE_ENV: optionalString('development'),

    // -------------------------------------------------------------------------
    // Logging
    // -------------------------------------------------------------------------
    LOG_LEVEL: z
      .enum(['debug', 'info', 'warn', 'error', ''])
      .optional()
      .transform((val): LogLevel => (val ? val : 'info')),

    // -------------------------------------------------------------------------
    // Task API (remote data source)
    // -------------------------------------------------------------------------
    TASK_API_BASE_URL: optionalString('http://localhost:3000').pipe(z.string().url()),
    TASK_API_TIMEOUT_MS: integerWithDefault(15000),
    TASK_API_TASKS_LIMIT: integerWithDefault(100),
    TASK_API_MATTERS_LIMIT: integerWithDefault(50),
    TASK_API_NOTES_LIMIT: integerWithDefault(50),
    TASK_API_SESSIONS_LIMIT: integerWithDefault(20),

    // -------------------------------------------------------------------------
    // Cache Coordinator
    // -------------------------------------------------------------------------
    CACHE_FRESH_WINDOW_MS: integerWithDefault(300000), // 5 minutes
    CACHE_BACKGROUND_THRESHOLD_MS: integerWithDefault(60000), // 1 minute
    CACHE_SINGLE_FLIGHT: optionalBoolean(false),
  })
  .refine((env) => env.CACHE_BACKGROUND_THRESHOLD_MS <= env.CACHE_FRESH_WINDOW_MS, {
    message: 'CACHE_BACKGROUND_THRESHOLD_MS must not exceed CACHE_FRESH_WINDOW_MS',
    path: ['CACHE_BACKGROUND_THRESHOLD_MS'],
  });

export type Env = z.infer<typeof envSchema>;

export type EnvParseResult =
  | { success: true; env: Env }
  | { success: false; errors: string[] };

/**
 * Validate an environment-like record. Exported so tests can exercise the
 * schema without touching process.env.
 */
export function parseEnv(source: Record<string, string | undefined>): EnvParseResult {
  const result = envSchema.safeParse(source);
  if (result.success) {
    return { success: true, env: result.data };
  }
  return {
    success: false,
    errors: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
}

// =============================================================================
// PARSE AND VALIDATE
// =============================================================================

const parseResult = parseEnv(process.env);

if (!parseResult.success) {
  console.error('Environment validation failed:');
  for (const error of parseResult.errors) {
    console.error(`  ${error}`);
  }
  if (process.env.NODE_ENV === 'production') {
    throw new Error('Invalid environment configuration');
  }
}

// Invalid values in development fall back to schema defaults
const parsedEnv: Env = parseResult.success ? parseResult.env : defaultEnv();

function defaultEnv(): Env {
  const fallback = parseEnv({});
  if (!fallback.success) {
    throw new Error(`Default environment is invalid: ${fallback.errors.join('; ')}`);
  }
  return fallback.env;
}

// =============================================================================
// EXPORTED CONFIGURATION VALUES
// =============================================================================

// Node Environment
export const NODE_ENV = parsedEnv.NODE_ENV;

// Logging
export const LOG_LEVEL: LogLevel = parsedEnv.LOG_LEVEL;

// Task API
export const TASK_API_BASE_URL = parsedEnv.TASK_API_BASE_URL;
export const TASK_API_TIMEOUT_MS = parsedEnv.TASK_API_TIMEOUT_MS;
export const TASK_API_TASKS_LIMIT = parsedEnv.TASK_API_TASKS_LIMIT;
export const TASK_API_MATTERS_LIMIT = parsedEnv.TASK_API_MATTERS_LIMIT;
export const TASK_API_NOTES_LIMIT = parsedEnv.TASK_API_NOTES_LIMIT;
export const TASK_API_SESSIONS_LIMIT = parsedEnv.TASK_API_SESSIONS_LIMIT;

// Cache Coordinator
export const CACHE_FRESH_WINDOW_MS = parsedEnv.CACHE_FRESH_WINDOW_MS;
export const CACHE_BACKGROUND_THRESHOLD_MS = parsedEnv.CACHE_BACKGROUND_THRESHOLD_MS;
export const CACHE_SINGLE_FLIGHT = parsedEnv.CACHE_SINGLE_FLIGHT;

export const isProduction = (): boolean => NODE_ENV === 'production';
export const isTest = (): boolean => NODE_ENV === 'test';
