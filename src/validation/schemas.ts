/**
 * Zod schemas shared by the logging and settings modules
 */

import { z } from 'zod';

// ========== Log taxonomy ==========

export const processTypeSchema = z.enum(['ui', 'core', 'system', 'speech', 'input']);

export const logStatusSchema = z.enum([
  'failure',
  'success',
  'warning',
  'critical',
  'information',
  'debug'
]);

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/** Levels accepted by logEnhanced, one per convenience function */
export const enhancedLevelSchema = z.enum(['info', 'debug', 'success', 'warning', 'error', 'critical']);

// ========== Settings ==========

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema)
  ])
);

/** A persisted settings document must be a JSON object at the top level */
export const settingsDocumentSchema = z.record(z.string(), jsonValueSchema);
