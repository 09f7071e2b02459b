/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Application Configuration Schema
// =============================================================================

/**
 * Application configuration schema
 */
export const AppConfigSchema = z.object({
  /** SQLite file holding the local cache, or ":memory:" */
  databasePath: z.string().min(1),

  /** Base URL of the remote stats provider */
  apiBaseUrl: z.string().url().default("https://pogoapi.net/api/v1"),

  /** Per-request timeout for provider calls */
  requestTimeoutMs: z.coerce.number().int().positive().default(30000),

  /** Directory holding the announcement .txt templates */
  templatesDir: z.string().min(1),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Shape accepted from config.json; every field is optional there.
 */
export const AppConfigFileSchema = AppConfigSchema.partial();

export type AppConfigFile = z.infer<typeof AppConfigFileSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
