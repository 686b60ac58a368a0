/**
 * @nestlock/demo — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Manager
  MANAGER_ID: z.string().min(1).default("manager"),
  MAX_DEPTH: z.coerce.number().int().min(1).default(64),

  // Scenario defaults
  DEFAULT_DECIMALS: z.coerce.number().int().min(0).max(18).default(0),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
