/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * Scene snapshots can carry absolute texture paths from artist machines;
 * those are redacted along with the usual auth headers.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.authorization",

  // Common header names
  "*.headers.authorization",
  '*.headers["x-api-key"]',
  "*.headers.cookie",

  // Host file-system locations
  "*.filepath",
  "*.absolutePath",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
