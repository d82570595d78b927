/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * - Type safety: All config values have proper types
 * - Validation: Invalid configurations fail fast at startup
 * - Testability: Reset with `_resetConfigCache()` after `vi.stubEnv()`
 * - Defaults: Values match the thresholds the rule modules were tuned with
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  // Server Configuration
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(5 * 1024 * 1024),
    allowedOrigins: z
      .string()
      .transform((val) => val.split(",").map((o) => o.trim()).filter((o) => o.length > 0))
      .optional(),
  }),

  // Scan behaviour
  scan: z.object({
    // Comma-separated object name prefixes skipped by scan and fix
    exclusionPatterns: z.string().default("WGT-"),
    transformTolerance: z.coerce.number().positive().default(0.001),
    textureMaxDimension: z.coerce.number().int().positive().default(8192),
    polyCountWarn: z.coerce.number().int().positive().default(50_000),
    polyCountHigh: z.coerce.number().int().positive().default(100_000),
  }),

  // Auto-fix behaviour
  repair: z.object({
    transformBatchSize: z.coerce.number().int().positive().default(15),
    transformBatchPauseMs: z.coerce.number().int().nonnegative().default(50),
    largeSceneWarnObjects: z.coerce.number().int().positive().default(500),
    markerMaterialName: z.string().min(1).default("_BROKEN TO FIX"),
    renameDefaultMeshData: booleanString.default(false),
    uvAngleLimit: z.coerce.number().positive().default(66),
    uvIslandMargin: z.coerce.number().nonnegative().default(0.02),
  }),

  // Testing
  testing: z.object({
    isVitest: booleanString.default(false),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    scan: {
      exclusionPatterns: env.SCENE_EXCLUSION_PATTERNS,
      transformTolerance: env.TRANSFORM_TOLERANCE,
      textureMaxDimension: env.TEXTURE_MAX_DIMENSION,
      polyCountWarn: env.POLY_COUNT_WARN,
      polyCountHigh: env.POLY_COUNT_HIGH,
    },
    repair: {
      transformBatchSize: env.TRANSFORM_BATCH_SIZE,
      transformBatchPauseMs: env.TRANSFORM_BATCH_PAUSE_MS,
      largeSceneWarnObjects: env.LARGE_SCENE_WARN_OBJECTS,
      markerMaterialName: env.MARKER_MATERIAL_NAME,
      renameDefaultMeshData: env.RENAME_DEFAULT_MESH_DATA,
      uvAngleLimit: env.UV_ANGLE_LIMIT,
      uvIslandMargin: env.UV_ISLAND_MARGIN,
    },
    testing: {
      isVitest: env.VITEST,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
        .join("\n");
      throw new Error(`Configuration validation failed:\n${issues}`);
    }
    throw error;
  }
}

/**
 * Cached configuration instance
 *
 * Lazy initialization: config is parsed on first access, not at module load,
 * so tests can stub env vars before the first read.
 *
 * ```
 * import { config } from './config/index.js';
 * const batchSize = config.repair.transformBatchSize;
 * ```
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  // Support Object.keys(), Object.entries(), spread operator
  ownKeys(_target) {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

/**
 * Check if running in production environment
 */
export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}
