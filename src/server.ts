// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { sceneRoutes } from "./routes/v1.scene.js";
import { SERVICE_VERSION } from "./version.js";
import { getRequestId, REQUEST_ID_HEADER, resolveRequestId } from "./utils/request-id.js";
import { toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { config, isProduction } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";

const SERVICE_NAME = "scene-audit-service";

export function resolveAllowedOrigins(): string[] | boolean {
  const origins = config.server.allowedOrigins;
  if (!origins || origins.length === 0) {
    // No allowlist: same-origin only outside development
    return config.server.nodeEnv === "development";
  }
  if (isProduction() && origins.includes("*")) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }
  return origins;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build() {
  const app = Fastify({
    logger: createLoggerConfig(config.testing.isVitest ? "silent" : config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    genReqId: (req) => resolveRequestId(req.headers),
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  // Pure JSON API: CSP and cross-origin isolation headers are not relevant
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error({
        error,
        request_id: errorV1.request_id,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      app.log.warn({
        request_id: errorV1.request_id,
        code: errorV1.code,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
  }));

  await sceneRoutes(app);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info({
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
        exclusion_patterns: config.scan.exclusionPatterns,
        transform_batch_size: config.repair.transformBatchSize,
      }, "Scene audit service starting");

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
