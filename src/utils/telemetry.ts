import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/path redaction
 *
 * Redaction paths centralized in src/utils/logger-config.ts so that the
 * Fastify logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || (env.VITEST ? "silent" : "info")));

export type Event = Record<string, unknown>;

/**
 * Test sink for capturing telemetry events in tests.
 * Only usable when NODE_ENV=test or under vitest.
 */
let testSink: ((eventName: string, data: Event) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: Event) => void) | null): void {
  // Direct env check avoids a circular import with the config module
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names.
 * Dashboards key off these; rename only together with them.
 */
export const TelemetryEvents = {
  ScanStarted: "scene_audit.scan.started",
  ScanCompleted: "scene_audit.scan.completed",

  AutoFixStarted: "scene_audit.autofix.started",
  AutoFixBatchCompleted: "scene_audit.autofix.batch_completed",
  AutoFixCompleted: "scene_audit.autofix.completed",
  AutoFixCancelled: "scene_audit.autofix.cancelled",
  AutoFixStepFailed: "scene_audit.autofix.step_failed",

  ShaderFixCompleted: "scene_audit.fix_shaders.completed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "scene_audit.",
    globalTags: {
      service: env.DD_SERVICE || "scene-audit-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function numberField(data: Event, key: string): number | undefined {
  const value = data[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Emit telemetry event (logs + Datadog metrics)
 *
 * @param event Event name (use TelemetryEvents)
 * @param data Event data
 */
export function emit(event: TelemetryEventName, data: Event): void {
  if (testSink) {
    testSink(event, data);
  }

  log.info({ event, ...data });

  if (!datadogClient) return;

  try {
    switch (event) {
      case TelemetryEvents.ScanCompleted: {
        const durationMs = numberField(data, "duration_ms");
        if (durationMs !== undefined) datadogClient.histogram("scan.duration_ms", durationMs);
        const errors = numberField(data, "error_count");
        if (errors !== undefined) datadogClient.gauge("scan.errors", errors);
        const warnings = numberField(data, "warning_count");
        if (warnings !== undefined) datadogClient.gauge("scan.warnings", warnings);
        break;
      }
      case TelemetryEvents.AutoFixCompleted: {
        const durationMs = numberField(data, "duration_ms");
        if (durationMs !== undefined) datadogClient.histogram("autofix.duration_ms", durationMs);
        const total = numberField(data, "total_fixed");
        if (total !== undefined) datadogClient.increment("autofix.fixed", total);
        break;
      }
      case TelemetryEvents.AutoFixStepFailed: {
        datadogClient.increment("autofix.step_failed", 1, {
          step: String(data.step ?? "unknown"),
        });
        break;
      }
      case TelemetryEvents.AutoFixCancelled: {
        datadogClient.increment("autofix.cancelled", 1);
        break;
      }
      default:
        datadogClient.increment(event.replace("scene_audit.", ""), 1);
    }
  } catch (error) {
    log.warn({ error, event }, "Failed to send metrics to Datadog");
  }
}
