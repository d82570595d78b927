/**
 * Validation Runner
 *
 * The three user-level commands over a Scene Store: validate, fix broken
 * shaders, and auto-fix with a residual rescan.
 */

import { config } from "../config/index.js";
import { SCENE_SCOPE, type ObjectScope, type SceneStore } from "../scene/store.js";
import { describeError } from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import type { Finding } from "../validators/types.js";
import {
  countBySeverity,
  filterByGroups,
  formatFixSummary,
  summarizeFindings,
  type CategoryGroup,
  type FindingsSummary,
  type FixResults,
} from "./findings-summary.js";
import { autoFixAll, fixBrokenShaders } from "./repair-orchestrator.js";
import { RunContext, type FixCounters, type ProgressUpdate, type StepFailure } from "./run-context.js";
import { parseExclusionPatterns, scanObjects } from "./scan-aggregator.js";

export interface RunRequest {
  scope?: ObjectScope;
  /** Comma-separated string or list; defaults to the configured patterns */
  exclusions?: string | readonly string[];
  /** Restrict reported findings to these category groups */
  groups?: readonly CategoryGroup[];
}

export interface AutoFixRequest extends RunRequest {
  batchSize?: number;
  pauseMs?: number;
  renameDefaultMeshData?: boolean;
  onProgress?: (update: ProgressUpdate) => void;
}

export interface ValidateOutcome {
  findings: Finding[];
  summary: FindingsSummary;
  message: string;
}

export interface FixShadersOutcome extends ValidateOutcome {
  materialsFixed: number;
  fixMessage: string;
}

export interface AutoFixOutcome extends ValidateOutcome {
  status: "completed" | "cancelled";
  results: FixResults | null;
  counters: FixCounters;
  progress: ProgressUpdate[];
  failures: StepFailure[];
  fixSummary: string | null;
}

export function scopeLabel(scope: ObjectScope): string {
  return scope.kind === "scene" ? "Scene" : `Collection '${scope.name}'`;
}

function resolvePatterns(request: RunRequest): string[] {
  return parseExclusionPatterns(request.exclusions ?? config.scan.exclusionPatterns);
}

function report(findings: Finding[], groups: RunRequest["groups"]): Pick<ValidateOutcome, "findings" | "summary"> {
  const visible = filterByGroups(findings, groups);
  return { findings: visible, summary: summarizeFindings(visible) };
}

function remainingMessage(findings: readonly Finding[], scopeName: string): string {
  if (findings.length === 0) return `${scopeName} is now clean!`;
  const { errors, warnings } = countBySeverity(findings);
  return `Remaining: ${errors} errors, ${warnings} warnings`;
}

/**
 * Scan the scope and describe what was found.
 */
export function runValidate(store: SceneStore, request: RunRequest = {}): ValidateOutcome {
  const scope = request.scope ?? SCENE_SCOPE;
  const scopeName = scopeLabel(scope);
  const findings = scanObjects(store, store.listObjects(scope), resolvePatterns(request));

  const { errors, warnings } = countBySeverity(findings);
  const message =
    findings.length === 0 ? `${scopeName} is clean.` : `Found ${errors} errors, ${warnings} warnings in ${scopeName}.`;

  return { ...report(findings, request.groups), message };
}

/**
 * Rebuild broken materials in scope, then rescan.
 */
export function runFixShaders(store: SceneStore, request: RunRequest = {}): FixShadersOutcome {
  const scope = request.scope ?? SCENE_SCOPE;
  const scopeName = scopeLabel(scope);
  const patterns = resolvePatterns(request);

  const materialsFixed = fixBrokenShaders(store, store.listObjects(scope), patterns);
  const findings = scanObjects(store, store.listObjects(scope), patterns);

  return {
    ...report(findings, request.groups),
    materialsFixed,
    fixMessage: `Fixed ${materialsFixed} materials.`,
    message: remainingMessage(findings, scopeName),
  };
}

/**
 * Switch the active object to OBJECT mode before fixing.
 * Returns the refusal reason, or null when the store is ready.
 */
function prepareObjectMode(store: SceneStore): string | null {
  const active = store.getActiveObject();
  if (!active || active.mode === "OBJECT") return null;
  try {
    store.setMode(active.name, "OBJECT");
    return null;
  } catch (error) {
    return describeError(error);
  }
}

/**
 * Full auto-fix: progress milestones, both repair phases, residual rescan.
 * The run context's processing flag is cleared on every exit path.
 */
export async function runAutoFix(store: SceneStore, request: AutoFixRequest = {}): Promise<AutoFixOutcome> {
  const ctx = new RunContext(request.onProgress);
  const scope = request.scope ?? SCENE_SCOPE;
  const scopeName = scopeLabel(scope);
  const patterns = resolvePatterns(request);

  ctx.begin();
  try {
    const refusal = prepareObjectMode(store);
    if (refusal !== null) {
      emit(TelemetryEvents.AutoFixCancelled, { reason: refusal });
      return {
        status: "cancelled",
        results: null,
        counters: ctx.counters,
        progress: [...ctx.history],
        failures: [...ctx.failures],
        fixSummary: null,
        findings: [],
        summary: summarizeFindings([]),
        message: `Cannot switch to OBJECT mode: ${refusal}. Please switch manually.`,
      };
    }

    ctx.advance("scanning");
    const objects = store.listObjects(scope);
    log.info({ scope: scopeName, objects: objects.length }, "Auto-fix running");

    ctx.advance("fixing");
    const results = await autoFixAll(store, objects, {
      exclusionPatterns: patterns,
      batchSize: request.batchSize,
      pauseMs: request.pauseMs,
      renameDefaultMeshData: request.renameDefaultMeshData,
      context: ctx,
    });

    ctx.advance("rescanning");
    const fixSummary = formatFixSummary(results, scopeName);

    ctx.advance("updating");
    const findings = scanObjects(store, store.listObjects(scope), patterns);
    const { errors, warnings } = countBySeverity(findings);
    const message =
      findings.length === 0
        ? `${scopeName} is now clean!`
        : errors > 0
          ? `Remaining: ${errors} errors, ${warnings} warnings (may need manual fixing)`
          : `Remaining: ${warnings} warnings (non-critical)`;

    ctx.advance("complete");

    return {
      status: "completed",
      results,
      counters: ctx.counters,
      progress: [...ctx.history],
      failures: [...ctx.failures],
      fixSummary,
      ...report(findings, request.groups),
      message,
    };
  } finally {
    ctx.finish();
  }
}
