/**
 * Batched Repair Orchestrator
 *
 * Auto-fix runs in two phases. Transforms are baked store-wide first, in
 * fixed-size batches with a refresh, garbage collection and a short pause at
 * every batch boundary. Object-level fixes follow in a single pass. Every
 * step is fault-isolated: a failure is recorded on the run context and the
 * remaining steps for that object still run.
 */

import { config } from "../config/index.js";
import type { SceneObjectT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";
import { describeError } from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import {
  fixBrokenModifiers,
  fixDefaultMeshName,
  fixDisconnectedOutput,
  fixDriverChains,
  fixEmptySlots,
  fixInvalidDrivers,
  fixMissingUvs,
  fixParentLoop,
  fixUnappliedRotation,
  fixUnappliedScale,
  fixVertexGroups,
  isMarkerMaterial,
  isMaterialBroken,
  markBrokenMaterial,
  packExternalTextures,
  rebuildMaterial,
  replaceDeprecatedNodes,
  type VertexGroupFixResult,
} from "../validators/index.js";
import { countersFromResults, emptyFixResults, totalFixed, type FixResults } from "./findings-summary.js";
import { RunContext } from "./run-context.js";
import { isExcluded, MATERIAL_BEARING_TYPES } from "./scan-aggregator.js";

export interface AutoFixOptions {
  exclusionPatterns: readonly string[];
  /** Objects per transform batch */
  batchSize?: number;
  /** Pause after each transform batch, in milliseconds */
  pauseMs?: number;
  /** Rename `Mesh` / `Mesh.NNN` data to `<object>_mesh` */
  renameDefaultMeshData?: boolean;
  context?: RunContext;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run one fix step against a freshly resolved object. Vanished objects are
 * skipped; thrown errors are recorded and count as `fallback`.
 */
function runStep<T>(
  store: SceneStore,
  ctx: RunContext,
  objectName: string,
  step: string,
  fallback: T,
  fn: (obj: SceneObjectT) => T,
): T {
  const obj = store.getObject(objectName);
  if (!obj) return fallback;
  try {
    return fn(obj);
  } catch (error) {
    const message = describeError(error);
    ctx.recordFailure({ objectName, step, message });
    log.warn({ object: objectName, step, error: message }, "Auto-fix step failed");
    emit(TelemetryEvents.AutoFixStepFailed, { object: objectName, step });
    return fallback;
  }
}

/** Dedupe key for instance groups: the data block, or the object itself */
function dataKey(obj: SceneObjectT): string {
  return obj.data ?? `obj:${obj.name}`;
}

async function runTransformPhase(
  store: SceneStore,
  names: readonly string[],
  results: FixResults,
  ctx: RunContext,
  batchSize: number,
  pauseMs: number,
): Promise<void> {
  const processedData = new Set<string>();
  const eligible = new Set(names);
  const totalBatches = Math.ceil(names.length / batchSize);

  if (names.length > config.repair.largeSceneWarnObjects) {
    log.warn({ objects: names.length }, "Large transform batch set, auto-fix may take several minutes");
  }

  for (let start = 0; start < names.length; start += batchSize) {
    const batch = names.slice(start, start + batchSize);
    store.refresh();
    store.collectGarbage();

    for (const name of batch) {
      const obj = store.getObject(name);
      if (!obj) continue;

      const key = dataKey(obj);
      if (!processedData.has(key)) {
        const baked = runStep(store, ctx, name, "scale", 0, (o) => fixUnappliedScale(store, o, eligible));
        if (baked > 0) {
          results.scales_applied += baked;
          processedData.add(key);
          const after = store.getObject(name);
          if (after) processedData.add(dataKey(after));
        }
      }

      results.rotations_applied += runStep(store, ctx, name, "rotation", 0, (o) => fixUnappliedRotation(store, o));
    }

    store.refresh();
    const freed = store.collectGarbage();
    ctx.setCounters(countersFromResults(results));
    emit(TelemetryEvents.AutoFixBatchCompleted, {
      batch: start / batchSize + 1,
      total_batches: totalBatches,
      objects: batch.length,
      scales_applied: results.scales_applied,
      rotations_applied: results.rotations_applied,
      data_blocks_freed: freed,
    });
    await sleep(pauseMs);
  }
}

function runObjectPhase(
  store: SceneStore,
  names: readonly string[],
  results: FixResults,
  ctx: RunContext,
  renameDefaultMeshData: boolean,
): void {
  const processedMaterials = new Set<string>();
  const markedMaterials = new Set<string>();

  for (const name of names) {
    if (!store.hasObject(name)) continue;

    results.empty_slots_fixed += runStep(store, ctx, name, "empty_slots", 0, (o) => fixEmptySlots(o));
    results.drivers_fixed += runStep(store, ctx, name, "drivers", 0, (o) => fixInvalidDrivers(store, o));
    if (runStep(store, ctx, name, "driver_chains", 0, (o) => fixDriverChains(store, o)) > 0) {
      results.driver_chains_fixed++;
    }
    results.modifiers_fixed += runStep(store, ctx, name, "modifiers", 0, (o) => fixBrokenModifiers(store, o));
    if (runStep(store, ctx, name, "uvs", false, (o) => fixMissingUvs(store, o))) {
      results.uvs_generated++;
    }
    if (runStep(store, ctx, name, "parent_loops", false, (o) => fixParentLoop(store, o))) {
      results.parent_loops_fixed++;
    }

    const rigging = runStep<VertexGroupFixResult | null>(store, ctx, name, "vertex_groups", null, (o) => fixVertexGroups(store, o));
    if (rigging) {
      results.vertex_groups_cleaned += rigging.emptyRemoved + rigging.orphanedRemoved;
      results.weights_normalized += rigging.normalized;
    }

    if (renameDefaultMeshData) {
      runStep(store, ctx, name, "mesh_name", false, (o) => fixDefaultMeshName(store, o));
    }

    const obj = store.getObject(name);
    if (obj && MATERIAL_BEARING_TYPES.has(obj.type)) {
      const slots = [...obj.materialSlots];
      slots.forEach((materialName, slotIndex) => {
        if (materialName === null || isMarkerMaterial(materialName)) return;

        // Material-level work happens once per call; marking is per slot
        if (markedMaterials.has(materialName)) {
          runStep(store, ctx, name, "material", false, (o) => markBrokenMaterial(store, o, slotIndex));
          return;
        }
        if (processedMaterials.has(materialName)) return;
        processedMaterials.add(materialName);

        runStep(store, ctx, name, "material", false, (o) => {
          const broken = isMaterialBroken(store, materialName);
          if (broken?.severity === "ERROR") {
            if (markBrokenMaterial(store, o, slotIndex)) {
              markedMaterials.add(materialName);
              results.materials_rebuilt++;
            }
          } else if (broken?.severity === "WARNING") {
            if (fixDisconnectedOutput(store, materialName)) results.disconnected_fixed++;
          }
          results.deprecated_replaced += replaceDeprecatedNodes(store, materialName);
          results.textures_packed += packExternalTextures(store, materialName);
          return true;
        });
      });
    }

    ctx.setCounters(countersFromResults(results));
  }
}

/**
 * Fix everything fixable on the given objects.
 *
 * Transform fixes complete for every eligible object before any
 * object-level fix starts.
 */
export async function autoFixAll(
  store: SceneStore,
  objects: readonly SceneObjectT[],
  options: AutoFixOptions,
): Promise<FixResults> {
  const ctx = options.context ?? new RunContext();
  const batchSize = options.batchSize ?? config.repair.transformBatchSize;
  const pauseMs = options.pauseMs ?? config.repair.transformBatchPauseMs;
  const renameDefaultMeshData = options.renameDefaultMeshData ?? config.repair.renameDefaultMeshData;
  const startedAt = Date.now();

  // Names, not records: every step re-resolves
  const eligible = objects
    .map((o) => o.name)
    .filter((name) => store.hasObject(name) && !isExcluded(name, options.exclusionPatterns));

  emit(TelemetryEvents.AutoFixStarted, { object_count: eligible.length, batch_size: batchSize });

  const results = emptyFixResults();
  await runTransformPhase(store, eligible, results, ctx, batchSize, pauseMs);
  runObjectPhase(store, eligible, results, ctx, renameDefaultMeshData);
  ctx.setCounters(countersFromResults(results));

  emit(TelemetryEvents.AutoFixCompleted, {
    ...results,
    total_fixed: totalFixed(results),
    failures: ctx.failures.length,
    duration_ms: Date.now() - startedAt,
  });

  return results;
}

/**
 * Rebuild every broken material used by in-scope mesh, curve and surface
 * objects, once per material.
 *
 * @returns Number of materials rebuilt
 */
export function fixBrokenShaders(
  store: SceneStore,
  objects: readonly SceneObjectT[],
  exclusionPatterns: readonly string[],
): number {
  const toFix = new Set<string>();

  for (const { name } of objects) {
    if (isExcluded(name, exclusionPatterns)) continue;
    const obj = store.getObject(name);
    if (!obj || !MATERIAL_BEARING_TYPES.has(obj.type)) continue;
    for (const slot of obj.materialSlots) {
      if (slot !== null && store.hasMaterial(slot) && isMaterialBroken(store, slot)) toFix.add(slot);
    }
  }

  let count = 0;
  for (const materialName of toFix) {
    try {
      if (rebuildMaterial(store, materialName)) count++;
    } catch (error) {
      log.warn({ material: materialName, error: describeError(error) }, "Failed to rebuild material");
    }
  }

  emit(TelemetryEvents.ShaderFixCompleted, { materials_fixed: count, candidates: toFix.size });
  return count;
}
