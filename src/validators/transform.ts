/**
 * Transform rules: unapplied scale, non-uniform scale, unapplied rotation.
 *
 * Scale bake-in is instance aware. Every object sharing the data block that
 * also carries unapplied scale is baked on its own single-user copy, then all
 * baked instances are re-linked to one block and the leftovers released.
 *
 * @module validators/transform
 */

import { config } from "../config/index.js";
import type { ObjectTypeT, SceneObjectT, Vec3T } from "../schemas/scene.js";
import { ensureObjectMode, withOperatingScope } from "../scene/operating-scope.js";
import type { SceneStore } from "../scene/store.js";
import { SceneAuditError, describeError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import { issue, type RuleIssue } from "./types.js";

/** Object types whose data can take a baked scale */
export const SCALE_APPLICABLE_TYPES: ReadonlySet<ObjectTypeT> = new Set(["MESH", "CURVE", "SURFACE", "META", "FONT"]);

function formatVec(v: Vec3T): string {
  return `(${v.x.toFixed(3)}, ${v.y.toFixed(3)}, ${v.z.toFixed(3)})`;
}

export function hasUnappliedScale(scale: Vec3T, tolerance = config.scan.transformTolerance): boolean {
  return (
    Math.abs(scale.x - 1) > tolerance ||
    Math.abs(scale.y - 1) > tolerance ||
    Math.abs(scale.z - 1) > tolerance
  );
}

export function hasNonUniformScale(scale: Vec3T, tolerance = config.scan.transformTolerance): boolean {
  return Math.abs(scale.x - scale.y) > tolerance || Math.abs(scale.x - scale.z) > tolerance;
}

export function hasUnappliedRotation(rotation: Vec3T, tolerance = config.scan.transformTolerance): boolean {
  return Math.abs(rotation.x) > tolerance || Math.abs(rotation.y) > tolerance || Math.abs(rotation.z) > tolerance;
}

export function validateTransforms(_store: SceneStore, obj: SceneObjectT): RuleIssue[] {
  const issues: RuleIssue[] = [];

  if (hasUnappliedScale(obj.scale)) {
    issues.push(issue("TRANSFORM", "WARNING", `Unapplied scale: ${formatVec(obj.scale)}`));
  }
  if (hasNonUniformScale(obj.scale)) {
    issues.push(issue("TRANSFORM", "WARNING", `Non-uniform scale: ${formatVec(obj.scale)}`));
  }
  if (obj.type === "MESH" && hasUnappliedRotation(obj.rotation)) {
    issues.push(issue("TRANSFORM", "WARNING", "Unapplied rotation detected"));
  }

  return issues;
}

/**
 * Put the active object (if any) and the target back into OBJECT mode.
 * Best effort: applyTransform itself refuses when this did not work.
 */
function neutralizeModes(store: SceneStore, objectName: string): void {
  const active = store.getActiveObject();
  if (active && active.mode !== "OBJECT") ensureObjectMode(store, active.name);
  ensureObjectMode(store, objectName);
}

/**
 * Bake one object's transform inside an operating scope, first giving it a
 * single-user copy of its data when the data is shared.
 */
function bakeTransform(store: SceneStore, objectName: string, options: { scale: boolean; rotation: boolean }): void {
  withOperatingScope(store, objectName, (target) => {
    if (target.data !== null && store.getDataUsers(target.data) > 1) {
      store.linkData(objectName, store.copyData(target.data));
    }
    store.applyTransform(objectName, options);
  });
}

/**
 * Re-link baked instances to one data block. The block that kept the
 * original name is preferred as master; blocks left without users go.
 */
function restoreInstancing(store: SceneStore, baked: string[], originalData: string): void {
  const holders = baked.map((name) => store.getObject(name)).filter((o): o is SceneObjectT => o !== undefined);
  const master = holders.find((o) => o.data === originalData)?.data ?? holders[0]?.data ?? null;
  if (master === null) return;

  for (const instance of holders) {
    const previous = instance.data;
    if (previous === master) continue;
    store.linkData(instance.name, master);
    if (previous !== null && store.getDataUsers(previous) === 0) {
      store.removeData(previous);
    }
  }
  store.collectGarbage();
}

/**
 * Apply scale to `obj` and to every instance sharing its data that also has
 * unapplied scale, then restore instancing.
 *
 * When `eligible` is given, sharers outside it are left alone: they keep the
 * original data block and their scale.
 *
 * @returns Number of objects baked
 */
export function fixUnappliedScale(store: SceneStore, obj: SceneObjectT, eligible?: ReadonlySet<string>): number {
  if (!hasUnappliedScale(obj.scale) || !SCALE_APPLICABLE_TYPES.has(obj.type)) return 0;

  const originalData = obj.data;
  const group =
    originalData === null
      ? [obj.name]
      : store
          .listObjects()
          .filter((o) => o.name === obj.name || eligible === undefined || eligible.has(o.name))
          .filter((o) => o.type === obj.type && o.data === originalData && hasUnappliedScale(o.scale))
          .map((o) => o.name);

  const baked: string[] = [];
  let lastError: SceneAuditError | null = null;

  for (const name of group) {
    store.refresh();
    if (!store.hasObject(name)) continue;
    if (!store.isInWorkingSet(name)) {
      log.debug({ object: name }, "Skipping scale bake, object not in view layer");
      continue;
    }

    neutralizeModes(store, name);
    try {
      bakeTransform(store, name, { scale: true, rotation: false });
      baked.push(name);
    } catch (error) {
      if (!(error instanceof SceneAuditError)) throw error;
      lastError = error;
      log.warn({ object: name, error: describeError(error) }, "Failed to apply scale");
    }
  }

  if (baked.length === 0 && lastError !== null) throw lastError;

  if (originalData !== null && baked.length > 1) {
    restoreInstancing(store, baked, originalData);
  }

  return baked.length;
}

/**
 * Apply rotation to a mesh object, on a single-user copy of its data when shared.
 *
 * @returns 1 when baked, 0 when nothing to do
 */
export function fixUnappliedRotation(store: SceneStore, obj: SceneObjectT): number {
  if (obj.type !== "MESH" || !hasUnappliedRotation(obj.rotation)) return 0;
  if (!store.isInWorkingSet(obj.name)) return 0;

  neutralizeModes(store, obj.name);
  store.refresh();
  bakeTransform(store, obj.name, { scale: false, rotation: true });
  return 1;
}
