/**
 * Rigging rules: empty, weightless and orphaned vertex groups.
 *
 * @module validators/rigging
 */

import type { SceneObjectT, VertexGroupT } from "../schemas/scene.js";
import { ensureObjectMode, withMode, withOperatingScope } from "../scene/operating-scope.js";
import type { SceneStore } from "../scene/store.js";
import { SceneAuditError, describeError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import { issue, type RuleIssue } from "./types.js";

export interface VertexGroupFixResult {
  emptyRemoved: number;
  orphanedRemoved: number;
  /** 1 when the weight normalization pass ran */
  normalized: number;
}

function totalWeight(group: VertexGroupT): number {
  return group.weights.reduce((sum, w) => sum + w.weight, 0);
}

/**
 * Bone names of the first Armature modifier that points at an armature
 * object, or null when there is none.
 */
function armatureBones(store: SceneStore, obj: SceneObjectT): Set<string> | null {
  for (const mod of obj.modifiers) {
    if (mod.type !== "ARMATURE" || mod.object === null) continue;
    const rig = store.getObject(mod.object);
    if (!rig || rig.type !== "ARMATURE") return null;
    const armature = rig.data !== null ? store.getArmature(rig.data) : undefined;
    return new Set(armature?.bones ?? []);
  }
  return null;
}

export function validateVertexGroups(store: SceneStore, obj: SceneObjectT): RuleIssue[] {
  if (obj.type !== "MESH" || obj.vertexGroups.length === 0) return [];
  if (obj.data === null || !store.getMesh(obj.data)) return [];

  const issues: RuleIssue[] = [];

  for (const group of obj.vertexGroups) {
    if (group.weights.length === 0) {
      issues.push(issue("RIGGING", "WARNING", `Vertex group '${group.name}' is empty (no vertices assigned)`));
    } else if (totalWeight(group) === 0) {
      issues.push(issue("RIGGING", "WARNING", `Vertex group '${group.name}' has zero total weight`));
    }
  }

  const bones = armatureBones(store, obj);
  if (bones) {
    for (const group of obj.vertexGroups) {
      if (!bones.has(group.name)) {
        issues.push(
          issue("RIGGING", "WARNING", `Orphaned vertex group '${group.name}' (no matching bone in armature)`),
        );
      }
    }
  }

  return issues;
}

/**
 * Remove empty and orphaned groups, then normalize the remaining weights.
 * A failed normalization is logged and leaves `normalized` at 0.
 */
export function fixVertexGroups(store: SceneStore, obj: SceneObjectT): VertexGroupFixResult {
  const result: VertexGroupFixResult = { emptyRemoved: 0, orphanedRemoved: 0, normalized: 0 };
  if (obj.type !== "MESH" || obj.vertexGroups.length === 0) return result;

  const bones = armatureBones(store, obj);
  const kept: VertexGroupT[] = [];

  for (const group of obj.vertexGroups) {
    if (group.weights.length === 0 || totalWeight(group) === 0) {
      result.emptyRemoved++;
    } else if (bones && bones.size > 0 && !bones.has(group.name)) {
      result.orphanedRemoved++;
    } else {
      kept.push(group);
    }
  }
  obj.vertexGroups = kept;

  if (kept.length === 0 || !store.isInWorkingSet(obj.name)) return result;

  try {
    ensureObjectMode(store, obj.name);
    withOperatingScope(store, obj.name, () =>
      withMode(store, obj.name, "WEIGHT_PAINT", () => store.normalizeVertexGroups(obj.name)),
    );
    result.normalized = 1;
  } catch (error) {
    if (!(error instanceof SceneAuditError)) throw error;
    log.warn({ object: obj.name, error: describeError(error) }, "Failed to normalize vertex weights");
  }

  return result;
}
