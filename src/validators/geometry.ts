/**
 * Geometry rules for mesh objects: faceless and edgeless meshes, missing UV
 * maps, polygon budget. The UV repair adds a layer and runs a smart unwrap.
 *
 * @module validators/geometry
 */

import { config } from "../config/index.js";
import type { SceneObjectT } from "../schemas/scene.js";
import { ensureObjectMode, withMode, withOperatingScope } from "../scene/operating-scope.js";
import type { SceneStore } from "../scene/store.js";
import { issue, type RuleIssue } from "./types.js";

export const DEFAULT_UV_LAYER = "UVMap";

const formatCount = (n: number): string => n.toLocaleString("en-US");

export function validateGeometry(store: SceneStore, obj: SceneObjectT): RuleIssue[] {
  if (obj.type !== "MESH") return [];

  const mesh = obj.data !== null ? store.getMesh(obj.data) : undefined;
  if (!mesh) return [issue("GEOMETRY", "ERROR", "Mesh object has no data.")];

  const issues: RuleIssue[] = [];
  const { vertexCount, edgeCount, polygonCount } = mesh;

  if (polygonCount === 0 && vertexCount > 0) {
    issues.push(issue("GEOMETRY", "WARNING", `Mesh has ${vertexCount} vertices but no faces`));
  }
  if (edgeCount === 0 && vertexCount > 0) {
    issues.push(issue("GEOMETRY", "WARNING", `Mesh has ${vertexCount} loose vertices (no edges)`));
  }
  if (mesh.uvLayers.length === 0 && polygonCount > 0) {
    issues.push(issue("GEOMETRY", "ERROR", "Mesh has no UV maps"));
  }

  if (polygonCount > config.scan.polyCountHigh) {
    issues.push(
      issue(
        "GEOMETRY",
        "WARNING",
        `Very high poly count: ${formatCount(polygonCount)} faces (may cause performance issues)`,
      ),
    );
  } else if (polygonCount > config.scan.polyCountWarn) {
    issues.push(issue("GEOMETRY", "WARNING", `High poly count: ${formatCount(polygonCount)} faces`));
  }

  return issues;
}

/**
 * Give a faced mesh without UV maps a default layer and unwrap it.
 * The layer is dropped again when the unwrap fails.
 */
export function fixMissingUvs(store: SceneStore, obj: SceneObjectT): boolean {
  if (obj.type !== "MESH" || obj.data === null) return false;
  const mesh = store.getMesh(obj.data);
  if (!mesh || mesh.uvLayers.length > 0 || mesh.polygonCount === 0) return false;
  if (!store.isInWorkingSet(obj.name)) return false;

  const active = store.getActiveObject();
  if (active && active.mode !== "OBJECT") ensureObjectMode(store, active.name);
  ensureObjectMode(store, obj.name);

  withOperatingScope(store, obj.name, () => {
    mesh.uvLayers.push(DEFAULT_UV_LAYER);
    try {
      withMode(store, obj.name, "EDIT", () =>
        store.unwrapUv(obj.name, {
          angleLimit: config.repair.uvAngleLimit,
          islandMargin: config.repair.uvIslandMargin,
        }),
      );
    } catch (error) {
      mesh.uvLayers = mesh.uvLayers.filter((layer) => layer !== DEFAULT_UV_LAYER);
      throw error;
    }
  });
  return true;
}
