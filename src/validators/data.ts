/**
 * Data-block rules: linked duplicates and shape keys pointing at missing
 * vertex groups. Also the optional default mesh-name cleanup.
 *
 * @module validators/data
 */

import type { SceneObjectT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";
import { issue, type RuleIssue } from "./types.js";

const DEFAULT_MESH_NAME = /^Mesh(\..*)?$/;

export function validateObjectData(store: SceneStore, obj: SceneObjectT): RuleIssue[] {
  if (obj.type !== "MESH" || obj.data === null) return [];
  const mesh = store.getMesh(obj.data);
  if (!mesh) return [];

  const issues: RuleIssue[] = [];

  const users = store.getDataUsers(mesh.name);
  if (users > 1) {
    issues.push(issue("DATA", "WARNING", `Mesh data '${mesh.name}' has ${users} users (linked duplicates)`));
  }

  const groupNames = new Set(obj.vertexGroups.map((g) => g.name));
  for (const key of mesh.shapeKeys) {
    if (key.vertexGroup && !groupNames.has(key.vertexGroup)) {
      issues.push(
        issue("DATA", "ERROR", `Shape key '${key.name}' references missing vertex group '${key.vertexGroup}'`),
      );
    }
  }

  return issues;
}

/**
 * Rename default-named mesh data (`Mesh`, `Mesh.001`, ...) to `<object>_mesh`.
 */
export function fixDefaultMeshName(store: SceneStore, obj: SceneObjectT): boolean {
  if (obj.type !== "MESH" || obj.data === null || !store.getMesh(obj.data)) return false;
  if (!DEFAULT_MESH_NAME.test(obj.data)) return false;

  store.renameData(obj.data, `${obj.name}_mesh`);
  return true;
}
