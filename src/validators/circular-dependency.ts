/**
 * Parent loops and two-object constraint loops.
 *
 * @module validators/circular-dependency
 */

import type { SceneObjectT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";
import { detectParentChain } from "./cycle-detection.js";
import { formatChain, issue, type RuleIssue } from "./types.js";

export function validateDependencies(store: SceneStore, obj: SceneObjectT): RuleIssue[] {
  const issues: RuleIssue[] = [];

  const loop = detectParentChain(store, obj);
  if (loop) {
    issues.push(issue("CIRCULAR_DEPENDENCY", "ERROR", `Parent loop detected: ${formatChain(loop)}`));
  }

  for (const constraint of obj.constraints) {
    if (constraint.target === null) continue;
    const target = store.getObject(constraint.target);
    if (!target) continue;
    if (target.constraints.some((c) => c.target === obj.name)) {
      issues.push(issue("CIRCULAR_DEPENDENCY", "ERROR", `Constraint loop: '${obj.name}' ↔ '${target.name}'`));
    }
  }

  return issues;
}

/**
 * Clear the parent of an object that sits on a parent loop. Objects that
 * only hang off a loop keep their parent.
 */
export function fixParentLoop(store: SceneStore, obj: SceneObjectT): boolean {
  const loop = detectParentChain(store, obj);
  if (!loop?.includes(obj.name)) return false;
  obj.parent = null;
  return true;
}
