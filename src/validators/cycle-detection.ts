/**
 * Cycle detection over the parent and driver dependency graphs.
 *
 * Both walkers address objects by name and re-resolve through the store on
 * every step; an object that cannot be resolved ends its branch without a
 * cycle.
 *
 * @module validators/cycle-detection
 */

import type { SceneObjectT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";

/**
 * Follow `parent` links from `start`.
 *
 * @returns The minimal cycle (first occurrence of the repeated name through
 * the repeat), or null when the chain ends.
 */
export function detectParentChain(store: SceneStore, start: SceneObjectT): string[] | null {
  const path: string[] = [];
  const seenAt = new Map<string, number>();
  let currentName: string | null = start.name;

  while (currentName !== null) {
    const firstIndex = seenAt.get(currentName);
    if (firstIndex !== undefined) {
      return [...path.slice(firstIndex), currentName];
    }
    const current = store.getObject(currentName);
    if (!current) return null;

    seenAt.set(currentName, path.length);
    path.push(currentName);
    currentName = current.parent;
  }

  return null;
}

/**
 * Names of other objects an object's drivers read from. Only OBJECT targets
 * count; other ID types cannot carry drivers of their own.
 */
export function driverObjectTargets(obj: SceneObjectT): string[] {
  const targets: string[] = [];
  for (const curve of obj.animation?.drivers ?? []) {
    for (const variable of curve.driver.variables) {
      for (const target of variable.targets) {
        if (target.idType === "OBJECT" && target.id !== null && target.id !== obj.name) {
          targets.push(target.id);
        }
      }
    }
  }
  return targets;
}

/**
 * Depth-first walk of driver dependencies from `start`. Each branch carries
 * its own copy of the visited set and path so sibling branches never share
 * cycle state.
 *
 * @returns The first cycle found (first occurrence through the repeat), or null.
 */
export function detectDriverChain(store: SceneStore, start: SceneObjectT): string[] | null {
  const walk = (name: string, visited: ReadonlySet<string>, path: readonly string[]): string[] | null => {
    if (visited.has(name)) {
      return [...path.slice(path.indexOf(name)), name];
    }
    const current = store.getObject(name);
    if (!current) return null;

    const nextVisited = new Set(visited).add(name);
    const nextPath = [...path, name];
    for (const target of driverObjectTargets(current)) {
      const cycle = walk(target, nextVisited, nextPath);
      if (cycle) return cycle;
    }
    return null;
  };

  return walk(start.name, new Set(), []);
}
