/**
 * Modifier rules
 *
 * One case per modifier type. Each case yields at most one verdict: the
 * issue to report and the remedy auto-fix applies for it.
 *
 * @module validators/modifier
 */

import type { InteractionModeT, ModifierT, SceneObjectT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";
import { issue, type RuleIssue } from "./types.js";

type Remedy = "disable-object-offset" | "remove" | "none";

interface ModifierVerdict {
  issue: RuleIssue;
  remedy: Remedy;
}

const MODE_LABELS: Record<InteractionModeT, string> = {
  OBJECT: "Object Mode",
  EDIT: "Edit Mode",
  WEIGHT_PAINT: "Weight Paint Mode",
  SCULPT: "Sculpt Mode",
  POSE: "Pose Mode",
};

/**
 * Verdict for a required object reference: unset, or set to a name the
 * store no longer resolves.
 */
function requireReference(
  store: SceneStore,
  target: string | null,
  unset: string,
  missing: string,
): ModifierVerdict | null {
  if (target === null) return { issue: issue("BROKEN_MODIFIER", "ERROR", unset), remedy: "remove" };
  if (!store.hasObject(target)) return { issue: issue("BROKEN_MODIFIER", "ERROR", missing), remedy: "remove" };
  return null;
}

export function inspectModifier(store: SceneStore, mod: ModifierT): ModifierVerdict | null {
  switch (mod.type) {
    case "ARRAY": {
      if (!mod.useObjectOffset) return null;
      if (mod.offsetObject === null) {
        return {
          issue: issue("BROKEN_MODIFIER", "WARNING", `Array modifier '${mod.name}' has Object Offset enabled but no object set`),
          remedy: "disable-object-offset",
        };
      }
      if (!store.hasObject(mod.offsetObject)) {
        return {
          issue: issue("BROKEN_MODIFIER", "WARNING", `Array modifier '${mod.name}' offset object is missing`),
          remedy: "disable-object-offset",
        };
      }
      return null;
    }

    case "BOOLEAN":
      return requireReference(
        store,
        mod.object,
        `Boolean modifier '${mod.name}' has no target object`,
        `Boolean modifier '${mod.name}' target object is missing`,
      );

    case "SHRINKWRAP":
      return requireReference(
        store,
        mod.target,
        `Shrinkwrap modifier '${mod.name}' has no target`,
        `Shrinkwrap modifier '${mod.name}' target object is missing`,
      );

    case "ARMATURE":
      return requireReference(
        store,
        mod.object,
        `Armature modifier '${mod.name}' has no armature object`,
        `Armature modifier '${mod.name}' armature object is missing`,
      );

    case "DATA_TRANSFER":
      return requireReference(
        store,
        mod.object,
        `Data Transfer modifier '${mod.name}' has no source object`,
        `Data Transfer modifier '${mod.name}' source object is missing`,
      );

    case "SURFACE_DEFORM": {
      if (!mod.isBound) {
        return {
          issue: issue(
            "UNBOUND_MODIFIER",
            "ERROR",
            `Surface Deform modifier '${mod.name}' is not bound - bind it or remove it to prevent crashes`,
          ),
          remedy: "remove",
        };
      }
      const target = mod.target !== null ? store.getObject(mod.target) : undefined;
      if (target && target.mode !== "OBJECT") {
        return {
          issue: issue(
            "UNSTABLE_MODIFIER",
            "ERROR",
            `Surface Deform target '${target.name}' is in ${MODE_LABELS[target.mode]} - this is unstable`,
          ),
          // The binding is valid; the target just has to leave its mode
          remedy: "none",
        };
      }
      return null;
    }

    case "SUBSURF":
    case "MIRROR":
    case "BEVEL":
    case "SOLIDIFY":
    case "DECIMATE":
    case "WEIGHTED_NORMAL":
    case "TRIANGULATE":
      return null;

    default: {
      const unhandled: never = mod;
      return unhandled;
    }
  }
}

export function validateModifiers(store: SceneStore, obj: SceneObjectT): RuleIssue[] {
  const issues: RuleIssue[] = [];
  for (const mod of obj.modifiers) {
    const verdict = inspectModifier(store, mod);
    if (verdict) issues.push(verdict.issue);
  }
  return issues;
}

/**
 * Disable dangling Array object offsets; remove modifiers whose required
 * reference is gone and unbound Surface Deform modifiers.
 *
 * @returns Number of modifiers changed or removed
 */
export function fixBrokenModifiers(store: SceneStore, obj: SceneObjectT): number {
  let fixed = 0;
  const kept: ModifierT[] = [];

  for (const mod of [...obj.modifiers]) {
    const verdict = inspectModifier(store, mod);
    switch (verdict?.remedy) {
      case "disable-object-offset":
        if (mod.type === "ARRAY") mod.useObjectOffset = false;
        kept.push(mod);
        fixed++;
        break;
      case "remove":
        fixed++;
        break;
      default:
        kept.push(mod);
    }
  }

  obj.modifiers = kept;
  return fixed;
}
