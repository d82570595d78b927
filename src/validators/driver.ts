/**
 * Driver rules: validity, self references, unset targets, dependency chains.
 *
 * Repairs remove driver curves; nothing is rewritten in place.
 *
 * @module validators/driver
 */

import type { DriverCurveT, SceneObjectT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";
import { detectDriverChain } from "./cycle-detection.js";
import { formatChain, issue, type RuleIssue } from "./types.js";

function isBlankScripted(curve: DriverCurveT): boolean {
  return curve.driver.type === "SCRIPTED" && curve.driver.expression.trim() === "";
}

function isSelfTarget(obj: SceneObjectT, idType: string, id: string | null): boolean {
  return idType === "OBJECT" && id === obj.name;
}

export function validateDrivers(store: SceneStore, obj: SceneObjectT): RuleIssue[] {
  const curves = obj.animation?.drivers;
  if (!curves) return [];

  const issues: RuleIssue[] = [];

  const chain = detectDriverChain(store, obj);
  if (chain) {
    issues.push(issue("DRIVER_CHAIN", "ERROR", `Driver chain loop detected: ${formatChain(chain)}`));
  }

  for (const curve of curves) {
    const { driver, dataPath } = curve;

    if (!driver.isValid) {
      issues.push(issue("INVALID_DRIVER", "ERROR", `Invalid driver on property '${dataPath}'`));
      continue;
    }

    for (const variable of driver.variables) {
      for (const target of variable.targets) {
        if (isSelfTarget(obj, target.idType, target.id)) {
          issues.push(
            issue("CIRCULAR_DRIVER", "ERROR", `Circular dependency: Driver on '${dataPath}' references itself`),
          );
        } else if (target.id === null) {
          issues.push(
            issue(
              "MISSING_DRIVER_TARGET",
              "ERROR",
              `Driver on '${dataPath}' has missing target in variable '${variable.name}'`,
            ),
          );
        }
      }
    }

    if (isBlankScripted(curve)) {
      issues.push(issue("INVALID_DRIVER", "ERROR", `Empty scripted expression on '${dataPath}'`));
    }
  }

  return issues;
}

function shouldRemove(obj: SceneObjectT, curve: DriverCurveT): boolean {
  if (!curve.driver.isValid || isBlankScripted(curve)) return true;
  return curve.driver.variables.some((v) =>
    v.targets.some((t) => t.id === null || isSelfTarget(obj, t.idType, t.id)),
  );
}

/**
 * Remove invalid, blank scripted, self-referencing and unset-target drivers.
 *
 * @returns Number of driver curves removed
 */
export function fixInvalidDrivers(_store: SceneStore, obj: SceneObjectT): number {
  const animation = obj.animation;
  if (!animation || animation.drivers.length === 0) return 0;

  const kept = animation.drivers.filter((curve) => !shouldRemove(obj, curve));
  const removed = animation.drivers.length - kept.length;
  animation.drivers = kept;
  return removed;
}

/**
 * Break a driver chain at this object: drop its drivers that read from any
 * object in the detected chain. Local only; a cycle closed through objects
 * this one does not read from directly stays in place.
 *
 * @returns Number of driver curves removed
 */
export function fixDriverChains(store: SceneStore, obj: SceneObjectT): number {
  const animation = obj.animation;
  if (!animation) return 0;

  const chain = detectDriverChain(store, obj);
  if (!chain) return 0;

  const members = new Set(chain);
  const kept = animation.drivers.filter(
    (curve) =>
      !curve.driver.variables.some((v) =>
        v.targets.some((t) => t.idType === "OBJECT" && t.id !== null && t.id !== obj.name && members.has(t.id)),
      ),
  );
  const removed = animation.drivers.length - kept.length;
  animation.drivers = kept;
  return removed;
}
