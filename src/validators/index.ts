/**
 * Rule modules in scan order.
 *
 * @module validators
 */

import type { SceneObjectT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";
import { validateDependencies } from "./circular-dependency.js";
import { validateObjectData } from "./data.js";
import { validateDrivers } from "./driver.js";
import { validateGeometry } from "./geometry.js";
import { validateModifiers } from "./modifier.js";
import { validateVertexGroups } from "./rigging.js";
import { validateTransforms } from "./transform.js";
import type { RuleIssue } from "./types.js";

export type ObjectRule = (store: SceneStore, obj: SceneObjectT) => RuleIssue[];

/** Per-object rules, run for every scanned object in this order */
export const OBJECT_RULES: ReadonlyArray<{ name: string; validate: ObjectRule }> = [
  { name: "transform", validate: validateTransforms },
  { name: "data", validate: validateObjectData },
  { name: "driver", validate: validateDrivers },
  { name: "modifier", validate: validateModifiers },
  { name: "geometry", validate: validateGeometry },
  { name: "rigging", validate: validateVertexGroups },
  { name: "circular-dependency", validate: validateDependencies },
];

export * from "./types.js";
export * from "./cycle-detection.js";
export * from "./transform.js";
export * from "./material.js";
export * from "./textures.js";
export * from "./driver.js";
export * from "./modifier.js";
export * from "./geometry.js";
export * from "./rigging.js";
export * from "./data.js";
export * from "./circular-dependency.js";
