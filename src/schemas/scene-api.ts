import { z } from "zod";
import { CATEGORY_GROUP_NAMES } from "../services/findings-summary.js";
import type { ObjectScope } from "../scene/store.js";
import { SceneSnapshot } from "./scene.js";

/**
 * Request bodies for the /v1/scene endpoints
 */

export const SCENE_VALIDATION_SCHEMA = "scene-validation.v1";

export const ScopeInput = z.union([
  z.literal("scene"),
  z.object({ collection: z.string().min(1) }),
]);

export const SceneRequest = z.object({
  scene: SceneSnapshot,
  scope: ScopeInput.optional(),
  exclusions: z.union([z.string(), z.array(z.string())]).optional(),
  groups: z.array(z.enum(CATEGORY_GROUP_NAMES)).optional(),
});

export const AutoFixRequestBody = SceneRequest.extend({
  options: z
    .object({
      batch_size: z.number().int().positive().max(500).optional(),
      pause_ms: z.number().int().nonnegative().max(5000).optional(),
      rename_default_mesh_data: z.boolean().optional(),
    })
    .optional(),
});

export type ScopeInputT = z.infer<typeof ScopeInput>;
export type SceneRequestT = z.infer<typeof SceneRequest>;
export type AutoFixRequestBodyT = z.infer<typeof AutoFixRequestBody>;

export function toObjectScope(input: ScopeInputT | undefined): ObjectScope {
  if (input === undefined || input === "scene") return { kind: "scene" };
  return { kind: "collection", name: input.collection };
}
