import type { SceneObjectT } from "../schemas/scene.js";
import { EntityMissingError, UnsafeStateError } from "../utils/errors.js";
import type { SceneStore } from "./store.js";

/**
 * Run `fn` with `objectName` as the sole selected and active object.
 *
 * The previous selection and active object are restored on every exit path;
 * entities that vanished or left the working set in the meantime are skipped
 * during restore.
 */
export function withOperatingScope<T>(
  store: SceneStore,
  objectName: string,
  fn: (obj: SceneObjectT) => T,
): T {
  const obj = store.getObject(objectName);
  if (!obj) throw new EntityMissingError(`Object '${objectName}' no longer exists`, objectName);
  if (!store.isInWorkingSet(objectName)) {
    throw new UnsafeStateError(`Object '${objectName}' is not in the active view layer`, objectName);
  }

  const previousSelection = store.getSelectedObjects().map((o) => o.name);
  const previousActive = store.getActiveObject()?.name ?? null;

  store.deselectAll();
  store.selectObject(objectName);
  store.setActiveObject(objectName);

  try {
    return fn(obj);
  } finally {
    store.deselectAll();
    for (const name of previousSelection) {
      if (store.isInWorkingSet(name)) store.selectObject(name);
    }
    store.setActiveObject(previousActive !== null && store.isInWorkingSet(previousActive) ? previousActive : null);
  }
}

/**
 * Switch an object to `mode`, run `fn`, and switch back to OBJECT mode.
 * Must be called inside an operating scope for non-OBJECT modes.
 */
export function withMode<T>(
  store: SceneStore,
  objectName: string,
  mode: "EDIT" | "WEIGHT_PAINT",
  fn: () => T,
): T {
  store.setMode(objectName, mode);
  try {
    return fn();
  } finally {
    if (store.hasObject(objectName)) store.setMode(objectName, "OBJECT");
  }
}

/**
 * Best-effort switch to OBJECT mode. Returns false when the host refuses.
 */
export function ensureObjectMode(store: SceneStore, objectName: string): boolean {
  const obj = store.getObject(objectName);
  if (!obj) return false;
  if (obj.mode === "OBJECT") return true;
  try {
    store.setMode(objectName, "OBJECT");
    return true;
  } catch (error) {
    if (error instanceof UnsafeStateError || error instanceof EntityMissingError) return false;
    throw error;
  }
}
