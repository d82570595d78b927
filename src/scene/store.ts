import type {
  ArmatureDataT,
  CurveDataT,
  ImageT,
  InteractionModeT,
  MaterialT,
  MeshDataT,
  SceneObjectT,
  SceneSnapshotT,
} from "../schemas/scene.js";

/**
 * Which objects an operation covers: the whole scene or one collection.
 */
export type ObjectScope = { kind: "scene" } | { kind: "collection"; name: string };

export const SCENE_SCOPE: ObjectScope = { kind: "scene" };

export type DataBlock = MeshDataT | CurveDataT | ArmatureDataT;

export interface ApplyTransformOptions {
  scale: boolean;
  rotation: boolean;
}

export interface UnwrapOptions {
  /** Angle limit in degrees */
  angleLimit: number;
  islandMargin: number;
}

/**
 * Scene Store
 *
 * Read/write access to the host scene graph. Entities are addressed by name
 * and every lookup returns the live record or undefined when the entity no
 * longer exists; callers re-resolve by name before each use and never hold
 * records across a mutation of the collection they came from.
 *
 * Bulk operations (applyTransform, unwrapUv, normalizeVertexGroups, packImage)
 * throw UnsafeStateError when their preconditions (mode, selection, single
 * user data) are not met, and HostOperationError when the host itself fails.
 */
export interface SceneStore {
  readonly sceneName: string;

  // Objects
  /** Throws ScopeNotFoundError for an unknown collection */
  listObjects(scope?: ObjectScope): SceneObjectT[];
  getObject(name: string): SceneObjectT | undefined;
  hasObject(name: string): boolean;

  // Selection and interaction state
  getActiveObject(): SceneObjectT | undefined;
  setActiveObject(name: string | null): void;
  getSelectedObjects(): SceneObjectT[];
  deselectAll(): void;
  selectObject(name: string, selected?: boolean): void;
  isInWorkingSet(name: string): boolean;
  setMode(objectName: string, mode: InteractionModeT): void;

  // Data blocks
  getMesh(name: string): MeshDataT | undefined;
  getArmature(name: string): ArmatureDataT | undefined;
  getDataUsers(dataName: string): number;
  /** Duplicate a data block under a fresh unique name; returns that name */
  copyData(dataName: string): string;
  /** Point an object at another data block */
  linkData(objectName: string, dataName: string): void;
  /** Release a data block that has no users; returns false when it is still used or absent */
  removeData(dataName: string): boolean;
  /** Rename a data block (uniquified); returns the name actually given */
  renameData(dataName: string, newName: string): string;

  // Materials and images
  getMaterial(name: string): MaterialT | undefined;
  hasMaterial(name: string): boolean;
  /** Create an empty node-based material; the name is uniquified when taken */
  createMaterial(name: string): MaterialT;
  getImage(name: string): ImageT | undefined;
  packImage(name: string): void;
  fileExists(path: string): boolean;

  // Host bulk operations
  applyTransform(objectName: string, options: ApplyTransformOptions): void;
  unwrapUv(objectName: string, options: UnwrapOptions): void;
  normalizeVertexGroups(objectName: string): void;
  /** Bring derived state (indices, user counts) up to date */
  refresh(): void;
  /** Release orphaned temporary data; returns how many blocks were freed */
  collectGarbage(): number;

  toSnapshot(): SceneSnapshotT;
}
