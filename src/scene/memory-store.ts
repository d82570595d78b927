import {
  SceneSnapshot,
  type ArmatureDataT,
  type CurveDataT,
  type ImageT,
  type InteractionModeT,
  type MaterialT,
  type MeshDataT,
  type ObjectTypeT,
  type SceneObjectT,
  type SceneSnapshotT,
  type Vec3T,
} from "../schemas/scene.js";
import {
  EntityMissingError,
  HostOperationError,
  ScopeNotFoundError,
  UnsafeStateError,
} from "../utils/errors.js";
import {
  SCENE_SCOPE,
  type ApplyTransformOptions,
  type DataBlock,
  type ObjectScope,
  type SceneStore,
  type UnwrapOptions,
} from "./store.js";
import { uniqueName } from "./naming.js";

const EDIT_CAPABLE: ReadonlySet<ObjectTypeT> = new Set(["MESH", "CURVE", "SURFACE", "FONT", "META", "ARMATURE"]);

function scaleVec(v: Vec3T, s: Vec3T): Vec3T {
  return { x: v.x * s.x, y: v.y * s.y, z: v.z * s.z };
}

/** Euler XYZ: rotate about X, then Y, then Z */
function rotateVec(v: Vec3T, r: Vec3T): Vec3T {
  const [cx, sx] = [Math.cos(r.x), Math.sin(r.x)];
  const [cy, sy] = [Math.cos(r.y), Math.sin(r.y)];
  const [cz, sz] = [Math.cos(r.z), Math.sin(r.z)];

  const x1 = v.x;
  const y1 = v.y * cx - v.z * sx;
  const z1 = v.y * sx + v.z * cx;

  const x2 = x1 * cy + z1 * sy;
  const y2 = y1;
  const z2 = -x1 * sy + z1 * cy;

  return { x: x2 * cz - y2 * sz, y: x2 * sz + y2 * cz, z: z2 };
}

function renameKey<V extends { name: string }>(map: Map<string, V>, from: string, to: string): Map<string, V> {
  return new Map([...map.values()].map((value) => {
    if (value.name === from) value.name = to;
    return [value.name, value] as const;
  }));
}

/**
 * In-memory Scene Store backed by a validated snapshot.
 *
 * Host bulk operations are deterministic: transform bake-in multiplies stored
 * vertex positions, weight normalization rescales per-vertex weights, image
 * packing requires the file to be listed in the snapshot's `files`.
 */
export class InMemorySceneStore implements SceneStore {
  readonly sceneName: string;

  /** Host bulk operations in call order, e.g. `applyTransform:Cube` */
  readonly operationLog: string[] = [];

  private objects: SceneObjectT[];
  private objectIndex = new Map<string, SceneObjectT>();
  private meshes: Map<string, MeshDataT>;
  private curves: Map<string, CurveDataT>;
  private armatures: Map<string, ArmatureDataT>;
  private materials: Map<string, MaterialT>;
  private images: Map<string, ImageT>;
  private collections: Set<string>;
  private files: Set<string>;
  private activeName: string | null;
  private temporaryData = new Set<string>();
  private refreshes = 0;

  private constructor(snapshot: SceneSnapshotT) {
    this.sceneName = snapshot.name;
    this.objects = snapshot.objects;
    this.meshes = new Map(snapshot.meshes.map((m) => [m.name, m]));
    this.curves = new Map(snapshot.curves.map((c) => [c.name, c]));
    this.armatures = new Map(snapshot.armatures.map((a) => [a.name, a]));
    this.materials = new Map(snapshot.materials.map((m) => [m.name, m]));
    this.images = new Map(snapshot.images.map((i) => [i.name, i]));
    this.collections = new Set([...snapshot.collections, ...snapshot.objects.flatMap((o) => o.collections)]);
    this.files = new Set(snapshot.files);
    this.rebuildIndex();
    this.activeName = snapshot.activeObject !== null && this.objectIndex.has(snapshot.activeObject)
      ? snapshot.activeObject
      : null;
  }

  /**
   * Validate a raw snapshot (throws ZodError) and load it.
   */
  static fromSnapshot(input: unknown): InMemorySceneStore {
    return new InMemorySceneStore(SceneSnapshot.parse(input));
  }

  /** Number of refresh() calls so far */
  get refreshCount(): number {
    return this.refreshes;
  }

  // ---------------------------------------------------------------------------
  // Objects
  // ---------------------------------------------------------------------------

  listObjects(scope: ObjectScope = SCENE_SCOPE): SceneObjectT[] {
    if (scope.kind === "scene") return [...this.objects];
    if (!this.collections.has(scope.name)) {
      throw new ScopeNotFoundError(`Collection '${scope.name}' not found`);
    }
    return this.objects.filter((o) => o.collections.includes(scope.name));
  }

  getObject(name: string): SceneObjectT | undefined {
    return this.objectIndex.get(name);
  }

  hasObject(name: string): boolean {
    return this.objectIndex.has(name);
  }

  /**
   * Delete an object the way an outside actor would. References held by other
   * entities are left dangling.
   */
  removeObject(name: string): boolean {
    const before = this.objects.length;
    this.objects = this.objects.filter((o) => o.name !== name);
    this.objectIndex.delete(name);
    if (this.activeName === name) this.activeName = null;
    return this.objects.length < before;
  }

  // ---------------------------------------------------------------------------
  // Selection and interaction state
  // ---------------------------------------------------------------------------

  getActiveObject(): SceneObjectT | undefined {
    return this.activeName === null ? undefined : this.objectIndex.get(this.activeName);
  }

  setActiveObject(name: string | null): void {
    if (name === null) {
      this.activeName = null;
      return;
    }
    this.requireInWorkingSet(name, "setActiveObject");
    this.activeName = name;
  }

  getSelectedObjects(): SceneObjectT[] {
    return this.objects.filter((o) => o.selected);
  }

  deselectAll(): void {
    for (const obj of this.objects) obj.selected = false;
  }

  selectObject(name: string, selected = true): void {
    this.requireInWorkingSet(name, "selectObject").selected = selected;
  }

  isInWorkingSet(name: string): boolean {
    return this.objectIndex.get(name)?.inViewLayer ?? false;
  }

  setMode(objectName: string, mode: InteractionModeT): void {
    const obj = this.requireInWorkingSet(objectName, "setMode");
    if (obj.mode === mode) return;

    if (mode !== "OBJECT") {
      if (this.activeName !== objectName) {
        throw new UnsafeStateError(`Cannot enter ${mode} mode: '${objectName}' is not the active object`, objectName);
      }
      const supported =
        mode === "EDIT" ? EDIT_CAPABLE.has(obj.type)
        : mode === "POSE" ? obj.type === "ARMATURE"
        : obj.type === "MESH";
      if (!supported) {
        throw new UnsafeStateError(`${obj.type} object '${objectName}' has no ${mode} mode`, objectName);
      }
    }
    obj.mode = mode;
  }

  // ---------------------------------------------------------------------------
  // Data blocks
  // ---------------------------------------------------------------------------

  getMesh(name: string): MeshDataT | undefined {
    return this.meshes.get(name);
  }

  getArmature(name: string): ArmatureDataT | undefined {
    return this.armatures.get(name);
  }

  getDataUsers(dataName: string): number {
    return this.objects.filter((o) => o.data === dataName).length;
  }

  copyData(dataName: string): string {
    const copyName = uniqueName(dataName, (n) => this.dataNameTaken(n));
    const mesh = this.meshes.get(dataName);
    const curve = this.curves.get(dataName);
    const armature = this.armatures.get(dataName);
    if (mesh) this.meshes.set(copyName, { ...structuredClone(mesh), name: copyName });
    else if (curve) this.curves.set(copyName, { ...structuredClone(curve), name: copyName });
    else if (armature) this.armatures.set(copyName, { ...structuredClone(armature), name: copyName });
    else throw new EntityMissingError(`Data block '${dataName}' not found`, dataName);

    this.temporaryData.add(copyName);
    return copyName;
  }

  linkData(objectName: string, dataName: string): void {
    const obj = this.requireObject(objectName, "linkData");
    if (!this.dataNameTaken(dataName)) {
      throw new EntityMissingError(`Data block '${dataName}' not found`, dataName);
    }
    obj.data = dataName;
  }

  removeData(dataName: string): boolean {
    if (this.getDataUsers(dataName) > 0) return false;
    const removed =
      this.meshes.delete(dataName) || this.curves.delete(dataName) || this.armatures.delete(dataName);
    this.temporaryData.delete(dataName);
    return removed;
  }

  renameData(dataName: string, newName: string): string {
    if (!this.dataNameTaken(dataName)) {
      throw new EntityMissingError(`Data block '${dataName}' not found`, dataName);
    }
    if (dataName === newName) return newName;

    const finalName = uniqueName(newName, (n) => this.dataNameTaken(n));
    this.meshes = renameKey(this.meshes, dataName, finalName);
    this.curves = renameKey(this.curves, dataName, finalName);
    this.armatures = renameKey(this.armatures, dataName, finalName);
    for (const obj of this.objects) {
      if (obj.data === dataName) obj.data = finalName;
    }
    if (this.temporaryData.delete(dataName)) this.temporaryData.add(finalName);
    return finalName;
  }

  // ---------------------------------------------------------------------------
  // Materials and images
  // ---------------------------------------------------------------------------

  getMaterial(name: string): MaterialT | undefined {
    return this.materials.get(name);
  }

  hasMaterial(name: string): boolean {
    return this.materials.has(name);
  }

  createMaterial(name: string): MaterialT {
    const material: MaterialT = {
      name: uniqueName(name, (n) => this.materials.has(n)),
      useNodes: false,
      nodeTree: null,
    };
    this.materials.set(material.name, material);
    return material;
  }

  getImage(name: string): ImageT | undefined {
    return this.images.get(name);
  }

  packImage(name: string): void {
    const image = this.images.get(name);
    if (!image) throw new EntityMissingError(`Image '${name}' not found`, name);
    if (image.packed) return;
    if (image.source !== "FILE") {
      throw new HostOperationError(`Image '${name}' is not file-backed`, "packImage", name);
    }
    if (!this.fileExists(image.filepath)) {
      throw new HostOperationError(`Image '${name}' file not found`, "packImage", name);
    }
    image.packed = true;
    image.hasData = true;
    this.operationLog.push(`packImage:${name}`);
  }

  fileExists(path: string): boolean {
    return path.length > 0 && this.files.has(path);
  }

  // ---------------------------------------------------------------------------
  // Host bulk operations
  // ---------------------------------------------------------------------------

  applyTransform(objectName: string, options: ApplyTransformOptions): void {
    const obj = this.requireObject(objectName, "applyTransform");
    if (obj.mode !== "OBJECT") {
      throw new UnsafeStateError(`Cannot apply transform to '${objectName}' in ${obj.mode} mode`, objectName);
    }
    const selected = this.getSelectedObjects();
    if (this.activeName !== objectName || selected.length !== 1 || selected[0] !== obj) {
      throw new UnsafeStateError(`'${objectName}' must be the only selected and active object`, objectName);
    }

    if (obj.data !== null) {
      const block = this.getDataBlock(obj.data);
      if (!block) throw new EntityMissingError(`Data block '${obj.data}' not found`, obj.data);
      if (this.getDataUsers(obj.data) > 1) {
        throw new UnsafeStateError(`Cannot apply transform to multi-user data '${obj.data}'`, objectName);
      }
      if ("positions" in block && block.positions !== undefined) {
        block.positions = block.positions.map((p) => {
          const scaled = options.scale ? scaleVec(p, obj.scale) : p;
          return options.rotation ? rotateVec(scaled, obj.rotation) : scaled;
        });
      }
    }

    if (options.scale) obj.scale = { x: 1, y: 1, z: 1 };
    if (options.rotation) obj.rotation = { x: 0, y: 0, z: 0 };
    this.operationLog.push(`applyTransform:${objectName}`);
  }

  unwrapUv(objectName: string, options: UnwrapOptions): void {
    const obj = this.requireInWorkingSet(objectName, "unwrapUv");
    if (obj.mode !== "EDIT") {
      throw new UnsafeStateError(`UV unwrap on '${objectName}' requires EDIT mode`, objectName);
    }
    const mesh = obj.type === "MESH" && obj.data !== null ? this.meshes.get(obj.data) : undefined;
    if (!mesh) throw new HostOperationError(`'${objectName}' has no mesh to unwrap`, "unwrapUv", objectName);
    if (mesh.uvLayers.length === 0) {
      throw new HostOperationError(`'${objectName}' has no UV layer to unwrap into`, "unwrapUv", objectName);
    }
    this.operationLog.push(`unwrapUv:${objectName}:${options.angleLimit}:${options.islandMargin}`);
  }

  normalizeVertexGroups(objectName: string): void {
    const obj = this.requireObject(objectName, "normalizeVertexGroups");
    if (obj.mode !== "WEIGHT_PAINT") {
      throw new UnsafeStateError(`Weight normalization on '${objectName}' requires WEIGHT_PAINT mode`, objectName);
    }

    const totals = new Map<number, number>();
    for (const group of obj.vertexGroups) {
      for (const w of group.weights) totals.set(w.index, (totals.get(w.index) ?? 0) + w.weight);
    }
    for (const group of obj.vertexGroups) {
      for (const w of group.weights) {
        const total = totals.get(w.index) ?? 0;
        if (total > 0) w.weight = w.weight / total;
      }
    }
    this.operationLog.push(`normalizeVertexGroups:${objectName}`);
  }

  refresh(): void {
    this.rebuildIndex();
    this.refreshes++;
  }

  collectGarbage(): number {
    let freed = 0;
    for (const name of [...this.temporaryData]) {
      if (!this.dataNameTaken(name)) {
        this.temporaryData.delete(name);
      } else if (this.removeData(name)) {
        freed++;
      }
    }
    return freed;
  }

  toSnapshot(): SceneSnapshotT {
    return structuredClone({
      name: this.sceneName,
      objects: this.objects,
      meshes: [...this.meshes.values()],
      curves: [...this.curves.values()],
      armatures: [...this.armatures.values()],
      materials: [...this.materials.values()],
      images: [...this.images.values()],
      collections: [...this.collections],
      files: [...this.files],
      activeObject: this.activeName,
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private rebuildIndex(): void {
    this.objectIndex = new Map(this.objects.map((o) => [o.name, o]));
  }

  private getDataBlock(name: string): DataBlock | undefined {
    return this.meshes.get(name) ?? this.curves.get(name) ?? this.armatures.get(name);
  }

  private dataNameTaken(name: string): boolean {
    return this.meshes.has(name) || this.curves.has(name) || this.armatures.has(name);
  }

  private requireObject(name: string, operation: string): SceneObjectT {
    const obj = this.objectIndex.get(name);
    if (!obj) throw new EntityMissingError(`${operation}: object '${name}' not found`, name);
    return obj;
  }

  private requireInWorkingSet(name: string, operation: string): SceneObjectT {
    const obj = this.requireObject(name, operation);
    if (!obj.inViewLayer) {
      throw new UnsafeStateError(`${operation}: object '${name}' is not in the active view layer`, name);
    }
    return obj;
  }
}
