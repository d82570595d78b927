import { describe, it, expect, vi } from "vitest";
import type { SceneStore } from "../../src/scene/store.js";
import { HostOperationError } from "../../src/utils/errors.js";
import { fixMissingUvs, validateGeometry } from "../../src/validators/geometry.js";
import { meshObject, quadMesh, storeOf, type MeshInput } from "../utils/scene-builders.js";

function resolve(store: SceneStore, name: string) {
  const obj = store.getObject(name);
  if (!obj) throw new Error(`missing ${name}`);
  return obj;
}

function meshStore(mesh: Partial<MeshInput>) {
  return storeOf({ objects: [meshObject("Cube")], meshes: [quadMesh("Cube_data", mesh)] });
}

const messages = (store: SceneStore) => validateGeometry(store, resolve(store, "Cube")).map((i) => i.message);

describe("validateGeometry", () => {
  it("reports a mesh object without data", () => {
    const store = storeOf({ objects: [meshObject("Cube", { data: null })] });
    expect(validateGeometry(store, resolve(store, "Cube"))).toEqual([
      { category: "GEOMETRY", severity: "ERROR", message: "Mesh object has no data." },
    ]);
  });

  it("reports loose vertices without faces or edges", () => {
    expect(messages(meshStore({ vertexCount: 8, edgeCount: 0, polygonCount: 0, uvLayers: [] }))).toEqual([
      "Mesh has 8 vertices but no faces",
      "Mesh has 8 loose vertices (no edges)",
    ]);
  });

  it("reports a faced mesh without UV maps", () => {
    const store = meshStore({ uvLayers: [] });
    expect(validateGeometry(store, resolve(store, "Cube"))).toEqual([
      { category: "GEOMETRY", severity: "ERROR", message: "Mesh has no UV maps" },
    ]);
  });

  it("grades high polygon counts", () => {
    expect(messages(meshStore({ polygonCount: 60000 }))).toEqual(["High poly count: 60,000 faces"]);
    expect(messages(meshStore({ polygonCount: 150000 }))).toEqual([
      "Very high poly count: 150,000 faces (may cause performance issues)",
    ]);
  });

  it("ignores non-mesh objects", () => {
    const store = storeOf({ objects: [{ name: "Cam", type: "CAMERA" }] });
    expect(validateGeometry(store, resolve(store, "Cam"))).toEqual([]);
  });
});

describe("fixMissingUvs", () => {
  it("adds a UV layer and unwraps in EDIT mode", () => {
    const store = meshStore({ uvLayers: [], polygonCount: 6 });
    const cube = resolve(store, "Cube");

    expect(fixMissingUvs(store, cube)).toBe(true);
    expect(store.getMesh("Cube_data")?.uvLayers).toEqual(["UVMap"]);
    expect(store.operationLog).toEqual(["unwrapUv:Cube:66:0.02"]);
    expect(cube.mode).toBe("OBJECT");
    expect(store.getActiveObject()).toBeUndefined();
  });

  it("removes the new layer when the unwrap fails", () => {
    const store = meshStore({ uvLayers: [], polygonCount: 6 });
    vi.spyOn(store, "unwrapUv").mockImplementation(() => {
      throw new HostOperationError("unwrap failed", "unwrapUv", "Cube");
    });

    expect(() => fixMissingUvs(store, resolve(store, "Cube"))).toThrow("unwrap failed");
    expect(store.getMesh("Cube_data")?.uvLayers).toEqual([]);
    expect(resolve(store, "Cube").mode).toBe("OBJECT");
  });

  it("does nothing when UVs exist or the mesh has no faces", () => {
    const mapped = meshStore({});
    expect(fixMissingUvs(mapped, resolve(mapped, "Cube"))).toBe(false);
    const faceless = meshStore({ uvLayers: [], polygonCount: 0 });
    expect(fixMissingUvs(faceless, resolve(faceless, "Cube"))).toBe(false);
  });
});
