import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { InMemorySceneStore } from "../../src/scene/memory-store.js";
import { uniqueName } from "../../src/scene/naming.js";
import {
  EntityMissingError,
  HostOperationError,
  ScopeNotFoundError,
  UnsafeStateError,
} from "../../src/utils/errors.js";
import { meshObject, quadMesh, storeOf } from "../utils/scene-builders.js";

describe("InMemorySceneStore.fromSnapshot", () => {
  it("rejects duplicate object names", () => {
    expect(() =>
      InMemorySceneStore.fromSnapshot({ objects: [{ name: "A", type: "EMPTY" }, { name: "A", type: "EMPTY" }] }),
    ).toThrow(ZodError);
  });

  it("rejects a data name shared by a mesh and an armature", () => {
    expect(() =>
      InMemorySceneStore.fromSnapshot({ meshes: [{ name: "Data" }], armatures: [{ name: "Data" }] }),
    ).toThrow(ZodError);
  });

  it("drops an active object name that does not resolve", () => {
    const store = storeOf({ objects: [{ name: "A", type: "EMPTY" }], activeObject: "Ghost" });
    expect(store.getActiveObject()).toBeUndefined();
  });
});

describe("listObjects", () => {
  const store = storeOf({
    objects: [
      { name: "Chair", type: "EMPTY", collections: ["Props"] },
      { name: "Floor", type: "EMPTY" },
    ],
    collections: ["Lights"],
  });

  it("lists the whole scene by default", () => {
    expect(store.listObjects().map((o) => o.name)).toEqual(["Chair", "Floor"]);
  });

  it("lists members of a collection", () => {
    expect(store.listObjects({ kind: "collection", name: "Props" }).map((o) => o.name)).toEqual(["Chair"]);
  });

  it("accepts a declared collection without members", () => {
    expect(store.listObjects({ kind: "collection", name: "Lights" })).toEqual([]);
  });

  it("throws ScopeNotFoundError for an unknown collection", () => {
    expect(() => store.listObjects({ kind: "collection", name: "Nope" })).toThrow(ScopeNotFoundError);
  });
});

describe("setMode", () => {
  it("requires the object to be active for non-OBJECT modes", () => {
    const store = storeOf({ objects: [meshObject("Cube")], meshes: [quadMesh("Cube_data")] });
    expect(() => store.setMode("Cube", "EDIT")).toThrow(UnsafeStateError);
  });

  it("refuses modes the object type does not have", () => {
    const store = storeOf({ objects: [{ name: "Null", type: "EMPTY" }], activeObject: "Null" });
    expect(() => store.setMode("Null", "EDIT")).toThrow("EMPTY object 'Null' has no EDIT mode");
  });

  it("refuses objects outside the view layer", () => {
    const store = storeOf({ objects: [meshObject("Hidden", { inViewLayer: false, mode: "EDIT" })] });
    expect(() => store.setMode("Hidden", "OBJECT")).toThrow(UnsafeStateError);
  });

  it("enters and leaves EDIT mode on the active mesh", () => {
    const store = storeOf({ objects: [meshObject("Cube")], meshes: [quadMesh("Cube_data")], activeObject: "Cube" });
    store.setMode("Cube", "EDIT");
    expect(store.getObject("Cube")?.mode).toBe("EDIT");
    store.setMode("Cube", "OBJECT");
    expect(store.getObject("Cube")?.mode).toBe("OBJECT");
  });
});

describe("data blocks", () => {
  it("copies data under a numbered name and collects it once unused", () => {
    const store = storeOf({ objects: [meshObject("Cube")], meshes: [quadMesh("Cube_data")] });

    const copy = store.copyData("Cube_data");
    expect(copy).toBe("Cube_data.001");
    expect(store.getMesh(copy)?.polygonCount).toBe(1);

    expect(store.collectGarbage()).toBe(1);
    expect(store.getMesh(copy)).toBeUndefined();
    expect(store.getMesh("Cube_data")).toBeDefined();
  });

  it("keeps a copy that gained a user", () => {
    const store = storeOf({ objects: [meshObject("Cube")], meshes: [quadMesh("Cube_data")] });
    const copy = store.copyData("Cube_data");
    store.linkData("Cube", copy);

    expect(store.collectGarbage()).toBe(0);
    expect(store.getObject("Cube")?.data).toBe("Cube_data.001");
  });

  it("throws EntityMissingError when copying unknown data", () => {
    const store = storeOf({});
    expect(() => store.copyData("Nope")).toThrow(EntityMissingError);
  });

  it("does not remove data that still has users", () => {
    const store = storeOf({ objects: [meshObject("Cube")], meshes: [quadMesh("Cube_data")] });
    expect(store.removeData("Cube_data")).toBe(false);
  });

  it("renames data and updates every user", () => {
    const store = storeOf({
      objects: [meshObject("A", { data: "Mesh" }), meshObject("B", { data: "Mesh" })],
      meshes: [quadMesh("Mesh"), quadMesh("A_mesh")],
    });

    expect(store.renameData("Mesh", "A_mesh")).toBe("A_mesh.001");
    expect(store.getObject("A")?.data).toBe("A_mesh.001");
    expect(store.getObject("B")?.data).toBe("A_mesh.001");
    expect(store.getMesh("Mesh")).toBeUndefined();
  });
});

describe("host operations", () => {
  it("refuses applyTransform unless the object is the sole selected and active object", () => {
    const store = storeOf({
      objects: [meshObject("Cube", { scale: { x: 2, y: 2, z: 2 } })],
      meshes: [quadMesh("Cube_data")],
    });
    expect(() => store.applyTransform("Cube", { scale: true, rotation: false })).toThrow(
      "'Cube' must be the only selected and active object",
    );
  });

  it("refuses applyTransform on multi-user data", () => {
    const store = storeOf({
      objects: [meshObject("A", { data: "Shared", selected: true }), meshObject("B", { data: "Shared" })],
      meshes: [quadMesh("Shared")],
      activeObject: "A",
    });
    expect(() => store.applyTransform("A", { scale: true, rotation: false })).toThrow(
      "Cannot apply transform to multi-user data 'Shared'",
    );
  });

  it("packs a file-backed image whose file exists", () => {
    const store = storeOf({
      images: [{ name: "wood", filepath: "textures/wood.png" }],
      files: ["textures/wood.png"],
    });
    store.packImage("wood");
    expect(store.getImage("wood")?.packed).toBe(true);
    expect(store.operationLog).toEqual(["packImage:wood"]);
  });

  it("fails to pack an image whose file is gone", () => {
    const store = storeOf({ images: [{ name: "wood", filepath: "textures/wood.png" }] });
    expect(() => store.packImage("wood")).toThrow(HostOperationError);
  });

  it("counts refreshes", () => {
    const store = storeOf({});
    store.refresh();
    store.refresh();
    expect(store.refreshCount).toBe(2);
  });
});

describe("toSnapshot", () => {
  it("returns a detached copy", () => {
    const store = storeOf({ objects: [meshObject("Cube")], meshes: [quadMesh("Cube_data")] });
    const snapshot = store.toSnapshot();
    snapshot.objects[0].name = "Renamed";

    expect(store.getObject("Cube")).toBeDefined();
    expect(snapshot.meshes).toEqual([
      { name: "Cube_data", vertexCount: 4, edgeCount: 4, polygonCount: 1, uvLayers: ["UVMap"], shapeKeys: [] },
    ]);
  });
});

describe("uniqueName", () => {
  it("returns the base name when free", () => {
    expect(uniqueName("Body", () => false)).toBe("Body");
  });

  it("numbers from the stem of an already numbered name", () => {
    const taken = new Set(["Body", "Body.001", "Body.002"]);
    expect(uniqueName("Body.001", (n) => taken.has(n))).toBe("Body.003");
  });
});
