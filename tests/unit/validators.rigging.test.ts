import { describe, it, expect } from "vitest";
import type { SceneStore } from "../../src/scene/store.js";
import { fixVertexGroups, validateVertexGroups } from "../../src/validators/rigging.js";
import { meshObject, quadMesh, storeOf, type ObjectInput } from "../utils/scene-builders.js";

function resolve(store: SceneStore, name: string) {
  const obj = store.getObject(name);
  if (!obj) throw new Error(`missing ${name}`);
  return obj;
}

function riggedBody(overrides: Partial<ObjectInput> = {}) {
  return storeOf({
    objects: [
      meshObject("Body", {
        modifiers: [{ type: "ARMATURE", name: "Armature", object: "Rig" }],
        vertexGroups: [
          { name: "Spine", weights: [{ index: 0, weight: 1 }] },
          { name: "Empty" },
          { name: "Zero", weights: [{ index: 1, weight: 0 }] },
          { name: "Tail", weights: [{ index: 2, weight: 0.5 }] },
        ],
        ...overrides,
      }),
      { name: "Rig", type: "ARMATURE", data: "RigData" },
    ],
    meshes: [quadMesh("Body_data")],
    armatures: [{ name: "RigData", bones: ["Spine"] }],
  });
}

describe("validateVertexGroups", () => {
  it("reports empty, weightless and orphaned groups", () => {
    const store = riggedBody();
    expect(validateVertexGroups(store, resolve(store, "Body")).map((i) => i.message)).toEqual([
      "Vertex group 'Empty' is empty (no vertices assigned)",
      "Vertex group 'Zero' has zero total weight",
      "Orphaned vertex group 'Empty' (no matching bone in armature)",
      "Orphaned vertex group 'Zero' (no matching bone in armature)",
      "Orphaned vertex group 'Tail' (no matching bone in armature)",
    ]);
  });

  it("skips the orphan check without an armature modifier", () => {
    const store = riggedBody({ modifiers: [] });
    expect(validateVertexGroups(store, resolve(store, "Body")).map((i) => i.message)).toEqual([
      "Vertex group 'Empty' is empty (no vertices assigned)",
      "Vertex group 'Zero' has zero total weight",
    ]);
  });

  it("skips the orphan check when the modifier points at a non-armature", () => {
    const store = riggedBody({ modifiers: [{ type: "ARMATURE", name: "Armature", object: "Body" }] });
    expect(validateVertexGroups(store, resolve(store, "Body"))).toHaveLength(2);
  });
});

describe("fixVertexGroups", () => {
  it("removes empty and orphaned groups then normalizes", () => {
    const store = riggedBody();
    const body = resolve(store, "Body");

    expect(fixVertexGroups(store, body)).toEqual({ emptyRemoved: 2, orphanedRemoved: 1, normalized: 1 });
    expect(body.vertexGroups.map((g) => g.name)).toEqual(["Spine"]);
    expect(store.operationLog).toEqual(["normalizeVertexGroups:Body"]);
    expect(body.mode).toBe("OBJECT");
  });

  it("normalizes weights per vertex", () => {
    const store = riggedBody({
      modifiers: [],
      vertexGroups: [
        { name: "Spine", weights: [{ index: 0, weight: 0.2 }] },
        { name: "Chest", weights: [{ index: 0, weight: 0.6 }] },
      ],
    });
    const body = resolve(store, "Body");

    expect(fixVertexGroups(store, body)).toEqual({ emptyRemoved: 0, orphanedRemoved: 0, normalized: 1 });
    expect(body.vertexGroups[0].weights[0].weight).toBeCloseTo(0.25);
    expect(body.vertexGroups[1].weights[0].weight).toBeCloseTo(0.75);
  });

  it("skips normalization outside the view layer", () => {
    const store = riggedBody({ inViewLayer: false });
    const body = resolve(store, "Body");

    expect(fixVertexGroups(store, body)).toEqual({ emptyRemoved: 2, orphanedRemoved: 1, normalized: 0 });
    expect(store.operationLog).toEqual([]);
  });
});
