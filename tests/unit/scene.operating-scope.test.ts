import { describe, it, expect } from "vitest";
import { ensureObjectMode, withMode, withOperatingScope } from "../../src/scene/operating-scope.js";
import { EntityMissingError, UnsafeStateError } from "../../src/utils/errors.js";
import { meshObject, quadMesh, storeOf } from "../utils/scene-builders.js";

function threeObjectStore() {
  return storeOf({
    objects: [
      meshObject("A", { selected: true }),
      meshObject("B"),
      meshObject("C", { selected: true }),
    ],
    meshes: [quadMesh("A_data"), quadMesh("B_data"), quadMesh("C_data")],
    activeObject: "A",
  });
}

const selectedNames = (store: ReturnType<typeof threeObjectStore>) => store.getSelectedObjects().map((o) => o.name);

describe("withOperatingScope", () => {
  it("makes the target the sole selected and active object while running", () => {
    const store = threeObjectStore();

    const seen = withOperatingScope(store, "B", () => ({
      selected: selectedNames(store),
      active: store.getActiveObject()?.name,
    }));

    expect(seen).toEqual({ selected: ["B"], active: "B" });
  });

  it("restores selection and active object afterwards", () => {
    const store = threeObjectStore();
    withOperatingScope(store, "B", () => undefined);

    expect(selectedNames(store)).toEqual(["A", "C"]);
    expect(store.getActiveObject()?.name).toBe("A");
  });

  it("restores selection when the body throws", () => {
    const store = threeObjectStore();

    expect(() =>
      withOperatingScope(store, "B", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(selectedNames(store)).toEqual(["A", "C"]);
    expect(store.getActiveObject()?.name).toBe("A");
  });

  it("skips previously selected objects that vanished", () => {
    const store = threeObjectStore();
    withOperatingScope(store, "B", () => store.removeObject("A"));

    expect(selectedNames(store)).toEqual(["C"]);
    expect(store.getActiveObject()).toBeUndefined();
  });

  it("throws EntityMissingError for an unknown object", () => {
    expect(() => withOperatingScope(threeObjectStore(), "Ghost", () => undefined)).toThrow(EntityMissingError);
  });

  it("throws UnsafeStateError for an object outside the view layer", () => {
    const store = storeOf({ objects: [meshObject("Hidden", { inViewLayer: false })] });
    expect(() => withOperatingScope(store, "Hidden", () => undefined)).toThrow(UnsafeStateError);
  });
});

describe("withMode", () => {
  it("returns the object to OBJECT mode after running", () => {
    const store = threeObjectStore();
    const during = withOperatingScope(store, "B", () =>
      withMode(store, "B", "EDIT", () => store.getObject("B")?.mode),
    );

    expect(during).toBe("EDIT");
    expect(store.getObject("B")?.mode).toBe("OBJECT");
  });

  it("returns the object to OBJECT mode when the body throws", () => {
    const store = threeObjectStore();
    expect(() =>
      withOperatingScope(store, "B", () =>
        withMode(store, "B", "WEIGHT_PAINT", () => {
          throw new Error("paint failed");
        }),
      ),
    ).toThrow("paint failed");

    expect(store.getObject("B")?.mode).toBe("OBJECT");
  });
});

describe("ensureObjectMode", () => {
  it("switches an active object out of EDIT mode", () => {
    const store = storeOf({
      objects: [meshObject("Cube", { mode: "EDIT" })],
      meshes: [quadMesh("Cube_data")],
      activeObject: "Cube",
    });
    expect(ensureObjectMode(store, "Cube")).toBe(true);
    expect(store.getObject("Cube")?.mode).toBe("OBJECT");
  });

  it("reports false when the host refuses", () => {
    const store = storeOf({ objects: [meshObject("Hidden", { mode: "EDIT", inViewLayer: false })] });
    expect(ensureObjectMode(store, "Hidden")).toBe(false);
  });

  it("reports false for an unknown object", () => {
    expect(ensureObjectMode(storeOf({}), "Ghost")).toBe(false);
  });
});
