import { describe, it, expect, afterEach } from "vitest";
import { isExcluded, parseExclusionPatterns, scanObjects } from "../../src/services/scan-aggregator.js";
import { TelemetryEvents } from "../../src/utils/telemetry.js";
import { captureEvents, cleanMaterial, meshObject, messyScene, quadMesh, storeOf } from "../utils/scene-builders.js";

describe("parseExclusionPatterns", () => {
  it("splits, trims and drops empty entries", () => {
    expect(parseExclusionPatterns(" WGT-, ,CTRL- ")).toEqual(["WGT-", "CTRL-"]);
  });

  it("accepts a list", () => {
    expect(parseExclusionPatterns(["WGT-", "  "])).toEqual(["WGT-"]);
  });
});

describe("isExcluded", () => {
  it("matches name prefixes case-sensitively", () => {
    expect(isExcluded("WGT-ctrl", ["WGT-"])).toBe(true);
    expect(isExcluded("wgt-ctrl", ["WGT-"])).toBe(false);
    expect(isExcluded("Body", [])).toBe(false);
  });
});

describe("scanObjects", () => {
  let stop: (() => void) | undefined;
  afterEach(() => stop?.());

  it("collects findings in object, rule, then slot order", () => {
    const store = storeOf(messyScene());

    expect(scanObjects(store, store.listObjects(), [])).toEqual([
      {
        objectName: "Cube",
        materialName: "N/A",
        category: "TRANSFORM",
        message: "Unapplied scale: (2.000, 2.000, 2.000)",
        severity: "WARNING",
      },
      {
        objectName: "Cube",
        materialName: "N/A",
        category: "BROKEN_MODIFIER",
        message: "Boolean modifier 'Cut' has no target object",
        severity: "ERROR",
      },
      {
        objectName: "Cube",
        materialName: "Broken",
        category: "BROKEN_SHADER",
        message: "Material does not use Nodes (Legacy).",
        severity: "ERROR",
      },
      {
        objectName: "Cube",
        materialName: "N/A",
        category: "EMPTY_SLOT",
        message: "Empty material slot found.",
        severity: "WARNING",
      },
    ]);
  });

  it("returns identical findings when run twice", () => {
    const store = storeOf(messyScene());
    const first = scanObjects(store, store.listObjects(), []);
    const second = scanObjects(store, store.listObjects(), []);
    expect(second).toEqual(first);
  });

  it("returns frozen findings", () => {
    const store = storeOf(messyScene());
    const [finding] = scanObjects(store, store.listObjects(), []);
    expect(Object.isFrozen(finding)).toBe(true);
  });

  it("skips excluded objects", () => {
    const store = storeOf({
      objects: [meshObject("WGT-ctrl", { scale: { x: 2, y: 2, z: 2 } })],
      meshes: [quadMesh("WGT-ctrl_data")],
    });
    expect(scanObjects(store, store.listObjects(), ["WGT-"])).toEqual([]);
  });

  it("skips objects that vanished after listing", () => {
    const store = storeOf(messyScene());
    const listed = store.listObjects();
    store.removeObject("Cube");
    expect(scanObjects(store, listed, [])).toEqual([]);
  });

  it("finds nothing in a clean scene", () => {
    const store = storeOf({
      objects: [meshObject("Cube", { materialSlots: ["Paint"] })],
      meshes: [quadMesh("Cube_data")],
      materials: [cleanMaterial("Paint")],
    });
    expect(scanObjects(store, store.listObjects(), [])).toEqual([]);
  });

  it("emits scan telemetry with severity counts", () => {
    const capture = captureEvents();
    stop = capture.stop;
    const store = storeOf(messyScene());

    scanObjects(store, store.listObjects(), ["Lamp"]);

    expect(capture.events.map((e) => e.name)).toEqual([TelemetryEvents.ScanStarted, TelemetryEvents.ScanCompleted]);
    expect(capture.events[1].data).toMatchObject({
      objects_scanned: 1,
      objects_excluded: 1,
      error_count: 2,
      warning_count: 2,
    });
  });
});
