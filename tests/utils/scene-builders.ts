/**
 * Scene Builder Utilities for Tests
 *
 * Snapshot fragments in input form (schema defaults fill the rest).
 *
 * Usage:
 *   import { meshObject, quadMesh, storeOf } from '../utils/scene-builders.js';
 *   const store = storeOf({ objects: [meshObject('Cube')], meshes: [quadMesh('Cube_data')] });
 */

import type { SceneSnapshotInput } from '../../src/schemas/scene.js';
import { InMemorySceneStore } from '../../src/scene/memory-store.js';
import { setTestSink } from '../../src/utils/telemetry.js';

export type ObjectInput = NonNullable<SceneSnapshotInput['objects']>[number];
export type MeshInput = NonNullable<SceneSnapshotInput['meshes']>[number];
export type MaterialInput = NonNullable<SceneSnapshotInput['materials']>[number];
export type ImageInput = NonNullable<SceneSnapshotInput['images']>[number];
export type DriverCurveInput = NonNullable<NonNullable<ObjectInput['animation']>['drivers']>[number];

export function storeOf(scene: SceneSnapshotInput): InMemorySceneStore {
  return InMemorySceneStore.fromSnapshot(scene);
}

/**
 * Mesh object whose data block is `<name>_data` unless overridden.
 */
export function meshObject(name: string, overrides: Partial<ObjectInput> = {}): ObjectInput {
  return { name, type: 'MESH', data: `${name}_data`, ...overrides };
}

/**
 * A single UV-mapped quad.
 */
export function quadMesh(name: string, overrides: Partial<MeshInput> = {}): MeshInput {
  return { name, vertexCount: 4, edgeCount: 4, polygonCount: 1, uvLayers: ['UVMap'], ...overrides };
}

/**
 * Principled BSDF feeding the Material Output.
 */
export function cleanMaterial(name: string): MaterialInput {
  return {
    name,
    nodeTree: {
      nodes: [
        { name: 'Material Output', type: 'OUTPUT_MATERIAL', location: [300, 0] },
        { name: 'Principled BSDF', type: 'BSDF_PRINCIPLED', location: [0, 0] },
      ],
      links: [{ fromNode: 'Principled BSDF', fromSocket: 'BSDF', toNode: 'Material Output', toSocket: 'Surface' }],
    },
  };
}

/**
 * Material whose tree holds the given extra nodes beside a fed output.
 */
export function materialWithNodes(
  name: string,
  nodes: NonNullable<NonNullable<MaterialInput['nodeTree']>['nodes']>,
): MaterialInput {
  return {
    name,
    nodeTree: {
      nodes: [
        { name: 'Material Output', type: 'OUTPUT_MATERIAL', location: [300, 0] },
        { name: 'Principled BSDF', type: 'BSDF_PRINCIPLED', location: [0, 0] },
        ...nodes,
      ],
      links: [{ fromNode: 'Principled BSDF', fromSocket: 'BSDF', toNode: 'Material Output', toSocket: 'Surface' }],
    },
  };
}

/**
 * A non-scripted driver on `dataPath` reading one OBJECT target.
 */
export function driverFrom(dataPath: string, targetId: string | null, variableName = 'var'): DriverCurveInput {
  return {
    dataPath,
    driver: {
      type: 'AVERAGE',
      variables: [{ name: variableName, targets: [{ idType: 'OBJECT', id: targetId }] }],
    },
  };
}

/**
 * One mesh with unapplied scale, a broken modifier, a legacy material and an
 * empty slot; plus a light.
 */
export function messyScene(): SceneSnapshotInput {
  return {
    objects: [
      meshObject('Cube', {
        data: 'CubeMesh',
        scale: { x: 2, y: 2, z: 2 },
        materialSlots: ['Broken', null],
        modifiers: [{ type: 'BOOLEAN', name: 'Cut' }],
      }),
      { name: 'Lamp', type: 'LIGHT' },
    ],
    meshes: [quadMesh('CubeMesh')],
    materials: [{ name: 'Broken', useNodes: false }],
  };
}

export interface CapturedEvent {
  name: string;
  data: Record<string, unknown>;
}

/**
 * Capture telemetry events until `stop()` is called.
 */
export function captureEvents(): { events: CapturedEvent[]; stop: () => void } {
  const events: CapturedEvent[] = [];
  setTestSink((name, data) => events.push({ name, data }));
  return { events, stop: () => setTestSink(null) };
}
