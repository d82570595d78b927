/**
 * Material rules
 *
 * Shading-graph integrity (output node present and fed), the destructive
 * rebuild, the shared marker material, empty slot cleanup, output
 * reconnection, deprecated node replacement and render compatibility.
 *
 * @module validators/material
 */

import { config } from "../config/index.js";
import type {
  MaterialT,
  NodeLinkT,
  NodeTreeT,
  SceneObjectT,
  ShaderNodeT,
  ShaderNodeTypeT,
} from "../schemas/scene.js";
import { uniqueName } from "../scene/naming.js";
import type { SceneStore } from "../scene/store.js";
import { issue, type RuleIssue, type Severity } from "./types.js";

export const OUTPUT_NODE_NAME = "Material Output";
export const PRINCIPLED_NODE_NAME = "Principled BSDF";

/** Deprecated shader nodes and the advice shown for them */
export const DEPRECATED_NODES: ReadonlyMap<ShaderNodeTypeT, string> = new Map([
  ["BSDF_DIFFUSE", "Use Principled BSDF instead"],
  ["BSDF_GLOSSY", "Use Principled BSDF instead"],
  ["EMISSION", "Use Principled BSDF emission"],
]);

/** Nodes only the path-tracing engine evaluates */
export const PATH_TRACER_ONLY_NODES: ReadonlySet<ShaderNodeTypeT> = new Set([
  "BSDF_HAIR",
  "BSDF_HAIR_PRINCIPLED",
  "SUBSURFACE_SCATTERING",
  "BSDF_ANISOTROPIC",
  "BSDF_SHEEN",
  "BSDF_TOON",
]);

/** Output socket each shader node exposes to the material output */
const SHADER_OUTPUT_SOCKET: Partial<Record<ShaderNodeTypeT, string>> = {
  BSDF_PRINCIPLED: "BSDF",
  EMISSION: "Emission",
  MIX_SHADER: "Shader",
};

export interface BrokenMaterial {
  message: string;
  severity: Severity;
}

// =============================================================================
// Node tree helpers
// =============================================================================

function findOutputNode(tree: NodeTreeT): ShaderNodeT | undefined {
  return tree.nodes.find((n) => n.type === "OUTPUT_MATERIAL");
}

function isSurfaceLinked(tree: NodeTreeT, output: ShaderNodeT): boolean {
  const nodeNames = new Set(tree.nodes.map((n) => n.name));
  return tree.links.some(
    (l) => l.toNode === output.name && l.toSocket === "Surface" && nodeNames.has(l.fromNode),
  );
}

function addNode(
  tree: NodeTreeT,
  type: ShaderNodeTypeT,
  baseName: string,
  location: [number, number],
  inputs: ShaderNodeT["inputs"] = {},
): ShaderNodeT {
  const node: ShaderNodeT = {
    name: uniqueName(baseName, (n) => tree.nodes.some((existing) => existing.name === n)),
    type,
    location,
    inputs,
  };
  tree.nodes.push(node);
  return node;
}

function link(tree: NodeTreeT, from: ShaderNodeT, fromSocket: string, to: ShaderNodeT, toSocket: string): void {
  // An input socket takes one link
  tree.links = tree.links.filter((l) => !(l.toNode === to.name && l.toSocket === toSocket));
  tree.links.push({ fromNode: from.name, fromSocket, toNode: to.name, toSocket });
}

function outputSocketOf(node: ShaderNodeT): string {
  return SHADER_OUTPUT_SOCKET[node.type] ?? "BSDF";
}

/** Enable nodes and give the material an empty tree; returns that tree */
function resetTree(material: MaterialT): NodeTreeT {
  const tree: NodeTreeT = { nodes: [], links: [] };
  material.useNodes = true;
  material.nodeTree = tree;
  return tree;
}

// =============================================================================
// Inspection
// =============================================================================

/**
 * Why a material cannot render, or null when it is usable.
 * A null name is an empty slot and is reported by the scan instead.
 */
export function isMaterialBroken(store: SceneStore, materialName: string | null): BrokenMaterial | null {
  if (materialName === null) return null;

  const material = store.getMaterial(materialName);
  if (!material) return { message: "Material has been deleted.", severity: "ERROR" };
  if (!material.useNodes) return { message: "Material does not use Nodes (Legacy).", severity: "ERROR" };

  const tree = material.nodeTree;
  if (!tree) return { message: "Node tree is missing.", severity: "ERROR" };

  const output = findOutputNode(tree);
  if (!output) return { message: "Missing Material Output node.", severity: "ERROR" };
  if (!isSurfaceLinked(tree, output)) {
    return { message: "Material Output surface is disconnected.", severity: "WARNING" };
  }

  return null;
}

/**
 * Flag nodes that only the path tracer renders and deprecated shader nodes.
 */
export function checkShaderCompatibility(store: SceneStore, materialName: string): RuleIssue[] {
  const material = store.getMaterial(materialName);
  if (!material?.useNodes || !material.nodeTree) return [];

  const issues: RuleIssue[] = [];
  for (const node of material.nodeTree.nodes) {
    if (PATH_TRACER_ONLY_NODES.has(node.type)) {
      issues.push(
        issue(
          "SHADER_COMPAT",
          "WARNING",
          `Node '${node.name}' (${node.type}) is path-tracer only, may not render in real-time viewports.`,
        ),
      );
    }
    const reason = DEPRECATED_NODES.get(node.type);
    if (reason !== undefined) {
      issues.push(issue("SHADER_COMPAT", "WARNING", `Deprecated node '${node.name}' (${node.type}). ${reason}`));
    }
  }
  return issues;
}

// =============================================================================
// Repair
// =============================================================================

/**
 * Replace the whole node graph with Principled BSDF → Material Output.
 * Destructive by intent.
 */
export function rebuildMaterial(store: SceneStore, materialName: string): boolean {
  const material = store.getMaterial(materialName);
  if (!material) return false;

  const tree = resetTree(material);
  const output = addNode(tree, "OUTPUT_MATERIAL", OUTPUT_NODE_NAME, [300, 0]);
  const principled = addNode(tree, "BSDF_PRINCIPLED", PRINCIPLED_NODE_NAME, [0, 0]);
  link(tree, principled, "BSDF", output, "Surface");
  return true;
}

/**
 * The shared red emissive marker material, created on first use.
 */
export function getOrCreateMarkerMaterial(store: SceneStore): MaterialT {
  const markerName = config.repair.markerMaterialName;
  const existing = store.getMaterial(markerName);
  if (existing) return existing;

  const marker = store.createMaterial(markerName);
  const tree = resetTree(marker);
  const output = addNode(tree, "OUTPUT_MATERIAL", OUTPUT_NODE_NAME, [300, 0]);
  const emission = addNode(tree, "EMISSION", "Emission", [0, 0], {
    Color: [1, 0, 0, 1],
    Strength: 2,
  });
  link(tree, emission, "Emission", output, "Surface");
  return marker;
}

export function isMarkerMaterial(materialName: string | null): boolean {
  return materialName === config.repair.markerMaterialName;
}

/**
 * Point one slot at the marker material. The broken material itself is left alone.
 */
export function markBrokenMaterial(store: SceneStore, obj: SceneObjectT, slotIndex: number): boolean {
  if (slotIndex < 0 || slotIndex >= obj.materialSlots.length) return false;
  obj.materialSlots[slotIndex] = getOrCreateMarkerMaterial(store).name;
  return true;
}

/**
 * Drop empty slots, keeping populated ones in order.
 *
 * @returns Number of slots removed
 */
export function fixEmptySlots(obj: SceneObjectT): number {
  const emptyCount = obj.materialSlots.filter((slot) => slot === null).length;
  if (emptyCount === 0) return 0;

  obj.materialSlots = obj.materialSlots.filter((slot): slot is string => slot !== null);
  return emptyCount;
}

/**
 * Feed an unlinked output from the existing Principled BSDF, or a new one
 * placed to its left. The rest of the graph is untouched.
 */
export function fixDisconnectedOutput(store: SceneStore, materialName: string): boolean {
  const material = store.getMaterial(materialName);
  if (!material?.useNodes || !material.nodeTree) return false;

  const tree = material.nodeTree;
  const output = findOutputNode(tree);
  if (!output || isSurfaceLinked(tree, output)) return false;

  const principled =
    tree.nodes.find((n) => n.type === "BSDF_PRINCIPLED") ??
    addNode(tree, "BSDF_PRINCIPLED", PRINCIPLED_NODE_NAME, [output.location[0] - 300, output.location[1]]);
  link(tree, principled, outputSocketOf(principled), output, "Surface");
  return true;
}

/**
 * Swap every deprecated shader node for a Principled BSDF at the same spot,
 * carrying its outgoing links over.
 *
 * @returns Number of nodes replaced
 */
export function replaceDeprecatedNodes(store: SceneStore, materialName: string): number {
  const material = store.getMaterial(materialName);
  if (!material?.useNodes || !material.nodeTree) return 0;

  const tree = material.nodeTree;
  let replaced = 0;

  for (const node of [...tree.nodes]) {
    if (!DEPRECATED_NODES.has(node.type)) continue;

    // Links go away with the node, so take them first
    const outgoing: NodeLinkT[] = tree.links.filter((l) => l.fromNode === node.name);

    tree.nodes = tree.nodes.filter((n) => n !== node);
    tree.links = tree.links.filter((l) => l.fromNode !== node.name && l.toNode !== node.name);

    const principled = addNode(tree, "BSDF_PRINCIPLED", PRINCIPLED_NODE_NAME, [node.location[0], node.location[1]]);
    for (const previous of outgoing) {
      const target = tree.nodes.find((n) => n.name === previous.toNode);
      if (target) link(tree, principled, "BSDF", target, previous.toSocket);
    }
    replaced++;
  }

  return replaced;
}
