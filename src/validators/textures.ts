/**
 * Texture checks and packing for image-reference nodes.
 *
 * @module validators/textures
 */

import { config } from "../config/index.js";
import type { ImageT, ShaderNodeT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";
import { SceneAuditError, describeError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import { issue, type RuleIssue } from "./types.js";

function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

function imageTextureNodes(store: SceneStore, materialName: string): ShaderNodeT[] {
  const material = store.getMaterial(materialName);
  if (!material?.useNodes || !material.nodeTree) return [];
  return material.nodeTree.nodes.filter((n) => n.type === "TEX_IMAGE" || n.type === "TEX_ENVIRONMENT");
}

function resolveImage(store: SceneStore, node: ShaderNodeT): ImageT | undefined {
  return node.image ? store.getImage(node.image) : undefined;
}

function checkImageTexture(store: SceneStore, image: ImageT | undefined): RuleIssue[] {
  if (!image) return [issue("TEXTURE", "WARNING", "Image Texture node has no image assigned.")];
  if (image.source !== "FILE" || image.packed) return [];

  if (!image.filepath) return [issue("TEXTURE", "ERROR", `Image '${image.name}' has no filepath.`)];
  if (!store.fileExists(image.filepath)) {
    return [issue("TEXTURE", "ERROR", `Missing texture file: ${image.name} (${image.filepath})`)];
  }
  if (!image.hasData) return [issue("TEXTURE", "ERROR", `Image '${image.name}' failed to load.`)];

  const { width, height } = image;
  // Size unavailable
  if (width <= 0 || height <= 0) return [];

  const issues: RuleIssue[] = [];
  const limit = config.scan.textureMaxDimension;
  if (width > limit || height > limit) {
    issues.push(issue("TEXTURE", "WARNING", `Very large texture: ${image.name} (${width}x${height})`));
  }
  if (!isPowerOfTwo(width) || !isPowerOfTwo(height)) {
    issues.push(issue("TEXTURE", "WARNING", `Non-power-of-2 texture: ${image.name} (${width}x${height})`));
  }
  return issues;
}

function checkEnvironmentTexture(store: SceneStore, image: ImageT | undefined): RuleIssue[] {
  if (!image) return [issue("TEXTURE", "WARNING", "Environment Texture node has no image assigned.")];
  if (image.source !== "FILE" || image.packed) return [];
  if (!store.fileExists(image.filepath)) {
    return [issue("TEXTURE", "ERROR", `Missing environment texture: ${image.name}`)];
  }
  return [];
}

/**
 * Check every image and environment texture node of a material.
 * Packed images are embedded and skip the file checks.
 */
export function validateTextures(store: SceneStore, materialName: string): RuleIssue[] {
  return imageTextureNodes(store, materialName).flatMap((node) => {
    const image = resolveImage(store, node);
    return node.type === "TEX_IMAGE" ? checkImageTexture(store, image) : checkEnvironmentTexture(store, image);
  });
}

/**
 * Embed every unpacked, file-backed image whose file exists.
 *
 * @returns Number of images packed
 */
export function packExternalTextures(store: SceneStore, materialName: string): number {
  let packed = 0;
  const seen = new Set<string>();

  for (const node of imageTextureNodes(store, materialName)) {
    const image = resolveImage(store, node);
    if (!image || seen.has(image.name)) continue;
    seen.add(image.name);

    if (image.source !== "FILE" || image.packed || !image.filepath) continue;
    if (!store.fileExists(image.filepath)) continue;

    try {
      store.packImage(image.name);
      packed++;
    } catch (error) {
      if (!(error instanceof SceneAuditError)) throw error;
      log.warn({ image: image.name, error: describeError(error) }, "Failed to pack texture");
    }
  }

  return packed;
}
