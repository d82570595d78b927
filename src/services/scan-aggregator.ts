/**
 * Scan Aggregator
 *
 * Runs every rule module over a filtered object set and collects findings
 * in a stable order: objects in input order, rules in OBJECT_RULES order,
 * then material slots in slot order.
 */

import type { ObjectTypeT, SceneObjectT } from "../schemas/scene.js";
import type { SceneStore } from "../scene/store.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { OBJECT_RULES } from "../validators/index.js";
import { checkShaderCompatibility, isMaterialBroken } from "../validators/material.js";
import { validateTextures } from "../validators/textures.js";
import { toFinding, type Finding } from "../validators/types.js";
import { countBySeverity } from "./findings-summary.js";

/** Object types that carry material slots */
export const MATERIAL_BEARING_TYPES: ReadonlySet<ObjectTypeT> = new Set(["MESH", "CURVE", "SURFACE"]);

/**
 * Split a comma-separated pattern list, trimming entries and dropping empty ones.
 */
export function parseExclusionPatterns(raw: string | readonly string[]): string[] {
  const entries = typeof raw === "string" ? raw.split(",") : raw;
  return entries.map((p) => p.trim()).filter((p) => p.length > 0);
}

/**
 * Case-sensitive name prefix match against any pattern.
 */
export function isExcluded(objectName: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => {
    const trimmed = pattern.trim();
    return trimmed.length > 0 && objectName.startsWith(trimmed);
  });
}

function scanMaterialSlots(store: SceneStore, obj: SceneObjectT): Finding[] {
  const findings: Finding[] = [];

  for (const slot of obj.materialSlots) {
    if (slot === null) {
      findings.push(
        toFinding(obj.name, { category: "EMPTY_SLOT", severity: "WARNING", message: "Empty material slot found." }),
      );
      continue;
    }

    const broken = isMaterialBroken(store, slot);
    if (broken) {
      findings.push(toFinding(obj.name, { category: "BROKEN_SHADER", ...broken }, slot));
    }
    for (const textureIssue of validateTextures(store, slot)) {
      findings.push(toFinding(obj.name, textureIssue, slot));
    }
    for (const compatIssue of checkShaderCompatibility(store, slot)) {
      findings.push(toFinding(obj.name, compatIssue, slot));
    }
  }

  return findings;
}

/**
 * Scan objects, skipping excluded and vanished ones. Read-only: scanning
 * twice without a mutation in between yields identical lists.
 */
export function scanObjects(
  store: SceneStore,
  objects: readonly SceneObjectT[],
  exclusionPatterns: readonly string[],
): Finding[] {
  const startedAt = Date.now();
  emit(TelemetryEvents.ScanStarted, { object_count: objects.length, scene: store.sceneName });
  const findings: Finding[] = [];
  let scanned = 0;

  for (const { name } of objects) {
    if (isExcluded(name, exclusionPatterns)) continue;
    const obj = store.getObject(name);
    if (!obj) continue;
    scanned++;

    for (const rule of OBJECT_RULES) {
      for (const ruleIssue of rule.validate(store, obj)) {
        findings.push(toFinding(obj.name, ruleIssue));
      }
    }

    if (MATERIAL_BEARING_TYPES.has(obj.type) && obj.materialSlots.length > 0) {
      findings.push(...scanMaterialSlots(store, obj));
    }
  }

  const { errors, warnings } = countBySeverity(findings);
  emit(TelemetryEvents.ScanCompleted, {
    objects_scanned: scanned,
    objects_excluded: objects.length - scanned,
    error_count: errors,
    warning_count: warnings,
    duration_ms: Date.now() - startedAt,
  });
  log.debug({ scanned, findings: findings.length }, "Scene scan finished");

  return findings;
}
