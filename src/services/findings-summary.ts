/**
 * Finding counts, category grouping and fix summaries.
 */

import type { Finding, IssueCategory } from "../validators/types.js";
import type { FixCounters } from "./run-context.js";

export const CATEGORY_GROUP_NAMES = [
  "materials",
  "geometry",
  "transforms",
  "modifiers",
  "drivers",
  "rigging",
  "circular",
  "data",
] as const;

export type CategoryGroup = (typeof CATEGORY_GROUP_NAMES)[number];

const GROUP_OF: Record<IssueCategory, CategoryGroup> = {
  BROKEN_SHADER: "materials",
  TEXTURE: "materials",
  SHADER_COMPAT: "materials",
  EMPTY_SLOT: "materials",
  GEOMETRY: "geometry",
  TRANSFORM: "transforms",
  DATA: "data",
  INVALID_DRIVER: "drivers",
  CIRCULAR_DRIVER: "drivers",
  DRIVER_CHAIN: "drivers",
  MISSING_DRIVER_TARGET: "drivers",
  BROKEN_MODIFIER: "modifiers",
  UNBOUND_MODIFIER: "modifiers",
  UNSTABLE_MODIFIER: "modifiers",
  RIGGING: "rigging",
  CIRCULAR_DEPENDENCY: "circular",
};

export function categoryGroupOf(category: IssueCategory): CategoryGroup {
  return GROUP_OF[category];
}

/**
 * Keep findings whose category belongs to one of `groups`.
 * No groups (or an empty list) keeps everything.
 */
export function filterByGroups(findings: readonly Finding[], groups?: readonly CategoryGroup[]): Finding[] {
  if (!groups || groups.length === 0) return [...findings];
  const wanted = new Set(groups);
  return findings.filter((f) => wanted.has(GROUP_OF[f.category]));
}

export interface SeverityCounts {
  errors: number;
  warnings: number;
}

export interface FindingsSummary extends SeverityCounts {
  total: number;
  by_category: Partial<Record<IssueCategory, SeverityCounts>>;
}

export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const errors = findings.filter((f) => f.severity === "ERROR").length;
  return { errors, warnings: findings.length - errors };
}

export function summarizeFindings(findings: readonly Finding[]): FindingsSummary {
  const byCategory: Partial<Record<IssueCategory, SeverityCounts>> = {};
  for (const finding of findings) {
    const bucket = byCategory[finding.category] ?? { errors: 0, warnings: 0 };
    if (finding.severity === "ERROR") bucket.errors++;
    else bucket.warnings++;
    byCategory[finding.category] = bucket;
  }
  return { total: findings.length, ...countBySeverity(findings), by_category: byCategory };
}

// =============================================================================
// Fix results
// =============================================================================

export const FIX_RESULT_KEYS = [
  "materials_rebuilt",
  "disconnected_fixed",
  "deprecated_replaced",
  "drivers_fixed",
  "driver_chains_fixed",
  "modifiers_fixed",
  "empty_slots_fixed",
  "scales_applied",
  "rotations_applied",
  "textures_packed",
  "uvs_generated",
  "vertex_groups_cleaned",
  "weights_normalized",
  "parent_loops_fixed",
] as const;

export type FixResultKey = (typeof FIX_RESULT_KEYS)[number];

export type FixResults = Record<FixResultKey, number>;

export function emptyFixResults(): FixResults {
  return {
    materials_rebuilt: 0,
    disconnected_fixed: 0,
    deprecated_replaced: 0,
    drivers_fixed: 0,
    driver_chains_fixed: 0,
    modifiers_fixed: 0,
    empty_slots_fixed: 0,
    scales_applied: 0,
    rotations_applied: 0,
    textures_packed: 0,
    uvs_generated: 0,
    vertex_groups_cleaned: 0,
    weights_normalized: 0,
    parent_loops_fixed: 0,
  };
}

export function totalFixed(results: FixResults): number {
  return FIX_RESULT_KEYS.reduce((sum, key) => sum + results[key], 0);
}

export function countersFromResults(results: FixResults): FixCounters {
  return {
    transforms: results.scales_applied + results.rotations_applied,
    materials: results.materials_rebuilt + results.empty_slots_fixed,
    drivers: results.drivers_fixed + results.driver_chains_fixed,
    modifiers: results.modifiers_fixed,
    geometry: results.uvs_generated,
    rigging: results.vertex_groups_cleaned + results.weights_normalized,
  };
}

/** Summary order and labels for non-zero fix counts */
const FIX_SUMMARY_LABELS: ReadonlyArray<[FixResultKey, string]> = [
  ["scales_applied", "scales"],
  ["rotations_applied", "rotations"],
  ["vertex_groups_cleaned", "vertex groups"],
  ["weights_normalized", "weights normalized"],
  ["parent_loops_fixed", "parent loops"],
  ["driver_chains_fixed", "driver chains"],
  ["materials_rebuilt", "materials"],
  ["empty_slots_fixed", "empty slots"],
  ["textures_packed", "textures packed"],
  ["uvs_generated", "UV maps"],
  ["drivers_fixed", "drivers"],
  ["modifiers_fixed", "modifiers"],
  ["deprecated_replaced", "deprecated nodes"],
  ["disconnected_fixed", "disconnected outputs"],
];

/**
 * `Fixed: 2 scales, 1 materials` or the no-op message for the scope.
 */
export function formatFixSummary(results: FixResults, scopeName: string): string {
  const parts = FIX_SUMMARY_LABELS.filter(([key]) => results[key] > 0).map(
    ([key, label]) => `${results[key]} ${label}`,
  );
  return parts.length === 0 ? `No fixable issues found in ${scopeName}.` : `Fixed: ${parts.join(", ")}`;
}
