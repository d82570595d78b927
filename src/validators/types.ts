/**
 * Shared validator types
 *
 * @module validators/types
 */

export const ISSUE_CATEGORIES = [
  "TRANSFORM",
  "DATA",
  "INVALID_DRIVER",
  "CIRCULAR_DRIVER",
  "MISSING_DRIVER_TARGET",
  "DRIVER_CHAIN",
  "BROKEN_MODIFIER",
  "UNBOUND_MODIFIER",
  "UNSTABLE_MODIFIER",
  "GEOMETRY",
  "RIGGING",
  "CIRCULAR_DEPENDENCY",
  "EMPTY_SLOT",
  "BROKEN_SHADER",
  "TEXTURE",
  "SHADER_COMPAT",
] as const;

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

export type Severity = "ERROR" | "WARNING";

/** Material name recorded on findings that are not about a material */
export const NO_MATERIAL = "N/A";

/**
 * What a rule reports about one entity.
 */
export interface RuleIssue {
  category: IssueCategory;
  message: string;
  severity: Severity;
}

/**
 * One scan finding. Frozen once created.
 */
export interface Finding {
  readonly objectName: string;
  readonly materialName: string;
  readonly category: IssueCategory;
  readonly message: string;
  readonly severity: Severity;
}

export function toFinding(objectName: string, issue: RuleIssue, materialName: string = NO_MATERIAL): Finding {
  return Object.freeze({
    objectName,
    materialName,
    category: issue.category,
    message: issue.message,
    severity: issue.severity,
  });
}

export function issue(category: IssueCategory, severity: Severity, message: string): RuleIssue {
  return { category, severity, message };
}

/**
 * Format a cycle path for messages: `A → B → A`.
 */
export function formatChain(chain: readonly string[]): string {
  return chain.join(" → ");
}
