import { defaultClassificationRules } from "../config";
import type {
  ChangeCategory,
  ChangeDescriptor,
  ChangeStatus,
  ClassificationRules,
  ImpactLevel,
  RawChangeRecord,
} from "../types";

const MEDIUM_IMPACT_CATEGORIES: ReadonlySet<ChangeCategory> = new Set<ChangeCategory>([
  "configuration",
  "database",
  "infrastructure",
]);

// GitHub reports more statuses than we distinguish.
const STATUS_ALIASES = new Map<string, ChangeStatus>([
  ["added", "added"],
  ["copied", "added"],
  ["modified", "modified"],
  ["changed", "modified"],
  ["unchanged", "modified"],
  ["deleted", "deleted"],
  ["removed", "deleted"],
  ["renamed", "renamed"],
]);

function toCount(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.floor(value);
}

export function normalizeStatus(status: unknown): ChangeStatus {
  if (typeof status !== "string") return "modified";
  return STATUS_ALIASES.get(status.toLowerCase()) ?? "modified";
}

export function categorizePath(
  path: string,
  rules: ClassificationRules = defaultClassificationRules
): ChangeCategory {
  const lowered = path.toLowerCase();
  if (!lowered) return "other";

  for (const rule of rules.categoryRules) {
    if (rule.keywords.some((keyword) => lowered.includes(keyword))) {
      return rule.category;
    }
  }
  return "other";
}

export function isBreakingChange(
  path: string,
  additions: number,
  deletions: number,
  rules: ClassificationRules = defaultClassificationRules
): boolean {
  const lowered = path.toLowerCase();
  const sensitive = rules.breakingKeywords.some((keyword) =>
    lowered.includes(keyword)
  );
  const { breakingDeletions, breakingAdditions } = rules.thresholds;
  return sensitive && (deletions > breakingDeletions || additions > breakingAdditions);
}

export function assessImpact(
  category: ChangeCategory,
  isBreaking: boolean,
  additions: number,
  rules: ClassificationRules = defaultClassificationRules
): ImpactLevel {
  if (isBreaking || category === "api") return "high";
  if (
    MEDIUM_IMPACT_CATEGORIES.has(category) ||
    additions > rules.thresholds.largeChangeAdditions
  ) {
    return "medium";
  }
  return "low";
}

/**
 * Classifies one changed file. Total: malformed records fall back to
 * zero line counts, status `modified` and category `other`.
 */
export function classifyFileChange(
  record: RawChangeRecord,
  rules: ClassificationRules = defaultClassificationRules
): ChangeDescriptor {
  const filename = typeof record.filename === "string" ? record.filename : "";
  const additions = toCount(record.additions);
  const deletions = toCount(record.deletions);

  const category = categorizePath(filename, rules);
  const isBreaking = isBreakingChange(filename, additions, deletions, rules);

  return {
    filename,
    changeType: normalizeStatus(record.status),
    category,
    isBreaking,
    impact: assessImpact(category, isBreaking, additions, rules),
    affectsApi: category === "api" || filename.toLowerCase().includes("api"),
    affectsUi: category === "frontend",
    requiresMigration: isBreaking && rules.migrationCategories.includes(category),
    additions,
    deletions,
  };
}
