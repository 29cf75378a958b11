import { ALL_CATEGORIES, defaultThresholds } from "../config";
import type {
  ChangeCategory,
  ChangeDescriptor,
  ChangeSetSummary,
  ChangeStatus,
  ImpactLevel,
  StrategyHint,
  Thresholds,
} from "../types";

export const STRATEGY_DESCRIPTIONS: Record<StrategyHint, string> = {
  migration_and_api_docs:
    "Breaking or API changes detected: write a migration guide and update the API documentation",
  new_comprehensive_guide:
    "Several high-impact changes: write a new comprehensive guide",
  standard_update: "Standard documentation update",
};

export const NO_CHANGES_NARRATIVE = "No file changes detected";

export function isSignificant(
  descriptor: Pick<ChangeDescriptor, "additions" | "deletions">,
  thresholds: Thresholds = defaultThresholds
): boolean {
  return (
    descriptor.additions > thresholds.significantAdditions ||
    descriptor.deletions > thresholds.significantDeletions
  );
}

function emptyCategoryCounts(): Record<ChangeCategory, number> {
  return {
    api: 0,
    configuration: 0,
    frontend: 0,
    backend: 0,
    test: 0,
    documentation: 0,
    database: 0,
    infrastructure: 0,
    other: 0,
  };
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

// Most frequent first; equal counts fall back to category priority order.
export function leadingCategories(
  counts: Record<ChangeCategory, number>,
  limit = 3
): ChangeCategory[] {
  return ALL_CATEGORIES.filter((category) => counts[category] > 0)
    .map((category, index) => ({ category, index, count: counts[category] }))
    .sort((a, b) => b.count - a.count || a.index - b.index)
    .slice(0, limit)
    .map(({ category }) => category);
}

function chooseStrategy(
  apiChanges: string[],
  breakingChanges: string[],
  highImpact: number,
  thresholds: Thresholds
): StrategyHint {
  if (apiChanges.length > 0 || breakingChanges.length > 0) {
    return "migration_and_api_docs";
  }
  if (highImpact >= thresholds.comprehensiveGuideHighImpact) {
    return "new_comprehensive_guide";
  }
  return "standard_update";
}

/**
 * Rolls per-file descriptors up into change-set statistics. Counts do not
 * depend on input order; the filename lists keep it.
 */
export function aggregateChanges(
  descriptors: readonly ChangeDescriptor[],
  thresholds: Thresholds = defaultThresholds
): ChangeSetSummary {
  const filesByCategory = emptyCategoryCounts();
  const filesByImpact: Record<ImpactLevel, number> = { high: 0, medium: 0, low: 0 };
  const filesByStatus: Record<ChangeStatus, number> = {
    added: 0,
    modified: 0,
    deleted: 0,
    renamed: 0,
  };
  const breakingChanges: string[] = [];
  const apiChanges: string[] = [];
  const configChanges: string[] = [];
  const significantChanges: string[] = [];
  let totalAdditions = 0;
  let totalDeletions = 0;

  for (const descriptor of descriptors) {
    filesByCategory[descriptor.category] += 1;
    filesByImpact[descriptor.impact] += 1;
    filesByStatus[descriptor.changeType] += 1;
    totalAdditions += descriptor.additions;
    totalDeletions += descriptor.deletions;

    if (descriptor.isBreaking) breakingChanges.push(descriptor.filename);
    if (descriptor.affectsApi) apiChanges.push(descriptor.filename);
    if (descriptor.category === "configuration") {
      configChanges.push(descriptor.filename);
    }
    if (isSignificant(descriptor, thresholds)) {
      significantChanges.push(descriptor.filename);
    }
  }

  const strategyHint = chooseStrategy(
    apiChanges,
    breakingChanges,
    filesByImpact.high,
    thresholds
  );

  return {
    totalFiles: descriptors.length,
    filesByCategory,
    filesByImpact,
    filesByStatus,
    totalAdditions,
    totalDeletions,
    breakingChanges,
    apiChanges,
    configChanges,
    significantChanges,
    narrative:
      descriptors.length === 0
        ? NO_CHANGES_NARRATIVE
        : [
          `${plural(descriptors.length, "file")} changed`,
          `${filesByImpact.high} high-impact`,
          `top categories: ${leadingCategories(filesByCategory).join(", ")}`,
          plural(breakingChanges.length, "breaking change"),
        ].join("; "),
    strategyHint,
    strategyDescription: STRATEGY_DESCRIPTIONS[strategyHint],
  };
}
