import { defaultConfig, defaultThresholds } from "../config";
import type {
  ActionKind,
  ChangeCategory,
  ChangeDescriptor,
  ChangeSetSummary,
  ContentStrategy,
  CoverageMap,
  CoverageResult,
  DocumentationAction,
  PageMatch,
  Priority,
  Thresholds,
} from "../types";
import { isSignificant } from "./aggregateChanges";

export interface PlanOptions {
  thresholds?: Thresholds;
  topicKeywords?: Partial<Record<ChangeCategory, string>>;
  defaultSpaceKey?: string;
  audiences?: Partial<Record<ChangeCategory, string[]>>;
}

export const CATEGORY_LABELS: Record<ChangeCategory, string> = {
  api: "API",
  configuration: "Configuration",
  frontend: "Frontend",
  backend: "Backend",
  test: "Testing",
  documentation: "Documentation",
  database: "Database",
  infrastructure: "Infrastructure",
  other: "General",
};

// Ascending; index doubles as rank.
const PRIORITY_LEVELS: readonly Priority[] = ["low", "medium", "high", "critical"];

export function priorityRank(priority: Priority): number {
  return PRIORITY_LEVELS.indexOf(priority);
}

export interface TopicGroup {
  category: ChangeCategory;
  topic: string;
  members: ChangeDescriptor[];
  significant: ChangeDescriptor[];
}

export function topicForCategory(
  category: ChangeCategory,
  topicKeywords: Partial<Record<ChangeCategory, string>> = {}
): string {
  const keyword = topicKeywords[category]?.trim();
  return keyword ? keyword : category;
}

/** Categories holding at least one significant change, in first-seen order. */
export function candidateTopics(
  descriptors: readonly ChangeDescriptor[],
  options: PlanOptions = {}
): TopicGroup[] {
  const thresholds = options.thresholds ?? defaultThresholds;
  const groups = new Map<ChangeCategory, TopicGroup>();

  for (const descriptor of descriptors) {
    let group = groups.get(descriptor.category);
    if (!group) {
      group = {
        category: descriptor.category,
        topic: topicForCategory(descriptor.category, options.topicKeywords),
        members: [],
        significant: [],
      };
      groups.set(descriptor.category, group);
    }
    group.members.push(descriptor);
    if (isSignificant(descriptor, thresholds)) group.significant.push(descriptor);
  }

  return [...groups.values()].filter((group) => group.significant.length > 0);
}

export function topicPriority(members: readonly ChangeDescriptor[]): Priority {
  let priority: Priority;
  if (members.some((d) => d.isBreaking && d.affectsApi)) {
    priority = "critical";
  } else if (members.some((d) => d.impact === "high")) {
    priority = "high";
  } else if (members.every((d) => d.impact === "low")) {
    priority = "low";
  } else {
    priority = "medium";
  }

  if (members.some((d) => d.requiresMigration)) {
    const raised = Math.min(priorityRank(priority) + 1, PRIORITY_LEVELS.length - 1);
    priority = PRIORITY_LEVELS[raised];
  }
  return priority;
}

export function chooseStrategy(
  coverage: CoverageResult | undefined,
  hasBreaking: boolean
): ContentStrategy {
  if (coverage?.hasCoverage) return "contextual_updates";
  return hasBreaking ? "both" : "complete_content";
}

function chooseTarget(
  pages: readonly PageMatch[],
  allDeleted: boolean
): { action: ActionKind; page: PageMatch } | undefined {
  const best = pages.find((page) => page.relevance === "high");
  if (allDeleted && pages.length > 0) {
    return { action: "archive_page", page: best ?? pages[0] };
  }
  if (best) return { action: "update_page", page: best };
  if (pages.length > 0) return { action: "review_page", page: pages[0] };
  return undefined;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

function describeReason(
  group: TopicGroup,
  coverage: CoverageResult | undefined,
  breaking: boolean,
  migration: boolean
): string {
  const parts = [
    `${plural(group.significant.length, "significant change")} in ${group.category} (${group.significant
      .map((d) => d.filename)
      .join(", ")})`,
  ];
  if (breaking) parts.push("includes breaking changes");
  if (migration) parts.push("migration required");

  if (coverage?.lookupFailed) {
    parts.push("documentation lookup failed, treated as uncovered");
  } else if (coverage?.hasCoverage) {
    parts.push(`${plural(coverage.pages.length, "existing page")} found`);
  } else {
    parts.push("no existing documentation found");
  }
  return parts.join("; ");
}

function audiencesFor(
  group: TopicGroup,
  audiences: Partial<Record<ChangeCategory, string[]>>
): string[] {
  const tags = [...(audiences[group.category] ?? [])];
  if (group.members.some((d) => d.affectsApi)) tags.push("api-consumers");
  if (group.members.some((d) => d.affectsUi)) tags.push("end-users");
  return [...new Set(tags)];
}

/**
 * Turns classified changes and coverage results into an ordered list of
 * documentation actions, one per topic with a significant change.
 * Sorted critical first; equal priorities keep first-seen topic order.
 */
export function planActions(
  summary: ChangeSetSummary,
  coverage: CoverageMap,
  descriptors: readonly ChangeDescriptor[],
  options: PlanOptions = {}
): DocumentationAction[] {
  if (summary.totalFiles === 0 || descriptors.length === 0) return [];

  const audiences = options.audiences ?? defaultConfig.audiences;
  const defaultSpaceKey = options.defaultSpaceKey ?? defaultConfig.defaultSpaceKey;

  const actions = candidateTopics(descriptors, options).map((group) => {
    const topicCoverage = coverage[group.topic];
    const breaking = group.members.some((d) => d.isBreaking);
    const migration = group.members.some((d) => d.requiresMigration);
    const contentStrategy = chooseStrategy(topicCoverage, breaking);
    const pages = topicCoverage?.pages ?? [];
    const allDeleted = group.members.every((d) => d.changeType === "deleted");
    const target = topicCoverage?.hasCoverage ? chooseTarget(pages, allDeleted) : undefined;
    const label = CATEGORY_LABELS[group.category];

    const action: DocumentationAction = {
      action: target?.action ?? "create_page",
      spaceKey: target?.page.spaceKey ?? defaultSpaceKey,
      pageTitle:
        target?.page.title ??
        (contentStrategy === "both" ? `${label} Migration Guide` : `${label} Documentation`),
      pageId: target?.page.id,
      topic: group.topic,
      category: group.category,
      priority: topicPriority(group.members),
      contentStrategy,
      reason: describeReason(group, topicCoverage, breaking, migration),
      affectedAudiences: audiencesFor(group, audiences),
      breakingChanges: breaking,
      migrationRequired: migration,
      sourceFiles: group.members.map((d) => d.filename),
      relatedPages: pages,
    };
    return action;
  });

  return actions.sort((a, b) => priorityRank(b.priority) - priorityRank(a.priority));
}
