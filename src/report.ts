import { ALL_CATEGORIES } from "./config";
import type {
  ActionKind,
  CoverageMap,
  DocImpactReport,
  DocumentationAction,
  GeneratedContent,
  PageMatch,
  Priority,
  ReviewState,
} from "./types";

const EFFORT_POINTS: Record<ActionKind, number> = {
  create_page: 3,
  update_page: 2,
  review_page: 1,
  archive_page: 1,
};

export function estimateEffort(actions: readonly DocumentationAction[]): DocImpactReport["estimatedEffort"] {
  const points = actions.reduce((sum, action) => sum + EFFORT_POINTS[action.action], 0);
  if (points <= 2) return "Low";
  if (points <= 6) return "Medium";
  return "High";
}

export function buildReport(state: ReviewState): DocImpactReport {
  if (!state.changeSummary) {
    throw new Error("Code analysis must be performed before building the report");
  }
  const summary = state.changeSummary;
  const actions = state.actionPlan ?? [];

  return {
    repository: `${state.owner}/${state.repo}`,
    pullNumber: state.pull_number,
    prTitle: state.prTitle ?? "",
    summary: summary.narrative,
    contentStrategy: summary.strategyDescription,
    changeSummary: summary,
    actions,
    totalActions: actions.length,
    estimatedEffort: estimateEffort(actions),
    spacesAffected: [...new Set(actions.map((action) => action.spaceKey))],
    changeCategories: ALL_CATEGORIES.filter((c) => summary.filesByCategory[c] > 0),
    criticalUpdates: actions
      .filter((action) => action.priority === "critical")
      .map((action) => `${action.pageTitle}: ${action.reason}`),
    coverage: state.coverage ?? {},
    generatedContent: state.generatedContent ?? [],
  };
}

function pageJson(page: PageMatch) {
  return {
    id: page.id,
    title: page.title,
    space_key: page.spaceKey ?? null,
    relevance: page.relevance,
  };
}

function coverageJson(coverage: CoverageMap) {
  return Object.fromEntries(
    Object.entries(coverage).map(([topic, result]) => [
      topic,
      {
        query: result.query,
        has_coverage: result.hasCoverage,
        lookup_failed: result.lookupFailed,
        error: result.error ?? null,
        recommended_approach: result.recommendedApproach,
        pages: result.pages.map(pageJson),
      },
    ])
  );
}

function draftJson(draft: GeneratedContent) {
  return {
    page_title: draft.pageTitle,
    action: draft.action,
    confluence_markup: draft.confluenceMarkup ?? null,
    contextual_updates: (draft.contextualUpdates ?? []).map((update) => ({
      update_type: update.updateType,
      target_heading: update.targetHeading ?? null,
      location_type: update.locationType,
      position_description: update.positionDescription,
      content_to_add: update.contentToAdd,
    })),
    implementation_notes: draft.implementationNotes ?? null,
  };
}

/** The persisted document read by downstream automation. */
export function toReportJson(report: DocImpactReport) {
  const summary = report.changeSummary;
  return {
    repository: report.repository,
    pull_number: report.pullNumber,
    pr_title: report.prTitle,
    summary: report.summary,
    content_strategy: report.contentStrategy,
    total_actions: report.totalActions,
    estimated_effort: report.estimatedEffort,
    spaces_affected: report.spacesAffected,
    change_categories: report.changeCategories,
    critical_updates: report.criticalUpdates,
    change_summary: {
      total_files: summary.totalFiles,
      files_by_category: summary.filesByCategory,
      files_by_impact: summary.filesByImpact,
      files_by_status: summary.filesByStatus,
      total_additions: summary.totalAdditions,
      total_deletions: summary.totalDeletions,
      breaking_changes: summary.breakingChanges,
      api_changes: summary.apiChanges,
      config_changes: summary.configChanges,
      significant_changes: summary.significantChanges,
      narrative: summary.narrative,
      strategy_hint: summary.strategyHint,
    },
    confluence_actions: report.actions.map((action) => ({
      action: action.action,
      page_id: action.pageId ?? null,
      space_key: action.spaceKey,
      page_title: action.pageTitle,
      topic: action.topic,
      change_category: action.category,
      priority: action.priority,
      content_strategy: action.contentStrategy,
      reason: action.reason,
      affected_audiences: action.affectedAudiences,
      breaking_changes: action.breakingChanges,
      migration_required: action.migrationRequired,
      source_files: action.sourceFiles,
      related_pages: action.relatedPages.map(pageJson),
    })),
    coverage: coverageJson(report.coverage),
    generated_content: report.generatedContent.map(draftJson),
  };
}

const PRIORITY_SECTIONS: ReadonlyArray<{ priority: Priority; emoji: string; label: string }> = [
  { priority: "critical", emoji: "🚨", label: "Critical" },
  { priority: "high", emoji: "🔴", label: "High" },
  { priority: "medium", emoji: "🟡", label: "Medium" },
  { priority: "low", emoji: "🟢", label: "Low" },
];

const ACTION_VERBS: Record<ActionKind, string> = {
  create_page: "Create",
  update_page: "Update",
  review_page: "Review",
  archive_page: "Archive",
};

function actionLinks(action: DocumentationAction, confluenceUrl?: string): string {
  if (!confluenceUrl) return "";
  const base = confluenceUrl.replace(/\/+$/, "");
  if (action.action === "create_page") {
    const url = `${base}/wiki/pages/createpage.action?spaceKey=${encodeURIComponent(action.spaceKey)}&title=${encodeURIComponent(action.pageTitle)}`;
    return `[➕ **Create Page**](${url})\n\n`;
  }
  if (!action.pageId) return "";
  const url = `${base}/wiki/spaces/${action.spaceKey}/pages/${action.pageId}`;
  return `[📝 **Edit Page**](${url}) | [👁️ **View Page**](${url})\n\n`;
}

function renderDraft(draft: GeneratedContent): string {
  let out = "";
  if (draft.confluenceMarkup) {
    out += "**Confluence Markup:**\n\n";
    out += `\`\`\`xml\n${draft.confluenceMarkup}\n\`\`\`\n\n`;
  }
  (draft.contextualUpdates ?? []).forEach((update, index) => {
    out += `**Update ${index + 1}: ${update.updateType}**\n`;
    out += `- **Location:** ${update.positionDescription}\n`;
    if (update.targetHeading) out += `- **Target:** ${update.targetHeading}\n`;
    out += `- **Action:** ${update.locationType}\n\n`;
    out += `\`\`\`xml\n${update.contentToAdd}\n\`\`\`\n\n`;
  });
  if (draft.implementationNotes) {
    out += `**Implementation Notes:** ${draft.implementationNotes}\n\n`;
  }
  return out;
}

function renderAction(
  action: DocumentationAction,
  drafts: readonly GeneratedContent[],
  confluenceUrl?: string
): string {
  let out = `##### ${ACTION_VERBS[action.action]}: ${action.pageTitle}\n\n`;
  out += "| Field | Details |\n";
  out += "|-------|---------|\n";
  out += `| **Space** | ${action.spaceKey} |\n`;
  out += `| **Reason** | ${action.reason} |\n`;
  out += `| **Change Type** | ${action.category} |\n`;
  out += `| **Strategy** | ${action.contentStrategy} |\n`;
  if (action.affectedAudiences.length > 0) {
    out += `| **Affects** | ${action.affectedAudiences.join(", ")} |\n`;
  }
  if (action.breakingChanges) out += "| **⚠️ Breaking Changes** | Yes |\n";
  if (action.migrationRequired) out += "| **📋 Migration Required** | Yes |\n";
  out += "\n";

  const draft = drafts.find(
    (d) => d.pageTitle === action.pageTitle && d.action === action.action
  );
  if (draft) out += renderDraft(draft);
  if (action.relatedPages.length > 0) {
    out += `**Related Pages:** ${action.relatedPages.map((p) => p.title).join(", ")}\n\n`;
  }
  out += actionLinks(action, confluenceUrl);
  out += "---\n\n";
  return out;
}

/** Markdown PR comment summarizing the report. */
export function renderComment(report: DocImpactReport, confluenceUrl?: string): string {
  let comment = "## 📋 Documentation Review\n\n";

  comment += "### 📊 Executive Summary\n\n";
  comment += `**Strategy:** ${report.contentStrategy}\n\n`;
  comment += `**Impact:** ${report.summary}\n\n`;
  comment += `**Total Actions:** ${report.totalActions}\n\n`;
  comment += `**Estimated Effort:** ${report.estimatedEffort}\n\n`;
  comment += `**Spaces Affected:** ${report.spacesAffected.join(", ") || "N/A"}\n\n`;
  if (report.changeCategories.length > 0) {
    comment += `**Change Categories:** ${report.changeCategories.join(", ")}\n\n`;
  }

  if (report.criticalUpdates.length > 0) {
    comment += "### 🚨 Critical Updates Required\n\n";
    report.criticalUpdates.forEach((update) => {
      comment += `⚠️ ${update}\n\n`;
    });
  }

  if (report.actions.length === 0) {
    comment += "### ✅ No Documentation Updates Required\n\n";
    comment += "This PR does not appear to require any documentation changes.\n";
    return comment;
  }

  comment += "### 📝 Documentation Actions Required\n\n";
  for (const section of PRIORITY_SECTIONS) {
    const actions = report.actions.filter((a) => a.priority === section.priority);
    if (actions.length === 0) continue;
    const noun = actions.length > 1 ? "actions" : "action";
    comment += `#### ${section.emoji} ${section.label} Priority (${actions.length} ${noun})\n\n`;
    actions.forEach((action) => {
      comment += renderAction(action, report.generatedContent, confluenceUrl);
    });
  }
  return comment;
}

function partHeader(index: number, total: number): string {
  return `### 📋 Documentation Review (Part ${index}/${total})\n\n`;
}

function chunk(text: string, size: number): string[] {
  const pieces: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    pieces.push(text.slice(i, i + size));
  }
  return pieces;
}

/**
 * Splits on line boundaries so each part, header included, fits in one
 * GitHub comment. Lines longer than a part are cut.
 */
export function splitComment(content: string, maxLength: number): string[] {
  if (content.length <= maxLength) return [content];

  // Leave room for the widest header: "Part 999/999".
  const budget = Math.max(1, maxLength - partHeader(999, 999).length);
  const parts: string[] = [];
  let current = "";
  for (const line of content.split("\n")) {
    for (const piece of chunk(line + "\n", budget)) {
      if (current.length + piece.length > budget) {
        if (current) parts.push(current);
        current = piece;
      } else {
        current += piece;
      }
    }
  }
  if (current) parts.push(current);

  return parts.map((part, index) =>
    index === 0 ? part : `${partHeader(index + 1, parts.length)}${part}`
  );
}
