import { STRATEGY_DESCRIPTIONS, aggregateChanges } from "../src/analysis/aggregateChanges";
import { coverageResult } from "../src/analysis/analyzeCoverage";
import { classifyFileChange } from "../src/analysis/classifyFileChange";
import { planActions } from "../src/analysis/planActions";
import { createReviewState } from "../src/agent";
import {
  buildReport,
  estimateEffort,
  renderComment,
  splitComment,
  toReportJson,
} from "../src/report";
import type { ActionKind, CoverageMap, DocumentationAction, ReviewState } from "../src/types";
import { record } from "./helpers";

const REASON =
  "1 significant change in api (auth/api/login_controller.py); includes breaking changes; no existing documentation found";

function reviewedState(coverage: CoverageMap = {}): ReviewState {
  const state = createReviewState({ owner: "acme", repo: "shop", pull_number: 7, prTitle: "Add login" });
  const descriptors = [classifyFileChange(record("auth/api/login_controller.py", 60, 15))];
  const changeSummary = aggregateChanges(descriptors);
  return {
    ...state,
    descriptors,
    changeSummary,
    coverage,
    actionPlan: planActions(changeSummary, coverage, descriptors),
  };
}

function actionOf(kind: ActionKind): DocumentationAction {
  const [action] = reviewedState().actionPlan ?? [];
  return { ...action, action: kind };
}

describe("estimateEffort", () => {
  it("weighs creations above updates and reviews", () => {
    expect(estimateEffort([])).toBe("Low");
    expect(estimateEffort([actionOf("update_page")])).toBe("Low");
    expect(estimateEffort([actionOf("create_page")])).toBe("Medium");
    expect(
      estimateEffort([actionOf("create_page"), actionOf("review_page"), actionOf("archive_page")])
    ).toBe("Medium");
    expect(
      estimateEffort([actionOf("create_page"), actionOf("create_page"), actionOf("update_page")])
    ).toBe("High");
  });
});

describe("buildReport", () => {
  it("summarizes the plan", () => {
    const report = buildReport(reviewedState());

    expect(report).toMatchObject({
      repository: "acme/shop",
      pullNumber: 7,
      prTitle: "Add login",
      summary: "1 file changed; 1 high-impact; top categories: api; 1 breaking change",
      contentStrategy: STRATEGY_DESCRIPTIONS.migration_and_api_docs,
      totalActions: 1,
      estimatedEffort: "Medium",
      spacesAffected: ["DOCS"],
      changeCategories: ["api"],
      criticalUpdates: [`API Migration Guide: ${REASON}`],
      coverage: {},
      generatedContent: [],
    });
  });

  it("requires the code analysis to have run", () => {
    const state = createReviewState({ owner: "acme", repo: "shop", pull_number: 7 });
    expect(() => buildReport(state)).toThrow(
      "Code analysis must be performed before building the report"
    );
  });
});

describe("toReportJson", () => {
  it("writes snake_case fields", () => {
    const coverage = { api: coverageResult("api", "q", [{ id: "42", title: "API Reference" }]) };
    const json = toReportJson(buildReport(reviewedState(coverage)));

    expect(json.pull_number).toBe(7);
    expect(json.total_actions).toBe(1);
    expect(json.change_summary.total_files).toBe(1);
    expect(json.change_summary.strategy_hint).toBe("migration_and_api_docs");
    expect(json.confluence_actions[0]).toMatchObject({
      action: "update_page",
      page_id: "42",
      space_key: "DOCS",
      page_title: "API Reference",
      change_category: "api",
      priority: "critical",
      content_strategy: "contextual_updates",
      related_pages: [{ id: "42", title: "API Reference", space_key: null, relevance: "high" }],
    });
    expect(json.coverage.api).toMatchObject({
      query: "q",
      has_coverage: true,
      lookup_failed: false,
      error: null,
    });
  });

  it("writes a null page id for new pages", () => {
    const json = toReportJson(buildReport(reviewedState()));
    expect(json.confluence_actions[0].page_id).toBeNull();
    expect(json.confluence_actions[0].page_title).toBe("API Migration Guide");
  });
});

describe("renderComment", () => {
  it("states that nothing is required for an empty plan", () => {
    const state = createReviewState({ owner: "acme", repo: "shop", pull_number: 7 });
    const report = buildReport({ ...state, changeSummary: aggregateChanges([]), actionPlan: [] });

    expect(renderComment(report)).toBe(
      "## 📋 Documentation Review\n\n" +
        "### 📊 Executive Summary\n\n" +
        "**Strategy:** Standard documentation update\n\n" +
        "**Impact:** No file changes detected\n\n" +
        "**Total Actions:** 0\n\n" +
        "**Estimated Effort:** Low\n\n" +
        "**Spaces Affected:** N/A\n\n" +
        "### ✅ No Documentation Updates Required\n\n" +
        "This PR does not appear to require any documentation changes.\n"
    );
  });

  it("groups actions by priority with a create link", () => {
    const comment = renderComment(buildReport(reviewedState()), "https://wiki.example.com/");

    expect(comment).toContain(`### 🚨 Critical Updates Required\n\n⚠️ API Migration Guide: ${REASON}\n\n`);
    expect(comment).toContain(
      "#### 🚨 Critical Priority (1 action)\n\n##### Create: API Migration Guide\n\n"
    );
    expect(comment).toContain("| **⚠️ Breaking Changes** | Yes |\n");
    expect(comment).toContain(
      "[➕ **Create Page**](https://wiki.example.com/wiki/pages/createpage.action?spaceKey=DOCS&title=API%20Migration%20Guide)\n\n"
    );
    expect(comment).not.toContain("Medium Priority");
  });

  it("links existing pages and includes drafted content", () => {
    const coverage = {
      api: coverageResult("api", "q", [{ id: "42", title: "API Reference", spaceKey: "ENG" }]),
    };
    const state = reviewedState(coverage);
    const report = buildReport({
      ...state,
      generatedContent: [
        {
          pageTitle: "API Reference",
          action: "update_page",
          contextualUpdates: [
            {
              updateType: "addition",
              targetHeading: "Authentication",
              locationType: "after",
              positionDescription: "After the login section",
              contentToAdd: "<p>Tokens now expire.</p>",
            },
          ],
          implementationNotes: "Check the examples",
        },
      ],
    });

    const comment = renderComment(report, "https://wiki.example.com");

    expect(comment).toContain("##### Update: API Reference\n\n");
    expect(comment).toContain(
      "**Update 1: addition**\n- **Location:** After the login section\n- **Target:** Authentication\n- **Action:** after\n\n```xml\n<p>Tokens now expire.</p>\n```\n\n"
    );
    expect(comment).toContain("**Implementation Notes:** Check the examples\n\n");
    expect(comment).toContain(
      "[📝 **Edit Page**](https://wiki.example.com/wiki/spaces/ENG/pages/42) | [👁️ **View Page**](https://wiki.example.com/wiki/spaces/ENG/pages/42)\n\n"
    );
  });
});

describe("splitComment", () => {
  it("returns short comments unchanged", () => {
    expect(splitComment("short", 100)).toEqual(["short"]);
  });

  it("splits on line boundaries and labels continuation parts", () => {
    const content = "aaaa\nbbbb\ncccc\ndddd\neeee\nffff\ngggg\nhhhh\niiii\njjjj\nkkkk\nllll";

    const parts = splitComment(content, 54);

    expect(parts).toHaveLength(6);
    expect(parts[0]).toBe("aaaa\nbbbb\n");
    expect(parts[1]).toBe("### 📋 Documentation Review (Part 2/6)\n\ncccc\ndddd\n");
    expect(parts[5]).toBe("### 📋 Documentation Review (Part 6/6)\n\nkkkk\nllll\n");
    expect(parts.every((part) => part.length <= 54)).toBe(true);
  });

  it("cuts lines longer than a part", () => {
    const parts = splitComment("x".repeat(60), 54);

    expect(parts).toHaveLength(7);
    expect(parts[0]).toBe("x".repeat(10));
    expect(parts[6]).toBe("### 📋 Documentation Review (Part 7/7)\n\n\n");
    expect(parts.every((part) => part.length <= 54)).toBe(true);
  });
});
