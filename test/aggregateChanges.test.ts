import {
  NO_CHANGES_NARRATIVE,
  STRATEGY_DESCRIPTIONS,
  aggregateChanges,
  leadingCategories,
} from "../src/analysis/aggregateChanges";
import { classifyFileChange } from "../src/analysis/classifyFileChange";
import { defaultThresholds } from "../src/config";
import { descriptor, record } from "./helpers";

const descriptors = [
  record("auth/api/login_controller.py", 60, 15),
  record("config/settings.yml", 5, 0, "added"),
  record("src/utils/parser.ts", 150, 0),
  record("README.md", 30, 2),
].map((input) => classifyFileChange(input));

describe("aggregateChanges", () => {
  it("summarizes a mixed change set", () => {
    const summary = aggregateChanges(descriptors);

    expect(summary.totalFiles).toBe(4);
    expect(summary.filesByCategory).toEqual({
      api: 1,
      configuration: 1,
      frontend: 0,
      backend: 0,
      test: 0,
      documentation: 1,
      database: 0,
      infrastructure: 0,
      other: 1,
    });
    expect(summary.filesByImpact).toEqual({ high: 1, medium: 2, low: 1 });
    expect(summary.filesByStatus).toEqual({ added: 1, modified: 3, deleted: 0, renamed: 0 });
    expect(summary.totalAdditions).toBe(245);
    expect(summary.totalDeletions).toBe(17);
    expect(summary.breakingChanges).toEqual(["auth/api/login_controller.py"]);
    expect(summary.apiChanges).toEqual(["auth/api/login_controller.py"]);
    expect(summary.configChanges).toEqual(["config/settings.yml"]);
    expect(summary.significantChanges).toEqual([
      "auth/api/login_controller.py",
      "src/utils/parser.ts",
      "README.md",
    ]);
    expect(summary.narrative).toBe(
      "4 files changed; 1 high-impact; top categories: api, configuration, documentation; 1 breaking change"
    );
    expect(summary.strategyHint).toBe("migration_and_api_docs");
    expect(summary.strategyDescription).toBe(STRATEGY_DESCRIPTIONS.migration_and_api_docs);
  });

  it("handles an empty change set", () => {
    const summary = aggregateChanges([]);

    expect(summary.totalFiles).toBe(0);
    expect(summary.filesByImpact).toEqual({ high: 0, medium: 0, low: 0 });
    expect(Object.values(summary.filesByCategory).every((count) => count === 0)).toBe(true);
    expect(summary.significantChanges).toEqual([]);
    expect(summary.narrative).toBe(NO_CHANGES_NARRATIVE);
    expect(summary.strategyHint).toBe("standard_update");
  });

  it("counts independently of input order and keeps list order", () => {
    const forward = aggregateChanges(descriptors);
    const reversed = aggregateChanges([...descriptors].reverse());

    expect(reversed.totalFiles).toBe(forward.totalFiles);
    expect(reversed.filesByCategory).toEqual(forward.filesByCategory);
    expect(reversed.filesByImpact).toEqual(forward.filesByImpact);
    expect(reversed.strategyHint).toBe(forward.strategyHint);
    expect(reversed.significantChanges).toEqual([
      "README.md",
      "src/utils/parser.ts",
      "auth/api/login_controller.py",
    ]);
  });

  it("suggests a comprehensive guide for several high-impact changes", () => {
    const highImpact = ["a.ts", "b.ts", "c.ts"].map((filename) =>
      descriptor({ filename, impact: "high", additions: 30 })
    );

    const summary = aggregateChanges(highImpact);
    expect(summary.strategyHint).toBe("new_comprehensive_guide");
    expect(summary.narrative).toBe(
      "3 files changed; 3 high-impact; top categories: other; 0 breaking changes"
    );

    expect(aggregateChanges(highImpact.slice(0, 2)).strategyHint).toBe("standard_update");
    expect(
      aggregateChanges(highImpact.slice(0, 2), {
        ...defaultThresholds,
        comprehensiveGuideHighImpact: 2,
      }).strategyHint
    ).toBe("new_comprehensive_guide");
  });

  it("treats a change as significant strictly above the thresholds", () => {
    const summary = aggregateChanges([
      descriptor({ filename: "edge.ts", additions: 20, deletions: 10 }),
      descriptor({ filename: "adds.ts", additions: 21 }),
      descriptor({ filename: "dels.ts", deletions: 11 }),
    ]);
    expect(summary.significantChanges).toEqual(["adds.ts", "dels.ts"]);
  });
});

describe("leadingCategories", () => {
  it("orders by count and breaks ties by category priority", () => {
    const counts = {
      api: 1,
      configuration: 0,
      frontend: 2,
      backend: 0,
      test: 4,
      documentation: 0,
      database: 2,
      infrastructure: 0,
      other: 1,
    };
    expect(leadingCategories(counts)).toEqual(["test", "frontend", "database"]);
    expect(leadingCategories(counts, 5)).toEqual(["test", "frontend", "database", "api", "other"]);
  });
});
