import type {
  CategoryRule,
  ChangeCategory,
  ClassificationRules,
  DocConfig,
  DocImpactConfig,
  Thresholds,
} from "./types";

// Evaluation order of category rules. The first matching rule wins, so this
// order is part of the classification contract and is never user-configurable.
export const CATEGORY_PRIORITY: readonly ChangeCategory[] = [
  "api",
  "configuration",
  "frontend",
  "backend",
  "test",
  "documentation",
  "database",
  "infrastructure",
];

export const ALL_CATEGORIES: readonly ChangeCategory[] = [
  ...CATEGORY_PRIORITY,
  "other",
];

export const defaultThresholds: Thresholds = {
  breakingDeletions: 10,
  breakingAdditions: 50,
  largeChangeAdditions: 100,
  significantAdditions: 20,
  significantDeletions: 10,
  comprehensiveGuideHighImpact: 3,
};

export const defaultConfig: Required<DocConfig> = {
  ignorePatterns: [
    "**/package-lock.json",
    "**/yarn.lock",
    "**/pnpm-lock.yaml",
    "**/composer.lock",
    "**/node_modules/**",
    "**/dist/**",
    "**/*.min.js",
    "**/*.map",
  ],
  categoryKeywords: {
    api: ["api", "endpoint", "route", "openapi", "swagger", "graphql"],
    configuration: ["config", "env", "setting"],
    frontend: [
      "frontend",
      "component",
      "ui/",
      "views/",
      "pages/",
      ".tsx",
      ".jsx",
      ".vue",
      ".svelte",
      ".css",
      ".scss",
      ".html",
    ],
    backend: [
      "backend",
      "server",
      "service",
      "controller",
      "handler",
      "middleware",
      "model",
      "worker",
    ],
    test: ["test", "spec", "__mocks__", "fixture"],
    documentation: ["readme", "docs", "guide", "changelog", ".md", ".rst"],
    database: ["migration", "schema", "database", ".sql", "db/", "seed"],
    infrastructure: [
      "docker",
      "k8s",
      "kubernetes",
      "helm",
      "terraform",
      ".tf",
      ".github/workflows",
      "deploy",
      "infra",
      "jenkinsfile",
      "makefile",
    ],
  },
  breakingKeywords: ["api", "interface", "contract", "schema"],
  migrationCategories: ["database"],
  thresholds: defaultThresholds,

  topicLimit: 3,
  lookupTimeoutMs: 10_000,
  lookupConcurrency: 3,
  spaceKeys: [],
  topicKeywords: {},

  defaultSpaceKey: "DOCS",
  audiences: {
    api: ["developers"],
    configuration: ["operators", "developers"],
    frontend: ["end-users"],
    backend: ["developers"],
    test: ["qa"],
    documentation: ["technical-writers"],
    database: ["developers", "operators"],
    infrastructure: ["operators"],
    other: ["developers"],
  },

  outputPath: "confluence_actions.json",
  postComment: false,
  confluenceUrl: "",

  generateContent: false,
  llmProvider: "openai",
  llmModel: "gpt-4.1",
  styleGuide: "",
};

function buildCategoryRules(
  keywords: Partial<Record<ChangeCategory, string[]>>
): CategoryRule[] {
  return CATEGORY_PRIORITY.map((category) => ({
    category,
    keywords: (keywords[category] ?? []).map((k) => k.toLowerCase()),
  }));
}

function buildAudiences(
  overrides: Partial<Record<ChangeCategory, string[]>>
): Record<ChangeCategory, string[]> {
  const base = defaultConfig.audiences;
  const pick = (category: ChangeCategory): string[] =>
    overrides[category] ?? base[category] ?? [];

  return {
    api: pick("api"),
    configuration: pick("configuration"),
    frontend: pick("frontend"),
    backend: pick("backend"),
    test: pick("test"),
    documentation: pick("documentation"),
    database: pick("database"),
    infrastructure: pick("infrastructure"),
    other: pick("other"),
  };
}

export const defaultClassificationRules: ClassificationRules = {
  categoryRules: buildCategoryRules(defaultConfig.categoryKeywords),
  breakingKeywords: defaultConfig.breakingKeywords,
  migrationCategories: defaultConfig.migrationCategories,
  thresholds: defaultThresholds,
};

// Non-finite numbers fall back to the default; the rest are clamped to >= 1.
function atLeastOne(value: number, fallback: number): number {
  return Number.isFinite(value) ? Math.max(1, Math.floor(value)) : fallback;
}

export function createFullConfig(userConfig: Partial<DocConfig>): DocImpactConfig {
  const config = { ...defaultConfig, ...userConfig };
  const thresholds: Thresholds = {
    ...defaultThresholds,
    ...(userConfig.thresholds ?? {}),
  };
  const categoryKeywords = {
    ...defaultConfig.categoryKeywords,
    ...(userConfig.categoryKeywords ?? {}),
  };
  const topicLimit = atLeastOne(config.topicLimit, defaultConfig.topicLimit);
  const concurrency = atLeastOne(config.lookupConcurrency, defaultConfig.lookupConcurrency);

  return {
    matchRules: {
      ignorePatterns: config.ignorePatterns,
      categoryRules: buildCategoryRules(categoryKeywords),
      breakingKeywords: config.breakingKeywords.map((k) => k.toLowerCase()),
      migrationCategories: config.migrationCategories,
      thresholds,
    },
    coverage: {
      topicLimit,
      lookupTimeoutMs: atLeastOne(config.lookupTimeoutMs, defaultConfig.lookupTimeoutMs),
      concurrency: Math.min(concurrency, topicLimit),
      spaceKeys: config.spaceKeys,
      topicKeywords: config.topicKeywords,
    },
    planning: {
      defaultSpaceKey: config.defaultSpaceKey,
      audiences: buildAudiences(userConfig.audiences ?? {}),
    },
    output: {
      path: config.outputPath,
      postComment: config.postComment,
      commentMaxLength: 60_000,
      confluenceUrl: config.confluenceUrl || process.env.CONFLUENCE_URL || undefined,
    },
    llmConfig: config.generateContent
      ? {
        provider: config.llmProvider,
        model: config.llmModel,
        styleGuide: config.styleGuide || undefined,
        temperature: 0.3,
      }
      : undefined,
  };
}
