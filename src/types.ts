export type ChangeStatus = "added" | "modified" | "deleted" | "renamed";

export type ChangeCategory =
  | "api"
  | "configuration"
  | "frontend"
  | "backend"
  | "test"
  | "documentation"
  | "database"
  | "infrastructure"
  | "other";

export type ImpactLevel = "high" | "medium" | "low";

export type Priority = "critical" | "high" | "medium" | "low";

export type ActionKind =
  | "create_page"
  | "update_page"
  | "review_page"
  | "archive_page";

export type ContentStrategy = "complete_content" | "contextual_updates" | "both";

export type StrategyHint =
  | "migration_and_api_docs"
  | "new_comprehensive_guide"
  | "standard_update";

export interface ChangeRecord {
  filename: string;
  status: ChangeStatus;
  additions: number;
  deletions: number;
}

// What actually arrives from upstream; any field may be missing.
// As received from the change source; any field may be missing or mistyped.
export interface RawChangeRecord {
  filename?: unknown;
  status?: unknown;
  additions?: unknown;
  deletions?: unknown;
}

export interface ChangeDescriptor {
  filename: string;
  changeType: ChangeStatus;
  category: ChangeCategory;
  isBreaking: boolean;
  impact: ImpactLevel;
  affectsApi: boolean;
  affectsUi: boolean;
  requiresMigration: boolean;
  additions: number;
  deletions: number;
}

export interface ChangeSetSummary {
  totalFiles: number;
  filesByCategory: Record<ChangeCategory, number>;
  filesByImpact: Record<ImpactLevel, number>;
  filesByStatus: Record<ChangeStatus, number>;
  totalAdditions: number;
  totalDeletions: number;
  breakingChanges: string[];
  apiChanges: string[];
  configChanges: string[];
  significantChanges: string[];
  narrative: string;
  strategyHint: StrategyHint;
  strategyDescription: string;
}

export interface PageRef {
  id: string;
  title: string;
  spaceKey?: string;
}

export interface PageMatch extends PageRef {
  relevance: "high" | "medium";
}

export interface RecommendedApproach {
  primary: "contextual_updates" | "complete_new_pages";
  secondary: "new_supporting_pages" | "minimal_existing_updates";
}

export interface CoverageResult {
  topic: string;
  query: string;
  pages: PageMatch[];
  hasCoverage: boolean;
  recommendedApproach: RecommendedApproach;
  lookupFailed: boolean;
  error?: string;
}

export type CoverageMap = Record<string, CoverageResult>;

export interface DocumentationAction {
  action: ActionKind;
  spaceKey: string;
  pageTitle: string;
  pageId?: string;
  topic: string;
  category: ChangeCategory;
  priority: Priority;
  contentStrategy: ContentStrategy;
  reason: string;
  affectedAudiences: string[];
  breakingChanges: boolean;
  migrationRequired: boolean;
  sourceFiles: string[];
  relatedPages: PageMatch[];
}

export interface PageContent extends PageRef {
  body: string;
  version?: number;
}

export interface SpaceRef {
  key: string;
  name: string;
}

export interface ContextualUpdate {
  updateType: string;
  targetHeading?: string;
  locationType: "before" | "after" | "replace" | "append";
  positionDescription: string;
  contentToAdd: string;
}

export interface GeneratedContent {
  pageTitle: string;
  action: ActionKind;
  confluenceMarkup?: string;
  contextualUpdates?: ContextualUpdate[];
  implementationNotes?: string;
}

// Collaborator capabilities. The core only depends on these shapes.

export interface ChangeSource {
  listChangedFiles(
    owner: string,
    repo: string,
    pullNumber: number
  ): Promise<RawChangeRecord[]>;
}

export interface DocumentationLookup {
  search(query: string, signal?: AbortSignal): Promise<PageRef[]>;
}

export interface DocumentationSource extends DocumentationLookup {
  listSpaces(): Promise<SpaceRef[]>;
  getPage(id: string): Promise<PageContent>;
}

export interface ContentGenerator {
  generate(
    action: DocumentationAction,
    page?: PageContent
  ): Promise<GeneratedContent>;
}

export interface CommentPublisher {
  publish(
    owner: string,
    repo: string,
    pullNumber: number,
    body: string
  ): Promise<string>;
}

export interface DocConfig {
  // Change matching
  ignorePatterns?: string[]; // Globs of paths never classified
  categoryKeywords?: Partial<Record<ChangeCategory, string[]>>;
  breakingKeywords?: string[];
  migrationCategories?: ChangeCategory[];
  thresholds?: Partial<Thresholds>;

  // Coverage lookups
  topicLimit?: number;
  lookupTimeoutMs?: number;
  lookupConcurrency?: number;
  spaceKeys?: string[]; // Restrict searches to these spaces
  topicKeywords?: Partial<Record<ChangeCategory, string>>;

  // Planning
  defaultSpaceKey?: string;
  audiences?: Partial<Record<ChangeCategory, string[]>>;

  // Output
  outputPath?: string;
  postComment?: boolean;
  confluenceUrl?: string;

  // Optional drafting
  generateContent?: boolean;
  llmProvider?: "openai" | "groq";
  llmModel?: string;
  styleGuide?: string;
}

export interface Thresholds {
  breakingDeletions: number;
  breakingAdditions: number;
  largeChangeAdditions: number;
  significantAdditions: number;
  significantDeletions: number;
  comprehensiveGuideHighImpact: number;
}

export interface CategoryRule {
  category: ChangeCategory;
  keywords: string[];
}

export interface ClassificationRules {
  categoryRules: CategoryRule[];
  breakingKeywords: string[];
  migrationCategories: ChangeCategory[];
  thresholds: Thresholds;
}

export interface DocImpactConfig {
  matchRules: ClassificationRules & {
    ignorePatterns: string[];
  };
  coverage: {
    topicLimit: number;
    lookupTimeoutMs: number;
    concurrency: number;
    spaceKeys: string[];
    topicKeywords: Partial<Record<ChangeCategory, string>>;
  };
  planning: {
    defaultSpaceKey: string;
    audiences: Record<ChangeCategory, string[]>;
  };
  output: {
    path: string;
    postComment: boolean;
    commentMaxLength: number;
    confluenceUrl?: string;
  };
  llmConfig?: {
    provider: "openai" | "groq";
    model: string;
    styleGuide?: string;
    temperature: number;
  };
}

export interface DocImpactReport {
  repository: string;
  pullNumber: number;
  prTitle: string;
  summary: string;
  contentStrategy: string;
  changeSummary: ChangeSetSummary;
  actions: DocumentationAction[];
  totalActions: number;
  estimatedEffort: "Low" | "Medium" | "High";
  spacesAffected: string[];
  changeCategories: ChangeCategory[];
  criticalUpdates: string[];
  coverage: CoverageMap;
  generatedContent: GeneratedContent[];
}

export interface ReviewState {
  owner: string;
  repo: string;
  pull_number: number;
  prTitle?: string;
  prBody?: string;
  config: DocImpactConfig;

  // analyzeCodeChanges
  descriptors?: ChangeDescriptor[];
  changeSummary?: ChangeSetSummary;

  // analyzeDocCoverage
  coverage?: CoverageMap;

  // planDocUpdates
  actionPlan?: DocumentationAction[];

  // generateContent
  generatedContent?: GeneratedContent[];

  // publishReport
  report?: DocImpactReport;
  reportPath?: string;
  commentUrls?: string[];
}
