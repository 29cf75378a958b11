import { errorMessage } from "../errors";
import type {
  CoverageMap,
  CoverageResult,
  DocumentationLookup,
  PageMatch,
  PageRef,
  RecommendedApproach,
} from "../types";

export interface AnalyzeCoverageOptions {
  /** Maximum number of topics queried; the rest are ignored. */
  topicLimit?: number;
  /** Per-lookup timeout in milliseconds. */
  timeoutMs?: number;
  /** Lookups in flight at once. Defaults to the topic limit. */
  concurrency?: number;
  /** Turns a topic keyword into the documentation source's query language. */
  buildQuery?: (topic: string) => string;
  /** Once aborted, no further lookups are issued. */
  signal?: AbortSignal;
}

export const DEFAULT_TOPIC_LIMIT = 3;
export const DEFAULT_LOOKUP_TIMEOUT_MS = 10_000;

const WITH_COVERAGE: RecommendedApproach = {
  primary: "contextual_updates",
  secondary: "new_supporting_pages",
};

const WITHOUT_COVERAGE: RecommendedApproach = {
  primary: "complete_new_pages",
  secondary: "minimal_existing_updates",
};

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

export function selectTopics(topics: Iterable<string>, limit: number): string[] {
  const selected: string[] = [];
  for (const raw of topics) {
    const topic = raw.trim();
    if (!topic || selected.includes(topic)) continue;
    if (selected.length >= limit) break;
    selected.push(topic);
  }
  return selected;
}

export function scorePages(topic: string, pages: readonly PageRef[]): PageMatch[] {
  const needle = topic.toLowerCase();
  const seen = new Set<string>();
  const matches: PageMatch[] = [];

  for (const page of pages) {
    if (seen.has(page.id)) continue;
    seen.add(page.id);
    matches.push({
      ...page,
      relevance: page.title.toLowerCase().includes(needle) ? "high" : "medium",
    });
  }
  return matches;
}

export function coverageResult(
  topic: string,
  query: string,
  pages: readonly PageRef[]
): CoverageResult {
  const matches = scorePages(topic, pages);
  return {
    topic,
    query,
    pages: matches,
    hasCoverage: matches.length > 0,
    recommendedApproach: matches.length > 0 ? WITH_COVERAGE : WITHOUT_COVERAGE,
    lookupFailed: false,
  };
}

function failedResult(topic: string, query: string, error: unknown): CoverageResult {
  return {
    ...coverageResult(topic, query, []),
    lookupFailed: true,
    error: errorMessage(error),
  };
}

async function searchWithTimeout(
  lookup: DocumentationLookup,
  query: string,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<PageRef[]> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  parent?.addEventListener("abort", onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle first so the race reports the timeout, not the abort it causes.
      reject(new Error(`lookup timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([lookup.search(query, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onAbort);
  }
}

/**
 * Checks, per topic, whether existing documentation already covers it.
 * A failed or timed-out lookup degrades that topic to "no coverage found";
 * it never rejects the whole analysis.
 */
export async function analyzeCoverage(
  topics: Iterable<string>,
  lookup: DocumentationLookup,
  options: AnalyzeCoverageOptions = {}
): Promise<CoverageMap> {
  const limit = Math.max(0, Math.floor(finiteOr(options.topicLimit, DEFAULT_TOPIC_LIMIT)));
  const timeoutMs = finiteOr(options.timeoutMs, DEFAULT_LOOKUP_TIMEOUT_MS);
  const buildQuery = options.buildQuery ?? ((topic: string) => topic);
  const { signal } = options;

  const selected = selectTopics(topics, limit);
  const concurrency = Math.max(
    1,
    Math.min(finiteOr(options.concurrency, selected.length), selected.length)
  );
  const results: Array<CoverageResult | undefined> = new Array(selected.length);

  const lookupTopic = async (topic: string): Promise<CoverageResult> => {
    const query = buildQuery(topic);
    try {
      const pages = await searchWithTimeout(lookup, query, timeoutMs, signal);
      return coverageResult(topic, query, pages);
    } catch (error) {
      console.warn(`⚠️ Coverage lookup for "${topic}" failed: ${errorMessage(error)}`);
      return failedResult(topic, query, error);
    }
  };

  let next = 0;
  const worker = async () => {
    while (next < selected.length) {
      if (signal?.aborted) return;
      const index = next++;
      results[index] = await lookupTopic(selected[index]);
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, selected.length) }, () => worker())
  );

  const coverage: CoverageMap = {};
  selected.forEach((topic, index) => {
    const result = results[index];
    if (result) coverage[topic] = result;
  });
  return coverage;
}
