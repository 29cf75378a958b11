import { analyzeCoverage } from "../analysis/analyzeCoverage";
import { candidateTopics } from "../analysis/planActions";
import { buildCql } from "../sources/confluence";
import { createAction } from "./action";

export const analyzeDocCoverage = createAction({
  id: "analyzeDocCoverage",
  description:
    "Searches the knowledge base for pages already covering each changed topic",
  async run(context) {
    const { state, services, signal } = context;

    if (!state.descriptors || !state.changeSummary) {
      throw new Error("Code analysis must be performed before coverage analysis");
    }

    const { coverage: options, matchRules } = state.config;
    const topics = candidateTopics(state.descriptors, {
      thresholds: matchRules.thresholds,
      topicKeywords: options.topicKeywords,
    }).map((group) => group.topic);

    console.log("\n=== Analyzing Documentation Coverage ===");
    console.log("Candidate Topics:", topics.join(", ") || "none");

    if (topics.length === 0) {
      state.coverage = {};
      return context;
    }
    if (!services.docSource) {
      console.log("No documentation source configured, every topic is treated as uncovered");
      state.coverage = {};
      return context;
    }

    const coverage = await analyzeCoverage(topics, services.docSource, {
      topicLimit: options.topicLimit,
      timeoutMs: options.lookupTimeoutMs,
      concurrency: options.concurrency,
      buildQuery: (topic) => buildCql(topic, options.spaceKeys),
      signal,
    });
    state.coverage = coverage;

    for (const result of Object.values(coverage)) {
      const status = result.lookupFailed
        ? "lookup failed"
        : `${result.pages.length} page(s)`;
      console.log(`- ${result.topic}: ${status} -> ${result.recommendedApproach.primary}`);
    }
    if (signal?.aborted) {
      console.log("Run cancelled, remaining topics were not looked up");
    }

    return context;
  },
});
