import micromatch from "micromatch";
import { aggregateChanges } from "../analysis/aggregateChanges";
import { classifyFileChange } from "../analysis/classifyFileChange";
import type { ChangeDescriptor, ClassificationRules, RawChangeRecord } from "../types";
import { createAction } from "./action";

export function filterIgnored(
  records: readonly RawChangeRecord[],
  ignorePatterns: readonly string[]
): RawChangeRecord[] {
  if (ignorePatterns.length === 0) return [...records];
  return records.filter((record) => {
    const filename = typeof record.filename === "string" ? record.filename : "";
    return !filename || !micromatch.isMatch(filename, [...ignorePatterns], { dot: true });
  });
}

export function classifyChanges(
  records: readonly RawChangeRecord[],
  rules: ClassificationRules
): ChangeDescriptor[] {
  return records.map((record) => classifyFileChange(record, rules));
}

export const analyzeCodeChanges = createAction({
  id: "analyzeCodeChanges",
  description:
    "Fetches the files changed in the PR, classifies each one and summarizes the change set",
  async run(context) {
    const { state, services } = context;
    const { matchRules } = state.config;

    // An upstream failure here aborts the run: nothing to classify without it.
    const records = await services.changeSource.listChangedFiles(
      state.owner,
      state.repo,
      state.pull_number
    );
    const kept = filterIgnored(records, matchRules.ignorePatterns);
    const descriptors = classifyChanges(kept, matchRules);
    const summary = aggregateChanges(descriptors, matchRules.thresholds);

    state.descriptors = descriptors;
    state.changeSummary = summary;

    console.log("\n=== Code Analysis Results ===");
    console.log("Files Fetched:", records.length);
    console.log("Files Ignored:", records.length - kept.length);
    console.log("Summary:", summary.narrative);
    console.log("Significant Changes:", summary.significantChanges.length);
    console.log("Breaking Changes:", summary.breakingChanges.join(", ") || "none");
    console.log("Strategy:", summary.strategyDescription);

    return context;
  },
});
