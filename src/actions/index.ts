import { analyzeCodeChanges } from "./analyzeCodeChanges";
import { analyzeDocCoverage } from "./analyzeDocCoverage";
import { planDocUpdates } from "./planDocUpdates";
import { generateContent } from "./generateContent";
import { publishReport } from "./publishReport";

export const actions = [
  analyzeCodeChanges,
  analyzeDocCoverage,
  planDocUpdates,
  generateContent,
  publishReport,
];

export * from "./action";
export * from "./analyzeCodeChanges";
export * from "./analyzeDocCoverage";
export * from "./planDocUpdates";
export * from "./generateContent";
export * from "./publishReport";
