export * from "./classifyFileChange";
export * from "./aggregateChanges";
export * from "./analyzeCoverage";
export * from "./planActions";
