import * as dotenv from "dotenv";
import { startServer } from "./server";

dotenv.config();

export { createDocImpactAgent, createReviewState } from "./agent";
export type {
  AgentRequest,
  AgentResult,
  CreateDocImpactAgentOptions,
  DocImpactAgent,
  ReviewTarget,
} from "./agent";
export * from "./analysis";
export { actions } from "./actions";
export type { ActionContext, AgentServices, DocAction } from "./actions";
export { createFullConfig, defaultConfig } from "./config";
export { UpstreamFetchError } from "./errors";
export { buildReport, renderComment, toReportJson } from "./report";
export { ConfluenceDocSource, buildCql } from "./sources/confluence";
export { GitHubChangeSource, GitHubCommentPublisher } from "./sources/github";
export { main as runGitHubAction, readEnvironment } from "./githubAction";
export { createApp, startServer } from "./server";
export type { ServerOptions } from "./server";
export type * from "./types";

// Start the server when this file is run directly
if (require.main === module) {
  startServer().catch((error: Error) => {
    console.error("Failed to start server:", error);
    process.exit(1);
  });
}
