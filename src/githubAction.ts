import { createDocImpactAgent, createReviewState } from "./agent";
import { UpstreamFetchError, errorMessage } from "./errors";
import type { DocConfig } from "./types";

const REQUIRED_VARS = ["GITHUB_TOKEN", "PR_NUMBER", "REPO_NAME"];

export interface ActionEnvironment {
  owner: string;
  repo: string;
  pullNumber: number;
  prTitle: string;
  prBody: string;
}

/** Reads the pull request coordinates a CI job exposes. */
export function readEnvironment(env: NodeJS.ProcessEnv = process.env): ActionEnvironment {
  const missing = REQUIRED_VARS.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
  }

  const [owner, repo, ...rest] = (env.REPO_NAME ?? "").split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`REPO_NAME must look like "owner/repo", got "${env.REPO_NAME}"`);
  }
  const pullNumber = Number(env.PR_NUMBER);
  if (!Number.isInteger(pullNumber) || pullNumber <= 0) {
    throw new Error(`PR_NUMBER must be a positive integer, got "${env.PR_NUMBER}"`);
  }

  return {
    owner,
    repo,
    pullNumber,
    prTitle: env.PR_TITLE ?? "",
    prBody: env.PR_BODY ?? "",
  };
}

export async function main(config: Partial<DocConfig> = {}): Promise<number> {
  console.log("🚀 Starting PR documentation impact analysis");
  console.log("=".repeat(60));

  let target: ActionEnvironment;
  try {
    target = readEnvironment();
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return 1;
  }

  const runConfig: Partial<DocConfig> = {
    postComment: process.env.POST_PR_COMMENT === "true",
    generateContent: Boolean(process.env.OPENAI_API_KEY || process.env.GROQ_API_KEY),
    llmProvider: process.env.GROQ_API_KEY && !process.env.OPENAI_API_KEY ? "groq" : "openai",
    ...(process.env.OUTPUT_PATH ? { outputPath: process.env.OUTPUT_PATH } : {}),
    ...config,
  };

  try {
    const agent = createDocImpactAgent();
    console.log(`📋 Analyzing PR #${target.pullNumber}: ${target.prTitle}`);

    const { state } = await agent({
      input: "Analyze documentation impact of the pull request",
      state: createReviewState(
        {
          owner: target.owner,
          repo: target.repo,
          pull_number: target.pullNumber,
          prTitle: target.prTitle,
          prBody: target.prBody,
        },
        runConfig
      ),
    });

    console.log("\n" + "=".repeat(60));
    console.log(`✅ Analysis successful: ${state.report?.totalActions ?? 0} action(s), results saved to ${state.reportPath}`);
    return 0;
  } catch (error) {
    if (error instanceof UpstreamFetchError) {
      console.error(`❌ Could not retrieve PR file changes (${error.kind}), no analysis possible: ${error.message}`);
    } else {
      console.error("❌ Analysis failed:", errorMessage(error));
    }
    return 1;
  }
}
