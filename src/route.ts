import type { Context } from "hono";
import type { DocImpactAgent } from "./agent";
import { createReviewState } from "./agent";
import { UpstreamFetchError, errorMessage } from "./errors";
import { toReportJson } from "./report";
import type { DocConfig } from "./types";

interface AnalyzeRequest {
  owner: string;
  repo: string;
  pull_number: number;
  pr_title?: string;
}

export function isAnalyzeRequest(body: unknown): body is AnalyzeRequest {
  if (typeof body !== "object" || body === null) return false;
  return (
    "owner" in body && typeof body.owner === "string" && body.owner.length > 0 &&
    "repo" in body && typeof body.repo === "string" && body.repo.length > 0 &&
    "pull_number" in body && typeof body.pull_number === "number" &&
    Number.isInteger(body.pull_number) && body.pull_number > 0 &&
    (!("pr_title" in body) || body.pr_title === undefined || typeof body.pr_title === "string")
  );
}

export function errorResponse(c: Context, message: string, error: unknown) {
  if (error instanceof UpstreamFetchError) {
    const status = error.kind === "not_found" ? 404 : 502;
    return c.json(
      { error: "No analysis possible", details: error.message, source: error.source, kind: error.kind },
      status
    );
  }
  return c.json({ error: message, details: errorMessage(error) }, 500);
}

export async function analyzePullRequest(
  c: Context,
  agent: DocImpactAgent,
  config: Partial<DocConfig> = {}
) {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: "Request body must be JSON" }, 400);
  }

  if (!isAnalyzeRequest(body)) {
    return c.json({ error: "Missing owner, repo or pull_number" }, 400);
  }

  try {
    const state = createReviewState(
      {
        owner: body.owner,
        repo: body.repo,
        pull_number: body.pull_number,
        prTitle: body.pr_title,
      },
      config
    );

    console.log(`📢 Analyzing ${state.owner}/${state.repo}#${state.pull_number}`);
    const result = await agent({
      input: `Analyze documentation impact of pull request #${state.pull_number}`,
      state,
      signal: c.req.raw.signal,
    });

    if (!result.state.report) {
      return c.json({ error: "Analysis produced no report" }, 500);
    }
    return c.json(toReportJson(result.state.report));
  } catch (error) {
    console.error("❌ Error analyzing pull request:", error);
    return errorResponse(c, "Failed to analyze pull request", error);
  }
}
