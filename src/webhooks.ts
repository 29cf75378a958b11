import type { Context } from "hono";
import type { DocImpactAgent } from "./agent";
import { createReviewState } from "./agent";
import { toReportJson } from "./report";
import type { DocConfig } from "./types";
import { errorResponse } from "./route";

interface PullRequestEvent {
  action: string;
  pull_request: {
    number: number;
    title: string;
    body?: string | null;
    labels?: Array<{ name?: string }>;
  };
  repository: {
    name: string;
    owner: { login: string };
  };
}

const RELEVANT_ACTIONS = ["opened", "synchronize", "reopened"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isValidPullRequest(body: unknown): body is PullRequestEvent {
  if (!isRecord(body) || typeof body.action !== "string") return false;
  const pr = body.pull_request;
  const repository = body.repository;
  return (
    isRecord(pr) &&
    typeof pr.number === "number" &&
    typeof pr.title === "string" &&
    isRecord(repository) &&
    typeof repository.name === "string" &&
    isRecord(repository.owner) &&
    typeof repository.owner.login === "string"
  );
}

export function isBotPR(pr: PullRequestEvent["pull_request"]): boolean {
  return (
    pr.title.startsWith("📚") ||
    (pr.labels || []).some((label) => label.name === "documentation")
  );
}

export function isRelevantPREvent(event: string, action: string): boolean {
  return event === "pull_request" && RELEVANT_ACTIONS.includes(action);
}

async function parseWebhookBody(c: Context): Promise<unknown> {
  const contentType = c.req.header("content-type") || "";

  if (contentType.includes("application/json")) {
    const body: unknown = await c.req.json();
    return body;
  }

  if (contentType.includes("application/x-www-form-urlencoded")) {
    const formData = await c.req.parseBody();
    if (typeof formData.payload === "string") {
      const payload: unknown = JSON.parse(formData.payload);
      return payload;
    }
  }

  throw new Error("Unsupported content type");
}

export async function handleWebhook(
  c: Context,
  agent: DocImpactAgent,
  config: Partial<DocConfig> = {}
) {
  try {
    const event = c.req.header("x-github-event");
    if (!event) {
      console.error("No GitHub event header found");
      return c.json({ error: "No GitHub event header found" }, 400);
    }

    const body = await parseWebhookBody(c);
    if (!isValidPullRequest(body)) {
      console.error("Invalid webhook payload");
      return c.json({ error: "Invalid webhook payload" }, 400);
    }

    if (isBotPR(body.pull_request)) {
      console.log("Skipping bot PR");
      return c.json({ message: "Skipping bot PR" });
    }

    if (!isRelevantPREvent(event, body.action)) {
      console.log("Event ignored:", event, body.action);
      return c.json({ message: "Event ignored" });
    }

    const state = createReviewState(
      {
        owner: body.repository.owner.login,
        repo: body.repository.name,
        pull_number: body.pull_request.number,
        prTitle: body.pull_request.title,
        prBody: body.pull_request.body ?? "",
      },
      config
    );

    const result = await agent({
      input: `Analyze documentation impact of pull request #${state.pull_number}`,
      state,
    });
    const report = result.state.report;

    return c.json({
      message: "Documentation analysis completed",
      completedActions: result.completedActions,
      report: report ? toReportJson(report) : null,
    });
  } catch (error) {
    console.error("Webhook error:", error);
    return errorResponse(c, "Webhook processing failed", error);
  }
}
