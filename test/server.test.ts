import type { AgentRequest, AgentResult } from "../src/agent";
import { aggregateChanges } from "../src/analysis/aggregateChanges";
import { UpstreamFetchError } from "../src/errors";
import { buildReport } from "../src/report";
import { createApp } from "../src/server";
import { isBotPR, isRelevantPREvent, isValidPullRequest } from "../src/webhooks";

const payload = {
  action: "opened",
  pull_request: { number: 7, title: "Add login", body: null, labels: [] },
  repository: { name: "shop", owner: { login: "acme" } },
};

function fakeAgent() {
  return jest.fn<Promise<AgentResult>, [AgentRequest]>(async ({ state }) => ({
    state: {
      ...state,
      report: buildReport({ ...state, changeSummary: aggregateChanges([]), actionPlan: [] }),
    },
    completedActions: ["analyzeCodeChanges", "publishReport"],
  }));
}

function postWebhook(app: ReturnType<typeof createApp>, body: unknown, event = "pull_request") {
  return app.request("/webhook", {
    method: "POST",
    headers: { "content-type": "application/json", "x-github-event": event },
    body: JSON.stringify(body),
  });
}

function postAnalyze(app: ReturnType<typeof createApp>, body: string) {
  return app.request("/analyze", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("POST /webhook", () => {
  it("analyzes an opened pull request", async () => {
    const agent = fakeAgent();
    const app = createApp(agent);

    const res = await postWebhook(app, payload);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      message: "Documentation analysis completed",
      completedActions: ["analyzeCodeChanges", "publishReport"],
      report: { repository: "acme/shop", pull_number: 7, pr_title: "Add login", total_actions: 0 },
    });
    expect(agent).toHaveBeenCalledTimes(1);
    expect(agent.mock.calls[0][0].state).toMatchObject({
      owner: "acme",
      repo: "shop",
      pull_number: 7,
      prTitle: "Add login",
      prBody: "",
    });
  });

  it("accepts form-encoded deliveries", async () => {
    const agent = fakeAgent();
    const app = createApp(agent);

    const res = await app.request("/webhook", {
      method: "POST",
      headers: {
        "content-type": "application/x-www-form-urlencoded",
        "x-github-event": "pull_request",
      },
      body: `payload=${encodeURIComponent(JSON.stringify(payload))}`,
    });

    expect(res.status).toBe(200);
    expect(agent).toHaveBeenCalledTimes(1);
  });

  it("rejects requests without an event header", async () => {
    const app = createApp(fakeAgent());

    const res = await app.request("/webhook", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No GitHub event header found" });
  });

  it("rejects malformed payloads", async () => {
    const res = await postWebhook(createApp(fakeAgent()), { action: "opened" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid webhook payload" });
  });

  it("skips documentation pull requests and irrelevant events", async () => {
    const agent = fakeAgent();
    const app = createApp(agent);

    const bot = await postWebhook(app, {
      ...payload,
      pull_request: { ...payload.pull_request, labels: [{ name: "documentation" }] },
    });
    expect(await bot.json()).toEqual({ message: "Skipping bot PR" });

    const closed = await postWebhook(app, { ...payload, action: "closed" });
    expect(await closed.json()).toEqual({ message: "Event ignored" });

    expect(agent).not.toHaveBeenCalled();
  });

  it("reports unsupported content types", async () => {
    const res = await createApp(fakeAgent()).request("/webhook", {
      method: "POST",
      headers: { "content-type": "text/plain", "x-github-event": "pull_request" },
      body: "hello",
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Webhook processing failed",
      details: "Unsupported content type",
    });
  });
});

describe("POST /analyze", () => {
  it("returns the report document", async () => {
    const agent = fakeAgent();

    const res = await postAnalyze(
      createApp(agent, { defaultSpaceKey: "ENG" }),
      JSON.stringify({ owner: "acme", repo: "shop", pull_number: 7, pr_title: "Add login" })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      repository: "acme/shop",
      pull_number: 7,
      summary: "No file changes detected",
      confluence_actions: [],
    });
    expect(agent.mock.calls[0][0].state.config.planning.defaultSpaceKey).toBe("ENG");
  });

  it("validates the request body", async () => {
    const app = createApp(fakeAgent());

    const invalid = await postAnalyze(app, "{");
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({ error: "Request body must be JSON" });

    const missing = await postAnalyze(app, JSON.stringify({ owner: "acme", pull_number: 7 }));
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: "Missing owner, repo or pull_number" });
  });

  it("maps upstream failures to HTTP statuses", async () => {
    const agent = fakeAgent();
    const app = createApp(agent);
    const body = JSON.stringify({ owner: "acme", repo: "shop", pull_number: 7 });

    agent.mockRejectedValueOnce(new UpstreamFetchError("github", "not_found", "no such PR"));
    const notFound = await postAnalyze(app, body);
    expect(notFound.status).toBe(404);
    expect(await notFound.json()).toEqual({
      error: "No analysis possible",
      details: "no such PR",
      source: "github",
      kind: "not_found",
    });

    agent.mockRejectedValueOnce(new UpstreamFetchError("github", "auth", "bad credentials"));
    expect((await postAnalyze(app, body)).status).toBe(502);

    agent.mockRejectedValueOnce(new Error("boom"));
    const failed = await postAnalyze(app, body);
    expect(failed.status).toBe(500);
    expect(await failed.json()).toEqual({
      error: "Failed to analyze pull request",
      details: "boom",
    });
  });
});

describe("GET /health", () => {
  it("responds ok", async () => {
    const res = await createApp(fakeAgent()).request("/health");
    expect(await res.json()).toEqual({ status: "ok" });
  });
});

describe("webhook guards", () => {
  it("recognizes relevant pull request events", () => {
    expect(isValidPullRequest(payload)).toBe(true);
    expect(isValidPullRequest({ ...payload, repository: { name: "shop" } })).toBe(false);
    expect(isRelevantPREvent("pull_request", "synchronize")).toBe(true);
    expect(isRelevantPREvent("push", "opened")).toBe(false);
    expect(isBotPR({ number: 1, title: "📚 Update docs" })).toBe(true);
    expect(isBotPR({ number: 1, title: "Add login" })).toBe(false);
  });
});
