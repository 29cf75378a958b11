import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { createDocImpactAgent } from "./agent";
import type { CreateDocImpactAgentOptions, DocImpactAgent } from "./agent";
import { handleWebhook } from "./webhooks";
import { analyzePullRequest } from "./route";
import type { DocConfig } from "./types";

export interface ServerOptions extends CreateDocImpactAgentOptions {
  port?: number;
  /** Applied to the review state of every request. */
  config?: Partial<DocConfig>;
}

export function createApp(agent: DocImpactAgent, config: Partial<DocConfig> = {}) {
  const app = new Hono();

  // GitHub pull_request webhook
  app.post("/webhook", (c) => handleWebhook(c, agent, config));

  // On-demand analysis of a single PR
  app.post("/analyze", (c) => analyzePullRequest(c, agent, config));

  app.get("/health", (c) => c.json({ status: "ok" }));

  return app;
}

export async function startServer(options: ServerOptions = {}) {
  const agent = createDocImpactAgent(options);
  const app = createApp(agent, options.config);

  const port = options.port || parseInt(process.env.PORT || "3000", 10);
  const server = serve({
    fetch: app.fetch,
    port,
  });

  console.log(`🚀 Server running at http://localhost:${port}`);

  return {
    agent,
    server,
  };
}
