import { promises as fs } from "fs";
import type { Octokit } from "@octokit/rest";
import { actions as defaultActions } from "./actions";
import type { ActionContext, AgentServices, DocAction } from "./actions";
import { LlmContentGenerator } from "./actions/generateContent";
import { createFullConfig } from "./config";
import { apiKeyFor, createChatCompletion } from "./llm";
import type { ChatCompletion, LlmProvider } from "./llm";
import { ConfluenceDocSource } from "./sources/confluence";
import { GitHubChangeSource, GitHubCommentPublisher, createOctokit } from "./sources/github";
import type { DocConfig, DocImpactConfig, ReviewState } from "./types";

export interface CreateDocImpactAgentOptions {
  githubToken?: string;
  /** Client used for the default GitHub collaborators. */
  octokit?: Octokit;
  /** Completion function used when a request's config turns drafting on. */
  createCompletion?: (provider: LlmProvider) => ChatCompletion;
  services?: Partial<AgentServices>;
  actions?: DocAction[];
}

export interface AgentRequest {
  input: string;
  state: ReviewState;
  signal?: AbortSignal;
}

export interface AgentResult {
  state: ReviewState;
  completedActions: string[];
}

export type DocImpactAgent = (request: AgentRequest) => Promise<AgentResult>;

export interface ReviewTarget {
  owner: string;
  repo: string;
  pull_number: number;
  prTitle?: string;
  prBody?: string;
}

export function createReviewState(
  target: ReviewTarget,
  config: Partial<DocConfig> = {}
): ReviewState {
  return { ...target, config: createFullConfig(config) };
}

/**
 * Builds the documentation impact agent. Collaborators default to GitHub,
 * Confluence and the configured LLM; any of them can be injected. The
 * comment publisher and the content generator follow each request's
 * `state.config`.
 */
export function createDocImpactAgent(
  options: CreateDocImpactAgentOptions = {}
): DocImpactAgent {
  const provided = options.services ?? {};
  const token = options.githubToken || process.env.GITHUB_TOKEN;
  const pipeline = options.actions ?? defaultActions;

  let octokit = options.octokit;
  const github = (): Octokit => {
    if (!octokit) octokit = createOctokit(token);
    return octokit;
  };

  const completions = new Map<LlmProvider, ChatCompletion>();
  const completionFor = (provider: LlmProvider): ChatCompletion => {
    let complete = completions.get(provider);
    if (!complete) {
      complete = options.createCompletion
        ? options.createCompletion(provider)
        : createChatCompletion(provider, apiKeyFor(provider));
      completions.set(provider, complete);
    }
    return complete;
  };

  let changeSource = provided.changeSource;
  const docSource = provided.docSource ?? ConfluenceDocSource.fromEnv();
  const writeReport =
    provided.writeReport ?? ((path: string, contents: string) => fs.writeFile(path, contents, "utf8"));

  const servicesFor = (config: DocImpactConfig): AgentServices => {
    const source = changeSource ?? new GitHubChangeSource(github());
    changeSource = source;

    let commentPublisher = provided.commentPublisher;
    if (!commentPublisher && config.output.postComment) {
      if (token || options.octokit) {
        commentPublisher = new GitHubCommentPublisher(github());
      } else {
        console.warn("⚠️ PR comment requested but no GitHub token is configured");
      }
    }

    const llm = config.llmConfig;
    const contentGenerator =
      provided.contentGenerator ??
      (llm ? new LlmContentGenerator(completionFor(llm.provider), llm) : undefined);

    return { changeSource: source, docSource, contentGenerator, commentPublisher, writeReport };
  };

  return async ({ input, state, signal }) => {
    console.log(`📢 ${input} (${state.owner}/${state.repo}#${state.pull_number})`);

    let context: ActionContext = { state, services: servicesFor(state.config), signal };
    const completedActions: string[] = [];
    for (const action of pipeline) {
      context = await action.run(context);
      completedActions.push(action.id);
    }

    return { state: context.state, completedActions };
  };
}
