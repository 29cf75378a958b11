import type { ChatCompletion } from "../llm";
import { errorMessage } from "../errors";
import type {
  ContentGenerator,
  ContextualUpdate,
  DocImpactConfig,
  DocumentationAction,
  GeneratedContent,
  PageContent,
} from "../types";
import { createAction } from "./action";

type LlmConfig = NonNullable<DocImpactConfig["llmConfig"]>;

const LOCATION_TYPES: ReadonlyArray<ContextualUpdate["locationType"]> = [
  "before",
  "after",
  "replace",
  "append",
];

// Keep prompts bounded; Confluence storage bodies can be very large.
const PAGE_PREVIEW_LENGTH = 4000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function toLocationType(value: unknown): ContextualUpdate["locationType"] {
  return LOCATION_TYPES.find((type) => type === value) ?? "append";
}

function toContextualUpdate(value: unknown): ContextualUpdate | undefined {
  if (!isRecord(value)) return undefined;
  const contentToAdd = optionalString(value.content_to_add);
  if (!contentToAdd) return undefined;
  return {
    updateType: optionalString(value.update_type) ?? "addition",
    targetHeading: optionalString(value.target_heading),
    locationType: toLocationType(value.location_type),
    positionDescription: optionalString(value.position_description) ?? "End of page",
    contentToAdd,
  };
}

/** Validates the model's JSON answer; unknown fields are dropped. */
export function parseGeneratedContent(
  raw: string,
  action: DocumentationAction
): GeneratedContent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Model returned invalid JSON for "${action.pageTitle}": ${errorMessage(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Model returned no object for "${action.pageTitle}"`);
  }

  const updates = Array.isArray(parsed.contextual_updates)
    ? parsed.contextual_updates.flatMap((item: unknown) => {
      const update = toContextualUpdate(item);
      return update ? [update] : [];
    })
    : [];

  return {
    pageTitle: action.pageTitle,
    action: action.action,
    confluenceMarkup: optionalString(parsed.confluence_markup),
    contextualUpdates: updates.length > 0 ? updates : undefined,
    implementationNotes: optionalString(parsed.implementation_notes),
  };
}

function wantsNewPage(action: DocumentationAction): boolean {
  return action.action === "create_page";
}

export function buildPrompt(
  action: DocumentationAction,
  page: PageContent | undefined,
  styleGuide?: string
) {
  const task = wantsNewPage(action)
    ? `Write the complete content of a new Confluence page titled "${action.pageTitle}".
Return JSON: { "confluence_markup": "<storage format markup>", "implementation_notes": "..." }`
    : `Propose precisely located edits to the existing Confluence page "${action.pageTitle}".
Return JSON: { "contextual_updates": [{ "update_type": "...", "target_heading": "...", "location_type": "before" | "after" | "replace" | "append", "position_description": "...", "content_to_add": "<storage format markup>" }], "implementation_notes": "..." }`;

  return [
    {
      role: "system" as const,
      content: `You are a technical documentation expert maintaining a Confluence knowledge base.
You receive one planned documentation action derived from a pull request and produce its content.

Rules:
1. Use Confluence storage format (XHTML) for all markup
2. Only document what the changed files imply; do not invent behavior
3. Call out breaking changes and migration steps explicitly when flagged
4. Address the listed audiences
${styleGuide ? `\nStyle Guide:\n${styleGuide}` : ""}`,
    },
    {
      role: "user" as const,
      content: `Task: ${task}

Priority: ${action.priority}
Content Strategy: ${action.contentStrategy}
Reason: ${action.reason}
Audiences: ${action.affectedAudiences.join(", ")}
Breaking Changes: ${action.breakingChanges ? "yes" : "no"}
Migration Required: ${action.migrationRequired ? "yes" : "no"}

Changed Files:
${action.sourceFiles.map((file) => `- ${file}`).join("\n")}

Related Pages:
${action.relatedPages.map((p) => `- ${p.title} (${p.relevance})`).join("\n") || "none"}
${page ? `\nCurrent page content:\n${page.body.slice(0, PAGE_PREVIEW_LENGTH)}\n` : ""}`,
    },
  ];
}

export class LlmContentGenerator implements ContentGenerator {
  constructor(
    private readonly complete: ChatCompletion,
    private readonly config: LlmConfig
  ) {}

  async generate(action: DocumentationAction, page?: PageContent): Promise<GeneratedContent> {
    const raw = await this.complete({
      model: this.config.model,
      messages: buildPrompt(action, page, this.config.styleGuide),
      temperature: this.config.temperature,
    });
    return parseGeneratedContent(raw, action);
  }
}

export const generateContent = createAction({
  id: "generateContent",
  description: "Drafts page content or contextual edits for each planned action",
  async run(context) {
    const { state, services, signal } = context;
    const generator = services.contentGenerator;

    if (!generator || !state.actionPlan || state.actionPlan.length === 0) {
      return context;
    }

    console.log("\n=== Generating Documentation Content ===");
    const drafts: GeneratedContent[] = [];

    for (const action of state.actionPlan) {
      if (signal?.aborted) {
        console.log("Run cancelled, skipping remaining drafts");
        break;
      }
      console.log(`\nProcessing: ${action.pageTitle} (${action.action})`);

      let page: PageContent | undefined;
      if (action.pageId && services.docSource) {
        try {
          page = await services.docSource.getPage(action.pageId);
          console.log("Found existing content");
        } catch (error) {
          console.log(`No existing content found: ${errorMessage(error)}`);
        }
      }

      try {
        drafts.push(await generator.generate(action, page));
        console.log("Content generated successfully");
      } catch (error) {
        console.error(`❌ Failed to draft "${action.pageTitle}":`, errorMessage(error));
      }
    }

    state.generatedContent = drafts;
    console.log("\nDrafts generated:", drafts.length);
    return context;
  },
});
