import type {
  ChangeSource,
  CommentPublisher,
  ContentGenerator,
  DocumentationSource,
  ReviewState,
} from "../types";

export interface AgentServices {
  changeSource: ChangeSource;
  docSource?: DocumentationSource;
  contentGenerator?: ContentGenerator;
  commentPublisher?: CommentPublisher;
  writeReport: (path: string, contents: string) => Promise<void>;
}

export interface ActionContext {
  state: ReviewState;
  services: AgentServices;
  signal?: AbortSignal;
}

export interface DocAction {
  id: string;
  description: string;
  run(context: ActionContext): Promise<ActionContext>;
}

export function createAction(action: DocAction): DocAction {
  return action;
}
