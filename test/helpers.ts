import { Octokit } from "@octokit/rest";
import type {
  ChangeDescriptor,
  DocumentationLookup,
  PageRef,
  RawChangeRecord,
} from "../src/types";

export function record(
  filename: string,
  additions: number,
  deletions: number,
  status = "modified"
): RawChangeRecord {
  return { filename, status, additions, deletions };
}

export function descriptor(overrides: Partial<ChangeDescriptor> = {}): ChangeDescriptor {
  return {
    filename: "src/file.ts",
    changeType: "modified",
    category: "other",
    isBreaking: false,
    impact: "low",
    affectsApi: false,
    affectsUi: false,
    requiresMigration: false,
    additions: 0,
    deletions: 0,
    ...overrides,
  };
}

export type LookupBehaviour = PageRef[] | Error | "hang";

/** In-memory documentation search keyed by the exact query string. */
export class FakeLookup implements DocumentationLookup {
  readonly queries: string[] = [];

  constructor(private readonly behaviours: Record<string, LookupBehaviour> = {}) {}

  async search(query: string, signal?: AbortSignal): Promise<PageRef[]> {
    this.queries.push(query);
    const behaviour = this.behaviours[query] ?? [];
    if (behaviour === "hang") {
      return new Promise<PageRef[]>((_, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    }
    if (behaviour instanceof Error) throw behaviour;
    return behaviour;
  }
}

// The parts of a fetch Response that Octokit reads.
export function jsonResponse(body: unknown, status = 200) {
  return {
    status,
    url: "https://api.github.com",
    headers: new Map([["content-type", "application/json; charset=utf-8"]]),
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

export function octokitWith(fetch: jest.Mock): Octokit {
  return new Octokit({ auth: "test-token", request: { fetch } });
}
