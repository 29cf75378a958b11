import axios, { AxiosInstance } from "axios";
import { UpstreamFetchError, toUpstreamFetchError } from "../errors";
import type { DocumentationSource, PageContent, PageRef, SpaceRef } from "../types";

export type HttpClient = Pick<AxiosInstance, "get">;

export interface ConfluenceCredentials {
  url: string;
  username: string;
  apiToken: string;
  timeoutMs?: number;
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resultsOf(data: unknown): JsonObject[] {
  if (!isRecord(data) || !Array.isArray(data.results)) return [];
  return data.results.filter(isRecord);
}

function stringField(value: JsonObject, key: string): string | undefined {
  const field = value[key];
  if (typeof field === "string") return field;
  if (typeof field === "number") return String(field);
  return undefined;
}

function spaceKeyOf(value: JsonObject): string | undefined {
  const space = value.space;
  return isRecord(space) ? stringField(space, "key") : undefined;
}

export function toPageRef(value: JsonObject): PageRef | undefined {
  // /search wraps pages in a `content` object, /content/search does not
  const content = isRecord(value.content) ? value.content : value;
  const id = stringField(content, "id");
  const title = stringField(content, "title");
  if (!id || !title) return undefined;
  return { id, title, spaceKey: spaceKeyOf(content) };
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** CQL for pages whose title or body mentions the topic. */
export function buildCql(topic: string, spaceKeys: readonly string[] = []): string {
  const clauses = [
    "type = page",
    `(title ~ ${quote(topic)} OR text ~ ${quote(topic)})`,
  ];
  if (spaceKeys.length > 0) {
    clauses.push(`space in (${spaceKeys.map(quote).join(", ")})`);
  }
  return clauses.join(" AND ");
}

export class ConfluenceDocSource implements DocumentationSource {
  constructor(private readonly http: HttpClient) {}

  static fromCredentials(credentials: ConfluenceCredentials): ConfluenceDocSource {
    const client = axios.create({
      baseURL: `${credentials.url.replace(/\/+$/, "")}/wiki/rest/api`,
      auth: { username: credentials.username, password: credentials.apiToken },
      headers: { Accept: "application/json" },
      timeout: credentials.timeoutMs ?? 15_000,
    });
    return new ConfluenceDocSource(client);
  }

  static fromEnv(): ConfluenceDocSource | undefined {
    const url = process.env.CONFLUENCE_URL;
    const username = process.env.CONFLUENCE_USERNAME;
    const apiToken = process.env.CONFLUENCE_API_TOKEN;
    if (!url || !username || !apiToken) return undefined;
    return ConfluenceDocSource.fromCredentials({ url, username, apiToken });
  }

  async listSpaces(): Promise<SpaceRef[]> {
    try {
      const { data } = await this.http.get<unknown>("/space", {
        params: { start: 0, limit: 50 },
      });
      return resultsOf(data).flatMap((space) => {
        const key = stringField(space, "key");
        return key ? [{ key, name: stringField(space, "name") ?? key }] : [];
      });
    } catch (error) {
      throw toUpstreamFetchError("confluence", error, "Listing Confluence spaces");
    }
  }

  async search(cql: string, signal?: AbortSignal): Promise<PageRef[]> {
    try {
      const { data } = await this.http.get<unknown>("/content/search", {
        params: { cql, limit: 25, expand: "space" },
        signal,
      });
      return resultsOf(data).flatMap((result) => {
        const page = toPageRef(result);
        return page ? [page] : [];
      });
    } catch (error) {
      throw toUpstreamFetchError("confluence", error, `Searching Confluence with CQL '${cql}'`);
    }
  }

  async getPage(id: string): Promise<PageContent> {
    try {
      const { data } = await this.http.get<unknown>(`/content/${encodeURIComponent(id)}`, {
        params: { expand: "body.storage,space,version" },
      });
      const page = isRecord(data) ? toPageRef(data) : undefined;
      if (!isRecord(data) || !page) {
        throw new UpstreamFetchError("confluence", "not_found", `Page '${id}' not found`);
      }
      const body = isRecord(data.body) && isRecord(data.body.storage)
        ? stringField(data.body.storage, "value") ?? ""
        : "";
      const version = isRecord(data.version) && typeof data.version.number === "number"
        ? data.version.number
        : undefined;
      return { ...page, body, version };
    } catch (error) {
      throw toUpstreamFetchError("confluence", error, `Getting Confluence page '${id}'`);
    }
  }
}
