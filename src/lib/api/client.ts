/**
 * SysML v2 REST API client.
 *
 * Plain authenticated GETs that decode JSON. No retries: callers decide what a
 * failure means (tree expansion drops the child, commands report and exit).
 */

import { silentLog, type DiagnosticSink } from "../diagnostics.js";
import { RemoteError, TransportError } from "./errors.js";
import type { Branch, Commit, Element, Project } from "./types.js";
import { isIdentified } from "./types.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_TIMEOUT_MS = 180_000;
export const DEFAULT_PAGE_SIZE = 100;

export interface ApiClientOptions {
  baseUrl: string;
  username: string;
  password: string;
  /** Fixed for the lifetime of the client; there is no per-call override. */
  timeoutMs?: number;
  /** Injected by tests; defaults to the global fetch. */
  fetch?: FetchFn;
  log?: DiagnosticSink;
}

export type QueryParams = Record<string, string | number | undefined>;

export interface PageOptions {
  pageSize?: number;
  signal?: AbortSignal;
  onPage?: (fetchedSoFar: number) => void;
}

export function buildQuery(params?: QueryParams): string {
  if (!params) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    parts.push(`${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`);
  }
  return parts.length > 0 ? `?${parts.join("&")}` : "";
}

export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf-8").toString("base64")}`;
}

export class SysmlApiClient {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly log: DiagnosticSink;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authorization = basicAuthHeader(options.username, options.password);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.log = options.log ?? silentLog;
  }

  /**
   * GET an endpoint and return the decoded JSON body.
   */
  async getJson(path: string, query?: QueryParams): Promise<unknown> {
    const endpoint = `${path}${buildQuery(query)}`;
    const { status, text } = await this.request(endpoint);

    if (status >= 400) {
      this.log.log(`API Error Response: ${text.slice(0, 500)}`);
      throw new RemoteError(endpoint, status, text);
    }

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch {
      throw new RemoteError(endpoint, status, text, `Response from ${endpoint} is not JSON`);
    }
  }

  /**
   * GET an endpoint that must answer with a JSON array.
   */
  async getList(path: string, query?: QueryParams): Promise<unknown[]> {
    const body = await this.getJson(path, query);
    if (!Array.isArray(body)) {
      const endpoint = `${path}${buildQuery(query)}`;
      throw new RemoteError(endpoint, 200, JSON.stringify(body), `Expected a list from ${endpoint}`);
    }
    return body;
  }

  async getObject(path: string, query?: QueryParams): Promise<{ "@id": string }> {
    const body = await this.getJson(path, query);
    if (!isIdentified(body)) {
      const endpoint = `${path}${buildQuery(query)}`;
      throw new RemoteError(endpoint, 200, JSON.stringify(body), `Expected an identified object from ${endpoint}`);
    }
    return body;
  }

  async getProjects(): Promise<Project[]> {
    return (await this.getList("/projects")).filter(isIdentified);
  }

  async getProject(projectId: string): Promise<Project> {
    return this.getObject(`/projects/${encodeURIComponent(projectId)}`);
  }

  /**
   * Commits in server order; the server lists the latest commit last.
   */
  async getCommits(projectId: string): Promise<Commit[]> {
    return (await this.getList(`/projects/${encodeURIComponent(projectId)}/commits`)).filter(isIdentified);
  }

  async getBranches(projectId: string): Promise<Branch[]> {
    return (await this.getList(`/projects/${encodeURIComponent(projectId)}/branches`)).filter(isIdentified);
  }

  async getRoots(projectId: string, commitId: string): Promise<Element[]> {
    return (await this.getList(`${this.commitPath(projectId, commitId)}/roots`)).filter(isIdentified);
  }

  async getElement(projectId: string, commitId: string, elementId: string): Promise<Element> {
    return this.getObject(`${this.commitPath(projectId, commitId)}/elements/${encodeURIComponent(elementId)}`);
  }

  async getElementsPage(projectId: string, commitId: string, pageSize: number, after?: number): Promise<Element[]> {
    return (await this.getRawElementsPage(projectId, commitId, pageSize, after)).filter(isIdentified);
  }

  /**
   * Every element of a commit, page by page. `page[after]` carries the running offset,
   * counted over raw page entries so that an entry without an id does not shift it.
   * Stops on a short or empty page, or when the signal is aborted between pages.
   */
  async getAllElements(projectId: string, commitId: string, options: PageOptions = {}): Promise<Element[]> {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    const all: Element[] = [];
    let offset = 0;

    while (!options.signal?.aborted) {
      const page = await this.getRawElementsPage(projectId, commitId, pageSize, offset === 0 ? undefined : offset);
      offset += page.length;
      all.push(...page.filter(isIdentified));
      options.onPage?.(all.length);
      if (page.length < pageSize) break;
    }

    this.log.log(`Total elements fetched: ${all.length}`);
    return all;
  }

  /**
   * A project is accessible when its commit list answers 200.
   */
  async probeAccess(projectId: string): Promise<boolean> {
    try {
      const { status } = await this.request(`/projects/${encodeURIComponent(projectId)}/commits`);
      return status === 200;
    } catch (error) {
      this.log.logError(`probeAccess(${projectId})`, error);
      return false;
    }
  }

  private async getRawElementsPage(projectId: string, commitId: string, pageSize: number, after?: number): Promise<unknown[]> {
    const query: QueryParams = { "page[size]": pageSize, "page[after]": after };
    return this.getList(`${this.commitPath(projectId, commitId)}/elements`, query);
  }

  private commitPath(projectId: string, commitId: string): string {
    return `/projects/${encodeURIComponent(projectId)}/commits/${encodeURIComponent(commitId)}`;
  }

  private async request(endpoint: string): Promise<{ status: number; text: string }> {
    this.log.log(`API GET: ${endpoint}`);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(`${this.baseUrl}${endpoint}`, {
        method: "GET",
        headers: {
          Accept: "application/json",
          Authorization: this.authorization,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      const transportError = new TransportError(endpoint, error);
      this.log.logError(`GET ${endpoint}`, transportError);
      throw transportError;
    }

    this.log.log(`API Response: status=${response.status}, bytes=${Buffer.byteLength(text, "utf-8")}`);
    return { status: response.status, text };
  }
}
