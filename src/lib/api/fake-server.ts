/**
 * In-process stand-in for a SysML v2 model server, used by tests through
 * SysmlApiClient's injectable fetch.
 */

import type { FetchFn } from "./client.js";
import type { Commit, Element, Project } from "./types.js";

export const FAKE_BASE_URL = "https://models.test/api";
export const FAKE_USERNAME = "test-user";
export const FAKE_PASSWORD = "test-secret";

export interface FakeModel {
  projects: Project[];
  /** projectId -> commits, latest last */
  commits: Record<string, Commit[]>;
  /** commitId -> root elements */
  roots: Record<string, Element[]>;
  /** commitId -> every element of that commit */
  elements: Record<string, Element[]>;
  /** Projects whose commit list answers 403. */
  forbiddenProjects?: string[];
  /** Element ids that answer 500. */
  failingElements?: string[];
}

export interface FakeServer {
  fetch: FetchFn;
  /** Paths (with query) of every request received, in order. */
  requests: string[];
  count(predicate: (path: string) => boolean): number;
  /** Called before each response; tests use it to hold requests open. */
  beforeRespond?: (path: string) => Promise<void> | void;
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function createFakeServer(model: FakeModel): FakeServer {
  const expectedAuth = `Basic ${Buffer.from(`${FAKE_USERNAME}:${FAKE_PASSWORD}`).toString("base64")}`;

  const route = (pathname: string, params: URLSearchParams): Response => {
    const segments = pathname.split("/").filter(Boolean).map(decodeURIComponent);
    if (segments[0] !== "projects") return json(404, { error: "Not found" });

    if (segments.length === 1) return json(200, model.projects);

    const projectId = segments[1];
    const project = model.projects.find((p) => p["@id"] === projectId);
    if (!project) return json(404, { error: `Project ${projectId} not found` });
    if (segments.length === 2) return json(200, project);

    if (segments[2] === "branches") return json(200, []);
    if (segments[2] !== "commits") return json(404, { error: "Not found" });
    if (model.forbiddenProjects?.includes(projectId)) return json(403, { error: "Forbidden" });
    if (segments.length === 3) return json(200, model.commits[projectId] ?? []);

    const commitId = segments[3];
    const elements = model.elements[commitId] ?? [];
    if (segments[4] === "roots") return json(200, model.roots[commitId] ?? []);
    if (segments[4] !== "elements") return json(404, { error: "Not found" });

    if (segments.length === 5) {
      const size = Number(params.get("page[size]") ?? elements.length);
      const after = Number(params.get("page[after]") ?? 0);
      return json(200, elements.slice(after, after + size));
    }

    const elementId = segments[5];
    if (model.failingElements?.includes(elementId)) return json(500, { error: "Internal error" });
    const element = elements.find((e) => e["@id"] === elementId);
    return element ? json(200, element) : json(404, { error: `Element ${elementId} not found` });
  };

  const server: FakeServer = {
    requests: [],
    count: (predicate) => server.requests.filter(predicate).length,
    fetch: async (input, init) => {
      const url = new URL(input);
      const path = url.pathname.replace(/^\/api/, "") + url.search;
      server.requests.push(decodeURIComponent(path));
      await server.beforeRespond?.(path);

      const headers = new Headers(init?.headers);
      if (headers.get("Authorization") !== expectedAuth) {
        return json(401, { error: "Unauthorized" });
      }
      return route(url.pathname.replace(/^\/api/, ""), url.searchParams);
    },
  };
  return server;
}

/**
 * Minimal element literal for fixtures.
 */
export function el(id: string, type: string, name?: string, children: { members?: string[]; features?: string[] } = {}): Element {
  const element: Element = { "@id": id, "@type": type };
  if (name !== undefined) element.name = name;
  if (children.members) element.ownedMember = children.members.map((m) => ({ "@id": m }));
  if (children.features) element.ownedFeature = children.features.map((f) => ({ "@id": f }));
  return element;
}
