import { describe, it, expect, vi } from "vitest";
import { SysmlApiClient, buildQuery, basicAuthHeader } from "./client.js";
import { RemoteError, TransportError } from "./errors.js";
import {
  createFakeServer,
  el,
  FAKE_BASE_URL,
  FAKE_PASSWORD,
  FAKE_USERNAME,
  type FakeModel,
} from "./fake-server.js";

const model: FakeModel = {
  projects: [
    { "@id": "p1", name: "Drone" },
    { "@id": "p2", name: "Locked" },
  ],
  commits: {
    p1: [{ "@id": "c1", created: "2026-01-01" }, { "@id": "c2", created: "2026-02-01" }],
  },
  roots: { c2: [el("root", "Namespace", undefined, { members: ["pkg"] })] },
  elements: {
    c2: [
      el("pkg", "Package", "Drone"),
      el("e1", "PartDefinition", "Motor"),
      el("e2", "PartDefinition", "Battery"),
      el("e3", "PartUsage", "motor"),
      el("e4", "PartUsage", "battery"),
      el("e5", "AttributeUsage", "mass"),
    ],
  },
  forbiddenProjects: ["p2"],
  failingElements: ["broken"],
};

function makeClient(fetchImpl = createFakeServer(model).fetch, log = { log: vi.fn(), logError: vi.fn() }) {
  return new SysmlApiClient({
    baseUrl: FAKE_BASE_URL + "/",
    username: FAKE_USERNAME,
    password: FAKE_PASSWORD,
    fetch: fetchImpl,
    log,
  });
}

describe("buildQuery", () => {
  it("returns empty string without params", () => {
    expect(buildQuery()).toBe("");
    expect(buildQuery({ a: undefined })).toBe("");
  });

  it("encodes bracketed page parameters", () => {
    expect(buildQuery({ "page[size]": 100, "page[after]": 200 })).toBe("?page%5Bsize%5D=100&page%5Bafter%5D=200");
  });
});

describe("basicAuthHeader", () => {
  it("base64-encodes user:password", () => {
    expect(basicAuthHeader("test-user", "test-secret")).toBe(
      "Basic " + Buffer.from("test-user:test-secret").toString("base64")
    );
  });
});

describe("SysmlApiClient", () => {
  it("lists projects", async () => {
    const projects = await makeClient().getProjects();
    expect(projects.map((p) => p["@id"])).toEqual(["p1", "p2"]);
  });

  it("fetches a single element by id", async () => {
    const element = await makeClient().getElement("p1", "c2", "e1");
    expect(element.name).toBe("Motor");
    expect(element["@type"]).toBe("PartDefinition");
  });

  it("fetches roots of a commit", async () => {
    const roots = await makeClient().getRoots("p1", "c2");
    expect(roots).toHaveLength(1);
    expect(roots[0]["@id"]).toBe("root");
  });

  it("throws RemoteError with status for 4xx/5xx", async () => {
    const client = makeClient();
    await expect(client.getElement("p1", "c2", "missing")).rejects.toBeInstanceOf(RemoteError);
    await expect(client.getElement("p1", "c2", "broken")).rejects.toMatchObject({ status: 500 });
  });

  it("throws RemoteError 401 for bad credentials", async () => {
    const client = new SysmlApiClient({
      baseUrl: FAKE_BASE_URL,
      username: FAKE_USERNAME,
      password: "wrong",
      fetch: createFakeServer(model).fetch,
    });
    await expect(client.getProjects()).rejects.toMatchObject({ status: 401 });
  });

  it("truncates long error bodies to 500 characters", async () => {
    const longBody = "x".repeat(2000);
    const client = makeClient(async () => new Response(longBody, { status: 502 }));
    const error = await client.getProjects().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteError);
    if (error instanceof RemoteError) {
      expect(error.body).toHaveLength(500);
      expect(error.status).toBe(502);
    }
  });

  it("wraps network failures in TransportError", async () => {
    const client = makeClient(async () => {
      throw new TypeError("fetch failed");
    });
    const error = await client.getProjects().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.endpoint).toBe("/projects");
      expect(error.message).toBe("Request to /projects failed: fetch failed");
    }
  });

  it("rejects non-JSON bodies", async () => {
    const client = makeClient(async () => new Response("<html>login</html>", { status: 200 }));
    await expect(client.getProjects()).rejects.toThrow("Response from /projects is not JSON");
  });

  it("rejects an object where a list is expected", async () => {
    const client = makeClient(async () => new Response(JSON.stringify({ error: "nope" }), { status: 200 }));
    await expect(client.getCommits("p1")).rejects.toThrow("Expected a list from /projects/p1/commits");
  });

  it("logs every call with endpoint, status and size", async () => {
    const log = { log: vi.fn(), logError: vi.fn() };
    await makeClient(createFakeServer(model).fetch, log).getProject("p1");
    const body = JSON.stringify(model.projects[0]);
    expect(log.log.mock.calls).toEqual([
      ["API GET: /projects/p1"],
      [`API Response: status=200, bytes=${Buffer.byteLength(body, "utf-8")}`],
    ]);
  });

  it("pages through all elements using the running offset", async () => {
    const server = createFakeServer(model);
    const elements = await makeClient(server.fetch).getAllElements("p1", "c2", { pageSize: 2 });

    expect(elements.map((e) => e["@id"])).toEqual(["pkg", "e1", "e2", "e3", "e4", "e5"]);
    expect(server.requests).toEqual([
      "/projects/p1/commits/c2/elements?page[size]=2",
      "/projects/p1/commits/c2/elements?page[size]=2&page[after]=2",
      "/projects/p1/commits/c2/elements?page[size]=2&page[after]=4",
      "/projects/p1/commits/c2/elements?page[size]=2&page[after]=6",
    ]);
  });

  it("counts entries without an id toward the paging offset", async () => {
    const pages = [[{ "@id": "a" }, { name: "anonymous" }], [{ "@id": "b" }]];
    const urls: string[] = [];
    const client = makeClient(async (input) => {
      urls.push(decodeURIComponent(input));
      return new Response(JSON.stringify(pages[urls.length - 1] ?? []), { status: 200 });
    });

    const elements = await client.getAllElements("p1", "c2", { pageSize: 2 });

    expect(elements.map((e) => e["@id"])).toEqual(["a", "b"]);
    expect(urls).toEqual([
      `${FAKE_BASE_URL}/projects/p1/commits/c2/elements?page[size]=2`,
      `${FAKE_BASE_URL}/projects/p1/commits/c2/elements?page[size]=2&page[after]=2`,
    ]);
  });

  it("stops paging when the signal is aborted", async () => {
    const controller = new AbortController();
    const elements = await makeClient().getAllElements("p1", "c2", {
      pageSize: 2,
      signal: controller.signal,
      onPage: () => controller.abort(),
    });
    expect(elements).toHaveLength(2);
  });

  describe("probeAccess", () => {
    it("is true when the commit list answers 200", async () => {
      expect(await makeClient().probeAccess("p1")).toBe(true);
    });

    it("is false on 403", async () => {
      expect(await makeClient().probeAccess("p2")).toBe(false);
    });

    it("is false on transport failure", async () => {
      const client = makeClient(async () => {
        throw new TypeError("fetch failed");
      });
      expect(await client.probeAccess("p1")).toBe(false);
    });
  });
});
