import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { RemoteError } from "./api/errors.js";
import { createFakeServer, FAKE_BASE_URL, FAKE_PASSWORD, FAKE_USERNAME } from "./api/fake-server.js";
import { connect, fail, loadFullTree, openCommit, withInterrupt, writeReport } from "./command-utils.js";
import { vehicleModel } from "./explorer/test-fixtures.js";
import { Output } from "./output.js";

class ExitCalled extends Error {}

describe("command-utils", () => {
  let dir: string;
  let consoleSpy: ReturnType<typeof vi.spyOn>;
  const out = new Output({ verbose: false });
  const env = { SYSMLV2_USERNAME: FAKE_USERNAME, SYSMLV2_PASSWORD: FAKE_PASSWORD };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "smx-cmd-"));
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleSpy.mockRestore();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe("connect", () => {
    it("builds a client from flags and environment credentials", async () => {
      const server = createFakeServer(vehicleModel());
      const { config, credentials, client } = await connect({
        args: {},
        flags: { "base-url": FAKE_BASE_URL, concurrency: 3 },
        out,
        env,
        cwd: dir,
        fetch: server.fetch,
      });

      expect(credentials.source).toBe("environment");
      expect(config.baseUrl).toBe(FAKE_BASE_URL);
      expect(config.concurrency).toBe(3);
      expect(config.outputDir).toBe("output");
      expect((await client.getProjects()).map((p) => p["@id"])).toEqual(["p1", "lib"]);
    });

    it("takes the base URL from credentials.properties when nothing overrides it", async () => {
      await writeFile(
        join(dir, "credentials.properties"),
        `SYSMLV2_USERNAME=${FAKE_USERNAME}\nSYSMLV2_PASSWORD=${FAKE_PASSWORD}\nSYSMLV2_BASE_URL=https://file.test/api\n`
      );
      const { config, credentials } = await connect({ args: {}, flags: {}, out, env: {}, cwd: dir });

      expect(credentials.source).toBe("file");
      expect(config.baseUrl).toBe("https://file.test/api");
    });

    it("reads the config file and lets --output override outputDir", async () => {
      await writeFile(join(dir, "sysml-explorer.yaml"), "outputDir: reports\npageSize: 50\n");
      const { config } = await connect({ args: {}, flags: {}, out, env, cwd: dir });
      expect(config.outputDir).toBe("reports");
      expect(config.pageSize).toBe(50);

      const overridden = await connect({ args: {}, flags: { output: "elsewhere" }, out, env, cwd: dir });
      expect(overridden.config.outputDir).toBe("elsewhere");
    });
  });

  describe("fail", () => {
    it("prints a truncated message, logs the detail and exits 1", async () => {
      const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
        throw new ExitCalled();
      });
      const { log } = await connect({ args: {}, flags: {}, out, env, cwd: dir });
      const error = new RemoteError("/projects", 500, "x".repeat(300));

      await expect(fail(out, log, "Failed to load projects", error)).rejects.toBeInstanceOf(ExitCalled);

      expect(exitSpy).toHaveBeenCalledWith(1);
      const printed = consoleSpy.mock.calls.flat().join(" ");
      expect(printed).toContain("Failed to load projects: API returned status 500 for /projects:");
      expect(printed).toContain("...");
      const logged = await readFile(log.path, "utf-8");
      expect(logged).toContain("ERROR in Failed to load projects");
      expect(logged).toContain("status=500 endpoint=/projects");
    });
  });

  describe("openCommit", () => {
    it("opens the latest commit by default", async () => {
      const server = createFakeServer(vehicleModel());
      const conn = await connect({ args: {}, flags: { "base-url": FAKE_BASE_URL }, out, env, cwd: dir, fetch: server.fetch });

      const { session, commit, commits } = await openCommit(conn, out, "p1");
      expect(session.commitId).toBe("c2");
      expect(commit).toEqual({ "@id": "c2", created: "2026-02-01T00:00:00Z" });
      expect(commits).toHaveLength(2);

      expect((await openCommit(conn, out, "p1", "c1")).session.commitId).toBe("c1");
    });

    it("exits 1 when the project has no commits", async () => {
      vi.spyOn(process, "exit").mockImplementation(() => {
        throw new ExitCalled();
      });
      const model = vehicleModel();
      model.projects.push({ "@id": "empty", name: "Empty" });
      const server = createFakeServer(model);
      const conn = await connect({ args: {}, flags: { "base-url": FAKE_BASE_URL }, out, env, cwd: dir, fetch: server.fetch });

      await expect(openCommit(conn, out, "empty")).rejects.toBeInstanceOf(ExitCalled);
      expect(consoleSpy.mock.calls.flat().join(" ")).toContain("No commits found for project empty");
    });
  });

  describe("loadFullTree", () => {
    it("expands the whole commit into the session cache", async () => {
      const server = createFakeServer(vehicleModel());
      const conn = await connect({ args: {}, flags: { "base-url": FAKE_BASE_URL }, out, env, cwd: dir, fetch: server.fetch });
      const { session } = await openCommit(conn, out, "p1");

      const { root, roots, partial } = await loadFullTree(conn, out, session, new AbortController().signal);

      expect(partial).toBe(false);
      expect(roots.map((r) => r["@id"])).toEqual(["root"]);
      expect(root.loadedChildren.map((n) => n.id)).toEqual(["pkg"]);
      expect(session.cache.has("f1")).toBe(true);
    });

    it("reports a partial load when already cancelled", async () => {
      const server = createFakeServer(vehicleModel());
      const conn = await connect({ args: {}, flags: { "base-url": FAKE_BASE_URL }, out, env, cwd: dir, fetch: server.fetch });
      const { session } = await openCommit(conn, out, "p1");
      const controller = new AbortController();
      controller.abort();

      const { root, partial } = await loadFullTree(conn, out, session, controller.signal);

      expect(partial).toBe(true);
      expect(root.loadedChildren).toEqual([]);
    });
  });

  describe("withInterrupt", () => {
    it("aborts the signal on SIGINT and removes its listener", async () => {
      const before = process.listenerCount("SIGINT");
      const aborted = await withInterrupt(out, async (signal) => {
        const listeners = process.listeners("SIGINT");
        expect(listeners).toHaveLength(before + 1);
        // call only our handler; emitting the signal would reach the runner's own listeners
        listeners[listeners.length - 1]("SIGINT");
        return signal.aborted;
      });

      expect(aborted).toBe(true);
      expect(process.listenerCount("SIGINT")).toBe(before);
    });
  });

  describe("writeReport", () => {
    it("creates missing directories", async () => {
      const path = join(dir, "a", "b", "report.txt");
      await writeReport(path, "content");
      expect(await readFile(path, "utf-8")).toBe("content");
    });
  });
});
