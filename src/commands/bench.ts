import { Command, Flags } from "@oclif/core";
import {
  closeLog,
  commitFlags,
  connect,
  credentialArgs,
  fail,
  openCommit,
  projectArg,
  requireArg,
} from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import {
  compareLoadPerformance,
  DEFAULT_BENCHMARK_IDS,
  MIN_BENCHMARK_IDS,
  sampleIds,
} from "../lib/explorer/load-benchmark.js";
import { buildRootTree, expandToDepth } from "../lib/explorer/tree.js";
import { Output } from "../lib/output.js";

export default class Bench extends Command {
  static description = "Compare sequential and pooled element loading against the server";

  static examples = [
    "<%= config.bin %> bench myuser mypassword PROJECT_ID",
    "<%= config.bin %> bench myuser mypassword PROJECT_ID --count 20 --concurrency 4",
  ];

  static args = {
    ...credentialArgs,
    projectId: projectArg,
  };

  static flags = {
    ...commitFlags,
    count: Flags.integer({
      description: "Elements to load in each pass",
      default: DEFAULT_BENCHMARK_IDS,
      min: 1,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Bench);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const { client, config } = conn;

      const { session } = await openCommit(conn, out, projectId, flags.commit);
      const expandOptions = { concurrency: config.concurrency, log };
      const roots = await client.getRoots(projectId, session.commitId);
      const root = await buildRootTree(session, roots, expandOptions);
      for (const child of root.loadedChildren) {
        await expandToDepth(child, session, 1, expandOptions);
      }

      const ids = sampleIds(session.cache, flags.count);
      if (ids.length < MIN_BENCHMARK_IDS) {
        out.error(`Not enough elements in cache (${ids.length}, need ${MIN_BENCHMARK_IDS}). Pick a larger project.`);
        await closeLog(out, log);
        process.exit(1);
      }

      const result = await compareLoadPerformance(session, ids, {
        concurrency: config.concurrency,
        log,
        onPass: (pass) => out.info(`Testing ${pass} loading...`),
      });

      out.header("Load Performance");
      out.field("Elements loaded", result.count);
      out.field("Sequential", `${result.sequentialMs} ms`);
      out.field("Parallel", `${result.parallelMs} ms (pool ${config.concurrency})`);
      out.field("Speedup", `${result.speedupPercent.toFixed(1)}%`);
      if (result.failures > 0) out.warn(`${result.failures} element loads failed; see ${conn.log.path}`);
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Load benchmark failed", error);
    }
  }
}
