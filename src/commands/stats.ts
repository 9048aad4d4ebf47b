import { Command } from "@oclif/core";
import { join } from "node:path";
import {
  closeLog,
  commitFlags,
  connect,
  credentialArgs,
  fail,
  loadFullTree,
  openCommit,
  outputFlags,
  projectArg,
  requireArg,
  withInterrupt,
  writeReport,
} from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import { formatTimestamp } from "../lib/diagnostics.js";
import { countNodes } from "../lib/explorer/tree.js";
import { safeName } from "../lib/formatting.js";
import { collectStatistics, formatStatistics, formatStatisticsReport } from "../lib/generators/statistics.js";
import { Output } from "../lib/output.js";

export default class Stats extends Command {
  static description = "Display model statistics for a commit and save a text copy";

  static examples = [
    "<%= config.bin %> stats myuser mypassword PROJECT_ID",
    "<%= config.bin %> stats myuser mypassword PROJECT_ID --commit COMMIT_ID",
  ];

  static args = {
    ...credentialArgs,
    projectId: projectArg,
  };

  static flags = {
    ...commitFlags,
    ...outputFlags,
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Stats);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const project = await conn.client.getProject(projectId);
      const { session } = await openCommit(conn, out, projectId, flags.commit);

      const { root, roots } = await withInterrupt(out, (signal) => loadFullTree(conn, out, session, signal));
      const stats = collectStatistics(session.cache, roots);

      out.header("Model Statistics");
      out.lines(formatStatistics(stats, countNodes(root)));

      const generatedAt = new Date();
      const projectName = project.name ?? projectId;
      const path = join(
        conn.config.outputDir,
        `statistics_${safeName(projectName)}_${formatTimestamp(generatedAt, "file")}.txt`
      );
      await writeReport(
        path,
        formatStatisticsReport(stats, { projectName, projectId, commitId: session.commitId, generatedAt })
      );
      out.success(`Statistics saved to ${path}`);
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Statistics failed", error);
    }
  }
}
