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
import { formatBytes } from "../lib/formatting.js";
import { renderHtmlReport } from "../lib/generators/html-report.js";
import { Output } from "../lib/output.js";

export default class Report extends Command {
  static description = "Load a whole commit and write a self-contained HTML report with navigation and search";

  static examples = [
    "<%= config.bin %> report myuser mypassword PROJECT_ID",
    "<%= config.bin %> report myuser mypassword PROJECT_ID --commit COMMIT_ID -o reports",
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
    const { args, flags } = await this.parse(Report);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const { session } = await openCommit(conn, out, projectId, flags.commit);

      await withInterrupt(out, (signal) => loadFullTree(conn, out, session, signal));
      if (session.cache.size === 0) {
        out.warn("No elements loaded; nothing to report.");
        await closeLog(out, log);
        return;
      }

      const html = renderHtmlReport({
        projectId,
        commitId: session.commitId,
        cache: session.cache,
        exportedAt: new Date(),
      });
      const path = join(conn.config.outputDir, `sysml_export_${projectId.slice(0, 8)}.html`);
      await writeReport(path, html);
      out.success(`HTML report with ${session.cache.size} elements saved to ${path} (${formatBytes(Buffer.byteLength(html, "utf-8"))})`);
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Report failed", error);
    }
  }
}
