import { Command } from "@oclif/core";
import { join } from "node:path";
import {
  closeLog,
  commitFlags,
  connect,
  credentialArgs,
  elementArg,
  fail,
  openCommit,
  outputFlags,
  projectArg,
  writeReport,
} from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import { seedRoots } from "../lib/explorer/session.js";
import { resolveElement } from "../lib/explorer/tree.js";
import { exportFileName, formatBytes, preview } from "../lib/formatting.js";
import { prefetchSubtree, renderExport, rootMemberIds } from "../lib/generators/notation.js";
import { Output } from "../lib/output.js";

export default class Export extends Command {
  static description = "Export a project, or one element of it, as SysML v2 textual notation";

  static examples = [
    "<%= config.bin %> export myuser mypassword",
    "<%= config.bin %> export myuser mypassword PROJECT_ID",
    "<%= config.bin %> export myuser mypassword PROJECT_ID ELEMENT_ID -o exports",
  ];

  static args = {
    ...credentialArgs,
    projectId: projectArg,
    elementId: elementArg,
  };

  static flags = {
    ...commitFlags,
    ...outputFlags,
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Export);
    const out = new Output({ verbose: flags.verbose });
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const { client, config } = conn;

      if (!args.projectId) {
        const projects = await client.getProjects();
        out.header("Available Projects");
        for (const project of projects) {
          out.field("ID", project["@id"]);
          out.field("Name", project.name ?? "(unnamed)");
          console.log("-".repeat(80));
        }
        console.log();
        console.log(`To export a project, run: ${this.config.bin} export <username> <password> <projectId>`);
        await closeLog(out, log);
        return;
      }

      const projectId = args.projectId;
      const project = await client.getProject(projectId);
      const { session, commit } = await openCommit(conn, out, projectId, flags.commit);
      out.info(`Fetching elements from commit ${commit.name ?? commit["@id"]}...`);

      const roots = await client.getRoots(projectId, session.commitId);
      seedRoots(session, roots);
      let startIds: string[];
      if (args.elementId) {
        await resolveElement(session, args.elementId);
        startIds = [args.elementId];
      } else {
        out.info(`Found ${roots.length} root element(s)`);
        startIds = rootMemberIds(roots);
      }

      const loaded = await prefetchSubtree(session, startIds, { concurrency: config.concurrency, log });
      out.info(`Loaded ${loaded} elements`);

      const exportedAt = new Date();
      const content = renderExport({
        projectName: project.name ?? projectId,
        commit,
        roots,
        elementId: args.elementId,
        cache: session.cache,
        exportedAt,
      });

      out.header("Preview");
      out.lines(preview(content));

      const path = join(config.outputDir, exportFileName(project.name || "unknown", exportedAt));
      await writeReport(path, content);
      out.success(`Export saved to ${path} (${formatBytes(Buffer.byteLength(content, "utf-8"))})`);
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Export failed", error);
    }
  }
}
