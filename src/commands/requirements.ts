import { Command } from "@oclif/core";
import { join } from "node:path";
import {
  closeLog,
  commitFlags,
  connect,
  credentialArgs,
  fail,
  openCommit,
  outputFlags,
  projectArg,
  requireArg,
  withInterrupt,
  writeReport,
} from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import { safeName } from "../lib/formatting.js";
import {
  buildRequirementsDump,
  formatRequirements,
  formatTypeSummary,
  summarizeTypes,
} from "../lib/generators/requirements.js";
import { Output } from "../lib/output.js";

export default class Requirements extends Command {
  static description = "Fetch every element of a commit, list the requirement-related ones and save them as JSON";

  static examples = [
    "<%= config.bin %> requirements myuser mypassword PROJECT_ID",
    "<%= config.bin %> requirements myuser mypassword PROJECT_ID --commit COMMIT_ID -o reports",
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
    const { args, flags } = await this.parse(Requirements);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const { client, config } = conn;

      const project = await client.getProject(projectId);
      const { session, commit } = await openCommit(conn, out, projectId, flags.commit);
      out.info(`Project: ${project.name ?? projectId}, commit ${commit.name ?? commit["@id"]}`);

      const elements = await withInterrupt(out, (signal) =>
        client.getAllElements(projectId, session.commitId, {
          pageSize: config.pageSize,
          signal,
          onPage: (fetched) => out.progress("Fetched elements", fetched),
        })
      );
      out.info(`Fetched ${elements.length} elements`);

      out.lines(formatTypeSummary(summarizeTypes(elements)));
      const dump = buildRequirementsDump(project, commit, elements);
      out.lines(formatRequirements(dump.requirements));

      const path = join(config.outputDir, `requirements_${safeName(project.name || "unknown")}.json`);
      await writeReport(path, JSON.stringify(dump, null, 2) + "\n");
      out.success(`${dump.requirements.length} requirements saved to ${path}`);
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Requirements failed", error);
    }
  }
}
