import { Command } from "@oclif/core";
import { closeLog, commonFlags, connect, credentialArgs, fail, projectArg, requireArg } from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import { formatCommitList, projectDetailRows } from "../lib/generators/listings.js";
import { Output } from "../lib/output.js";

export default class Commits extends Command {
  static description = "List a project's commits, oldest first";

  static examples = [
    "<%= config.bin %> commits myuser mypassword PROJECT_ID",
    '<%= config.bin %> commits "" "" PROJECT_ID',
  ];

  static args = {
    ...credentialArgs,
    projectId: projectArg,
  };

  static flags = {
    ...commonFlags,
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Commits);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;

      const [project, commits] = await Promise.all([
        conn.client.getProject(projectId),
        conn.client.getCommits(projectId),
      ]);

      out.header(`Project ${project.name ?? projectId}`);
      for (const [label, value] of projectDetailRows(project, commits.length)) {
        out.field(label, value);
      }

      out.header("Commits");
      if (commits.length === 0) {
        out.warn("No commits found for this project.");
      } else {
        out.lines(formatCommitList(commits));
      }

      const branches = await conn.client.getBranches(projectId);
      if (branches.length > 0) {
        out.header("Branches");
        for (const branch of branches) {
          out.field(branch.name ?? branch["@id"], branch.head?.["@id"] ?? "(no head)");
        }
      }
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Failed to list commits", error);
    }
  }
}
