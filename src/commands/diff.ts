import { Command, Flags } from "@oclif/core";
import {
  closeLog,
  commonFlags,
  connect,
  credentialArgs,
  fail,
  projectArg,
  requireArg,
} from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import { diffElementMaps, formatDiffReport, loadCommitRoots } from "../lib/generators/diff.js";
import { Output } from "../lib/output.js";

export default class Diff extends Command {
  static description = "Compare the root elements of two commits of a project";

  static examples = [
    "<%= config.bin %> diff myuser mypassword PROJECT_ID",
    "<%= config.bin %> diff myuser mypassword PROJECT_ID --base COMMIT_A --compare COMMIT_B",
    "<%= config.bin %> diff myuser mypassword PROJECT_ID --policy raw --ignore elementId",
  ];

  static args = {
    ...credentialArgs,
    projectId: projectArg,
  };

  static flags = {
    ...commonFlags,
    base: Flags.string({
      description: "Base commit id (defaults to the second-latest commit)",
    }),
    compare: Flags.string({
      description: "Commit to compare against the base (defaults to the latest commit)",
    }),
    policy: Flags.option({
      description: "canonical ignores key order; raw compares the JSON as served",
      options: ["canonical", "raw"] as const,
      default: "canonical",
    })(),
    ignore: Flags.string({
      description: "Property left out of the comparison (repeatable)",
      multiple: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Diff);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const { client, config } = conn;

      const commits = await client.getCommits(projectId);
      if (commits.length < 2) {
        out.error("Need at least 2 commits to compare");
        await closeLog(out, log);
        process.exit(1);
      }

      const baseId = flags.base ?? commits[commits.length - 2]["@id"];
      const compareId = flags.compare ?? commits[commits.length - 1]["@id"];
      if (baseId === compareId) {
        out.error("Please select two different commits");
        await closeLog(out, log);
        process.exit(1);
      }
      const base = commits.find((c) => c["@id"] === baseId) ?? { "@id": baseId };
      const compare = commits.find((c) => c["@id"] === compareId) ?? { "@id": compareId };

      out.info(`Loading ${baseId} and ${compareId}...`);
      const [baseElements, compareElements] = await Promise.all([
        loadCommitRoots(client, projectId, baseId, config.concurrency),
        loadCommitRoots(client, projectId, compareId, config.concurrency),
      ]);

      const diff = diffElementMaps(baseElements, compareElements, {
        policy: flags.policy,
        ignore: flags.ignore,
      });
      out.lines(formatDiffReport({ base, compare, baseElements, compareElements, diff }));
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Diff failed", error);
    }
  }
}
