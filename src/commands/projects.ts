import { Command, Flags } from "@oclif/core";
import pLimit from "p-limit";
import { join } from "node:path";
import { closeLog, commonFlags, connect, credentialArgs, fail, outputFlags, writeReport } from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import { formatProjectTable } from "../lib/generators/listings.js";
import { Output } from "../lib/output.js";

export default class Projects extends Command {
  static description = "List the projects on the model server and save them as JSON";

  static examples = [
    "<%= config.bin %> projects myuser mypassword",
    "<%= config.bin %> projects --check-access",
    "<%= config.bin %> projects --base-url https://models.example.com/api -v",
  ];

  static args = {
    ...credentialArgs,
  };

  static flags = {
    ...commonFlags,
    ...outputFlags,
    "check-access": Flags.boolean({
      description: "Probe each project's commit list and mark the ones you cannot read",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Projects);
    const out = new Output({ verbose: flags.verbose });
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const { client, config } = conn;

      log.log("Fetching projects...");
      const projects = await client.getProjects();
      out.header(`Projects (${projects.length})`);

      let access: Map<string, boolean> | undefined;
      if (flags["check-access"]) {
        const limit = pLimit(config.probeConcurrency);
        let probed = 0;
        const results = await Promise.all(
          projects.map((project) =>
            limit(async (): Promise<[string, boolean]> => {
              const ok = await client.probeAccess(project["@id"]);
              out.progress("Checking access", ++probed, projects.length);
              return [project["@id"], ok];
            })
          )
        );
        access = new Map(results);
      }

      out.lines(formatProjectTable(projects, access));

      if (access) {
        const denied = [...access.values()].filter((ok) => !ok).length;
        if (denied > 0) out.warn(`${denied} of ${projects.length} projects are not accessible`);
      }

      const path = join(config.outputDir, "projects.json");
      await writeReport(path, JSON.stringify(projects, null, 2) + "\n");
      out.success(`Projects saved to ${path}`);
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Failed to list projects", error);
    }
  }
}
