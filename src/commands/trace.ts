import { Command, Flags } from "@oclif/core";
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
import { buildMatrix, buildRelationshipMap, formatMatrix, matrixToCsv } from "../lib/generators/traceability.js";
import { Output } from "../lib/output.js";

export default class Trace extends Command {
  static description = "Show a traceability matrix of relationships between the loaded elements";

  static examples = [
    "<%= config.bin %> trace myuser mypassword PROJECT_ID",
    "<%= config.bin %> trace myuser mypassword PROJECT_ID --csv --max-types 5",
  ];

  static args = {
    ...credentialArgs,
    projectId: projectArg,
  };

  static flags = {
    ...commitFlags,
    ...outputFlags,
    csv: Flags.boolean({
      description: "Also write the matrix as CSV",
      default: false,
    }),
    "max-types": Flags.integer({
      description: "Element types shown on each axis",
      default: 10,
      min: 1,
    }),
    "per-type": Flags.integer({
      description: "Elements shown per type",
      default: 10,
      min: 1,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Trace);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const { session } = await openCommit(conn, out, projectId, flags.commit);

      await withInterrupt(out, (signal) => loadFullTree(conn, out, session, signal));
      if (session.cache.size === 0) {
        out.warn("No elements loaded; nothing to trace.");
        await closeLog(out, log);
        return;
      }

      const relationships = buildRelationshipMap(session.cache);
      const matrix = buildMatrix(session.cache, relationships, {
        maxTypes: flags["max-types"],
        perType: flags["per-type"],
      });

      out.header("Traceability Matrix");
      out.lines(formatMatrix(matrix));

      if (flags.csv) {
        const path = join(conn.config.outputDir, `traceability_${projectId.slice(0, 8)}.csv`);
        await writeReport(path, matrixToCsv(matrix));
        out.success(`Matrix saved to ${path}`);
      }
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Traceability failed", error);
    }
  }
}
