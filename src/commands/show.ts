import { Command } from "@oclif/core";
import {
  closeLog,
  commitFlags,
  connect,
  credentialArgs,
  elementArg,
  fail,
  openCommit,
  projectArg,
  requireArg,
} from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import { resolveElement } from "../lib/explorer/tree.js";
import { renderNotation, prefetchSubtree } from "../lib/generators/notation.js";
import { formatProperties } from "../lib/generators/properties.js";
import { isIdentified } from "../lib/api/types.js";
import { childRefIds } from "../lib/elements.js";
import { Output } from "../lib/output.js";

export default class Show extends Command {
  static description = "Show one element's properties and its SysML v2 textual notation";

  static examples = [
    "<%= config.bin %> show myuser mypassword PROJECT_ID ELEMENT_ID",
    "<%= config.bin %> show myuser mypassword PROJECT_ID ELEMENT_ID --commit COMMIT_ID",
  ];

  static args = {
    ...credentialArgs,
    projectId: projectArg,
    elementId: elementArg,
  };

  static flags = {
    ...commitFlags,
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Show);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    const elementId = requireArg(out, args.elementId, "elementId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;

      const { session } = await openCommit(conn, out, projectId, flags.commit);

      const element = await resolveElement(session, elementId);
      // load the subtree so references and nested members resolve to names
      await prefetchSubtree(session, childRefIds(element), { concurrency: conn.config.concurrency, log });
      if (isIdentified(element.owner)) {
        try {
          await session.cache.getOrFetch(element.owner["@id"]);
        } catch (error) {
          log.logError(`Owner lookup for ${elementId}`, error);
        }
      }

      out.header("Properties");
      out.lines(formatProperties(element, session.cache));

      out.header("SysML v2 Text");
      out.lines(renderNotation(element, session.cache).trimEnd());
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, `Failed to show element ${elementId}`, error);
    }
  }
}
