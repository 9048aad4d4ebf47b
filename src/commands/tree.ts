import { Command, Flags } from "@oclif/core";
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
  withInterrupt,
} from "../lib/command-utils.js";
import type { DiagnosticLog } from "../lib/diagnostics.js";
import { loadDependencies } from "../lib/explorer/session.js";
import {
  buildRootTree,
  countNodes,
  expandAll,
  expandToDepth,
  renderTree,
  resolveElement,
  TreeNode,
} from "../lib/explorer/tree.js";
import { Output } from "../lib/output.js";

export default class Tree extends Command {
  static description = "Print a project's element tree, loading elements on demand";

  static examples = [
    "<%= config.bin %> tree myuser mypassword PROJECT_ID",
    "<%= config.bin %> tree myuser mypassword PROJECT_ID --depth 3",
    "<%= config.bin %> tree myuser mypassword PROJECT_ID ELEMENT_ID --all",
  ];

  static args = {
    ...credentialArgs,
    projectId: projectArg,
    elementId: elementArg,
  };

  static flags = {
    ...commitFlags,
    depth: Flags.integer({
      char: "d",
      description: "Levels to expand below the root",
      default: 1,
      min: 0,
    }),
    all: Flags.boolean({
      description: "Expand everything (Ctrl+C stops early and prints what is loaded)",
      default: false,
      exclusive: ["depth"],
    }),
    "no-dependencies": Flags.boolean({
      description: "Skip loading the roots of used library projects",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Tree);
    const out = new Output({ verbose: flags.verbose });
    const projectId = requireArg(out, args.projectId, "projectId");
    let log: DiagnosticLog | undefined;

    try {
      const conn = await connect({ args, flags, out });
      log = conn.log;
      const { client, config } = conn;

      const { session } = await openCommit(conn, out, projectId, flags.commit);

      if (!flags["no-dependencies"]) {
        const added = await loadDependencies(session, { log });
        if (added > 0) out.info(`Loaded ${added} dependency roots`);
      }

      const expandOptions = { concurrency: config.concurrency, log };
      await withInterrupt(out, async (signal) => {
        let root: TreeNode;
        if (args.elementId) {
          root = TreeNode.create(await resolveElement(session, args.elementId));
        } else {
          const roots = await client.getRoots(projectId, session.commitId);
          root = await buildRootTree(session, roots, {
            ...expandOptions,
            signal,
            onProgress: (done, total) => out.progress("Loading root members", done, total),
          });
        }

        if (flags.all) {
          const expanded = await expandAll(root, session, {
            ...expandOptions,
            signal,
            onProgress: (count) => out.progress("Expanded", count),
          });
          if (signal.aborted) out.warn(`Stopped after expanding ${expanded} nodes; showing the partial tree`);
        } else {
          // the synthetic project node already holds its first level
          const depth = root.synthetic ? flags.depth - 1 : flags.depth;
          for (const child of root.synthetic ? root.loadedChildren : [root]) {
            await expandToDepth(child, session, depth, { ...expandOptions, signal });
          }
        }

        out.header(root.synthetic ? `Project ${projectId}` : `Element ${root.id}`);
        out.lines(renderTree(root, { verbose: flags.verbose }));
        out.summary(`${countNodes(root)} nodes loaded, ${session.cache.size} elements cached`);
      });
      await closeLog(out, log);
    } catch (error) {
      await fail(out, log, "Failed to build tree", error);
    }
  }
}
