import { Args, Flags } from "@oclif/core";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { SysmlApiClient, type FetchFn } from "./api/client.js";
import { loadConfigFile, resolveConfig, type ExplorerConfig } from "./config.js";
import { maskPassword, resolveCredentials, terminalPrompt, type Credentials, type PromptFn } from "./credentials.js";
import type { Commit, Element } from "./api/types.js";
import { DiagnosticLog } from "./diagnostics.js";
import { openSession, type Session } from "./explorer/session.js";
import { buildRootTree, expandAll, type TreeNode } from "./explorer/tree.js";
import { errorMessage, MAX_CONSOLE_ERROR, truncate } from "./formatting.js";
import { Output } from "./output.js";

/**
 * Positional credentials shared by every command. Both are optional; see resolveCredentials.
 */
export const credentialArgs = {
  username: Args.string({
    description: "Username for the model server",
  }),
  password: Args.string({
    description: "Password for the model server",
  }),
};

export const projectArg = Args.string({
  description: "Project id",
});

export const elementArg = Args.string({
  description: "Element id",
});

/**
 * Common flags shared by all explorer commands.
 */
export const commonFlags = {
  "base-url": Flags.string({
    description: "Model server base URL (overrides SYSMLV2_BASE_URL and the config file)",
  }),
  config: Flags.string({
    description: "Path to a sysml-explorer.yaml config file",
  }),
  concurrency: Flags.integer({
    description: "Parallel element fetches",
    min: 1,
  }),
  verbose: Flags.boolean({
    char: "v",
    description: "Show detailed output, including diagnostic lines",
    default: false,
  }),
};

/**
 * Flags for commands that read one commit of a project.
 */
export const commitFlags = {
  ...commonFlags,
  commit: Flags.string({
    description: "Commit id (defaults to the latest commit)",
  }),
};

/**
 * Flags for commands that write files.
 */
export const outputFlags = {
  output: Flags.string({
    char: "o",
    description: "Output directory (overrides outputDir from the config file)",
  }),
};

export interface ConnectArgs {
  username?: string;
  password?: string;
}

export interface ConnectFlags {
  "base-url"?: string;
  config?: string;
  concurrency?: number;
  output?: string;
}

export interface ConnectOptions {
  args: ConnectArgs;
  flags: ConnectFlags;
  out: Output;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Defaults to a terminal prompt when stdin is interactive. */
  prompt?: PromptFn;
  /** Injected by tests; defaults to the global fetch. */
  fetch?: FetchFn;
}

export interface Connection {
  config: ExplorerConfig;
  credentials: Credentials;
  client: SysmlApiClient;
  log: DiagnosticLog;
}

/**
 * Resolve config and credentials, open the diagnostic log and build the API client.
 */
export async function connect(options: ConnectOptions): Promise<Connection> {
  const { out, flags } = options;
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const file = await loadConfigFile(flags.config, cwd);
  const credentials = await resolveCredentials({
    username: options.args.username,
    password: options.args.password,
    env,
    filePath: join(cwd, "credentials.properties"),
    prompt: options.prompt ?? terminalPrompt(),
  });
  const config = resolveConfig({
    file,
    credentialsBaseUrl: credentials.fileBaseUrl,
    env,
    flags: { baseUrl: flags["base-url"], concurrency: flags.concurrency, outputDir: flags.output },
  });

  const log = new DiagnosticLog({
    dir: join(cwd, config.diagnosticsDir),
    echo: (line) => out.diagnostic(line),
  });
  log.log(`Connecting to ${config.baseUrl} as ${credentials.username} (password ${maskPassword(credentials.password)}, from ${credentials.source})`);
  out.info(`Server: ${config.baseUrl}`);

  const client = new SysmlApiClient({
    baseUrl: config.baseUrl,
    username: credentials.username,
    password: credentials.password,
    timeoutMs: config.timeoutMs,
    fetch: options.fetch,
    log,
  });

  return { config, credentials, client, log };
}

/**
 * Positional arguments after the optional credentials cannot be marked required; check them here.
 */
export function requireArg(out: Output, value: string | undefined, name: string): string {
  if (value) return value;
  out.error(`Missing argument: ${name}. Pass username and password (or "" "" to use the environment) before it.`);
  process.exit(1);
}

/**
 * Print a short failure message, keep the full detail in the diagnostic log, and exit 1.
 */
export async function fail(out: Output, log: DiagnosticLog | undefined, context: string, error: unknown): Promise<never> {
  out.error(`${context}: ${truncate(errorMessage(error), MAX_CONSOLE_ERROR)}`);
  if (log) {
    log.logError(context, error);
    try {
      await log.flush();
      out.info(`Details in ${log.path}`);
    } catch (flushError) {
      out.warn(`Could not write diagnostic log: ${errorMessage(flushError)}`);
    }
  }
  process.exit(1);
}

/**
 * Wait for pending diagnostic writes; a failed write is reported, not fatal.
 */
export async function closeLog(out: Output, log: DiagnosticLog): Promise<void> {
  try {
    await log.flush();
  } catch (error) {
    out.warn(`Could not write diagnostic log: ${errorMessage(error)}`);
  }
}

/**
 * Write a report file, creating its directory.
 */
export async function writeReport(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
}

/**
 * Abort controller tied to Ctrl+C for the duration of `body`.
 * The first SIGINT aborts cooperatively; a second one is left to Node's default handling.
 */
export async function withInterrupt<T>(out: Output, body: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    out.warn("Cancelling, waiting for requests in flight...");
    controller.abort();
    process.removeListener("SIGINT", onInterrupt);
  };
  process.on("SIGINT", onInterrupt);
  try {
    return await body(controller.signal);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

export interface OpenedCommit {
  session: Session;
  commits: Commit[];
  commit: Commit;
}

/**
 * Open a session on `commitId`, or on the latest commit. A project without commits ends the command with exit 1.
 */
export async function openCommit(conn: Connection, out: Output, projectId: string, commitId?: string): Promise<OpenedCommit> {
  const opened = await openSession(conn.client, projectId, commitId);
  if (!opened) {
    out.error(`No commits found for project ${projectId}`);
    await closeLog(out, conn.log);
    process.exit(1);
  }
  const { session, commits } = opened;
  const commit = commits.find((c) => c["@id"] === session.commitId) ?? { "@id": session.commitId };
  out.info(`Session ${session.label}`);
  return { session, commits, commit };
}

export interface LoadedTree {
  root: TreeNode;
  roots: Element[];
  /** True when Ctrl+C stopped the expansion early. */
  partial: boolean;
}

/**
 * Build the root tree and expand all of it, so every reachable displayable element is cached.
 */
export async function loadFullTree(conn: Connection, out: Output, session: Session, signal: AbortSignal): Promise<LoadedTree> {
  const options = { concurrency: conn.config.concurrency, log: conn.log, signal };
  const roots = await conn.client.getRoots(session.projectId, session.commitId);
  const root = await buildRootTree(session, roots, {
    ...options,
    onProgress: (done, total) => out.progress("Loading root members", done, total),
  });
  const expanded = await expandAll(root, session, {
    ...options,
    onProgress: (count) => out.progress("Expanded", count),
  });
  if (signal.aborted) out.warn(`Stopped after expanding ${expanded} nodes; continuing with what is loaded`);
  out.info(`${session.cache.size} elements cached`);
  return { root, roots, partial: signal.aborted };
}
