import type { SysmlApiClient } from "../api/client.js";
import type { Commit, Element, Project, ProjectUsage } from "../api/types.js";
import { silentLog, type DiagnosticSink } from "../diagnostics.js";
import { ElementCache } from "./cache.js";

/**
 * One project+commit selection and the cache that belongs to it.
 * Selecting another commit or project means a new Session, never a mutation.
 */
export class Session {
  readonly cache: ElementCache;

  constructor(
    readonly client: SysmlApiClient,
    readonly projectId: string,
    readonly commitId: string
  ) {
    this.cache = new ElementCache((id) => client.getElement(projectId, commitId, id));
  }

  withCommit(commitId: string): Session {
    return new Session(this.client, this.projectId, commitId);
  }

  /** Short label for status lines: "1a2b3c4d/5e6f7a8b". */
  get label(): string {
    return `${this.projectId.slice(0, 8)}/${this.commitId.slice(0, 8)}`;
  }
}

/**
 * Latest commit, which the server lists last.
 */
export function latestCommit(commits: Commit[]): Commit | undefined {
  return commits.length > 0 ? commits[commits.length - 1] : undefined;
}

/**
 * Open a session on a project, at the given commit or the latest one.
 * Returns undefined when the project has no commits.
 */
export async function openSession(
  client: SysmlApiClient,
  projectId: string,
  commitId?: string
): Promise<{ session: Session; commits: Commit[] } | undefined> {
  const commits = await client.getCommits(projectId);
  const chosen = commitId ?? latestCommit(commits)?.["@id"];
  if (!chosen) return undefined;
  return { session: new Session(client, projectId, chosen), commits };
}

export function seedRoots(session: Session, roots: Element[]): void {
  for (const root of roots) session.cache.set(root);
}

export interface DependencyRef {
  projectId: string;
  commitId: string;
  name: string;
}

/**
 * Normalize `projectUsages` (one object or a list) into the dependencies that name both a project and a commit.
 */
export function dependencyRefs(project: Project): DependencyRef[] {
  const usages = project.projectUsages;
  if (!usages) return [];
  const list: ProjectUsage[] = Array.isArray(usages) ? usages : [usages];

  const refs: DependencyRef[] = [];
  for (const usage of list) {
    const projectId = usage.usedProject?.["@id"];
    const commitId = usage.usedCommit?.["@id"];
    if (!projectId || !commitId) continue;
    refs.push({ projectId, commitId, name: usage.usedProject?.name ?? projectId.slice(0, 12) });
  }
  return refs;
}

/**
 * Load the root elements of every project this session's project uses, so
 * references into library projects resolve from the cache.
 * A dependency that fails to load is logged and skipped.
 */
export async function loadDependencies(
  session: Session,
  options: { log?: DiagnosticSink; signal?: AbortSignal } = {}
): Promise<number> {
  const log = options.log ?? silentLog;
  const project = await session.client.getProject(session.projectId);
  const deps = dependencyRefs(project);
  if (deps.length === 0) {
    log.log(`No dependencies found for project ${session.projectId}`);
    return 0;
  }

  let added = 0;
  for (const [index, dep] of deps.entries()) {
    if (options.signal?.aborted) break;
    log.log(`Loading dependency ${index + 1}/${deps.length}: ${dep.name}`);
    try {
      const roots = await session.client.getRoots(dep.projectId, dep.commitId);
      for (const root of roots) {
        if (!session.cache.has(root["@id"])) {
          session.cache.set(root);
          added++;
        }
      }
    } catch (error) {
      log.logError(`Failed to load dependency ${dep.name}`, error);
    }
  }

  log.log(`Dependency loading complete. Cache now contains ${session.cache.size} elements`);
  return added;
}
