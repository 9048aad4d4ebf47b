/**
 * SysML v2 textual notation from cached element JSON.
 *
 * Rendering never touches the network: children missing from the cache are
 * skipped. Call prefetchSubtree first to make an element's subtree complete.
 */

import pLimit from "p-limit";
import type { Commit, Element } from "../api/types.js";
import { refIds } from "../api/types.js";
import { silentLog, type DiagnosticSink } from "../diagnostics.js";
import { childRefIds, elementName } from "../elements.js";
import type { Session } from "../explorer/session.js";
import { isDisplayableType, keywordFor, shortTypeName } from "./element-types.js";

export const INDENT = "    ";

/** Read-only view of a cache. ElementCache and Map-backed lookups both fit. */
export interface ElementLookup {
  get(id: string): Element | undefined;
}

/**
 * Quote a name that is not a plain identifier: `'Front Axle'`, `'it\'s'`.
 */
export function escapeName(name: string): string {
  if (/[ '()]/.test(name)) {
    return `'${name.replace(/'/g, "\\'")}'`;
  }
  return name;
}

function renderChildren(element: Element, cache: ElementLookup, indent: number): string {
  let body = "";
  for (const id of childRefIds(element)) {
    const child = cache.get(id);
    if (!child || !isDisplayableType(child["@type"])) continue;
    body += renderNotation(child, cache, indent);
  }
  return body;
}

/**
 * Render one element and its cached displayable descendants.
 *
 * `keyword name;` when no child renders, otherwise `keyword name {` with the
 * children one level deeper and a closing brace. Types outside the keyword
 * table render as `/* Type *\/` and are not descended into.
 */
export function renderNotation(element: Element, cache: ElementLookup, indent = 0): string {
  const pad = INDENT.repeat(indent);
  const type = shortTypeName(element["@type"]);

  if (type === "Comment") {
    const body = typeof element.body === "string" ? element.body : "";
    return body ? `${pad}/* ${body} */\n` : "";
  }

  const keyword = keywordFor(element["@type"]);
  if (!keyword) return `${pad}/* ${type} */\n`;

  const name = elementName(element);
  const declaration = name ? `${pad}${keyword} ${escapeName(name)}` : `${pad}${keyword}`;

  const body = renderChildren(element, cache, indent + 1);
  if (!body) return `${declaration};\n`;
  return `${declaration} {\n${body}${pad}}\n`;
}

export interface ExportInput {
  projectName: string;
  commit: Commit;
  /** Root elements; their owned members are what gets exported. */
  roots: Element[];
  /** Export this element alone instead of the roots' members. */
  elementId?: string;
  cache: ElementLookup;
  exportedAt: Date;
}

/**
 * Ids a whole-commit export starts from: every root's owned members.
 */
export function rootMemberIds(roots: Element[]): string[] {
  return roots.flatMap((root) => refIds(root.ownedMember ?? []));
}

/**
 * Commit export: a comment header, then every root's owned members (or the one requested element).
 */
export function renderExport(input: ExportInput): string {
  const commitName = typeof input.commit.name === "string" ? input.commit.name : input.commit["@id"];
  let text = "// SysML v2 Export\n";
  text += `// Project: ${input.projectName}\n`;
  text += `// Exported: ${input.exportedAt.toISOString()}\n`;
  text += `// Commit: ${commitName} (${input.commit["@id"]})\n\n`;

  const ids = input.elementId ? [input.elementId] : rootMemberIds(input.roots);
  for (const id of ids) {
    const member = input.cache.get(id);
    if (member) text += renderNotation(member, input.cache) + "\n";
  }
  return text;
}

export interface PrefetchOptions {
  concurrency?: number;
  log?: DiagnosticSink;
  signal?: AbortSignal;
}

/**
 * Fetch the displayable subtree below `ids` into the session cache, level by
 * level. Elements that fail to load are logged and left out. Returns the
 * number of elements now reachable.
 */
export async function prefetchSubtree(session: Session, ids: string[], options: PrefetchOptions = {}): Promise<number> {
  const log = options.log ?? silentLog;
  const limit = pLimit(options.concurrency ?? 8);
  const visited = new Set<string>();
  let frontier = ids;

  while (frontier.length > 0 && !options.signal?.aborted) {
    const level = frontier.filter((id) => !visited.has(id));
    for (const id of level) visited.add(id);

    const loaded = await Promise.all(
      level.map((id) =>
        limit(async () => {
          try {
            return await session.cache.getOrFetch(id);
          } catch (error) {
            log.logError(`Prefetch of element ${id}`, error);
            visited.delete(id);
            return undefined;
          }
        })
      )
    );

    frontier = [];
    for (const element of loaded) {
      if (element && isDisplayableType(element["@type"])) frontier.push(...childRefIds(element));
    }
  }

  return visited.size;
}
