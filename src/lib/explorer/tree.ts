/**
 * Lazy element tree.
 *
 * A node with child references starts with a single placeholder child. The
 * first expansion resolves the references through the session cache on a
 * bounded pool and swaps the placeholder for the complete child list in one
 * assignment, so a node is never seen half placeholder, half children.
 */

import pLimit from "p-limit";
import type { Element } from "../api/types.js";
import { refIds } from "../api/types.js";
import { ElementNotFoundError } from "../api/errors.js";
import { silentLog, type DiagnosticSink } from "../diagnostics.js";
import { childRefIds, displayName, shortId } from "../elements.js";
import { errorMessage } from "../formatting.js";
import { isDisplayableType, shortTypeName } from "../generators/element-types.js";
import type { Session } from "./session.js";

export const DEFAULT_EXPAND_CONCURRENCY = 8;

export const PLACEHOLDER = { kind: "placeholder", label: "Loading..." } as const;
export type Placeholder = typeof PLACEHOLDER;

/**
 * Outcome for one child reference, so "no children" and "children failed to load" stay distinguishable.
 */
export type ChildSlot =
  | { kind: "loaded"; id: string; node: TreeNode }
  | { kind: "failed"; id: string; reason: string }
  | { kind: "filtered"; id: string; type: string };

export type NodeState = "unexpanded" | "expanding" | "expanded";

export class TreeNode {
  /** null while the placeholder stands in for the children */
  private slots: ChildSlot[] | null;
  private pending: Promise<void> | null = null;

  private constructor(
    readonly element: Element,
    slots: ChildSlot[] | null,
    readonly synthetic = false
  ) {
    this.slots = slots;
  }

  /**
   * Node for a fetched element: unexpanded with a placeholder when it has child references, otherwise expanded and empty.
   */
  static create(element: Element): TreeNode {
    return new TreeNode(element, childRefIds(element).length > 0 ? null : []);
  }

  /**
   * Already-expanded container that is not a model element, e.g. the project root.
   */
  static synthetic(label: string, slots: ChildSlot[]): TreeNode {
    return new TreeNode({ "@id": `#${label}`, "@type": label, name: label }, slots, true);
  }

  get id(): string {
    return this.element["@id"];
  }

  get state(): NodeState {
    if (this.slots) return "expanded";
    return this.pending ? "expanding" : "unexpanded";
  }

  get hasPlaceholder(): boolean {
    return this.slots === null;
  }

  get children(): ReadonlyArray<ChildSlot | Placeholder> {
    return this.slots ?? [PLACEHOLDER];
  }

  get slotList(): readonly ChildSlot[] {
    return this.slots ?? [];
  }

  /** Materialized child nodes in reference order. */
  get loadedChildren(): TreeNode[] {
    const nodes: TreeNode[] = [];
    for (const slot of this.slots ?? []) {
      if (slot.kind === "loaded") nodes.push(slot.node);
    }
    return nodes;
  }

  /**
   * Run `load` once. While it runs every caller gets the same promise; once it
   * resolves the node is expanded for good. A rejected load leaves the
   * placeholder in place so a later call can try again.
   */
  expandWith(load: () => Promise<ChildSlot[]>): Promise<void> {
    if (this.slots) return Promise.resolve();
    if (this.pending) return this.pending;

    this.pending = load()
      .then((slots) => {
        this.slots = slots;
      })
      .finally(() => {
        this.pending = null;
      });
    return this.pending;
  }
}

export interface ExpandOptions {
  concurrency?: number;
  log?: DiagnosticSink;
}

/**
 * Resolve the child references of an element into slots, in reference order.
 */
export async function loadChildSlots(element: Element, session: Session, options: ExpandOptions = {}): Promise<ChildSlot[]> {
  const log = options.log ?? silentLog;
  const ids = childRefIds(element);
  if (ids.length === 0) return [];

  const limit = pLimit(options.concurrency ?? DEFAULT_EXPAND_CONCURRENCY);
  const startTime = Date.now();

  const slots = await Promise.all(
    ids.map((id) =>
      limit(async (): Promise<ChildSlot> => {
        try {
          const child = await session.cache.getOrFetch(id);
          if (!isDisplayableType(child["@type"])) {
            return { kind: "filtered", id, type: shortTypeName(child["@type"]) };
          }
          return { kind: "loaded", id, node: TreeNode.create(child) };
        } catch (error) {
          log.log(`Failed to load element ${id}: ${errorMessage(error)}`);
          return { kind: "failed", id, reason: errorMessage(error) };
        }
      })
    )
  );

  const loaded = slots.filter((s) => s.kind === "loaded").length;
  log.log(`Parallel load completed in ${Date.now() - startTime}ms (${loaded}/${ids.length} elements)`);
  return slots;
}

/**
 * Expand a node. No-op when already expanded; joins the running expansion when one is in progress.
 */
export function expand(node: TreeNode, session: Session, options: ExpandOptions = {}): Promise<void> {
  return node.expandWith(() => loadChildSlots(node.element, session, options));
}

export interface BuildOptions extends ExpandOptions {
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

/**
 * Cache the commit's root elements and build the synthetic "Project" node
 * whose children are the roots' owned members.
 */
export async function buildRootTree(session: Session, roots: Element[], options: BuildOptions = {}): Promise<TreeNode> {
  const log = options.log ?? silentLog;
  for (const root of roots) session.cache.set(root);

  const seen = new Set<string>();
  const memberIds: string[] = [];
  for (const root of roots) {
    for (const id of refIds(root.ownedMember ?? [])) {
      if (seen.has(id)) continue;
      seen.add(id);
      memberIds.push(id);
    }
  }

  const limit = pLimit(options.concurrency ?? DEFAULT_EXPAND_CONCURRENCY);
  let done = 0;
  const slots = await Promise.all(
    memberIds.map((id) =>
      limit(async (): Promise<ChildSlot | null> => {
        if (options.signal?.aborted) return null;
        try {
          const member = await session.cache.getOrFetch(id);
          return { kind: "loaded", id, node: TreeNode.create(member) };
        } catch (error) {
          log.log(`Failed to load root member ${id}: ${errorMessage(error)}`);
          return { kind: "failed", id, reason: errorMessage(error) };
        } finally {
          options.onProgress?.(++done, memberIds.length);
        }
      })
    )
  );

  if (options.signal?.aborted) log.log("Tree building cancelled, partial tree loaded");
  return TreeNode.synthetic("Project", slots.filter((s): s is ChildSlot => s !== null));
}

/**
 * Look up an element in the session cache, fetching it when absent.
 */
export async function resolveElement(session: Session, elementId: string): Promise<Element> {
  try {
    return await session.cache.getOrFetch(elementId);
  } catch (error) {
    throw new ElementNotFoundError(elementId, error);
  }
}

/**
 * Expand `depth` levels below `node`. Returns the number of nodes expanded by this call.
 */
export async function expandToDepth(node: TreeNode, session: Session, depth: number, options: BuildOptions = {}): Promise<number> {
  if (depth <= 0 || options.signal?.aborted) return 0;
  let count = 0;
  if (node.state !== "expanded") {
    await expand(node, session, options);
    count++;
  }
  for (const child of node.loadedChildren) {
    count += await expandToDepth(child, session, depth - 1, options);
  }
  return count;
}

/**
 * Load every element below `node`. Cancellation is cooperative: the signal is
 * checked before each expansion, requests already issued still complete.
 */
export async function expandAll(
  node: TreeNode,
  session: Session,
  options: ExpandOptions & { signal?: AbortSignal; onProgress?: (expanded: number) => void } = {}
): Promise<number> {
  let expanded = 0;
  const visit = async (current: TreeNode): Promise<void> => {
    if (options.signal?.aborted) return;
    if (current.hasPlaceholder) {
      await expand(current, session, options);
      expanded++;
      options.onProgress?.(expanded);
    }
    for (const child of current.loadedChildren) {
      await visit(child);
    }
  };
  await visit(node);
  return expanded;
}

/**
 * Path from `root` to the materialized node for `elementId`, or undefined when it is not in the loaded tree.
 */
export function findPath(root: TreeNode, elementId: string): TreeNode[] | undefined {
  if (root.id === elementId && !root.synthetic) return [root];
  for (const child of root.loadedChildren) {
    const path = findPath(child, elementId);
    if (path) return [root, ...path];
  }
  return undefined;
}

/** Element nodes materialized below and including `root`. */
export function countNodes(root: TreeNode): number {
  let count = root.synthetic ? 0 : 1;
  for (const child of root.loadedChildren) count += countNodes(child);
  return count;
}

export function nodeLabel(node: TreeNode): string {
  if (node.synthetic) return displayName(node.element);
  return `${displayName(node.element)} [${shortTypeName(node.element["@type"])}]`;
}

export interface RenderTreeOptions {
  /** Show failed and filtered slots, and element ids. */
  verbose?: boolean;
}

/**
 * Plain-text rendering with box-drawing guides.
 */
export function renderTree(root: TreeNode, options: RenderTreeOptions = {}): string[] {
  const lines: string[] = [nodeLabel(root)];

  const walk = (node: TreeNode, prefix: string): void => {
    const rows: Array<{ text: string; node?: TreeNode }> = [];

    for (const child of node.children) {
      if (child.kind === "placeholder") {
        rows.push({ text: child.label });
      } else if (child.kind === "loaded") {
        const suffix = options.verbose ? ` (${shortId(child.id)})` : "";
        rows.push({ text: nodeLabel(child.node) + suffix, node: child.node });
      } else if (options.verbose && child.kind === "failed") {
        rows.push({ text: `! ${shortId(child.id)} failed: ${child.reason}` });
      } else if (options.verbose && child.kind === "filtered") {
        rows.push({ text: `- ${shortId(child.id)} filtered [${child.type}]` });
      }
    }

    rows.forEach((row, index) => {
      const last = index === rows.length - 1;
      lines.push(`${prefix}${last ? "└── " : "├── "}${row.text}`);
      if (row.node) walk(row.node, prefix + (last ? "    " : "│   "));
    });
  };

  walk(root, "");
  return lines;
}
