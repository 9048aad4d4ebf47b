/**
 * Commit comparison over root-element maps.
 */

import pLimit from "p-limit";
import type { SysmlApiClient } from "../api/client.js";
import type { Commit, Element } from "../api/types.js";
import { displayName } from "../elements.js";
import { shortTypeName } from "./element-types.js";

/**
 * How two versions of an element are compared.
 * - canonical: JSON with object keys sorted, so key order never counts as a change
 * - raw: JSON.stringify output as served
 */
export type DiffPolicy = "canonical" | "raw";

export interface DiffOptions {
  policy?: DiffPolicy;
  /** Top-level properties left out of the comparison, e.g. "elementId" or "@id". */
  ignore?: string[];
}

export interface ElementDiff {
  added: string[];
  removed: string[];
  modified: string[];
  unchanged: string[];
}

export const MAX_MODIFIED_SHOWN = 50;

/**
 * JSON text with object keys sorted at every level.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v !== "object" || v === null || Array.isArray(v)) return v;
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(v).sort()) {
      sorted[key] = Reflect.get(v, key);
    }
    return sorted;
  });
}

function comparable(element: Element, options: DiffOptions): string {
  let value: Record<string, unknown> = element;
  if (options.ignore && options.ignore.length > 0) {
    value = { ...element };
    for (const key of options.ignore) delete value[key];
  }
  return (options.policy ?? "canonical") === "canonical" ? canonicalJson(value) : JSON.stringify(value);
}

/**
 * Classify every id in either map. Ids present in both are modified when
 * their comparable text differs under the chosen policy.
 */
export function diffElementMaps(
  base: ReadonlyMap<string, Element>,
  compare: ReadonlyMap<string, Element>,
  options: DiffOptions = {}
): ElementDiff {
  const diff: ElementDiff = { added: [], removed: [], modified: [], unchanged: [] };
  const ids = new Set([...base.keys(), ...compare.keys()]);

  for (const id of ids) {
    const before = base.get(id);
    const after = compare.get(id);
    if (!before) {
      diff.added.push(id);
    } else if (!after) {
      diff.removed.push(id);
    } else if (comparable(before, options) !== comparable(after, options)) {
      diff.modified.push(id);
    } else {
      diff.unchanged.push(id);
    }
  }
  return diff;
}

/**
 * Root elements of a commit, each fetched in full by id.
 */
export async function loadCommitRoots(
  client: SysmlApiClient,
  projectId: string,
  commitId: string,
  concurrency = 8
): Promise<Map<string, Element>> {
  const roots = await client.getRoots(projectId, commitId);
  const limit = pLimit(concurrency);
  const elements = await Promise.all(
    roots.map((root) => limit(() => client.getElement(projectId, commitId, root["@id"])))
  );
  return new Map(elements.map((e) => [e["@id"], e]));
}

export interface DiffReportInput {
  base: Commit;
  compare: Commit;
  baseElements: ReadonlyMap<string, Element>;
  compareElements: ReadonlyMap<string, Element>;
  diff: ElementDiff;
}

function commitTime(commit: Commit): string {
  return commit.created ?? commit.timestamp ?? "unknown time";
}

function elementLabel(element: Element | undefined, id: string): string {
  if (!element) return id;
  return `${displayName(element)} (${shortTypeName(element["@type"])})`;
}

export function formatDiffReport(input: DiffReportInput): string {
  const { diff } = input;
  const total = diff.added.length + diff.removed.length + diff.modified.length + diff.unchanged.length;
  const lines: string[] = [
    "━━━ Commit Diff ━━━",
    "",
    `Base Commit:    ${commitTime(input.base)}`,
    `                ${input.base["@id"]}`,
    "",
    `Compare Commit: ${commitTime(input.compare)}`,
    `                ${input.compare["@id"]}`,
    "",
    "Summary",
    `Added:     ${diff.added.length} elements`,
    `Removed:   ${diff.removed.length} elements`,
    `Modified:  ${diff.modified.length} elements`,
    `Unchanged: ${diff.unchanged.length} elements`,
    `Total:     ${total} elements`,
    "",
  ];

  const section = (title: string, marker: string, labels: string[], cap?: number): void => {
    if (labels.length === 0) return;
    const sorted = [...labels].sort();
    const shown = cap === undefined ? sorted : sorted.slice(0, cap);
    lines.push(title, ...shown.map((label) => `${marker} ${label}`));
    if (shown.length < sorted.length) {
      lines.push("", `... and ${sorted.length - shown.length} more modified elements`);
    }
    lines.push("");
  };

  section("Added Elements", "+", diff.added.map((id) => elementLabel(input.compareElements.get(id), id)));
  section("Removed Elements", "-", diff.removed.map((id) => elementLabel(input.baseElements.get(id), id)));
  section(
    "Modified Elements",
    "~",
    diff.modified.map((id) => elementLabel(input.compareElements.get(id), id)),
    MAX_MODIFIED_SHOWN
  );

  return lines.join("\n");
}
