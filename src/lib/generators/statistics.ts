/**
 * Model statistics over cached elements.
 */

import type { Element } from "../api/types.js";
import { childRefIds } from "../elements.js";
import { shortTypeName } from "./element-types.js";
import type { ElementLookup } from "./notation.js";

export interface ElementSource extends ElementLookup {
  values(): Iterable<Element>;
}

export interface ModelStatistics {
  totalElements: number;
  rootElements: number;
  /** Most frequent first; ties by name. */
  typeCounts: Array<[string, number]>;
  /** Non-`@` property names and how many elements carry them, most frequent first. */
  propertyUsage: Array<[string, number]>;
  /** Longest ownership chain below the roots; a root sits at depth 0. */
  maxDepth: number;
  averageProperties: number;
}

function byCountThenName(a: [string, number], b: [string, number]): number {
  return b[1] - a[1] || a[0].localeCompare(b[0]);
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Depth of the deepest cached descendant. Children that are not cached end the chain.
 */
export function ownershipDepth(roots: Element[], cache: ElementLookup): number {
  const visited = new Set(roots.map((r) => r["@id"]));
  let level = roots;
  let depth = -1;

  while (level.length > 0) {
    depth++;
    const next: Element[] = [];
    for (const element of level) {
      for (const id of childRefIds(element)) {
        const child = cache.get(id);
        if (child && !visited.has(id)) {
          visited.add(id);
          next.push(child);
        }
      }
    }
    level = next;
  }
  return Math.max(depth, 0);
}

export function collectStatistics(cache: ElementSource, roots: Element[] = []): ModelStatistics {
  const types = new Map<string, number>();
  const properties = new Map<string, number>();
  let total = 0;
  let propertyTotal = 0;

  for (const element of cache.values()) {
    total++;
    increment(types, shortTypeName(element["@type"]));
    const keys = Object.keys(element);
    propertyTotal += keys.length;
    for (const key of keys) {
      if (!key.startsWith("@")) increment(properties, key);
    }
  }

  return {
    totalElements: total,
    rootElements: roots.length,
    typeCounts: [...types].sort(byCountThenName),
    propertyUsage: [...properties].sort(byCountThenName),
    maxDepth: ownershipDepth(roots, cache),
    averageProperties: total > 0 ? propertyTotal / total : 0,
  };
}

function percent(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0;
}

/**
 * Console summary: overview, top ten types with bars, top ten properties.
 */
export function formatStatistics(stats: ModelStatistics, loadedNodes?: number): string {
  const lines = [
    "Overview:",
    `  Total Elements:    ${stats.totalElements}`,
    `  Root Elements:     ${stats.rootElements}`,
    `  Unique Types:      ${stats.typeCounts.length}`,
    `  Maximum Depth:     ${stats.maxDepth}`,
    `  Properties Used:   ${stats.propertyUsage.length}`,
  ];
  if (loadedNodes !== undefined) lines.push(`  Tree Nodes:        ${loadedNodes}`);

  lines.push("", "Element Type Distribution:");
  stats.typeCounts.slice(0, 10).forEach(([type, count], index) => {
    const pct = percent(count, stats.totalElements);
    const bar = "█".repeat(Math.floor(pct / 2));
    lines.push(
      `  ${String(index + 1).padStart(2)}. ${type.padEnd(25)} ${String(count).padStart(4)} (${pct.toFixed(1)}%) ${bar}`.trimEnd()
    );
  });

  lines.push("", "Most Common Properties:");
  for (const [property, count] of stats.propertyUsage.slice(0, 10)) {
    const pct = percent(count, stats.totalElements);
    lines.push(`  ${property.padEnd(25)} ${String(count).padStart(4)} elements (${pct.toFixed(1)}%)`);
  }

  lines.push("", "Complexity Metrics:", `  Avg Properties/Element: ${stats.averageProperties.toFixed(2)}`);
  return lines.join("\n");
}

export interface StatisticsReportInput {
  projectName: string;
  projectId: string;
  commitId: string;
  generatedAt: Date;
}

/**
 * Plain-text report file with the complete type list.
 */
export function formatStatisticsReport(stats: ModelStatistics, input: StatisticsReportInput): string {
  const rule = (char: string): string => char.repeat(80);
  const lines = [
    "Model Statistics Report",
    rule("="),
    "",
    `Project: ${input.projectName}`,
    `Project ID: ${input.projectId}`,
    `Commit ID: ${input.commitId}`,
    `Analysis Date: ${input.generatedAt.toISOString()}`,
    "",
    "OVERVIEW",
    rule("-"),
    `Total Elements: ${stats.totalElements}`,
    `Root Elements: ${stats.rootElements}`,
    `Unique Element Types: ${stats.typeCounts.length}`,
    `Maximum Depth: ${stats.maxDepth}`,
    "",
    "ELEMENT TYPES (Complete List)",
    rule("-"),
    ...stats.typeCounts.map(([type, count]) => `${type.padEnd(40)} ${count}`),
    "",
  ];
  return lines.join("\n");
}
