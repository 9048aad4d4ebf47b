/**
 * Traceability matrix over the cached element graph.
 */

import type { Element } from "../api/types.js";
import { refIds } from "../api/types.js";
import { displayName } from "../elements.js";
import { shortTypeName } from "./element-types.js";
import type { ElementSource } from "./statistics.js";

/** Properties whose references count as relationships, in reporting order. */
export const RELATION_KINDS = [
  "ownedMember",
  "ownedFeature",
  "client",
  "supplier",
  "source",
  "target",
  "satisfiedRequirement",
  "satisfyingFeature",
] as const;

export type RelationKind = (typeof RELATION_KINDS)[number];

/** source id -> target id -> relation kinds joined with "," */
export type RelationshipMap = Map<string, Map<string, string>>;

/**
 * Record, for every cached element, which cached elements it references and through which properties.
 */
export function buildRelationshipMap(cache: ElementSource): RelationshipMap {
  const map: RelationshipMap = new Map();
  for (const element of cache.values()) {
    const targets = new Map<string, string>();
    for (const kind of RELATION_KINDS) {
      for (const targetId of refIds(element[kind])) {
        if (!cache.get(targetId)) continue;
        const existing = targets.get(targetId);
        targets.set(targetId, existing ? `${existing},${kind}` : kind);
      }
    }
    map.set(element["@id"], targets);
  }
  return map;
}

export function countRelationships(map: RelationshipMap): number {
  let total = 0;
  for (const targets of map.values()) total += targets.size;
  return total;
}

export interface MatrixOptions {
  maxTypes?: number;
  perType?: number;
}

export interface MatrixAxisEntry {
  id: string;
  name: string;
  type: string;
}

export interface TraceabilityMatrix {
  /** Rows and columns share one axis. */
  axis: MatrixAxisEntry[];
  /** cells[row][col]: relation kinds, or "" */
  cells: string[][];
  elementCount: number;
  relationshipCount: number;
}

/**
 * Pick the first `perType` elements of each of the first `maxTypes` types (by name) and tabulate their relationships.
 */
export function buildMatrix(cache: ElementSource, map: RelationshipMap, options: MatrixOptions = {}): TraceabilityMatrix {
  const maxTypes = options.maxTypes ?? 10;
  const perType = options.perType ?? 10;

  const byType = new Map<string, Element[]>();
  let elementCount = 0;
  for (const element of cache.values()) {
    elementCount++;
    const type = shortTypeName(element["@type"]);
    const list = byType.get(type) ?? [];
    list.push(element);
    byType.set(type, list);
  }

  const axis: MatrixAxisEntry[] = [];
  for (const type of [...byType.keys()].sort().slice(0, maxTypes)) {
    for (const element of (byType.get(type) ?? []).slice(0, perType)) {
      axis.push({ id: element["@id"], name: displayName(element), type });
    }
  }

  const cells = axis.map((row) => axis.map((col) => map.get(row.id)?.get(col.id) ?? ""));
  return { axis, cells, elementCount, relationshipCount: countRelationships(map) };
}

/**
 * Text grid: numbered columns, a mark where a relationship exists, then the relationship list.
 */
export function formatMatrix(matrix: TraceabilityMatrix): string {
  const { axis, cells } = matrix;
  const lines = [
    `Elements: ${matrix.elementCount} | Relationships: ${matrix.relationshipCount} | Rows: ${axis.length} | Columns: ${axis.length}`,
    "",
  ];
  if (axis.length === 0) return lines.join("\n");

  const labelWidth = Math.min(30, Math.max(...axis.map((e) => e.name.length)));
  const numberWidth = String(axis.length).length;
  const label = (name: string): string =>
    (name.length > labelWidth ? name.slice(0, labelWidth - 1) + "…" : name).padEnd(labelWidth);

  const header = axis.map((_, i) => String(i + 1).padStart(numberWidth)).join(" ");
  lines.push(`${" ".repeat(numberWidth + 2)}${"".padEnd(labelWidth)} | ${header}`);

  const relations: string[] = [];
  axis.forEach((row, r) => {
    const marks = cells[r].map((cell) => (cell ? "●" : "·").padStart(numberWidth)).join(" ");
    lines.push(`${String(r + 1).padStart(numberWidth)}. ${label(row.name)} | ${marks}`);
    cells[r].forEach((cell, c) => {
      if (cell) relations.push(`  ${row.name} -> ${axis[c].name}: ${cell}`);
    });
  });

  if (relations.length > 0) lines.push("", "Relationships:", ...relations);
  return lines.join("\n");
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function matrixToCsv(matrix: TraceabilityMatrix): string {
  const rows = [["", ...matrix.axis.map((e) => e.name)]];
  matrix.axis.forEach((row, r) => rows.push([row.name, ...matrix.cells[r]]));
  return rows.map((row) => row.map(csvField).join(",")).join("\n") + "\n";
}
