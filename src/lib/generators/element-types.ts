/**
 * Element type table: which `@type` tags appear in trees and textual notation,
 * and the keyword each renders with. The table itself lives in
 * data/element-types.json so that supporting a new type is a data change.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const ELEMENT_TYPES_PATH = join(__dirname, "../../../data/element-types.json");

export interface ElementTypeInfo {
  keyword?: string;
  displayable: boolean;
}

/**
 * Validate the raw JSON table. Entries that are not objects with a boolean
 * `displayable` are rejected.
 */
export function parseElementTypeTable(raw: unknown): Map<string, ElementTypeInfo> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("Element type table must be a JSON object");
  }
  const table = new Map<string, ElementTypeInfo>();
  for (const [type, entry] of Object.entries(raw)) {
    if (typeof entry !== "object" || entry === null || !("displayable" in entry) || typeof entry.displayable !== "boolean") {
      throw new Error(`Invalid element type entry: ${type}`);
    }
    const keyword = "keyword" in entry && typeof entry.keyword === "string" ? entry.keyword : undefined;
    table.set(type, { keyword, displayable: entry.displayable });
  }
  return table;
}

const ELEMENT_TYPES = parseElementTypeTable(JSON.parse(readFileSync(ELEMENT_TYPES_PATH, "utf-8")));

/**
 * "sysml.PartDefinition" -> "PartDefinition". Some servers qualify type tags.
 */
export function shortTypeName(type: string | undefined): string {
  if (!type) return "Unknown";
  const parts = type.split(".");
  return parts[parts.length - 1];
}

export function typeInfo(type: string | undefined): ElementTypeInfo | undefined {
  return ELEMENT_TYPES.get(shortTypeName(type));
}

export function isDisplayableType(type: string | undefined): boolean {
  return typeInfo(type)?.displayable ?? false;
}

/**
 * Keyword for a type, or undefined for types outside the table.
 * Callers render undefined as a comment placeholder naming the type.
 */
export function keywordFor(type: string | undefined): string | undefined {
  return typeInfo(type)?.keyword;
}
