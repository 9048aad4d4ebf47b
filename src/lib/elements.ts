/**
 * Helpers for reading element JSON.
 */

import type { Element } from "./api/types.js";
import { refIds } from "./api/types.js";

/**
 * Declared name of an element: `name`, then `declaredName`, then the last
 * segment of `qualifiedName` with surrounding quotes stripped.
 */
export function elementName(element: Element): string | undefined {
  const name = element.name ?? element.declaredName;
  if (name) return name;

  const qualified = element.qualifiedName;
  if (qualified) {
    const parts = qualified.split("::");
    const last = parts[parts.length - 1].replace(/^'|'$/g, "");
    return last || undefined;
  }
  return undefined;
}

export function shortId(id: string, length = 8): string {
  return id.slice(0, length);
}

/**
 * Name for lists and labels; falls back to the first characters of the id.
 */
export function displayName(element: Element): string {
  return element.name || element.declaredName || shortId(element["@id"]);
}

/**
 * Child reference ids: `ownedMember` first, then `ownedFeature`, each id once,
 * in source order. Refs without an `@id` are skipped.
 */
export function childRefIds(element: Element): string[] {
  const seen = new Set<string>();
  const ids: string[] = [];
  for (const id of [...refIds(element.ownedMember ?? []), ...refIds(element.ownedFeature ?? [])]) {
    if (seen.has(id)) continue;
    seen.add(id);
    ids.push(id);
  }
  return ids;
}

/**
 * Documentation bodies: `documentation` may hold strings or `{ body }` objects, singly or in a list.
 */
export function documentationText(value: unknown): string[] {
  const entries = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];
  const texts: string[] = [];
  for (const entry of entries) {
    if (typeof entry === "string") {
      texts.push(entry);
    } else if (typeof entry === "object" && entry !== null && "body" in entry && typeof entry.body === "string") {
      texts.push(entry.body);
    }
  }
  return texts;
}
