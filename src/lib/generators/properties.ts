/**
 * Property sheet of a single element, as plain text lines.
 */

import type { Element } from "../api/types.js";
import { isIdentified } from "../api/types.js";
import { displayName, documentationText, shortId } from "../elements.js";
import type { ElementLookup } from "./notation.js";
import { shortTypeName } from "./element-types.js";

const LABEL_WIDTH = 22;

const OPTIONAL_FLAGS: Array<[string, string]> = [
  ["isComposite", "Is Composite"],
  ["isReadOnly", "Is Read Only"],
  ["isDerived", "Is Derived"],
  ["isOrdered", "Is Ordered"],
  ["isUnique", "Is Unique"],
];

function row(label: string, value: string | number, indent = ""): string {
  return `${indent}${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function text(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * "Motor (PartDefinition)" for a cached reference, "1a2b3c4d5e6f..." otherwise.
 */
export function referenceLabel(ref: unknown, cache: ElementLookup): string {
  const id = typeof ref === "string" ? ref : isIdentified(ref) ? ref["@id"] : undefined;
  if (!id) return "None";
  const target = cache.get(id);
  if (!target) return `${shortId(id, 12)}...`;
  return `${displayName(target)} (${shortTypeName(target["@type"])})`;
}

function documentation(element: Element, cache: ElementLookup): string[] {
  const texts: string[] = [];
  for (const entry of asList(element.documentation)) {
    // documentation is often a list of references to Documentation elements
    const resolved = isIdentified(entry) && !("body" in entry) ? cache.get(entry["@id"]) : entry;
    texts.push(...documentationText(resolved));
  }
  return texts;
}

function multiplicity(value: unknown, cache: ElementLookup): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  if ("lowerBound" in value || "upperBound" in value) {
    const lower = "lowerBound" in value && value.lowerBound !== null ? String(value.lowerBound) : "0";
    const upper = "upperBound" in value && value.upperBound !== null ? String(value.upperBound) : "*";
    return `[${lower}..${upper}]`;
  }
  return referenceLabel(value, cache);
}

function relatedTargets(value: unknown, key: string): unknown[] {
  const targets: unknown[] = [];
  for (const entry of asList(value)) {
    if (typeof entry === "object" && entry !== null && key in entry) {
      targets.push(Reflect.get(entry, key));
    }
  }
  return targets;
}

/**
 * Identity, documentation, SysML properties, flags, specializations,
 * redefinitions, owned counts and owner. References resolve to names through
 * the cache when the target is loaded.
 */
export function formatProperties(element: Element, cache: ElementLookup): string[] {
  const lines = [
    row("Type", element["@type"] ?? "Unknown"),
    row("ID", element["@id"]),
    row("Name", text(element.name) ?? "(unnamed)"),
    row("Qualified Name", text(element.qualifiedName) ?? "N/A"),
    row("Short Name", text(element.shortName) ?? "N/A"),
    row("Element ID", text(element.elementId) ?? "N/A"),
  ];

  const docs = documentation(element, cache);
  if (docs.length > 0) {
    lines.push("", "Documentation:", ...docs.flatMap((d) => d.split("\n")).map((l) => `  ${l}`));
  }

  const sysml: string[] = [];
  const direction = text(element.direction);
  if (direction) sysml.push(row("Direction", direction, "  "));
  const mult = multiplicity(element.multiplicity, cache);
  if (mult) sysml.push(row("Multiplicity", mult, "  "));
  const typeRef = element.declaredType ?? element.type;
  if (typeRef) sysml.push(row("Typed By", asList(typeRef).map((t) => referenceLabel(t, cache)).join(", "), "  "));
  if (sysml.length > 0) lines.push("", "SysML v2 Properties:", ...sysml);

  lines.push(
    "",
    "Flags:",
    row("Is Abstract", String(element.isAbstract ?? false), "  "),
    row("Is Library Element", String(element.isLibraryElement ?? false), "  "),
    row("Is Implied Included", String(element.isImpliedIncluded ?? false), "  ")
  );
  for (const [key, label] of OPTIONAL_FLAGS) {
    const value = element[key];
    if (value !== undefined && value !== null) lines.push(row(label, String(value), "  "));
  }

  const generals = relatedTargets(element.specialization, "general");
  if (generals.length > 0) {
    lines.push("", "Specializations:", ...generals.map((g) => `  :> ${referenceLabel(g, cache)}`));
  }
  const redefined = relatedTargets(element.redefinition, "redefinedFeature");
  if (redefined.length > 0) {
    lines.push("", "Redefinitions:", ...redefined.map((r) => `  :>> ${referenceLabel(r, cache)}`));
  }

  lines.push(
    "",
    "Owned Elements:",
    row("Owned Members", asList(element.ownedMember).length, "  "),
    row("Owned Features", asList(element.ownedFeature).length, "  "),
    row("Owned Relationships", asList(element.ownedRelationship).length, "  ")
  );

  if (element.owner) {
    lines.push("", "Owner:", `  ${referenceLabel(element.owner, cache)}`);
  }
  return lines;
}
