/**
 * Requirement extraction from a flat element list.
 */

import type { Commit, Element, Project } from "../api/types.js";
import { documentationText } from "../elements.js";
import { shortTypeName } from "./element-types.js";

/** Element types reported as requirement-related. */
export const REQUIREMENT_TYPES: readonly string[] = [
  "RequirementUsage",
  "RequirementDefinition",
  "ConcernUsage",
  "ConcernDefinition",
  "ConstraintUsage",
  "ConstraintDefinition",
  "ObjectiveMembership",
  "StakeholderMembership",
  "SubjectMembership",
  "RequirementConstraintMembership",
  "RequirementVerificationMembership",
  "SatisfyRequirementUsage",
  "AssertConstraintUsage",
];

export interface RequirementSummary {
  type: string;
  id: string;
  name: string | null;
  shortName: string | null;
  qualifiedName: string | null;
  documentation: string[];
  ownedElementCount: number;
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function filterByType(elements: Element[], types: readonly string[]): Element[] {
  const wanted = new Set(types);
  return elements.filter((e) => wanted.has(shortTypeName(e["@type"])));
}

export function extractRequirements(elements: Element[]): RequirementSummary[] {
  return filterByType(elements, REQUIREMENT_TYPES).map((e) => ({
    type: shortTypeName(e["@type"]),
    id: e["@id"],
    name: optionalString(e.name) ?? optionalString(e.declaredName),
    shortName: optionalString(e.shortName) ?? optionalString(e.declaredShortName),
    qualifiedName: optionalString(e.qualifiedName),
    documentation: documentationText(e.documentation),
    ownedElementCount: Array.isArray(e.ownedElement) ? e.ownedElement.length : 0,
  }));
}

/**
 * Type -> element count, most frequent first.
 */
export function summarizeTypes(elements: Element[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const element of elements) {
    const type = shortTypeName(element["@type"]);
    counts.set(type, (counts.get(type) ?? 0) + 1);
  }
  return [...counts].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function formatTypeSummary(summary: Array<[string, number]>): string {
  const rule = "=".repeat(60);
  return [
    rule,
    "ELEMENT TYPES SUMMARY",
    rule,
    `${"Type".padEnd(40)} | Count`,
    "-".repeat(60),
    ...summary.map(([type, count]) => `${type.padEnd(40)} | ${count}`),
    rule,
  ].join("\n");
}

export function formatRequirements(requirements: RequirementSummary[]): string {
  const rule = "=".repeat(80);
  const lines = [rule, "REQUIREMENTS FOUND", rule];
  if (requirements.length === 0) {
    lines.push("No requirement-type elements found in this project.", "", "Requirement types searched for:");
    lines.push(...REQUIREMENT_TYPES.map((t) => `  - ${t}`));
    return lines.join("\n");
  }

  requirements.forEach((req, index) => {
    lines.push(
      "",
      `--- Requirement ${index + 1} ---`,
      `Type:           ${req.type}`,
      `ID:             ${req.id}`,
      `Name:           ${req.name ?? "N/A"}`,
      `Short Name:     ${req.shortName ?? "N/A"}`,
      `Qualified Name: ${req.qualifiedName ?? "N/A"}`
    );
    if (req.documentation.length > 0) {
      lines.push("Documentation:", ...req.documentation.map((d) => `  ${d}`));
    }
    if (req.ownedElementCount > 0) lines.push(`Owned Elements: ${req.ownedElementCount}`);
  });
  lines.push("", rule);
  return lines.join("\n");
}

export interface RequirementsDump {
  project: { id: string; name: string | null; created: string | null };
  commit: { id: string; name: string | null; description: string | null; created: string | null };
  elementsSummary: Record<string, number>;
  requirements: RequirementSummary[];
}

export function buildRequirementsDump(project: Project, commit: Commit, elements: Element[]): RequirementsDump {
  return {
    project: {
      id: project["@id"],
      name: optionalString(project.name),
      created: optionalString(project.created),
    },
    commit: {
      id: commit["@id"],
      name: optionalString(commit.name),
      description: optionalString(commit.description),
      created: optionalString(commit.created),
    },
    elementsSummary: Object.fromEntries(summarizeTypes(elements)),
    requirements: extractRequirements(elements),
  };
}
