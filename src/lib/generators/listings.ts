/**
 * Tabular listings of projects and commits.
 */

import type { Commit, Project } from "../api/types.js";

const RULE_WIDTH = 100;

function projectRow(index: string, name: string, id: string, created: string, access?: string): string {
  const row = `${index.padEnd(4)} | ${name.padEnd(50)} | ${id.padEnd(36)} | `;
  return access === undefined ? row + created : `${row}${created.padEnd(10)} | ${access}`;
}

/**
 * Projects sorted by name. With `access`, a column marks the projects whose commits could not be read.
 */
export function formatProjectTable(projects: Project[], access?: Map<string, boolean>): string[] {
  const lines = [
    "=".repeat(RULE_WIDTH),
    projectRow("#", "Name", "ID", "Created", access && "Access"),
    "-".repeat(RULE_WIDTH),
  ];

  const sorted = [...projects].sort((a, b) => (a.name ?? "").localeCompare(b.name ?? ""));
  sorted.forEach((project, index) => {
    const name = (project.name || "Unnamed").slice(0, 50);
    const created = project.created?.slice(0, 10) || "Unknown";
    const mark = access && (access.get(project["@id"]) ? "ok" : "no access");
    lines.push(projectRow(String(index + 1), name, project["@id"], created, mark));
  });

  lines.push("=".repeat(RULE_WIDTH));
  return lines;
}

/**
 * Commits in server order, the latest (last) one marked.
 */
export function formatCommitList(commits: Commit[]): string[] {
  return commits.map((commit, index) => {
    const created = commit.created ?? commit.timestamp ?? "Unknown";
    const name = commit.name ? ` ${commit.name}` : "";
    const latest = index === commits.length - 1 ? " (latest)" : "";
    return `${String(index + 1).padStart(3)}. ${commit["@id"]}  ${created}${name}${latest}`;
  });
}

/**
 * Label/value rows describing one project, shown above its commit list.
 */
export function projectDetailRows(project: Project, commitCount: number): Array<[string, string | number]> {
  const type = project["@type"];
  return [
    ["ID", project["@id"]],
    ["Type", typeof type === "string" ? type : "(none)"],
    ["Description", project.description || "(none)"],
    ["Created", project.created ?? "Unknown"],
    ["Default branch", project.defaultBranch?.["@id"] ?? "(none)"],
    ["Total commits", commitCount],
  ];
}
