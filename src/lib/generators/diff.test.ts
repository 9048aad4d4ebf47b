import { describe, it, expect } from "vitest";
import { el } from "../api/fake-server.js";
import type { Element } from "../api/types.js";
import { vehicleClient, vehicleModel } from "../explorer/test-fixtures.js";
import { canonicalJson, diffElementMaps, formatDiffReport, loadCommitRoots } from "./diff.js";

function elementMap(...elements: Element[]): Map<string, Element> {
  return new Map(elements.map((e) => [e["@id"], e]));
}

describe("canonicalJson", () => {
  it("sorts keys at every level and keeps array order", () => {
    expect(canonicalJson({ b: 1, a: { d: [2, 1], c: null } })).toBe('{"a":{"c":null,"d":[2,1]},"b":1}');
  });
});

describe("diffElementMaps", () => {
  it("classifies added, removed and unchanged ids", () => {
    const x = el("x", "Package", "X");
    const y = el("y", "Package", "Y");
    const z = el("z", "Package", "Z");

    const diff = diffElementMaps(elementMap(x, y), elementMap({ ...y }, z));

    expect(diff).toEqual({ added: ["z"], removed: ["x"], modified: [], unchanged: ["y"] });
  });

  it("reports a changed property as modified", () => {
    const diff = diffElementMaps(elementMap(el("y", "Package", "Y")), elementMap(el("y", "Package", "Y2")));
    expect(diff.modified).toEqual(["y"]);
  });

  it("ignores key order under the canonical policy only", () => {
    const base = elementMap({ "@id": "y", name: "Y", "@type": "Package" });
    const compare = elementMap({ "@type": "Package", "@id": "y", name: "Y" });

    expect(diffElementMaps(base, compare).unchanged).toEqual(["y"]);
    expect(diffElementMaps(base, compare, { policy: "raw" }).modified).toEqual(["y"]);
  });

  it("leaves ignored properties out of the comparison", () => {
    const base = elementMap({ "@id": "y", name: "Y", elementId: "old" });
    const compare = elementMap({ "@id": "y", name: "Y", elementId: "new" });

    expect(diffElementMaps(base, compare, { ignore: ["elementId"] }).unchanged).toEqual(["y"]);
  });
});

describe("loadCommitRoots", () => {
  it("maps each root id to its full element", async () => {
    const model = vehicleModel();
    model.elements.c2.push(el("other", "Namespace", "Other"));
    model.roots.c2.push({ "@id": "other" });
    const { client } = vehicleClient(model);

    const roots = await loadCommitRoots(client, "p1", "c2");

    expect([...roots.keys()]).toEqual(["root", "other"]);
    expect(roots.get("other")?.name).toBe("Other");
  });
});

describe("formatDiffReport", () => {
  const base = { "@id": "c1", created: "2026-01-01T00:00:00Z" };
  const compare = { "@id": "c2", created: "2026-02-01T00:00:00Z" };

  it("summarizes counts and lists sorted labels", () => {
    const baseElements = elementMap(el("x", "PartDefinition", "Wheel"), el("y", "Package", "Y"));
    const compareElements = elementMap(el("y", "Package", "Y"), el("z", "PartDefinition", "Brake"), el("w", "PartUsage", "axle"));

    const report = formatDiffReport({
      base,
      compare,
      baseElements,
      compareElements,
      diff: diffElementMaps(baseElements, compareElements),
    });

    expect(report.split("\n")).toEqual([
      "━━━ Commit Diff ━━━",
      "",
      "Base Commit:    2026-01-01T00:00:00Z",
      "                c1",
      "",
      "Compare Commit: 2026-02-01T00:00:00Z",
      "                c2",
      "",
      "Summary",
      "Added:     2 elements",
      "Removed:   1 elements",
      "Modified:  0 elements",
      "Unchanged: 1 elements",
      "Total:     4 elements",
      "",
      "Added Elements",
      "+ Brake (PartDefinition)",
      "+ axle (PartUsage)",
      "",
      "Removed Elements",
      "- Wheel (PartDefinition)",
      "",
    ]);
  });

  it("caps the modified list at 50", () => {
    const ids = Array.from({ length: 53 }, (_, i) => `e${String(i).padStart(2, "0")}`);
    const baseElements = elementMap(...ids.map((id) => el(id, "PartUsage", id)));
    const compareElements = elementMap(...ids.map((id) => el(id, "PartUsage", `${id}-renamed`)));

    const lines = formatDiffReport({
      base,
      compare,
      baseElements,
      compareElements,
      diff: diffElementMaps(baseElements, compareElements),
    }).split("\n");

    expect(lines.filter((l) => l.startsWith("~ "))).toHaveLength(50);
    expect(lines).toContain("~ e49-renamed (PartUsage)");
    expect(lines).not.toContain("~ e50-renamed (PartUsage)");
    expect(lines).toContain("... and 3 more modified elements");
  });
});
