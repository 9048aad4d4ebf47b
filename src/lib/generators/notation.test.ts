import { describe, it, expect, vi } from "vitest";
import { el } from "../api/fake-server.js";
import type { Element } from "../api/types.js";
import { Session } from "../explorer/session.js";
import { vehicleClient } from "../explorer/test-fixtures.js";
import { escapeName, prefetchSubtree, renderExport, renderNotation, rootMemberIds } from "./notation.js";

function lookup(...elements: Element[]): Map<string, Element> {
  return new Map(elements.map((e) => [e["@id"], e]));
}

describe("escapeName", () => {
  it("leaves plain identifiers alone", () => {
    expect(escapeName("Motor")).toBe("Motor");
  });

  it("quotes names with spaces, quotes or parentheses", () => {
    expect(escapeName("Front Axle")).toBe("'Front Axle'");
    expect(escapeName("f(x)")).toBe("'f(x)'");
    expect(escapeName("it's")).toBe("'it\\'s'");
  });
});

describe("renderNotation", () => {
  it("renders a childless definition as a declaration", () => {
    expect(renderNotation(el("m", "PartDefinition", "Motor"), lookup())).toBe("part def Motor;\n");
  });

  it("renders a body when a displayable child is cached", () => {
    const motor = el("m", "PartDefinition", "Motor", { features: ["p"] });
    const cache = lookup(el("p", "AttributeUsage", "power"));

    expect(renderNotation(motor, cache)).toBe("part def Motor {\n    attribute power;\n}\n");
  });

  it("skips uncached and non-displayable children", () => {
    const motor = el("m", "PartDefinition", "Motor", { members: ["gone", "t"] });
    const cache = lookup(el("t", "FeatureTyping"));

    expect(renderNotation(motor, cache)).toBe("part def Motor;\n");
  });

  it("renders a member listed again as a feature once", () => {
    const pkg = el("pkg", "Package", "Vehicle", { members: ["b"], features: ["b"] });
    const cache = lookup(el("b", "PartUsage", "battery"));

    expect(renderNotation(pkg, cache)).toBe("package Vehicle {\n    part battery;\n}\n");
  });

  it("nests with four spaces per level", () => {
    const pkg = el("pkg", "Package", "Vehicle", { members: ["m"] });
    const cache = lookup(el("m", "PartDefinition", "Motor", { features: ["p"] }), el("p", "AttributeUsage", "power"));

    expect(renderNotation(pkg, cache)).toBe(
      ["package Vehicle {", "    part def Motor {", "        attribute power;", "    }", "}", ""].join("\n")
    );
  });

  it("renders types without a keyword as a comment and does not nest them", () => {
    const odd = el("x", "ReferenceUsage", "ref", { members: ["p"] });
    const cache = lookup(el("p", "AttributeUsage", "power"));

    expect(renderNotation(odd, cache, 1)).toBe("    /* ReferenceUsage */\n");
  });

  it("renders comments by their body and drops empty ones", () => {
    expect(renderNotation({ "@id": "c", "@type": "Comment", body: "check torque" }, lookup())).toBe(
      "/* check torque */\n"
    );
    expect(renderNotation({ "@id": "c", "@type": "Comment" }, lookup())).toBe("");
  });

  it("keeps the declaration when every child renders empty", () => {
    const part = el("m", "PartDefinition", "Motor", { members: ["c"] });
    expect(renderNotation(part, lookup({ "@id": "c", "@type": "Comment", body: "" }))).toBe("part def Motor;\n");
  });

  it("falls back to the qualified name and quotes it when needed", () => {
    const element: Element = { "@id": "q", "@type": "PartUsage", qualifiedName: "Vehicle::'Front Axle'" };
    expect(renderNotation(element, lookup())).toBe("part 'Front Axle';\n");
  });

  it("omits the name when the element has none", () => {
    expect(renderNotation(el("n", "Namespace"), lookup())).toBe("namespace;\n");
  });
});

describe("renderExport", () => {
  it("writes a header and each root member", () => {
    const root = el("root", "Namespace", undefined, { members: ["a", "missing"] });
    const text = renderExport({
      projectName: "Vehicle",
      commit: { "@id": "c2", name: "Second" },
      roots: [root],
      cache: lookup(el("a", "PartDefinition", "Motor")),
      exportedAt: new Date("2026-03-01T10:00:00Z"),
    });

    expect(text).toBe(
      [
        "// SysML v2 Export",
        "// Project: Vehicle",
        "// Exported: 2026-03-01T10:00:00.000Z",
        "// Commit: Second (c2)",
        "",
        "part def Motor;",
        "",
        "",
      ].join("\n")
    );
  });

  it("exports a single element when one is named", () => {
    const root = el("root", "Namespace", undefined, { members: ["a"] });
    const text = renderExport({
      projectName: "Vehicle",
      commit: { "@id": "c2" },
      roots: [root],
      elementId: "b",
      cache: lookup(el("a", "PartDefinition", "Motor"), el("b", "PortDefinition", "Plug")),
      exportedAt: new Date("2026-03-01T10:00:00Z"),
    });

    expect(text.split("\n").slice(3)).toEqual(["// Commit: c2 (c2)", "", "port def Plug;", "", ""]);
  });
});

describe("rootMemberIds", () => {
  it("collects every root's owned members in order", () => {
    expect(rootMemberIds([el("r1", "Namespace", undefined, { members: ["a", "b"] }), el("r2", "Namespace", undefined, { members: ["c"] })])).toEqual(["a", "b", "c"]);
  });
});

describe("prefetchSubtree", () => {
  it("loads the displayable subtree and skips failures", async () => {
    const { client } = vehicleClient();
    const session = new Session(client, "p1", "c2");
    const log = { log: vi.fn(), logError: vi.fn() };

    const count = await prefetchSubtree(session, ["pkg"], { log });

    // pkg m1 m2 m4 f1; m3 fails
    expect(count).toBe(5);
    expect(session.cache.has("f1")).toBe(true);
    expect(log.logError).toHaveBeenCalledTimes(1);
    expect(renderNotation(session.cache.get("pkg") ?? el("pkg", "Package"), session.cache)).toBe(
      [
        "package Vehicle {",
        "    part def Motor {",
        "        attribute power;",
        "    }",
        "    part def Battery;",
        "}",
        "",
      ].join("\n")
    );
  });
});
