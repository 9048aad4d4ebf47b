/**
 * Static HTML report of every cached element.
 */

import type { Element } from "../api/types.js";
import { formatTimestamp } from "../diagnostics.js";
import { displayName, shortId } from "../elements.js";
import { render } from "../templates.js";
import { shortTypeName } from "./element-types.js";
import type { ElementSource } from "./statistics.js";

export interface HtmlReportInput {
  projectId: string;
  commitId: string;
  cache: ElementSource;
  exportedAt: Date;
}

export interface NavItem {
  id: string;
  name: string;
  type: string;
}

/**
 * JSON that is safe inside a <script> element: no `</script>` and no line separators that end a JS string.
 */
export function scriptSafeJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export function renderHtmlReport(input: HtmlReportInput): string {
  const elements: Record<string, Element> = {};
  const nav: NavItem[] = [];
  const types = new Set<string>();

  for (const element of input.cache.values()) {
    const type = shortTypeName(element["@type"]);
    elements[element["@id"]] = element;
    nav.push({ id: element["@id"], name: displayName(element), type });
    types.add(type);
  }

  return render("report/index", {
    projectLabel: shortId(input.projectId),
    commitLabel: shortId(input.commitId),
    nav,
    stats: {
      total: nav.length,
      typeCount: types.size,
      exportDate: formatTimestamp(input.exportedAt).slice(0, 10),
    },
    elementsJson: scriptSafeJson(elements),
  });
}
