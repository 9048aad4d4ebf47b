import { Eta } from "eta";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const TEMPLATES_DIR = join(__dirname, "../../templates");

const eta = new Eta({
  views: TEMPLATES_DIR,
  autoEscape: true, // element names end up in HTML
});

export function render(template: string, data?: object): string {
  return eta.render(template, data ?? {});
}
