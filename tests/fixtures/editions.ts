import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { BookEdition } from "../../src/domain/book/edition";
import { parseBookJson } from "../../src/application/import/parse-edition";

export const TWO_SECTIONS_PATH = fileURLToPath(new URL("./two-sections.json", import.meta.url));

/** One chapter, two sections of 3 and 2 paragraphs; the first paragraph carries `<b>` markup. */
export function twoSectionEdition(): BookEdition {
  return parseBookJson(readFileSync(TWO_SECTIONS_PATH, "utf8"), TWO_SECTIONS_PATH);
}
