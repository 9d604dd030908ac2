import type { ParagraphList, SectionContent } from "../../domain/book/edition";

export type FlatSection = {
  /** Keys from the chapter's content object down to this section. */
  keys: string[];
  paragraphs: string[];
};

export type FlatChapter =
  | { kind: "paragraphs"; paragraphs: string[] }
  | { kind: "sections"; sections: FlatSection[] };

export function flattenParagraphs(list: ParagraphList): string[] {
  const out: string[] = [];
  for (const item of list) {
    if (typeof item === "string") out.push(item);
    else out.push(...flattenParagraphs(item));
  }
  return out;
}

function collectSections(
  content: { [key: string]: SectionContent },
  keys: string[],
  out: FlatSection[],
): void {
  for (const [key, value] of Object.entries(content)) {
    const path = [...keys, key];
    if (Array.isArray(value)) {
      out.push({ keys: path, paragraphs: flattenParagraphs(value) });
    } else {
      collectSections(value, path, out);
    }
  }
}

/**
 * One level of sections per chapter: nested section objects are walked
 * depth-first and every leaf paragraph list becomes its own section.
 */
export function flattenChapter(content: SectionContent): FlatChapter {
  if (Array.isArray(content)) {
    return { kind: "paragraphs", paragraphs: flattenParagraphs(content) };
  }
  const sections: FlatSection[] = [];
  collectSections(content, [], sections);
  return { kind: "sections", sections };
}
