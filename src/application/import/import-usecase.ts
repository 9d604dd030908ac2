import type { Logger } from "../../cli/logging";
import type { BookEdition } from "../../domain/book/edition";
import { toAppError, ValidationError } from "../../domain/common/errors";
import type { BookStore } from "../../infrastructure/store/sqlite-store";
import { stripMarkup } from "../../infrastructure/text/markup";
import { flattenChapter } from "./flatten";
import {
  buildTitleLookup,
  placeholderTitle,
  resolveTitle,
  type TitleLookup,
} from "./titles";

export type ImportOptions = {
  /** Clear the store first; importing into a non-empty store is refused otherwise. */
  reset?: boolean;
  placeholders: { chapter: string; section: string };
  logger: Logger;
};

export type ImportSummary = {
  chapters: number;
  sections: number;
  paragraphs: number;
  /** Paragraphs left empty once markup was stripped. */
  skippedEmpty: number;
  /** Titles that did not come from the schema block. */
  titleFallbacks: number;
  failedChapters: number;
  failures: Array<{ chapter: string; error: string }>;
};

type ChapterCounts = {
  title: string;
  sections: number;
  paragraphs: number;
  skippedEmpty: number;
  titleFallbacks: number;
};

function titleFor(
  keys: string[],
  lookup: TitleLookup,
  placeholder: string,
  logger: Logger,
): { title: string; fallback: boolean } {
  const resolved = resolveTitle(keys, lookup, placeholder);
  if (resolved.source !== "schema") {
    const label = keys.map((k) => (k === "" ? "(unnamed)" : k)).join(" > ");
    logger.warn(
      `No schema title for "${label}"; using ${resolved.source === "inline" ? "inline label" : "placeholder"} "${resolved.title}"`,
    );
  }
  return { title: resolved.title, fallback: resolved.source !== "schema" };
}

function importChapter(
  store: BookStore,
  chapterNumber: number,
  chapterKey: string,
  edition: BookEdition,
  lookup: TitleLookup,
  options: ImportOptions,
): ChapterCounts {
  const content = edition.text[chapterKey] ?? [];
  const chapterTitle = titleFor(
    [chapterKey],
    lookup,
    placeholderTitle(options.placeholders.chapter, chapterNumber),
    options.logger,
  );
  const counts: ChapterCounts = {
    title: chapterTitle.title,
    sections: 0,
    paragraphs: 0,
    skippedEmpty: 0,
    titleFallbacks: chapterTitle.fallback ? 1 : 0,
  };

  const chapter = store.insertChapter({ number: chapterNumber, title: chapterTitle.title });

  const insertParagraphs = (texts: string[], sectionId: number | null) => {
    let number = 0;
    for (const raw of texts) {
      const text = stripMarkup(raw);
      if (text.length === 0) {
        counts.skippedEmpty++;
        continue;
      }
      number++;
      store.insertParagraph({ chapterId: chapter.id, sectionId, number, text });
      counts.paragraphs++;
    }
    return number;
  };

  const flat = flattenChapter(content);
  if (flat.kind === "paragraphs") {
    insertParagraphs(flat.paragraphs, null);
    return counts;
  }

  flat.sections.forEach((flatSection, index) => {
    const sectionNumber = index + 1;
    const sectionTitle = titleFor(
      [chapterKey, ...flatSection.keys],
      lookup,
      placeholderTitle(options.placeholders.section, sectionNumber),
      options.logger,
    );
    if (sectionTitle.fallback) counts.titleFallbacks++;
    const section = store.insertSection({
      chapterId: chapter.id,
      number: sectionNumber,
      title: sectionTitle.title,
    });
    counts.sections++;
    const stored = insertParagraphs(flatSection.paragraphs, section.id);
    options.logger.debug(`  Section ${sectionNumber} (${sectionTitle.title}): ${stored} paragraphs`);
  });
  return counts;
}

/**
 * Writes an edition into the store, one transaction per chapter. A chapter
 * that fails is rolled back and counted; the others still import.
 */
export function importBook(
  store: BookStore,
  edition: BookEdition,
  options: ImportOptions,
): ImportSummary {
  const { logger } = options;

  if (options.reset) {
    logger.info("Clearing existing store contents");
    store.reset();
  } else if (!store.isEmpty()) {
    const existing = store.counts().chapters;
    throw new ValidationError(
      `Store already contains ${existing} chapters; import with reset to replace them`,
    );
  }

  const lookup = buildTitleLookup(edition.schema.nodes);
  const summary: ImportSummary = {
    chapters: 0,
    sections: 0,
    paragraphs: 0,
    skippedEmpty: 0,
    titleFallbacks: 0,
    failedChapters: 0,
    failures: [],
  };

  for (const chapterKey of Object.keys(edition.text)) {
    const chapterNumber = summary.chapters + 1;
    try {
      const counts = store.transaction(
        () => importChapter(store, chapterNumber, chapterKey, edition, lookup, options),
        `Failed to import chapter "${chapterKey}"`,
      );
      summary.chapters++;
      summary.sections += counts.sections;
      summary.paragraphs += counts.paragraphs;
      summary.skippedEmpty += counts.skippedEmpty;
      summary.titleFallbacks += counts.titleFallbacks;
      logger.info(
        `Chapter ${chapterNumber}: ${counts.title} (${counts.sections} sections, ${counts.paragraphs} paragraphs)`,
      );
    } catch (error) {
      const appError = toAppError(error);
      summary.failedChapters++;
      summary.failures.push({ chapter: chapterKey, error: appError.message });
      logger.error(appError.message);
    }
  }

  return summary;
}
