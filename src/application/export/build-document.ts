import type { Chapter, Paragraph, Scope, Section } from "../../domain/book/model";
import type { DocBlock, ExportDocument, TableBlock } from "../../domain/export/document";
import type { BookStore } from "../../infrastructure/store/sqlite-store";

export type BuildDocumentOptions = {
  promptName: string;
  scope: Scope;
  showOriginal: boolean;
  labels: { number: string; original: string; translation: string };
  placeholder: string;
  emptySection: string;
  /** Title page for whole-book exports. */
  title?: string;
  subtitle?: string;
};

export type DocumentStats = {
  chapters: number;
  sections: number;
  rows: number;
  translated: number;
  missing: number;
};

type Selection = { chapter: Chapter; sections: Section[]; includeDirect: boolean };

function select(store: BookStore, scope: Scope): Selection[] {
  switch (scope.kind) {
    case "all":
      return store.listChapters().map((chapter) => ({
        chapter,
        sections: store.listSections(chapter.id),
        includeDirect: true,
      }));
    case "chapter": {
      const chapter = store.getChapter(scope.chapter);
      return [{ chapter, sections: store.listSections(chapter.id), includeDirect: true }];
    }
    case "section": {
      const chapter = store.getChapter(scope.chapter);
      const section = store.getSection(scope.chapter, scope.section);
      return [{ chapter, sections: [section], includeDirect: false }];
    }
  }
}

export function buildExportDocument(
  store: BookStore,
  options: BuildDocumentOptions,
): { document: ExportDocument; stats: DocumentStats } {
  const translations = store.translationsFor(options.promptName, options.scope);
  const stats: DocumentStats = { chapters: 0, sections: 0, rows: 0, translated: 0, missing: 0 };
  const blocks: DocBlock[] = [];

  const table = (paragraphs: Paragraph[]): TableBlock => ({
    type: "table",
    header: {
      number: options.labels.number,
      original: options.showOriginal ? options.labels.original : undefined,
      translation: options.labels.translation,
    },
    rows: paragraphs.map((p) => {
      const translation = translations.get(p.id);
      stats.rows++;
      if (translation) stats.translated++;
      else stats.missing++;
      return {
        number: p.number,
        original: options.showOriginal ? p.text : undefined,
        translation: translation ? translation.text : options.placeholder,
        missing: translation === undefined,
      };
    }),
  });

  if (options.scope.kind === "all" && options.title) {
    blocks.push({ type: "title", text: options.title });
    if (options.subtitle) blocks.push({ type: "subtitle", text: options.subtitle });
    blocks.push({ type: "pageBreak" });
  }

  const selections = select(store, options.scope);
  selections.forEach(({ chapter, sections, includeDirect }, index) => {
    if (index > 0) blocks.push({ type: "pageBreak" });
    blocks.push({ type: "heading", level: 1, text: chapter.title });
    stats.chapters++;

    const direct = includeDirect ? store.listContainerParagraphs(chapter.id, null) : [];
    if (direct.length > 0) blocks.push(table(direct));

    for (const section of sections) {
      blocks.push({ type: "heading", level: 2, text: section.title });
      stats.sections++;
      const paragraphs = store.listContainerParagraphs(chapter.id, section.id);
      blocks.push(
        paragraphs.length > 0 ? table(paragraphs) : { type: "note", text: options.emptySection },
      );
    }

    if (direct.length === 0 && sections.length === 0) {
      blocks.push({ type: "note", text: options.emptySection });
    }
  });

  return { document: { showOriginal: options.showOriginal, blocks }, stats };
}
