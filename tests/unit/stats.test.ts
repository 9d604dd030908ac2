import { describe, expect, it } from "vitest";
import { importBook } from "../../src/application/import/import-usecase";
import { collectStats, formatStats } from "../../src/application/stats/stats-usecase";
import { silentLogger } from "../../src/cli/logging";
import { BookStore } from "../../src/infrastructure/store/sqlite-store";
import { twoSectionEdition } from "../fixtures/editions";

describe("collectStats", () => {
  it("reports store counts and per-prompt coverage", () => {
    const store = new BookStore(":memory:");
    try {
      importBook(store, twoSectionEdition(), {
        placeholders: { chapter: "Chapter {n}", section: "Section {n}" },
        logger: silentLogger,
      });
      for (const p of store.listParagraphs({ kind: "section", chapter: 1, section: 1 }).slice(0, 2)) {
        store.saveTranslation({ paragraphId: p.id, promptName: "literal", text: "t", model: null });
      }

      const stats = collectStats(store);
      expect(stats.prompts).toEqual([
        { promptName: "literal", translated: 2, byChapter: new Map([[1, 2]]) },
      ]);
      expect(formatStats(stats)).toEqual([
        "Chapters: 1",
        "Sections: 2",
        "Paragraphs: 5",
        "Translations: 2",
        'Prompt "literal": 2/5 (40.0%)',
        "  chapter 1: 2/5",
      ]);
    } finally {
      store.close();
    }
  });

  it("handles an empty store", () => {
    const store = new BookStore(":memory:");
    try {
      expect(formatStats(collectStats(store))).toEqual([
        "Chapters: 0",
        "Sections: 0",
        "Paragraphs: 0",
        "Translations: 0",
      ]);
    } finally {
      store.close();
    }
  });
});
