import type { BookStore, StoreCounts } from "../../infrastructure/store/sqlite-store";

export type PromptCoverage = {
  promptName: string;
  translated: number;
  /** Chapter number to translated paragraph count; chapters without any are absent. */
  byChapter: Map<number, number>;
};

export type BookStats = StoreCounts & {
  /** Chapter number to paragraph count. */
  paragraphsByChapter: Map<number, number>;
  prompts: PromptCoverage[];
};

export function collectStats(store: BookStore): BookStats {
  const prompts = new Map<string, PromptCoverage>();
  for (const row of store.translationCounts()) {
    let coverage = prompts.get(row.promptName);
    if (!coverage) {
      coverage = { promptName: row.promptName, translated: 0, byChapter: new Map() };
      prompts.set(row.promptName, coverage);
    }
    coverage.translated += row.count;
    coverage.byChapter.set(row.chapterNumber, row.count);
  }

  return {
    ...store.counts(),
    paragraphsByChapter: store.paragraphCountsByChapter(),
    prompts: [...prompts.values()],
  };
}

/** Plain-text report, one line per prompt and chapter. */
export function formatStats(stats: BookStats): string[] {
  const lines = [
    `Chapters: ${stats.chapters}`,
    `Sections: ${stats.sections}`,
    `Paragraphs: ${stats.paragraphs}`,
    `Translations: ${stats.translations}`,
  ];
  for (const prompt of stats.prompts) {
    const pct = stats.paragraphs === 0 ? 0 : (prompt.translated / stats.paragraphs) * 100;
    lines.push(`Prompt "${prompt.promptName}": ${prompt.translated}/${stats.paragraphs} (${pct.toFixed(1)}%)`);
    for (const [chapter, total] of stats.paragraphsByChapter) {
      lines.push(`  chapter ${chapter}: ${prompt.byChapter.get(chapter) ?? 0}/${total}`);
    }
  }
  return lines;
}
