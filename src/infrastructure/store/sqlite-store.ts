import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type {
  Chapter,
  LocatedParagraph,
  Paragraph,
  Scope,
  Section,
  Translation,
} from "../../domain/book/model";
import { NotFoundError, StoreError } from "../../domain/common/errors";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS chapters (
  id INTEGER PRIMARY KEY,
  number INTEGER NOT NULL UNIQUE CHECK (number > 0),
  title TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS sections (
  id INTEGER PRIMARY KEY,
  chapter_id INTEGER NOT NULL REFERENCES chapters(id) ON DELETE CASCADE,
  number INTEGER NOT NULL CHECK (number > 0),
  title TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (chapter_id, number),
  UNIQUE (id, chapter_id)
);

CREATE TABLE IF NOT EXISTS paragraphs (
  id INTEGER PRIMARY KEY,
  chapter_id INTEGER NOT NULL REFERENCES chapters(id) ON DELETE CASCADE,
  section_id INTEGER,
  number INTEGER NOT NULL CHECK (number > 0),
  text TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (section_id, chapter_id) REFERENCES sections(id, chapter_id) ON DELETE CASCADE
);

CREATE UNIQUE INDEX IF NOT EXISTS paragraphs_section_number_uq
  ON paragraphs(section_id, number) WHERE section_id IS NOT NULL;
CREATE UNIQUE INDEX IF NOT EXISTS paragraphs_chapter_number_uq
  ON paragraphs(chapter_id, number) WHERE section_id IS NULL;

CREATE TABLE IF NOT EXISTS translations (
  id INTEGER PRIMARY KEY,
  paragraph_id INTEGER NOT NULL REFERENCES paragraphs(id) ON DELETE CASCADE,
  prompt_name TEXT NOT NULL,
  translated_text TEXT NOT NULL CHECK (length(trim(translated_text)) > 0),
  model TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (paragraph_id, prompt_name)
);
`;

type ChapterRow = { id: number; number: number; title: string };
type SectionRow = { id: number; chapter_id: number; number: number; title: string };
type ParagraphRow = {
  id: number;
  chapter_id: number;
  section_id: number | null;
  number: number;
  text: string;
};
type LocatedParagraphRow = ParagraphRow & {
  chapter_number: number;
  chapter_title: string;
  section_number: number | null;
  section_title: string | null;
};
type TranslationRow = {
  id: number;
  paragraph_id: number;
  prompt_name: string;
  translated_text: string;
  model: string | null;
  created_at: string;
};

const toChapter = (r: ChapterRow): Chapter => ({
  id: r.id,
  number: r.number,
  title: r.title,
});

const toSection = (r: SectionRow): Section => ({
  id: r.id,
  chapterId: r.chapter_id,
  number: r.number,
  title: r.title,
});

const toParagraph = (r: ParagraphRow): Paragraph => ({
  id: r.id,
  chapterId: r.chapter_id,
  sectionId: r.section_id,
  number: r.number,
  text: r.text,
});

const toTranslation = (r: TranslationRow): Translation => ({
  id: r.id,
  paragraphId: r.paragraph_id,
  promptName: r.prompt_name,
  text: r.translated_text,
  model: r.model,
  createdAt: r.created_at,
});

export type SaveTranslationInput = {
  paragraphId: number;
  promptName: string;
  text: string;
  model: string | null;
};

export type SaveTranslationResult = "inserted" | "replaced" | "exists";

export type StoreCounts = {
  chapters: number;
  sections: number;
  paragraphs: number;
  translations: number;
};

export type TranslationCount = {
  promptName: string;
  chapterNumber: number;
  count: number;
};

/** Filter and parameters selecting the paragraphs of a scope. */
type ScopeFilter = { where: string; params: number[] };

function storeError(error: unknown, context: string): StoreError {
  if (error instanceof StoreError) return error;
  if (error instanceof Database.SqliteError) {
    return new StoreError(`${context}: ${error.message}`, error, error.code);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StoreError(`${context}: ${message}`, error);
}

function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.exec(SCHEMA_SQL);
    return db;
  } catch (error) {
    throw storeError(error, `Failed to open store at "${dbPath}"`);
  }
}

/**
 * The book store: one SQLite file holding chapters, sections, paragraphs and
 * translations. Pass ":memory:" for a throwaway store.
 */
export class BookStore {
  readonly path: string;
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (!dbPath || dbPath.trim() === "") {
      throw new StoreError("Database path cannot be empty");
    }
    this.path = dbPath;
    this.db = openDatabase(dbPath);
  }

  close(): void {
    this.db.close();
  }

  /** Runs `fn` in a transaction; any throw rolls it back and is rethrown as a StoreError. */
  transaction<T>(fn: () => T, context = "Transaction failed"): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      throw storeError(error, context);
    }
  }

  isEmpty(): boolean {
    const row = this.db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM chapters")
      .get();
    return (row?.n ?? 0) === 0;
  }

  /** Deletes every row; translations go with their paragraphs. */
  reset(): void {
    this.transaction(() => {
      this.db.prepare("DELETE FROM chapters").run();
    }, "Failed to reset store");
  }

  insertChapter(input: { number: number; title: string }): Chapter {
    const info = this.db
      .prepare<[number, string]>("INSERT INTO chapters (number, title) VALUES (?, ?)")
      .run(input.number, input.title);
    return { id: Number(info.lastInsertRowid), ...input };
  }

  insertSection(input: { chapterId: number; number: number; title: string }): Section {
    const info = this.db
      .prepare<[number, number, string]>(
        "INSERT INTO sections (chapter_id, number, title) VALUES (?, ?, ?)",
      )
      .run(input.chapterId, input.number, input.title);
    return { id: Number(info.lastInsertRowid), ...input };
  }

  insertParagraph(input: {
    chapterId: number;
    sectionId: number | null;
    number: number;
    text: string;
  }): Paragraph {
    const info = this.db
      .prepare<[number, number | null, number, string]>(
        "INSERT INTO paragraphs (chapter_id, section_id, number, text) VALUES (?, ?, ?, ?)",
      )
      .run(input.chapterId, input.sectionId, input.number, input.text);
    return { id: Number(info.lastInsertRowid), ...input };
  }

  listChapters(): Chapter[] {
    return this.db
      .prepare<[], ChapterRow>("SELECT id, number, title FROM chapters ORDER BY number")
      .all()
      .map(toChapter);
  }

  getChapter(number: number): Chapter {
    const row = this.db
      .prepare<[number], ChapterRow>("SELECT id, number, title FROM chapters WHERE number = ?")
      .get(number);
    if (!row) throw new NotFoundError(`Chapter ${number} not found`);
    return toChapter(row);
  }

  listSections(chapterId: number): Section[] {
    return this.db
      .prepare<[number], SectionRow>(
        "SELECT id, chapter_id, number, title FROM sections WHERE chapter_id = ? ORDER BY number",
      )
      .all(chapterId)
      .map(toSection);
  }

  getSection(chapterNumber: number, sectionNumber: number): Section {
    const chapter = this.getChapter(chapterNumber);
    const row = this.db
      .prepare<[number, number], SectionRow>(
        "SELECT id, chapter_id, number, title FROM sections WHERE chapter_id = ? AND number = ?",
      )
      .get(chapter.id, sectionNumber);
    if (!row) {
      throw new NotFoundError(
        `Section ${sectionNumber} not found in chapter ${chapterNumber}`,
      );
    }
    return toSection(row);
  }

  /** Paragraphs of one container (a section, or a chapter's sectionless paragraphs) in ordinal order. */
  listContainerParagraphs(chapterId: number, sectionId: number | null): Paragraph[] {
    const rows =
      sectionId === null
        ? this.db
            .prepare<[number], ParagraphRow>(
              "SELECT id, chapter_id, section_id, number, text FROM paragraphs WHERE chapter_id = ? AND section_id IS NULL ORDER BY number",
            )
            .all(chapterId)
        : this.db
            .prepare<[number], ParagraphRow>(
              "SELECT id, chapter_id, section_id, number, text FROM paragraphs WHERE section_id = ? ORDER BY number",
            )
            .all(sectionId);
    return rows.map(toParagraph);
  }

  private scopeFilter(scope: Scope): ScopeFilter {
    switch (scope.kind) {
      case "all":
        return { where: "1 = 1", params: [] };
      case "chapter":
        return { where: "p.chapter_id = ?", params: [this.getChapter(scope.chapter).id] };
      case "section":
        return {
          where: "p.section_id = ?",
          params: [this.getSection(scope.chapter, scope.section).id],
        };
    }
  }

  /**
   * Every paragraph in scope, ordered by chapter, then section (sectionless
   * paragraphs first), then paragraph ordinal.
   */
  listParagraphs(scope: Scope): LocatedParagraph[] {
    const filter = this.scopeFilter(scope);
    const rows = this.db
      .prepare<number[], LocatedParagraphRow>(
        `SELECT p.id, p.chapter_id, p.section_id, p.number, p.text,
                c.number AS chapter_number, c.title AS chapter_title,
                s.number AS section_number, s.title AS section_title
           FROM paragraphs p
           JOIN chapters c ON c.id = p.chapter_id
           LEFT JOIN sections s ON s.id = p.section_id
          WHERE ${filter.where}
          ORDER BY c.number, COALESCE(s.number, 0), p.number`,
      )
      .all(...filter.params);
    return rows.map((r) => ({
      ...toParagraph(r),
      chapterNumber: r.chapter_number,
      chapterTitle: r.chapter_title,
      sectionNumber: r.section_number,
      sectionTitle: r.section_title,
    }));
  }

  findTranslation(paragraphId: number, promptName: string): Translation | undefined {
    const row = this.db
      .prepare<[number, string], TranslationRow>(
        "SELECT id, paragraph_id, prompt_name, translated_text, model, created_at FROM translations WHERE paragraph_id = ? AND prompt_name = ?",
      )
      .get(paragraphId, promptName);
    return row ? toTranslation(row) : undefined;
  }

  /** Translations under `promptName` for the paragraphs in scope, keyed by paragraph id. */
  translationsFor(promptName: string, scope: Scope): Map<number, Translation> {
    const filter = this.scopeFilter(scope);
    const rows = this.db
      .prepare<Array<string | number>, TranslationRow>(
        `SELECT t.id, t.paragraph_id, t.prompt_name, t.translated_text, t.model, t.created_at
           FROM translations t
           JOIN paragraphs p ON p.id = t.paragraph_id
          WHERE t.prompt_name = ? AND ${filter.where}`,
      )
      .all(promptName, ...filter.params);
    return new Map(rows.map((r) => [r.paragraph_id, toTranslation(r)]));
  }

  /**
   * Stores a translation. An existing row for the same (paragraph, prompt)
   * is kept unless `replace` is set, so there is never more than one.
   */
  saveTranslation(
    input: SaveTranslationInput,
    options: { replace?: boolean } = {},
  ): SaveTranslationResult {
    try {
      if (options.replace) {
        const existed = this.findTranslation(input.paragraphId, input.promptName) !== undefined;
        this.db
          .prepare<[number, string, string, string | null]>(
            `INSERT INTO translations (paragraph_id, prompt_name, translated_text, model)
             VALUES (?, ?, ?, ?)
             ON CONFLICT (paragraph_id, prompt_name) DO UPDATE SET
               translated_text = excluded.translated_text,
               model = excluded.model,
               created_at = CURRENT_TIMESTAMP`,
          )
          .run(input.paragraphId, input.promptName, input.text, input.model);
        return existed ? "replaced" : "inserted";
      }
      const info = this.db
        .prepare<[number, string, string, string | null]>(
          `INSERT INTO translations (paragraph_id, prompt_name, translated_text, model)
           VALUES (?, ?, ?, ?)
           ON CONFLICT (paragraph_id, prompt_name) DO NOTHING`,
        )
        .run(input.paragraphId, input.promptName, input.text, input.model);
      return info.changes > 0 ? "inserted" : "exists";
    } catch (error) {
      throw storeError(
        error,
        `Failed to save translation for paragraph ${input.paragraphId} (${input.promptName})`,
      );
    }
  }

  counts(): StoreCounts {
    const count = (table: string) =>
      this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
    return {
      chapters: count("chapters"),
      sections: count("sections"),
      paragraphs: count("paragraphs"),
      translations: count("translations"),
    };
  }

  translationCounts(): TranslationCount[] {
    return this.db
      .prepare<[], { prompt_name: string; chapter_number: number; n: number }>(
        `SELECT t.prompt_name, c.number AS chapter_number, COUNT(*) AS n
           FROM translations t
           JOIN paragraphs p ON p.id = t.paragraph_id
           JOIN chapters c ON c.id = p.chapter_id
          GROUP BY t.prompt_name, c.number
          ORDER BY t.prompt_name, c.number`,
      )
      .all()
      .map((r) => ({ promptName: r.prompt_name, chapterNumber: r.chapter_number, count: r.n }));
  }

  paragraphCountsByChapter(): Map<number, number> {
    const rows = this.db
      .prepare<[], { chapter_number: number; n: number }>(
        `SELECT c.number AS chapter_number, COUNT(p.id) AS n
           FROM chapters c
           LEFT JOIN paragraphs p ON p.chapter_id = c.id
          GROUP BY c.number
          ORDER BY c.number`,
      )
      .all();
    return new Map(rows.map((r) => [r.chapter_number, r.n]));
  }
}
