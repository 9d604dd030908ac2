export type Chapter = {
  id: number;
  number: number;
  title: string;
};

export type Section = {
  id: number;
  chapterId: number;
  number: number;
  title: string;
};

export type Paragraph = {
  id: number;
  chapterId: number;
  /** `null` when the chapter has no sections. */
  sectionId: number | null;
  /** 1-based, contiguous within the section (or the chapter when sectionless). */
  number: number;
  text: string;
};

export type Translation = {
  id: number;
  paragraphId: number;
  promptName: string;
  text: string;
  model: string | null;
  createdAt: string;
};

/** A paragraph joined with the ordinals of its containers. */
export type LocatedParagraph = Paragraph & {
  chapterNumber: number;
  chapterTitle: string;
  sectionNumber: number | null;
  sectionTitle: string | null;
};

export type Scope =
  | { kind: "all" }
  | { kind: "chapter"; chapter: number }
  | { kind: "section"; chapter: number; section: number };

export function describeScope(scope: Scope): string {
  switch (scope.kind) {
    case "all":
      return "whole book";
    case "chapter":
      return `chapter ${scope.chapter}`;
    case "section":
      return `chapter ${scope.chapter}, section ${scope.section}`;
  }
}
