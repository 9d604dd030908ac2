/** Renderer-agnostic export document. */

export type TableRow = {
  number: number;
  /** Present only when the original text is shown. */
  original?: string;
  translation: string;
  /** The translation cell holds the placeholder. */
  missing: boolean;
};

export type TableBlock = {
  type: "table";
  header: { number: string; original?: string; translation: string };
  rows: TableRow[];
};

export type DocBlock =
  | { type: "title"; text: string }
  | { type: "subtitle"; text: string }
  | { type: "heading"; level: 1 | 2; text: string }
  | { type: "note"; text: string }
  | TableBlock
  | { type: "pageBreak" };

export type ExportDocument = {
  showOriginal: boolean;
  blocks: DocBlock[];
};
