import { strToU8, zipSync } from "fflate";
import type { DocBlock, ExportDocument, TableBlock, TableRow } from "../../domain/export/document";
import { escapeXml, mirrorBrackets, NS, XML_HEADER } from "./xml";

export type DocxStyle = {
  font: string;
  /** Points. */
  fontSize: number;
  rtl: boolean;
  mirrorBrackets: boolean;
};

type RunFormat = {
  bold?: boolean;
  italic?: boolean;
  color?: string;
  /** Points. */
  size?: number;
};

type ParagraphFormat = {
  style?: string;
  align?: "center" | "start";
};

const HEADER_FILL = "D9E2F3";
const PLACEHOLDER_COLOR = "808080";
const NUMBER_COLUMN = 576;
const TEXT_WIDTH = 8640;

// twips; A4 with 1" margins
const PAGE = { width: 11906, height: 16838, margin: 1440 };

function runProperties(style: DocxStyle, format: RunFormat): string {
  const parts: string[] = [];
  if (format.bold) parts.push("<w:b/><w:bCs/>");
  if (format.italic) parts.push("<w:i/><w:iCs/>");
  if (format.color) parts.push(`<w:color w:val="${format.color}"/>`);
  if (format.size) {
    const halfPoints = Math.round(format.size * 2);
    parts.push(`<w:sz w:val="${halfPoints}"/><w:szCs w:val="${halfPoints}"/>`);
  }
  if (style.rtl) parts.push("<w:rtl/>");
  return parts.length > 0 ? `<w:rPr>${parts.join("")}</w:rPr>` : "";
}

function paragraph(
  text: string,
  style: DocxStyle,
  pFormat: ParagraphFormat = {},
  rFormat: RunFormat = {},
): string {
  const pPr: string[] = [];
  if (pFormat.style) pPr.push(`<w:pStyle w:val="${pFormat.style}"/>`);
  if (style.rtl) pPr.push("<w:bidi/>");
  if (pFormat.align) pPr.push(`<w:jc w:val="${pFormat.align}"/>`);

  const shown = style.rtl && style.mirrorBrackets ? mirrorBrackets(text) : text;
  const rPr = runProperties(style, rFormat);
  const runs = shown
    .split("\n")
    .map((line) => `<w:t xml:space="preserve">${escapeXml(line)}</w:t>`)
    .join("<w:br/>");

  return `<w:p>${pPr.length > 0 ? `<w:pPr>${pPr.join("")}</w:pPr>` : ""}<w:r>${rPr}${runs}</w:r></w:p>`;
}

function cell(content: string, width: number, fill?: string): string {
  const shading = fill ? `<w:shd w:val="clear" w:color="auto" w:fill="${fill}"/>` : "";
  return `<w:tc><w:tcPr><w:tcW w:w="${width}" w:type="dxa"/>${shading}</w:tcPr>${content}</w:tc>`;
}

function columnWidths(table: TableBlock): number[] {
  if (table.header.original === undefined) return [NUMBER_COLUMN, TEXT_WIDTH - NUMBER_COLUMN];
  const half = Math.floor((TEXT_WIDTH - NUMBER_COLUMN) / 2);
  return [NUMBER_COLUMN, half, half];
}

function tableRow(row: TableRow, widths: number[], style: DocxStyle): string {
  const cells: string[] = [];
  const [numberWidth = NUMBER_COLUMN] = widths;
  cells.push(
    cell(
      paragraph(String(row.number), { ...style, rtl: false }, { align: "center" }, { color: PLACEHOLDER_COLOR, size: 10 }),
      numberWidth,
    ),
  );
  let column = 1;
  if (row.original !== undefined) {
    cells.push(cell(paragraph(row.original, style, {}, { size: 11 }), widths[column] ?? TEXT_WIDTH));
    column++;
  }
  const translationFormat: RunFormat = row.missing
    ? { italic: true, color: PLACEHOLDER_COLOR, size: 11 }
    : { size: 11 };
  cells.push(cell(paragraph(row.translation, style, {}, translationFormat), widths[column] ?? TEXT_WIDTH));
  return `<w:tr><w:trPr><w:cantSplit/></w:trPr>${cells.join("")}</w:tr>`;
}

function table(block: TableBlock, style: DocxStyle): string {
  const widths = columnWidths(block);
  const headerLabels = [block.header.number, block.header.original, block.header.translation].filter(
    (label): label is string => label !== undefined,
  );
  const header = headerLabels
    .map((label, i) =>
      cell(
        paragraph(label, style, { align: "center" }, { bold: true, size: 11 }),
        widths[i] ?? TEXT_WIDTH,
        HEADER_FILL,
      ),
    )
    .join("");

  const tblPr = [
    '<w:tblStyle w:val="TableGrid"/>',
    style.rtl ? "<w:bidiVisual/>" : "",
    '<w:tblW w:w="0" w:type="auto"/>',
    '<w:tblLayout w:type="fixed"/>',
  ].join("");

  return [
    `<w:tbl><w:tblPr>${tblPr}</w:tblPr>`,
    `<w:tblGrid>${widths.map((w) => `<w:gridCol w:w="${w}"/>`).join("")}</w:tblGrid>`,
    `<w:tr><w:trPr><w:tblHeader/></w:trPr>${header}</w:tr>`,
    ...block.rows.map((row) => tableRow(row, widths, style)),
    "</w:tbl>",
    // Word needs a paragraph between consecutive tables
    "<w:p/>",
  ].join("");
}

function block(b: DocBlock, style: DocxStyle): string {
  switch (b.type) {
    case "title":
      return paragraph(b.text, style, { style: "Title", align: "center" });
    case "subtitle":
      return paragraph(b.text, style, { style: "Subtitle", align: "center" }, { italic: true });
    case "heading":
      return paragraph(b.text, style, { style: b.level === 1 ? "Heading1" : "Heading2" });
    case "note":
      return paragraph(b.text, style, {}, { italic: true, color: PLACEHOLDER_COLOR });
    case "table":
      return table(b, style);
    case "pageBreak":
      return '<w:p><w:r><w:br w:type="page"/></w:r></w:p>';
  }
}

export function documentXml(doc: ExportDocument, style: DocxStyle): string {
  const body = doc.blocks.map((b) => block(b, style)).join("");
  const sectPr = [
    "<w:sectPr>",
    `<w:pgSz w:w="${PAGE.width}" w:h="${PAGE.height}"/>`,
    `<w:pgMar w:top="${PAGE.margin}" w:right="${PAGE.margin}" w:bottom="${PAGE.margin}" w:left="${PAGE.margin}" w:header="720" w:footer="720" w:gutter="0"/>`,
    style.rtl ? "<w:bidi/>" : "",
    "</w:sectPr>",
  ].join("");
  return `${XML_HEADER}<w:document xmlns:w="${NS.w}" xmlns:r="${NS.r}"><w:body>${body}${sectPr}</w:body></w:document>`;
}

function headingStyle(id: string, name: string, size: number, color: string, outline?: number): string {
  const outlineLvl = outline === undefined ? "" : `<w:outlineLvl w:val="${outline}"/>`;
  return [
    `<w:style w:type="paragraph" w:styleId="${id}">`,
    `<w:name w:val="${name}"/><w:basedOn w:val="Normal"/><w:next w:val="Normal"/><w:qFormat/>`,
    `<w:pPr><w:keepNext/><w:spacing w:before="240" w:after="120"/>${outlineLvl}</w:pPr>`,
    `<w:rPr><w:b/><w:bCs/><w:color w:val="${color}"/><w:sz w:val="${size * 2}"/><w:szCs w:val="${size * 2}"/></w:rPr>`,
    "</w:style>",
  ].join("");
}

export function stylesXml(style: DocxStyle): string {
  const font = escapeXml(style.font);
  const size = Math.round(style.fontSize * 2);
  return [
    XML_HEADER,
    `<w:styles xmlns:w="${NS.w}">`,
    "<w:docDefaults><w:rPrDefault><w:rPr>",
    `<w:rFonts w:ascii="${font}" w:hAnsi="${font}" w:eastAsia="${font}" w:cs="${font}"/>`,
    `<w:sz w:val="${size}"/><w:szCs w:val="${size}"/>`,
    "</w:rPr></w:rPrDefault>",
    '<w:pPrDefault><w:pPr><w:spacing w:after="120"/></w:pPr></w:pPrDefault>',
    "</w:docDefaults>",
    '<w:style w:type="paragraph" w:default="1" w:styleId="Normal"><w:name w:val="Normal"/><w:qFormat/></w:style>',
    headingStyle("Title", "Title", 24, "003366"),
    headingStyle("Subtitle", "Subtitle", 16, "336699"),
    headingStyle("Heading1", "heading 1", 18, "003366", 0),
    headingStyle("Heading2", "heading 2", 14, "336699", 1),
    '<w:style w:type="table" w:styleId="TableGrid"><w:name w:val="Table Grid"/><w:tblPr><w:tblBorders>',
    ...["top", "left", "bottom", "right", "insideH", "insideV"].map(
      (edge) => `<w:${edge} w:val="single" w:sz="4" w:space="0" w:color="8EAADB"/>`,
    ),
    '</w:tblBorders><w:tblCellMar><w:left w:w="108" w:type="dxa"/><w:right w:w="108" w:type="dxa"/></w:tblCellMar></w:tblPr></w:style>',
    "</w:styles>",
  ].join("");
}

const CONTENT_TYPES = `${XML_HEADER}<Types xmlns="${NS.contentTypes}"><Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/><Default Extension="xml" ContentType="application/xml"/><Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/><Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/></Types>`;

const PACKAGE_RELS = `${XML_HEADER}<Relationships xmlns="${NS.rels}"><Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/></Relationships>`;

const DOCUMENT_RELS = `${XML_HEADER}<Relationships xmlns="${NS.rels}"><Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles" Target="styles.xml"/></Relationships>`;

/** The document as DOCX bytes. */
export function renderDocx(doc: ExportDocument, style: DocxStyle): Uint8Array {
  return zipSync({
    "[Content_Types].xml": strToU8(CONTENT_TYPES),
    "_rels/.rels": strToU8(PACKAGE_RELS),
    "word/_rels/document.xml.rels": strToU8(DOCUMENT_RELS),
    "word/document.xml": strToU8(documentXml(doc, style)),
    "word/styles.xml": strToU8(stylesXml(style)),
  });
}
