export const XML_HEADER = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export const NS = {
  w: "http://schemas.openxmlformats.org/wordprocessingml/2006/main",
  r: "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
  rels: "http://schemas.openxmlformats.org/package/2006/relationships",
  contentTypes: "http://schemas.openxmlformats.org/package/2006/content-types",
} as const;

/**
 * Escape text for element content and attribute values. Characters XML 1.0
 * does not allow are dropped.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/[^\x09\x0A\x0D\x20-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

const MIRRORED: Record<string, string> = {
  "(": ")",
  ")": "(",
  "[": "]",
  "]": "[",
  "{": "}",
  "}": "{",
  "<": ">",
  ">": "<",
};

/** Swaps paired brackets, for viewers that lay out RTL runs without mirroring them. */
export function mirrorBrackets(text: string): string {
  return text.replace(/[()[\]{}<>]/g, (c) => MIRRORED[c] ?? c);
}
