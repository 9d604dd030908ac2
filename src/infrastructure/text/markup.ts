const ENTITIES: Record<string, string> = {
  nbsp: " ",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  thinsp: " ",
};

const MAX_CODE_POINT = 0x10ffff;

/** Out-of-range references are kept as written. */
function fromCodePoint(match: string, codePoint: number): string {
  return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : match;
}

function decodeEntities(input: string): string {
  return input
    .replace(/&#x([0-9a-f]+);/gi, (match, hex: string) =>
      fromCodePoint(match, Number.parseInt(hex, 16)),
    )
    .replace(/&#(\d+);/g, (match, dec: string) =>
      fromCodePoint(match, Number.parseInt(dec, 10)),
    )
    .replace(/&([a-z]+);/gi, (match, name: string) => {
      const decoded = ENTITIES[name.toLowerCase()];
      return decoded ?? match;
    })
    // last, so "&amp;lt;" stays "&lt;"
    .replace(/&amp;/gi, "&");
}

/**
 * Inline markup to plain text. Tag content is kept, the tags go; line breaks
 * and block boundaries become a single space.
 */
export function stripMarkup(input: string): string {
  const text = input
    .replace(/<br\s*\/?>/gi, " ")
    .replace(/<\/(p|div|li|h[1-6])>/gi, " ")
    .replace(/<[^>]+>/g, "");
  return normalizeWhitespace(decodeEntities(text));
}

export function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}
