import { describe, expect, it } from "vitest";
import { normalizeWhitespace, stripMarkup } from "../../src/infrastructure/text/markup";

describe("stripMarkup", () => {
  it("keeps tag content and drops the tags", () => {
    expect(stripMarkup("First <b>bold</b> paragraph")).toBe("First bold paragraph");
    expect(stripMarkup('<span class="x">a</span><i>b</i>')).toBe("ab");
  });

  it("turns line breaks and block ends into spaces", () => {
    expect(stripMarkup("a<br>b<br/>c<BR />d")).toBe("a b c d");
    expect(stripMarkup("<p>one</p><p>two</p>")).toBe("one two");
  });

  it("decodes entities", () => {
    expect(stripMarkup("A &amp; B &lt;tag&gt; &#1488;&#x5D1;")).toBe("A & B <tag> אב");
    expect(stripMarkup("x&nbsp;y")).toBe("x y");
  });

  it("does not decode twice", () => {
    expect(stripMarkup("&amp;lt;")).toBe("&lt;");
  });

  it("keeps numeric references beyond the Unicode range as written", () => {
    expect(stripMarkup("before &#1114112; after")).toBe("before &#1114112; after");
    expect(stripMarkup("x &#x110000; y &#x10FFFF;")).toBe("x &#x110000; y \u{10FFFF}");
  });

  it("leaves unknown entities alone", () => {
    expect(stripMarkup("&bogus; text")).toBe("&bogus; text");
  });

  it("yields an empty string for markup-only input", () => {
    expect(stripMarkup('<span class="x">   </span>')).toBe("");
  });
});

describe("normalizeWhitespace", () => {
  it("collapses runs and trims", () => {
    expect(normalizeWhitespace("  a \n\t b  ")).toBe("a b");
  });
});
