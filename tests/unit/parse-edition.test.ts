import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  lineColumnAt,
  parseBookJson,
  readBookEdition,
} from "../../src/application/import/parse-edition";
import { InputFormatError, IOError } from "../../src/domain/common/errors";
import { TWO_SECTIONS_PATH } from "../fixtures/editions";

function parseError(raw: string): InputFormatError {
  try {
    parseBookJson(raw, "book.json");
  } catch (error) {
    if (error instanceof InputFormatError) return error;
    throw error;
  }
  throw new Error("expected parseBookJson to throw");
}

describe("lineColumnAt", () => {
  it("is 1-based", () => {
    expect(lineColumnAt("ab\ncd", 0)).toEqual({ line: 1, column: 1 });
    expect(lineColumnAt("ab\ncd", 4)).toEqual({ line: 2, column: 2 });
  });
});

describe("parseBookJson", () => {
  it("fills schema defaults", () => {
    const edition = parseBookJson('{"text": {"A": ["x"]}}');
    expect(edition.text).toEqual({ A: ["x"] });
    expect(edition.schema.nodes).toEqual([]);
  });

  it("reports where truncated JSON ends", () => {
    const error = parseError('{\n"text": {\n');
    expect(error.kind).toBe("input");
    expect(error.location).toEqual({ line: 3, column: 1 });
    expect(error.message).toMatch(/^Malformed JSON in book\.json at line 3, column 1: /);
  });

  it("reports the JSON path of a value with the wrong shape", () => {
    expect(parseError('{"text": {"A": [1]}}').location).toEqual({ path: "text.A" });
    expect(parseError('{"title": "x"}').location).toEqual({ path: "text" });
  });
});

describe("readBookEdition", () => {
  it("reads an edition from disk", async () => {
    const edition = await readBookEdition(TWO_SECTIONS_PATH);
    expect(Object.keys(edition.text)).toEqual(["Gate One"]);
  });

  it("wraps read failures", async () => {
    const missing = path.join(os.tmpdir(), "folio-trans-missing", "none.json");
    await expect(readBookEdition(missing)).rejects.toBeInstanceOf(IOError);
  });
});
