import { readFile } from "node:fs/promises";
import { BookEditionSchema, type BookEdition } from "../../domain/book/edition";
import { InputFormatError, IOError } from "../../domain/common/errors";

/** 1-based line and column of a character offset. */
export function lineColumnAt(raw: string, offset: number): { line: number; column: number } {
  const before = raw.slice(0, Math.max(0, offset));
  const lines = before.split("\n");
  const last = lines[lines.length - 1] ?? "";
  return { line: lines.length, column: last.length + 1 };
}

function syntaxErrorOffset(raw: string, error: SyntaxError): number | undefined {
  const position = /position (\d+)/.exec(error.message);
  if (position?.[1]) return Number(position[1]);
  const lineCol = /line (\d+) column (\d+)/.exec(error.message);
  if (lineCol?.[1] && lineCol[2]) {
    const lines = raw.split("\n").slice(0, Number(lineCol[1]) - 1);
    return lines.reduce((n, l) => n + l.length + 1, 0) + Number(lineCol[2]) - 1;
  }
  if (/unexpected end/i.test(error.message)) return raw.length;
  return undefined;
}

/**
 * Parses a JSON edition. Syntax errors report line and column; shape errors
 * report the JSON path of the first offending value.
 */
export function parseBookJson(raw: string, source = "<input>"): BookEdition {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    const offset = syntaxErrorOffset(raw, error);
    const location = offset === undefined ? undefined : lineColumnAt(raw, offset);
    throw new InputFormatError({
      message: location
        ? `Malformed JSON in ${source} at line ${location.line}, column ${location.column}: ${error.message}`
        : `Malformed JSON in ${source}: ${error.message}`,
      source,
      location,
      cause: error,
    });
  }

  const parsed = BookEditionSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const jsonPath = issue ? issue.path.join(".") || "(root)" : "(root)";
    throw new InputFormatError({
      message: `Unexpected document shape in ${source} at ${jsonPath}: ${issue?.message ?? "invalid"}`,
      source,
      location: { path: jsonPath },
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export async function readBookEdition(filePath: string): Promise<BookEdition> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new IOError(`Failed to read edition: ${filePath}`, error, filePath);
  }
  return parseBookJson(raw, filePath);
}
