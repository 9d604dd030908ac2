import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../../cli/logging";
import { describeScope, type Scope } from "../../domain/book/model";
import { IOError } from "../../domain/common/errors";
import type { ExportConfig } from "../../infrastructure/config/schema";
import { renderDocx } from "../../infrastructure/docx/render-docx";
import type { BookStore } from "../../infrastructure/store/sqlite-store";
import { buildExportDocument, type DocumentStats } from "./build-document";

export type ExportRequest = {
  store: BookStore;
  promptName: string;
  scope: Scope;
  showOriginal: boolean;
  config: ExportConfig;
  /** Relative names land in `config.outputDir`. */
  fileName?: string;
  logger: Logger;
};

export type ExportSummary = DocumentStats & { path: string };

function safeName(name: string): string {
  return name.replace(/[^\p{L}\p{N}_-]+/gu, "_");
}

/**
 * `chapter3_literal_with_original.docx`, `ch3_sec1_literal_only.docx`,
 * `book_literal_with_original.docx`.
 */
export function defaultExportFileName(
  scope: Scope,
  promptName: string,
  showOriginal: boolean,
): string {
  const prefix =
    scope.kind === "all"
      ? "book"
      : scope.kind === "chapter"
        ? `chapter${scope.chapter}`
        : `ch${scope.chapter}_sec${scope.section}`;
  const suffix = showOriginal ? "with_original" : "only";
  return `${prefix}_${safeName(promptName)}_${suffix}.docx`;
}

export async function exportDocument(req: ExportRequest): Promise<ExportSummary> {
  const { config, logger } = req;
  const { document, stats } = buildExportDocument(req.store, {
    promptName: req.promptName,
    scope: req.scope,
    showOriginal: req.showOriginal,
    labels: config.labels,
    placeholder: config.placeholder,
    emptySection: config.emptySection,
    title: config.title,
    subtitle: config.subtitle,
  });

  if (stats.translated === 0) {
    logger.warn(`No "${req.promptName}" translations in ${describeScope(req.scope)}`);
  }

  const bytes = renderDocx(document, {
    font: config.font,
    fontSize: config.fontSize,
    rtl: config.rtl,
    mirrorBrackets: config.mirrorBrackets,
  });

  const fileName =
    req.fileName ?? defaultExportFileName(req.scope, req.promptName, req.showOriginal);
  const target = path.resolve(config.outputDir, fileName);
  try {
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, bytes);
  } catch (error) {
    throw new IOError(`Failed to write ${target}`, error, target);
  }

  logger.info(
    `Wrote ${target}: ${stats.rows} rows, ${stats.translated} translated, ${stats.missing} missing`,
  );
  return { path: target, ...stats };
}
