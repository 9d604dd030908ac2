import type { Logger } from "../../cli/logging";
import { describeScope, type LocatedParagraph, type Scope } from "../../domain/book/model";
import { ProviderError, toAppError } from "../../domain/common/errors";
import type { PromptConfig } from "../../infrastructure/config/schema";
import { isTruncated, type LlmClient } from "../../infrastructure/llm/types";
import type { BookStore } from "../../infrastructure/store/sqlite-store";
import { buildTranslationMessages } from "../../prompts/translate";

export type TranslateRequest = {
  store: BookStore;
  client: LlmClient;
  /** Catalog name of the prompt. */
  promptName: string;
  prompt: PromptConfig;
  /** Used when the prompt does not name a model. */
  defaultModel: string;
  scope: Scope;
  logger: Logger;
  /** Re-translate paragraphs that already have a translation (the row is replaced). */
  force?: boolean;
  /** Stop after this many completion requests. */
  limit?: number;
  /** Prompt name the translations are stored under; defaults to `promptName`. */
  storageName?: string;
};

export type TranslateFailure = {
  paragraphId: number;
  location: string;
  error: string;
};

export type TranslateSummary = {
  promptName: string;
  total: number;
  translated: number;
  skipped: number;
  failed: number;
  /** Paragraphs left untouched because `limit` was reached. */
  deferred: number;
  failures: TranslateFailure[];
};

function locate(p: LocatedParagraph): string {
  const section = p.sectionNumber === null ? "" : `, section ${p.sectionNumber}`;
  return `chapter ${p.chapterNumber}${section}, paragraph ${p.number}`;
}

async function requestTranslation(
  req: TranslateRequest,
  paragraph: LocatedParagraph,
  model: string,
): Promise<{ text: string; model: string }> {
  const response = await req.client.chatComplete({
    model,
    messages: buildTranslationMessages(req.prompt, {
      text: paragraph.text,
      chapter: paragraph.chapterTitle,
      section: paragraph.sectionTitle,
      number: paragraph.number,
    }),
    temperature: req.prompt.temperature,
    maxTokens: req.prompt.maxTokens,
  });
  if (response.usage) {
    const { promptTokens, completionTokens } = response.usage;
    req.logger.debug(`Tokens: ${promptTokens ?? "?"} prompt, ${completionTokens ?? "?"} completion`);
  }
  // a cut-off answer would be stored as if complete
  if (isTruncated(response)) {
    throw new ProviderError({
      provider: req.client.provider,
      retryable: false,
      message: `Completion truncated at ${req.prompt.maxTokens} tokens; raise maxTokens for this prompt`,
    });
  }
  const text = response.content.trim();
  if (text.length === 0) {
    throw new ProviderError({
      provider: req.client.provider,
      retryable: false,
      message: `Empty completion (finish reason: ${response.finishReason ?? "unknown"})`,
    });
  }
  return { text, model: response.model };
}

/**
 * Translates every paragraph in scope that has no translation under the
 * storage name yet, one request per paragraph. Failures are recorded and
 * the run moves on.
 */
export async function translateParagraphs(
  req: TranslateRequest,
): Promise<TranslateSummary> {
  const { store, logger } = req;
  const storageName = req.storageName ?? req.promptName;
  const model = req.prompt.model ?? req.defaultModel;

  const paragraphs = store.listParagraphs(req.scope);
  const existing = store.translationsFor(storageName, req.scope);
  const summary: TranslateSummary = {
    promptName: storageName,
    total: paragraphs.length,
    translated: 0,
    skipped: 0,
    failed: 0,
    deferred: 0,
    failures: [],
  };

  logger.info(
    `Translating ${describeScope(req.scope)} with prompt "${req.promptName}" (${model}), storing as "${storageName}"`,
  );

  let requests = 0;
  for (const [index, paragraph] of paragraphs.entries()) {
    if (!req.force && existing.has(paragraph.id)) {
      summary.skipped++;
      continue;
    }
    if (req.limit !== undefined && requests >= req.limit) {
      summary.deferred++;
      continue;
    }
    requests++;

    const where = locate(paragraph);
    logger.debug(`Translating ${where} (${paragraph.text.length} chars)`);
    try {
      const result = await requestTranslation(req, paragraph, model);
      store.saveTranslation(
        {
          paragraphId: paragraph.id,
          promptName: storageName,
          text: result.text,
          model: result.model,
        },
        { replace: req.force },
      );
      summary.translated++;
      logger.info(`[${index + 1}/${paragraphs.length}] ${where} translated`);
    } catch (error) {
      const appError = toAppError(error);
      summary.failed++;
      summary.failures.push({ paragraphId: paragraph.id, location: where, error: appError.message });
      logger.error(`${where} failed: ${appError.message}`);
    }
  }

  return summary;
}
