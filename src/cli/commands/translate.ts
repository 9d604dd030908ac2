import type { Command } from "commander";
import { z } from "zod";
import { translateParagraphs } from "../../application/translate/translate-usecase";
import { getPrompt } from "../../infrastructure/config/load";
import { createCompletionService } from "../../infrastructure/llm/factory";
import { ExitCode } from "../exit-codes";
import {
  CommonOptionsSchema,
  SECTION_NEEDS_CHAPTER,
  runAction,
  scopeOptionShape,
  sectionNeedsChapter,
  toScope,
  withCommonOptions,
  withScopeOptions,
  withStore,
} from "../shared";

const TranslateArgsSchema = CommonOptionsSchema.extend({
  ...scopeOptionShape,
  prompt: z.string().min(1),
  force: z.boolean().optional(),
  limit: z.coerce.number().int().positive().optional(),
  storageName: z.string().min(1).optional(),
}).refine(sectionNeedsChapter, SECTION_NEEDS_CHAPTER);

export function registerTranslateCommand(program: Command): void {
  withCommonOptions(
    withScopeOptions(
      program
        .command("translate")
        .description("Translate stored paragraphs with a named prompt")
        .requiredOption("-p, --prompt <name>", "Prompt from the catalog (see `prompts`)")
        .option("--force", "Re-translate paragraphs that already have a translation")
        .option("--limit <n>", "Send at most this many requests")
        .option("--storage-name <name>", "Store translations under this name instead of the prompt's"),
    ),
  ).action((opts) =>
    runAction(opts, TranslateArgsSchema, async (args, { config, logger, out }) => {
      const prompt = getPrompt(config, args.prompt);
      const { client, defaultModel } = createCompletionService(config, logger);

      const summary = await withStore(config, (store) =>
        translateParagraphs({
          store,
          client,
          promptName: args.prompt,
          prompt,
          defaultModel,
          scope: toScope(args),
          logger,
          force: args.force,
          limit: args.limit,
          storageName: args.storageName,
        }),
      );

      out(
        `"${summary.promptName}": ${summary.translated} translated, ${summary.skipped} already done, ${summary.failed} failed, ${summary.deferred} deferred (of ${summary.total})`,
      );
      for (const failure of summary.failures) {
        out(`  ${failure.location}: ${failure.error}`);
      }
      return summary.failed > 0 ? ExitCode.partial : ExitCode.success;
    }),
  );
}
