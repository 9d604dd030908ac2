import type { Command } from "commander";
import { z } from "zod";
import { importBook } from "../../application/import/import-usecase";
import { readBookEdition } from "../../application/import/parse-edition";
import { ExitCode } from "../exit-codes";
import { CommonOptionsSchema, runAction, withCommonOptions, withStore } from "../shared";

const ImportArgsSchema = CommonOptionsSchema.extend({
  input: z.string().min(1),
  reset: z.boolean().optional(),
});

export function registerImportCommand(program: Command): void {
  withCommonOptions(
    program
      .command("import")
      .description("Load a JSON edition into the local store")
      .requiredOption("-i, --input <path>", "Edition JSON file")
      .option("--reset", "Clear the store before importing"),
  ).action((opts) =>
    runAction(opts, ImportArgsSchema, async (args, { config, logger, out }) => {
      const edition = await readBookEdition(args.input);
      const summary = await withStore(config, (store) =>
        importBook(store, edition, {
          reset: args.reset,
          placeholders: config.import.placeholders,
          logger,
        }),
      );

      out(
        `Imported ${summary.chapters} chapters, ${summary.sections} sections, ${summary.paragraphs} paragraphs`,
      );
      if (summary.skippedEmpty > 0) out(`Skipped ${summary.skippedEmpty} empty paragraphs`);
      if (summary.titleFallbacks > 0) out(`${summary.titleFallbacks} titles were not found in the schema`);
      for (const failure of summary.failures) {
        out(`Chapter "${failure.chapter}" failed: ${failure.error}`);
      }
      return summary.failedChapters > 0 ? ExitCode.partial : ExitCode.success;
    }),
  );
}
