import type { Command } from "commander";
import { z } from "zod";
import { exportDocument } from "../../application/export/export-usecase";
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

const ExportArgsSchema = CommonOptionsSchema.extend({
  ...scopeOptionShape,
  prompt: z.string().min(1),
  // commander sets this from --no-original
  original: z.boolean().default(true),
  output: z.string().min(1).optional(),
}).refine(sectionNeedsChapter, SECTION_NEEDS_CHAPTER);

export function registerExportCommand(program: Command): void {
  withCommonOptions(
    withScopeOptions(
      program
        .command("export")
        .description("Write stored translations to a DOCX file")
        .requiredOption("-p, --prompt <name>", "Prompt name the translations are stored under")
        .option("--no-original", "Leave out the original text column")
        .option("-o, --output <file>", "File name (relative names go to the output directory)"),
    ),
  ).action((opts) =>
    runAction(opts, ExportArgsSchema, async (args, { config, logger, out }) => {
      const summary = await withStore(config, (store) =>
        exportDocument({
          store,
          promptName: args.prompt,
          scope: toScope(args),
          showOriginal: args.original,
          config: config.export,
          fileName: args.output,
          logger,
        }),
      );
      out(summary.path);
      out(
        `${summary.chapters} chapters, ${summary.sections} sections, ${summary.rows} rows (${summary.translated} translated, ${summary.missing} missing)`,
      );
    }),
  );
}
