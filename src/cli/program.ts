import { Command } from "commander";
import { registerExportCommand } from "./commands/export";
import { registerImportCommand } from "./commands/import";
import { registerPromptsCommand } from "./commands/prompts";
import { registerStatsCommand } from "./commands/stats";
import { registerTranslateCommand } from "./commands/translate";

export function createProgram(): Command {
  const program = new Command();

  const version = process.env.npm_package_version ?? "0.1.0";
  program
    .name("folio-trans")
    .description("Import a structured book, translate it paragraph by paragraph, export bilingual DOCX")
    .version(version);

  registerImportCommand(program);
  registerTranslateCommand(program);
  registerExportCommand(program);
  registerStatsCommand(program);
  registerPromptsCommand(program);

  return program;
}
