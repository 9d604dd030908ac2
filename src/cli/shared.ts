import { existsSync } from "node:fs";
import type { Command } from "commander";
import { z } from "zod";
import type { Scope } from "../domain/book/model";
import { AppError, toAppError } from "../domain/common/errors";
import { loadConfig } from "../infrastructure/config/load";
import type { AppConfig, LogLevel } from "../infrastructure/config/schema";
import { BookStore } from "../infrastructure/store/sqlite-store";
import { ExitCode, exitCodeFor } from "./exit-codes";
import { createLogger, type Logger } from "./logging";

export const CommonOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export const scopeOptionShape = {
  chapter: z.coerce.number().int().positive().optional(),
  section: z.coerce.number().int().positive().optional(),
};

export function sectionNeedsChapter(o: { chapter?: number; section?: number }): boolean {
  return o.section === undefined || o.chapter !== undefined;
}

export const SECTION_NEEDS_CHAPTER = {
  message: "--section requires --chapter",
  path: ["section"],
};

export function toScope(opts: { chapter?: number; section?: number }): Scope {
  if (opts.chapter === undefined) return { kind: "all" };
  if (opts.section === undefined) return { kind: "chapter", chapter: opts.chapter };
  return { kind: "section", chapter: opts.chapter, section: opts.section };
}

/** Used when `--config` is not given and the file exists in the working directory. */
export const DEFAULT_CONFIG_FILE = "config.yaml";

export function withCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", `Path to YAML/JSON config file (default: ./${DEFAULT_CONFIG_FILE} if present)`)
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)");
}

export function withScopeOptions(command: Command): Command {
  return command
    .option("--chapter <n>", "Only this chapter (1-based)")
    .option("--section <n>", "Only this section of --chapter (1-based)");
}

export type CommandContext = {
  config: AppConfig;
  logger: Logger;
  /** Results go here; logs go to stderr. */
  out: (line: string) => void;
};

function logLevelFor(opts: { verbose?: boolean; debug?: boolean }): LogLevel | undefined {
  if (opts.debug) return "debug";
  if (opts.verbose) return "info";
  return undefined;
}

/**
 * Validates the raw commander options, loads the config and runs `fn`.
 * Failures set `process.exitCode` instead of exiting, so a programmatic
 * `parseAsync` returns.
 */
export async function runAction<S extends z.ZodTypeAny>(
  rawOpts: unknown,
  schema: S,
  fn: (args: z.output<S>, ctx: CommandContext) => Promise<ExitCode | void>,
): Promise<void> {
  const parsed = schema.safeParse(rawOpts);
  if (!parsed.success) {
    console.error(parsed.error.issues.map((i) => i.message).join("\n"));
    process.exitCode = ExitCode.usage;
    return;
  }
  const common = CommonOptionsSchema.parse(rawOpts);

  try {
    const config = await loadConfig({
      configPath: common.config ?? (existsSync(DEFAULT_CONFIG_FILE) ? DEFAULT_CONFIG_FILE : undefined),
      overrides: { logLevel: logLevelFor(common) },
    });
    const logger = createLogger(config);
    const code = await fn(parsed.data, { config, logger, out: (line) => console.log(line) });
    process.exitCode = code ?? ExitCode.success;
  } catch (error) {
    const appError = toAppError(error);
    if (common.debug) {
      console.error(appError.stack ?? appError.message);
      if (appError.cause instanceof Error && !(appError.cause instanceof AppError)) {
        console.error(`caused by: ${appError.cause.stack ?? appError.cause.message}`);
      }
    } else {
      console.error(`error: ${appError.message}`);
    }
    process.exitCode = exitCodeFor(appError);
  }
}

/** Opens the configured store, runs `fn` and closes the store again. */
export async function withStore<T>(
  config: AppConfig,
  fn: (store: BookStore) => Promise<T> | T,
): Promise<T> {
  const store = new BookStore(config.database.path);
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}
