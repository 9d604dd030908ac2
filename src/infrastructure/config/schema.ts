import { z } from "zod";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("info");

export const ProviderNameSchema = z.enum(["openai", "openrouter"]);

export const ProviderOpenAiSchema = z.object({
  /** Only required once a translate run builds a client. */
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default("https://api.openai.com/v1"),
  organization: z.string().min(1).optional(),
  model: z.string().min(1).default("gpt-4o"),
  timeoutMs: z.number().int().positive().default(120_000),
  maxRetries: z.number().int().min(0).default(3),
});

export const ProviderOpenRouterSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default("https://openrouter.ai/api/v1"),
  model: z.string().min(1).default("openai/gpt-4o"),
  timeoutMs: z.number().int().positive().default(120_000),
  maxRetries: z.number().int().min(0).default(3),
  app: z
    .object({
      httpReferer: z.string().url().optional(),
      title: z.string().min(1).optional(),
    })
    .default({}),
});

export const RetrySchema = z.object({
  baseMs: z.number().int().min(0).default(1_000),
  maxMs: z.number().int().positive().default(30_000),
  jitter: z.number().min(0).max(1).default(0.2),
});

export const DatabaseSchema = z.object({
  path: z.string().min(1).default("data/folio.db"),
});

// English defaults; override them in the edition's own language.
export const ImportSchema = z.object({
  /** Titles used when neither the schema block nor the inline label names a node. */
  placeholders: z
    .object({
      chapter: z.string().min(1).default("Chapter {n}"),
      section: z.string().min(1).default("Section {n}"),
    })
    .default({}),
});

export const PromptSchema = z.object({
  description: z.string().default(""),
  systemPrompt: z.string().min(1),
  /** `{text}` is replaced by the paragraph; `{chapter}`, `{section}`, `{number}` by its location. */
  userTemplate: z.string().min(1).default("{text}"),
  /** Falls back to the active provider's model. */
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().default(4_000),
});

export const ExportSchema = z.object({
  outputDir: z.string().min(1).default("output"),
  font: z.string().min(1).default("David"),
  /** Points. */
  fontSize: z.number().positive().default(12),
  rtl: z.boolean().default(true),
  mirrorBrackets: z.boolean().default(false),
  placeholder: z.string().min(1).default("(not yet translated)"),
  emptySection: z.string().min(1).default("(no paragraphs in this section)"),
  labels: z
    .object({
      number: z.string().min(1).default("#"),
      original: z.string().min(1).default("Original"),
      translation: z.string().min(1).default("Translation"),
    })
    .default({}),
  title: z.string().min(1).optional(),
  subtitle: z.string().min(1).optional(),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  provider: ProviderNameSchema.default("openai"),
  providers: z
    .object({
      openai: ProviderOpenAiSchema.default({}),
      openrouter: ProviderOpenRouterSchema.optional(),
    })
    .default({}),
  retry: RetrySchema.default({}),
  database: DatabaseSchema.default({}),
  import: ImportSchema.default({}),
  prompts: z.record(z.string().min(1), PromptSchema).default({}),
  export: ExportSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PromptConfig = z.infer<typeof PromptSchema>;
export type ExportConfig = z.infer<typeof ExportSchema>;
export type LogLevel = AppConfig["logLevel"];
