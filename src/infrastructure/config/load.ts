import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, NotFoundError, ValidationError } from "../../domain/common/errors";
import { AppConfigSchema, type AppConfig, type PromptConfig } from "./schema";

export type ConfigOverrides = {
  [key: string]: unknown;
};

export type LoadConfigArgs = {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
};

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: UnknownRecord, next: UnknownRecord): UnknownRecord {
  const out: UnknownRecord = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const prior = out[key];
    if (isRecord(prior) && isRecord(value)) {
      out[key] = deepMerge(prior, value);
    } else if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

/** Drops keys whose value is undefined, and objects left empty by that. */
function prune(value: UnknownRecord): UnknownRecord | undefined {
  const out: UnknownRecord = {};
  for (const [key, v] of Object.entries(value)) {
    if (v === undefined) continue;
    if (isRecord(v)) {
      const inner = prune(v);
      if (inner) out[key] = inner;
      continue;
    }
    out[key] = v;
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function envReader(env: NodeJS.ProcessEnv) {
  const str = (name: string): string | undefined => {
    const v = env[name];
    return v && v.trim().length > 0 ? v : undefined;
  };
  const int = (name: string): number | undefined => {
    const raw = str(name);
    if (!raw) return undefined;
    const n = Number(raw);
    return Number.isFinite(n) ? Math.trunc(n) : undefined;
  };
  return { str, int };
}

function configFromEnv(env: NodeJS.ProcessEnv): UnknownRecord {
  const { str, int } = envReader(env);

  const envConfig: UnknownRecord = {
    logLevel: str("LOG_LEVEL"),
    provider: str("LLM_PROVIDER"),
    providers: {
      openai: {
        apiKey: str("OPENAI_API_KEY"),
        baseUrl: str("OPENAI_BASE_URL"),
        organization: str("OPENAI_ORG_ID"),
        model: str("OPENAI_MODEL"),
        timeoutMs: int("OPENAI_TIMEOUT_MS"),
        maxRetries: int("OPENAI_MAX_RETRIES"),
      },
      openrouter: {
        apiKey: str("OPENROUTER_API_KEY"),
        baseUrl: str("OPENROUTER_BASE_URL"),
        model: str("OPENROUTER_MODEL"),
        timeoutMs: int("OPENROUTER_TIMEOUT_MS"),
        maxRetries: int("OPENROUTER_MAX_RETRIES"),
      },
    },
    database: {
      path: str("DATABASE_PATH"),
    },
    export: {
      outputDir: str("OUTPUT_DIR"),
    },
  };

  return prune(envConfig) ?? {};
}

async function readConfigFile(configPath: string): Promise<UnknownRecord> {
  const abs = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${abs}`, error);
  }

  const ext = path.extname(abs).toLowerCase();
  try {
    if (ext === ".yaml" || ext === ".yml") {
      const parsed: unknown = YAML.parse(raw);
      return isRecord(parsed) ? parsed : {};
    }
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${abs}`, error);
  }
}

export async function loadConfig(
  args: LoadConfigArgs = {},
): Promise<AppConfig> {
  const fileConfig = args.configPath
    ? await readConfigFile(args.configPath)
    : {};
  const envConfig = configFromEnv(args.env ?? process.env);
  const overrides = prune(args.overrides ?? {}) ?? {};
  const merged = deepMerge(deepMerge(fileConfig, envConfig), overrides);

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ValidationError(
      `Invalid configuration:\n${issues}`,
      parsed.error,
    );
  }
  return parsed.data;
}

export function getPrompt(config: AppConfig, name: string): PromptConfig {
  const prompt = config.prompts[name];
  if (!prompt) {
    const available = Object.keys(config.prompts);
    throw new NotFoundError(
      `Prompt "${name}" not found. Available prompts: ${available.length > 0 ? available.join(", ") : "(none configured)"}`,
    );
  }
  return prompt;
}
