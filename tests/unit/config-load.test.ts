import { describe, expect, it } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { getPrompt, loadConfig } from "../../src/infrastructure/config/load";
import { ConfigError, NotFoundError, ValidationError } from "../../src/domain/common/errors";

describe("loadConfig", () => {
  it("applies defaults with no file and no environment", async () => {
    const cfg = await loadConfig({ env: {} });
    expect(cfg.logLevel).toBe("info");
    expect(cfg.provider).toBe("openai");
    expect(cfg.providers.openai).toEqual({
      baseUrl: "https://api.openai.com/v1",
      model: "gpt-4o",
      timeoutMs: 120_000,
      maxRetries: 3,
    });
    expect(cfg.providers.openrouter).toBeUndefined();
    expect(cfg.database.path).toBe("data/folio.db");
    expect(cfg.export.labels).toEqual({ number: "#", original: "Original", translation: "Translation" });
    expect(cfg.prompts).toEqual({});
    expect(cfg.import.placeholders).toEqual({ chapter: "Chapter {n}", section: "Section {n}" });
  });

  it("loads YAML config and validates", async () => {
    const configPath = path.join(await writeTempDir(), "cfg.yaml");
    await writeFile(
      configPath,
      [
        "logLevel: warn",
        "providers:",
        "  openai:",
        "    apiKey: test-secret",
        "    maxRetries: 0",
        "prompts:",
        "  literal:",
        "    description: Close rendering",
        "    systemPrompt: Translate literally.",
        "    temperature: 0.2",
        "export:",
        "  rtl: false",
        "",
      ].join("\n"),
      "utf8",
    );

    const cfg = await loadConfig({ configPath, env: {} });
    expect(cfg.logLevel).toBe("warn");
    expect(cfg.providers.openai.apiKey).toBe("test-secret");
    expect(cfg.providers.openai.maxRetries).toBe(0);
    expect(cfg.export.rtl).toBe(false);
    expect(getPrompt(cfg, "literal")).toEqual({
      description: "Close rendering",
      systemPrompt: "Translate literally.",
      userTemplate: "{text}",
      temperature: 0.2,
      maxTokens: 4000,
    });
  });

  it("applies env over file config and overrides over env", async () => {
    const configPath = path.join(await writeTempDir(), "cfg.json");
    await writeFile(
      configPath,
      JSON.stringify({ logLevel: "error", database: { path: "from-file.db" } }),
      "utf8",
    );

    const env = {
      LOG_LEVEL: "debug",
      DATABASE_PATH: "from-env.db",
      OPENAI_TIMEOUT_MS: "5000",
      OPENAI_ORG_ID: "org-test",
      OUTPUT_DIR: "out",
    };
    const cfg = await loadConfig({ configPath, env });
    expect(cfg.logLevel).toBe("debug");
    expect(cfg.database.path).toBe("from-env.db");
    expect(cfg.providers.openai.timeoutMs).toBe(5000);
    expect(cfg.providers.openai.organization).toBe("org-test");
    expect(cfg.export.outputDir).toBe("out");

    const overridden = await loadConfig({ configPath, env, overrides: { logLevel: "silent" } });
    expect(overridden.logLevel).toBe("silent");
  });

  it("ignores undefined overrides", async () => {
    const cfg = await loadConfig({ env: { LOG_LEVEL: "warn" }, overrides: { logLevel: undefined } });
    expect(cfg.logLevel).toBe("warn");
  });

  it("selects OpenRouter from the environment", async () => {
    const cfg = await loadConfig({
      env: { LLM_PROVIDER: "openrouter", OPENROUTER_API_KEY: "test-secret" },
    });
    expect(cfg.provider).toBe("openrouter");
    expect(cfg.providers.openrouter?.apiKey).toBe("test-secret");
    expect(cfg.providers.openrouter?.baseUrl).toBe("https://openrouter.ai/api/v1");
  });

  it("rejects invalid values", async () => {
    await expect(loadConfig({ env: { LOG_LEVEL: "loud" } })).rejects.toBeInstanceOf(ValidationError);
  });

  it("reports unreadable files", async () => {
    const configPath = path.join(await writeTempDir(), "missing.yaml");
    await expect(loadConfig({ configPath, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("getPrompt", () => {
  it("lists the catalog when the prompt is unknown", async () => {
    const cfg = await loadConfig({
      env: {},
      overrides: { prompts: { literal: { systemPrompt: "x" }, modern: { systemPrompt: "y" } } },
    });
    expect(() => getPrompt(cfg, "simplified")).toThrow(NotFoundError);
    expect(() => getPrompt(cfg, "simplified")).toThrow(
      'Prompt "simplified" not found. Available prompts: literal, modern',
    );
  });
});

async function writeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "folio-trans-"));
}
