import type { Logger } from "../../cli/logging";
import { ConfigError } from "../../domain/common/errors";
import type { AppConfig } from "../config/schema";
import { OpenAiClient } from "./providers/openai";
import { OpenRouterClient } from "./providers/openrouter";
import { RetriableClient } from "./retry/retriable-client";
import type { LlmClient } from "./types";

export type CompletionService = {
  client: LlmClient;
  /** Model used when a prompt does not name one. */
  defaultModel: string;
};

/** Builds the configured provider's client, wrapped in the retry policy. */
export function createCompletionService(
  config: AppConfig,
  logger?: Logger,
): CompletionService {
  const backoff = {
    baseMs: config.retry.baseMs,
    maxMs: config.retry.maxMs,
    jitter: config.retry.jitter,
  };

  if (config.provider === "openrouter") {
    const openrouter = config.providers.openrouter;
    if (!openrouter?.apiKey) {
      throw new ConfigError(
        "OpenRouter API key is not configured (set OPENROUTER_API_KEY or providers.openrouter.apiKey)",
      );
    }
    const inner = new OpenRouterClient({
      apiKey: openrouter.apiKey,
      baseUrl: openrouter.baseUrl,
      timeoutMs: openrouter.timeoutMs,
      httpReferer: openrouter.app.httpReferer,
      title: openrouter.app.title,
    });
    return {
      client: new RetriableClient(inner, { maxRetries: openrouter.maxRetries, backoff }, logger),
      defaultModel: openrouter.model,
    };
  }

  const openai = config.providers.openai;
  if (!openai.apiKey) {
    throw new ConfigError(
      "OpenAI API key is not configured (set OPENAI_API_KEY or providers.openai.apiKey)",
    );
  }
  const inner = new OpenAiClient({
    apiKey: openai.apiKey,
    baseUrl: openai.baseUrl,
    timeoutMs: openai.timeoutMs,
    organization: openai.organization,
  });
  return {
    client: new RetriableClient(inner, { maxRetries: openai.maxRetries, backoff }, logger),
    defaultModel: openai.model,
  };
}
