import { ProviderError } from "../../../domain/common/errors";
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  LlmClient,
  ProviderName,
} from "../types";

type ChatCompletionBody = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  max_completion_tokens?: number;
};

type ChatCompletionWireResponse = {
  model?: string;
  choices?: Array<{
    message?: { role: string; content?: string | null; refusal?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
  error?: { code?: number | string; message?: string };
};

export type ChatCompletionsClientConfig = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
};

export function joinUrl(baseUrl: string, pathname: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const suffix = pathname.startsWith("/") ? pathname : `/${pathname}`;
  return `${base}${suffix}`;
}

/**
 * Reasoning model families take `max_completion_tokens` and reject a custom
 * temperature.
 */
export function isReasoningModel(model: string): boolean {
  const name = model.includes("/") ? model.slice(model.lastIndexOf("/") + 1) : model;
  return /^(o1|o3|o4|gpt-5)/.test(name);
}

export function buildChatCompletionBody(
  request: ChatCompletionRequest,
): ChatCompletionBody {
  if (isReasoningModel(request.model)) {
    return {
      model: request.model,
      messages: request.messages,
      max_completion_tokens: request.maxTokens,
    };
  }
  return {
    model: request.model,
    messages: request.messages,
    temperature: request.temperature,
    max_tokens: request.maxTokens,
  };
}

async function readJson(res: Response): Promise<ChatCompletionWireResponse | undefined> {
  const text = await res.text();
  if (text.trim().length === 0) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === "object" && parsed !== null
      ? (parsed as ChatCompletionWireResponse)
      : undefined;
  } catch {
    return undefined;
  }
}

/** A client for any endpoint speaking the OpenAI chat-completions wire format. */
export abstract class ChatCompletionsClient implements LlmClient {
  abstract readonly provider: ProviderName;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  protected constructor(config: ChatCompletionsClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs;
    this.headers = config.headers ?? {};
  }

  async chatComplete(
    request: ChatCompletionRequest,
  ): Promise<ChatCompletionResponse> {
    const url = joinUrl(this.baseUrl, "/chat/completions");
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json",
          ...this.headers,
        },
        body: JSON.stringify(buildChatCompletionBody(request)),
        signal: controller.signal,
      });

      const json = await readJson(res);

      if (!res.ok) {
        throw new ProviderError({
          provider: this.provider,
          statusCode: res.status,
          retryable: res.status === 408 || res.status === 429 || res.status >= 500,
          message:
            json?.error?.message ?? `${this.provider} request failed (${res.status})`,
          cause: json,
        });
      }

      if (!json) {
        throw new ProviderError({
          provider: this.provider,
          retryable: true,
          message: `${this.provider} returned an unreadable response body`,
        });
      }

      if (json.error) {
        throw new ProviderError({
          provider: this.provider,
          retryable: true,
          message: json.error.message ?? `${this.provider} returned an error`,
          cause: json,
        });
      }

      const choice = json.choices?.[0];
      if (choice?.message?.refusal) {
        throw new ProviderError({
          provider: this.provider,
          retryable: false,
          message: `Model refused: ${choice.message.refusal}`,
          cause: json,
        });
      }

      return {
        provider: this.provider,
        model: json.model ?? request.model,
        content: choice?.message?.content ?? "",
        finishReason: choice?.finish_reason ?? undefined,
        usage: json.usage
          ? {
              promptTokens: json.usage.prompt_tokens,
              completionTokens: json.usage.completion_tokens,
              totalTokens: json.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      const timedOut = controller.signal.aborted;
      throw new ProviderError({
        provider: this.provider,
        retryable: true,
        message: timedOut
          ? `${this.provider} request timed out after ${this.timeoutMs}ms`
          : `${this.provider} request failed`,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
