import { ChatCompletionsClient } from "./chat-completions";

export type OpenRouterClientConfig = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  httpReferer?: string;
  title?: string;
};

export class OpenRouterClient extends ChatCompletionsClient {
  readonly provider = "openrouter" as const;

  constructor(config: OpenRouterClientConfig) {
    super({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      headers: {
        ...(config.httpReferer ? { "HTTP-Referer": config.httpReferer } : {}),
        ...(config.title ? { "X-Title": config.title } : {}),
      },
    });
  }
}
