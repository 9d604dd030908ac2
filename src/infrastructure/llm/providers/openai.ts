import { ChatCompletionsClient } from "./chat-completions";

export type OpenAiClientConfig = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  organization?: string;
};

export class OpenAiClient extends ChatCompletionsClient {
  readonly provider = "openai" as const;

  constructor(config: OpenAiClientConfig) {
    super({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      headers: config.organization
        ? { "OpenAI-Organization": config.organization }
        : undefined,
    });
  }
}
