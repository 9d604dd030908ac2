export type ProviderName = "openai" | "openrouter";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  /** Sent as `max_completion_tokens` to reasoning models, `max_tokens` otherwise. */
  maxTokens?: number;
};

export type ChatCompletionResponse = {
  provider: ProviderName;
  /** The model that answered, which may be a dated variant of the one requested. */
  model: string;
  content: string;
  /** `stop`, or `length` when the token budget ran out mid-answer. */
  finishReason?: string;
  usage?: {
    promptTokens?: number;
    completionTokens?: number;
    totalTokens?: number;
  };
};

export interface LlmClient {
  readonly provider: ProviderName;
  chatComplete(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
}

export function isTruncated(response: ChatCompletionResponse): boolean {
  return response.finishReason === "length";
}
