import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  LlmClient,
} from "../../src/infrastructure/llm/types";

type Reply = string | Error | ((request: ChatCompletionRequest) => string);

/** An in-process completion service: replies are taken in order, the last one repeats. */
export class FakeClient implements LlmClient {
  readonly provider = "openai" as const;
  readonly requests: ChatCompletionRequest[] = [];
  private readonly replies: Reply[];

  /** Reported with every completion. */
  finishReason = "stop";

  usage?: ChatCompletionResponse["usage"];

  constructor(...replies: Reply[]) {
    this.replies = replies.length > 0 ? replies : [""];
  }

  get calls(): number {
    return this.requests.length;
  }

  async chatComplete(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    this.requests.push(request);
    const reply = this.replies[Math.min(this.requests.length, this.replies.length) - 1];
    if (reply instanceof Error) throw reply;
    const content = typeof reply === "function" ? reply(request) : (reply ?? "");
    return {
      provider: this.provider,
      model: request.model,
      content,
      finishReason: this.finishReason,
      usage: this.usage,
    };
  }
}
