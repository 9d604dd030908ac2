import type { Logger } from "../../../cli/logging";
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  LlmClient,
} from "../types";
import { withRetry, type RetryConfig } from "./retry";

/** Wraps a client so transient failures are retried with backoff. */
export class RetriableClient implements LlmClient {
  readonly provider: LlmClient["provider"];
  private readonly inner: LlmClient;
  private readonly retry: RetryConfig;
  private readonly logger?: Logger;

  constructor(inner: LlmClient, retry: RetryConfig, logger?: Logger) {
    this.inner = inner;
    this.provider = inner.provider;
    this.retry = retry;
    this.logger = logger;
  }

  async chatComplete(
    request: ChatCompletionRequest,
  ): Promise<ChatCompletionResponse> {
    return withRetry(() => this.inner.chatComplete(request), {
      ...this.retry,
      onRetry: (info) => {
        const reason = info.error instanceof Error ? info.error.message : String(info.error);
        this.logger?.warn(
          `${this.provider} request failed (attempt ${info.attempt}/${this.retry.maxRetries + 1}), retrying in ${info.delayMs}ms: ${reason}`,
        );
        this.retry.onRetry?.(info);
      },
    });
  }
}
