import { describe, expect, it } from "vitest";
import nock from "nock";
import { OpenAiClient } from "../../src/infrastructure/llm/providers/openai";
import { ProviderError } from "../../src/domain/common/errors";

const client = () =>
  new OpenAiClient({
    apiKey: "test-secret",
    baseUrl: "https://api.openai.com/v1",
    timeoutMs: 10_000,
    organization: "org-test",
  });

async function providerError(promise: Promise<unknown>): Promise<ProviderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ProviderError) return error;
    throw error;
  }
  throw new Error("expected a ProviderError");
}

describe("OpenAiClient", () => {
  it("posts a chat completion and maps the response", async () => {
    nock("https://api.openai.com")
      .matchHeader("authorization", "Bearer test-secret")
      .matchHeader("openai-organization", "org-test")
      .post("/v1/chat/completions", {
        model: "gpt-4o",
        messages: [{ role: "user", content: "hi" }],
        temperature: 0.3,
        max_tokens: 100,
      })
      .reply(200, {
        model: "gpt-4o-2024-08-06",
        choices: [{ message: { role: "assistant", content: "שלום" }, finish_reason: "stop" }],
        usage: { prompt_tokens: 10, completion_tokens: 2, total_tokens: 12 },
      });

    const response = await client().chatComplete({
      model: "gpt-4o",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.3,
      maxTokens: 100,
    });

    expect(response).toMatchObject({
      provider: "openai",
      model: "gpt-4o-2024-08-06",
      content: "שלום",
      finishReason: "stop",
      usage: { promptTokens: 10, completionTokens: 2, totalTokens: 12 },
    });
  });

  it("sends max_completion_tokens and no temperature to reasoning models", async () => {
    nock("https://api.openai.com")
      .post("/v1/chat/completions", {
        model: "o3-mini",
        messages: [{ role: "user", content: "hi" }],
        max_completion_tokens: 100,
      })
      .reply(200, { choices: [{ message: { role: "assistant", content: "ok" } }] });

    const response = await client().chatComplete({
      model: "o3-mini",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.3,
      maxTokens: 100,
    });
    expect(response.content).toBe("ok");
    expect(response.model).toBe("o3-mini");
  });

  it("marks rate limits and server errors retryable", async () => {
    nock("https://api.openai.com")
      .post("/v1/chat/completions")
      .reply(429, { error: { message: "Rate limit reached" } });
    const rateLimited = await providerError(
      client().chatComplete({ model: "gpt-4o", messages: [] }),
    );
    expect(rateLimited).toMatchObject({ statusCode: 429, retryable: true, message: "Rate limit reached" });

    nock("https://api.openai.com").post("/v1/chat/completions").reply(503, "");
    const unavailable = await providerError(
      client().chatComplete({ model: "gpt-4o", messages: [] }),
    );
    expect(unavailable).toMatchObject({
      statusCode: 503,
      retryable: true,
      message: "openai request failed (503)",
    });
  });

  it("does not retry client errors or refusals", async () => {
    nock("https://api.openai.com")
      .post("/v1/chat/completions")
      .reply(400, { error: { message: "Invalid model" } });
    expect(
      await providerError(client().chatComplete({ model: "nope", messages: [] })),
    ).toMatchObject({ statusCode: 400, retryable: false });

    nock("https://api.openai.com")
      .post("/v1/chat/completions")
      .reply(200, { choices: [{ message: { role: "assistant", content: null, refusal: "cannot help" } }] });
    expect(
      await providerError(client().chatComplete({ model: "gpt-4o", messages: [] })),
    ).toMatchObject({ retryable: false, message: "Model refused: cannot help" });
  });

  it("wraps network failures as retryable", async () => {
    nock("https://api.openai.com").post("/v1/chat/completions").replyWithError("socket hang up");
    expect(
      await providerError(client().chatComplete({ model: "gpt-4o", messages: [] })),
    ).toMatchObject({ retryable: true, message: "openai request failed" });
  });
});
