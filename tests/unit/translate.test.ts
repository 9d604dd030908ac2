import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { importBook } from "../../src/application/import/import-usecase";
import { translateParagraphs, type TranslateRequest } from "../../src/application/translate/translate-usecase";
import { createLogger, silentLogger } from "../../src/cli/logging";
import { ProviderError } from "../../src/domain/common/errors";
import type { PromptConfig } from "../../src/infrastructure/config/schema";
import type { LlmClient } from "../../src/infrastructure/llm/types";
import { BookStore } from "../../src/infrastructure/store/sqlite-store";
import { twoSectionEdition } from "../fixtures/editions";
import { FakeClient } from "../helpers/fake-client";

const literal: PromptConfig = {
  description: "",
  systemPrompt: "Translate.\n",
  userTemplate: "{text}",
  temperature: 0.3,
  maxTokens: 4000,
};

describe("translateParagraphs", () => {
  let store: BookStore;

  beforeEach(() => {
    store = new BookStore(":memory:");
    importBook(store, twoSectionEdition(), {
      placeholders: { chapter: "Chapter {n}", section: "Section {n}" },
      logger: silentLogger,
    });
  });

  afterEach(() => {
    store.close();
  });

  const run = (client: LlmClient, extra: Partial<TranslateRequest> = {}) =>
    translateParagraphs({
      store,
      client,
      promptName: "literal",
      prompt: literal,
      defaultModel: "gpt-4o",
      scope: { kind: "chapter", chapter: 1 },
      logger: silentLogger,
      ...extra,
    });

  it("stores one translation per paragraph under the prompt name", async () => {
    const client = new FakeClient("תרגום");
    const summary = await run(client);

    expect(summary).toEqual({
      promptName: "literal",
      total: 5,
      translated: 5,
      skipped: 0,
      failed: 0,
      deferred: 0,
      failures: [],
    });
    expect(client.calls).toBe(5);
    const rows = [...store.translationsFor("literal", { kind: "all" }).values()];
    expect(rows).toHaveLength(5);
    for (const row of rows) {
      expect(row).toMatchObject({ promptName: "literal", text: "תרגום", model: "gpt-4o" });
    }
  });

  it("makes no calls when every paragraph is already translated", async () => {
    await run(new FakeClient("תרגום"));
    const before = [...store.translationsFor("literal", { kind: "all" }).values()];

    const again = new FakeClient("other");
    const summary = await run(again);

    expect(again.calls).toBe(0);
    expect(summary).toMatchObject({ total: 5, translated: 0, skipped: 5, failed: 0 });
    expect([...store.translationsFor("literal", { kind: "all" }).values()]).toEqual(before);
  });

  it("sends the rendered prompt with the prompt's parameters", async () => {
    const client = new FakeClient("t");
    await run(client, {
      prompt: { ...literal, userTemplate: "{chapter} / {section} #{number}: {text}", model: "gpt-4o-mini" },
      scope: { kind: "section", chapter: 1, section: 1 },
      limit: 1,
    });

    expect(client.requests).toEqual([
      {
        model: "gpt-4o-mini",
        temperature: 0.3,
        maxTokens: 4000,
        messages: [
          { role: "system", content: "Translate." },
          { role: "user", content: "שער ראשון / פרק א #1: First bold paragraph" },
        ],
      },
    ]);
  });

  it("records failures and carries on", async () => {
    const client = new FakeClient(
      "a",
      new ProviderError({ provider: "openai", retryable: false, message: "bad request" }),
      "c",
    );
    const summary = await run(client);
    const second = store.listParagraphs({ kind: "section", chapter: 1, section: 1 })[1];

    expect(summary).toMatchObject({ translated: 4, failed: 1 });
    expect(summary.failures).toEqual([
      { paragraphId: second?.id, location: "chapter 1, section 1, paragraph 2", error: "bad request" },
    ]);

    const resumed = new FakeClient("b");
    const retry = await run(resumed);
    expect(resumed.calls).toBe(1);
    expect(retry).toMatchObject({ translated: 1, skipped: 4, failed: 0 });
  });

  it("treats an empty completion as a failure", async () => {
    const summary = await run(new FakeClient("   "));
    expect(summary.failed).toBe(5);
    expect(summary.failures[0]?.error).toBe("Empty completion (finish reason: stop)");
    expect(store.counts().translations).toBe(0);
  });

  it("does not store a truncated completion", async () => {
    const client = new FakeClient("half a sentence");
    client.finishReason = "length";
    const summary = await run(client, { limit: 1 });
    expect(summary.failures[0]?.error).toBe(
      "Completion truncated at 4000 tokens; raise maxTokens for this prompt",
    );
    expect(store.counts().translations).toBe(0);
  });

  it("logs token usage for each completion at debug", async () => {
    const lines: string[] = [];
    const client = new FakeClient("t");
    client.usage = { promptTokens: 12, completionTokens: 3 };
    await run(client, {
      scope: { kind: "section", chapter: 1, section: 2 },
      logger: createLogger({ logLevel: "debug" }, (line) => lines.push(line)),
    });

    expect(lines.filter((line) => line.startsWith("Tokens:"))).toEqual([
      "Tokens: 12 prompt, 3 completion",
      "Tokens: 12 prompt, 3 completion",
    ]);
  });

  it("stops requesting once the limit is reached", async () => {
    const client = new FakeClient("t");
    const summary = await run(client, { limit: 2 });
    expect(client.calls).toBe(2);
    expect(summary).toMatchObject({ translated: 2, deferred: 3 });
  });

  it("replaces existing translations when forced", async () => {
    await run(new FakeClient("old"));
    const client = new FakeClient("new");
    const summary = await run(client, { force: true });

    expect(client.calls).toBe(5);
    expect(summary).toMatchObject({ translated: 5, skipped: 0 });
    const texts = [...store.translationsFor("literal", { kind: "all" }).values()].map((t) => t.text);
    expect(texts).toEqual(["new", "new", "new", "new", "new"]);
  });

  it("stores under a separate name when asked", async () => {
    await run(new FakeClient("v1"));
    const summary = await run(new FakeClient("v2"), { storageName: "literal-v2" });

    expect(summary).toMatchObject({ promptName: "literal-v2", translated: 5, skipped: 0 });
    expect(store.translationsFor("literal-v2", { kind: "all" }).size).toBe(5);
    expect(store.counts().translations).toBe(10);
  });
});
