import { describe, expect, it } from "vitest";
import { buildTranslationMessages, renderTemplate } from "../../src/prompts/translate";

describe("translation prompt", () => {
  const input = { text: "שלום", chapter: "פרק א", section: "סעיף ב", number: 4 };

  it("fills the known placeholders", () => {
    expect(renderTemplate("{chapter} / {section} #{number}\n\n{text}", input)).toBe(
      "פרק א / סעיף ב #4\n\nשלום",
    );
  });

  it("leaves other braces alone and blanks a missing section", () => {
    expect(renderTemplate("{text} {unknown} {section}", { ...input, section: null })).toBe("שלום {unknown} ");
  });

  it("builds a system and a user message", () => {
    const messages = buildTranslationMessages(
      {
        description: "",
        systemPrompt: "  Translate literally.\n",
        userTemplate: "{text}",
        temperature: 0.3,
        maxTokens: 4000,
      },
      input,
    );
    expect(messages).toEqual([
      { role: "system", content: "Translate literally." },
      { role: "user", content: "שלום" },
    ]);
  });
});
