import type { PromptConfig } from "../infrastructure/config/schema";
import type { ChatMessage } from "../infrastructure/llm/types";

export type TranslationPromptInput = {
  text: string;
  chapter: string;
  section?: string | null;
  number: number;
};

const PLACEHOLDER = /\{(text|chapter|section|number)\}/g;

/** Fills `{text}`, `{chapter}`, `{section}` and `{number}`; other braces are left alone. */
export function renderTemplate(
  template: string,
  input: TranslationPromptInput,
): string {
  return template.replace(PLACEHOLDER, (_, key: string) => {
    switch (key) {
      case "text":
        return input.text;
      case "chapter":
        return input.chapter;
      case "section":
        return input.section ?? "";
      default:
        return String(input.number);
    }
  });
}

export function buildTranslationMessages(
  prompt: PromptConfig,
  input: TranslationPromptInput,
): ChatMessage[] {
  return [
    { role: "system", content: prompt.systemPrompt.trim() },
    { role: "user", content: renderTemplate(prompt.userTemplate, input) },
  ];
}
