import type { Command } from "commander";
import { CommonOptionsSchema, runAction, withCommonOptions } from "../shared";

export function registerPromptsCommand(program: Command): void {
  withCommonOptions(
    program.command("prompts").description("List the configured prompt catalog"),
  ).action((opts) =>
    runAction(opts, CommonOptionsSchema, async (_args, { config, out }) => {
      const entries = Object.entries(config.prompts);
      if (entries.length === 0) {
        out("No prompts configured");
        return;
      }
      for (const [name, prompt] of entries) {
        const model = prompt.model ? ` [${prompt.model}]` : "";
        out(`${name}${model}: ${prompt.description}`);
      }
    }),
  );
}
