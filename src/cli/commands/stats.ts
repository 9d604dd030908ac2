import type { Command } from "commander";
import { collectStats, formatStats } from "../../application/stats/stats-usecase";
import { CommonOptionsSchema, runAction, withCommonOptions, withStore } from "../shared";

export function registerStatsCommand(program: Command): void {
  withCommonOptions(
    program.command("stats").description("Show store contents and translation coverage"),
  ).action((opts) =>
    runAction(opts, CommonOptionsSchema, async (_args, { config, out }) => {
      const stats = await withStore(config, collectStats);
      formatStats(stats).forEach((line) => out(line));
    }),
  );
}
