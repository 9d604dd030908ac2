import type { LogLevel } from "../infrastructure/config/schema";

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const ORDER: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export function createLogger(
  config: { logLevel: LogLevel },
  sink: (line: string) => void = (line) => console.error(line),
): Logger {
  const level = config.logLevel;
  const enabled = (target: LogLevel) =>
    level !== "silent" && ORDER.indexOf(level) >= ORDER.indexOf(target);

  return {
    debug: (m) => enabled("debug") && sink(m),
    info: (m) => enabled("info") && sink(m),
    warn: (m) => enabled("warn") && sink(`warn: ${m}`),
    error: (m) => enabled("error") && sink(`error: ${m}`),
  };
}

export const silentLogger: Logger = createLogger({ logLevel: "silent" });
