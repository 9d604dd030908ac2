import type { AppError } from "../domain/common/errors";

export const ExitCode = {
  success: 0,
  failure: 1,
  usage: 2,
  /** Some paragraphs or chapters failed; the rest of the run completed. */
  partial: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(error: AppError): ExitCode {
  switch (error.kind) {
    case "config":
    case "validation":
    case "not_found":
      return ExitCode.usage;
    default:
      return ExitCode.failure;
  }
}
