import type { AnswerStatus } from "../domain/qa/answer";

export const ExitCode = {
  success: 0,
  failure: 1,
  usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Exit code for an `ask` outcome: only a found answer is a success. */
export function exitCodeForAnswer(status: AnswerStatus): ExitCode {
  if (status === "found") return ExitCode.success;
  if (status === "too_short") return ExitCode.usage;
  return ExitCode.failure;
}
