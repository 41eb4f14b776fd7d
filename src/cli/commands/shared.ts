import type { LogLevel } from "../logging";

export function verbosity(args: { verbose?: boolean; debug?: boolean }): LogLevel {
  return args.debug ? "debug" : args.verbose ? "info" : "error";
}

export function reportError(error: unknown, debug?: boolean): void {
  if (debug && error instanceof Error) {
    console.error(error.stack ?? error.message);
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
}
