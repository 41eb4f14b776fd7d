import type { AppConfig } from "../infrastructure/config/schema";

export type LogLevel = AppConfig["logLevel"];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same sink and level, messages prefixed with `[scope]` */
  child(scope: string): Logger;
};

const ORDER: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export type LogSink = (line: string) => void;

export function createLogger(
  config: Pick<AppConfig, "logLevel">,
  sink: LogSink = (line) => console.error(line),
): Logger {
  const level = config.logLevel;
  const enabled = (target: LogLevel) =>
    level !== "silent" && ORDER.indexOf(level) >= ORDER.indexOf(target);

  const build = (prefix: string): Logger => {
    const emit = (target: LogLevel, m: string) => {
      if (enabled(target)) sink(`${target.toUpperCase()} ${prefix}${m}`);
    };
    return {
      debug: (m) => emit("debug", m),
      info: (m) => emit("info", m),
      warn: (m) => emit("warn", m),
      error: (m) => emit("error", m),
      child: (scope) => build(`${prefix}[${scope}] `),
    };
  };

  return build("");
}

export const silentLogger: Logger = createLogger({ logLevel: "silent" });
