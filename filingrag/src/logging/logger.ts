export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
};

type LogSink = (line: string) => void;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(params: {
  level: LogLevel;
  scope?: string;
  sink?: LogSink;
}): Logger {
  const sink: LogSink = params.sink ?? ((line) => process.stderr.write(`${line}\n`));
  const threshold = RANK[params.level];

  const emit = (level: Exclude<LogLevel, "silent">, message: string): void => {
    if (RANK[level] < threshold) return;
    const scope = params.scope ? ` [${params.scope}]` : "";
    sink(`${new Date().toISOString()} ${level.toUpperCase()}${scope} ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    child: (scope) =>
      createLogger({
        level: params.level,
        scope: params.scope ? `${params.scope}:${scope}` : scope,
        sink
      })
  };
}

export const silentLogger: Logger = createLogger({ level: "silent", sink: () => undefined });
