export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, "silent">;

export type LogSink = (line: string) => void;

export type Logger = {
  readonly scope: string;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  child: (scope: string) => Logger;
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function createLogger(
  scope: string,
  level: LogLevel = "info",
  sink: LogSink = stderrSink
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit = (target: EmitLevel, args: unknown[]) => {
    if (LOG_LEVELS.indexOf(target) > threshold) return;
    sink(formatLogLine(new Date().toISOString(), target, scope, formatArgs(args)));
  };

  return {
    scope,
    error: (...args) => emit("error", args),
    warn: (...args) => emit("warn", args),
    info: (...args) => emit("info", args),
    debug: (...args) => emit("debug", args),
    child: (child) => createLogger(`${scope}:${child}`, level, sink),
  };
}

export function formatLogLine(
  timestamp: string,
  level: EmitLevel,
  scope: string,
  message: string
): string {
  return `${timestamp} ${level.toUpperCase().padEnd(5, " ")} [${scope}] ${message}`;
}

function formatArgs(args: unknown[]): string {
  return args
    .map((value) => {
      if (value instanceof Error) return value.message;
      if (typeof value === "object" && value !== null) return JSON.stringify(value);
      return String(value);
    })
    .join(" ");
}
