export const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const MAX_VERBOSITY = LOG_LEVELS.length - 1;

export type Logger = {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  verbose(message: string): void;
  debug(message: string): void;
};

export type LogSink = (level: LogLevel, line: string) => void;

export function clampVerbosity(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(MAX_VERBOSITY, Math.max(0, Math.trunc(value)));
}

export function isLevelEnabled(level: LogLevel, verbosity: number): boolean {
  return LOG_LEVELS.indexOf(level) <= clampVerbosity(verbosity);
}

function consoleSink(level: LogLevel, line: string): void {
  if (level === "error" || level === "warn") {
    console.error(line);
    return;
  }
  console.log(line);
}

export function createLogger(verbosity: number, sink: LogSink = consoleSink): Logger {
  const emit = (level: LogLevel, message: string) => {
    if (!isLevelEnabled(level, verbosity)) return;
    sink(level, `[${level}] ${message}`);
  };

  return {
    error: (message) => emit("error", message),
    warn: (message) => emit("warn", message),
    info: (message) => emit("info", message),
    verbose: (message) => emit("verbose", message),
    debug: (message) => emit("debug", message),
  };
}

export const silentLogger: Logger = createLogger(0, () => undefined);
