export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

const logLevelRank: Readonly<Record<Exclude<LogLevel, "silent">, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = {
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
};

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const shouldLog = (configuredLevel: LogLevel, messageLevel: Exclude<LogLevel, "silent">): boolean => {
  if (configuredLevel === "silent") {
    return false;
  }

  return logLevelRank[messageLevel] <= logLevelRank[configuredLevel];
};

export type LogSink = (line: string) => void;

const writeToStderr: LogSink = (line) => {
  process.stderr.write(line);
};

export const formatLogLine = (messageLevel: Exclude<LogLevel, "silent">, message: string): string =>
  `[scc-kit] ${messageLevel.toUpperCase()} ${message}\n`;

export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const emit =
    (messageLevel: Exclude<LogLevel, "silent">) =>
    (message: string): void => {
      if (shouldLog(level, messageLevel)) {
        sink(formatLogLine(messageLevel, message));
      }
    };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value) {
    case "silent":
    case "error":
    case "warn":
    case "info":
    case "debug":
      return value;
    default:
      return "info";
  }
};
