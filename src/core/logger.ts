export type LogLevel = "debug" | "info" | "warn" | "silent";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  silent: 3,
};

export function createLogger(level: LogLevel = "info", scope?: string): Logger {
  const enabled = (target: Exclude<LogLevel, "silent">) =>
    LEVEL_RANK[target] >= LEVEL_RANK[level];
  const format = (message: string) => (scope ? `[${scope}] ${message}` : message);

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(format(message), ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(format(message), ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(format(`Warning: ${message}`), ...details);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
