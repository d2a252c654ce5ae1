export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger using the `[scope] message` convention. Everything goes to
 * stderr so that JSON printed on stdout by the CLI stays parseable.
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];

  const emit = (at: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    const line = `[${scope}] ${message}`;
    if (at === "warn") {
      console.warn(line, ...details);
    } else {
      console.error(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
