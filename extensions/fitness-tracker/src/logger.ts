export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Same shape a plugin host hands to its extensions. */
export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createConsoleLogger(options: { level?: LogLevel; tag?: string } = {}): Logger {
  const threshold = SEVERITY[options.level ?? "info"];
  const tag = options.tag ?? "fitness-tracker";

  const write = (level: LogLevel, message: string) => {
    if (SEVERITY[level] < threshold) {
      return;
    }
    const line = `[${new Date().toISOString()}] [${tag}] ${level.toUpperCase()} ${message}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
