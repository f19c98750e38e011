export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function timestamp(): string {
  return new Date().toISOString();
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }

  return "info";
}

export function formatLine(level: LogLevel, scope: string | null, message: string, at: string = timestamp()): string {
  const prefix = scope ? `[${scope}] ` : "";
  return `[${at}] ${level.toUpperCase()} ${prefix}${message}`;
}

export function createLogger(scope: string | null = null, minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return {
    debug(message: string): void {
      if (enabled("debug")) {
        console.log(formatLine("debug", scope, message));
      }
    },
    info(message: string): void {
      if (enabled("info")) {
        console.log(formatLine("info", scope, message));
      }
    },
    warn(message: string): void {
      if (enabled("warn")) {
        console.warn(formatLine("warn", scope, message));
      }
    },
    error(message: string): void {
      if (enabled("error")) {
        console.error(formatLine("error", scope, message));
      }
    }
  };
}

export const logger = createLogger();

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
