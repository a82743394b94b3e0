export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let threshold: LogLevel = "info";

function timestamp(): string {
  return new Date().toISOString();
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export const logger = {
  debug(message: string): void {
    if (enabled("debug")) {
      console.log(`[${timestamp()}] DEBUG ${message}`);
    }
  },
  info(message: string): void {
    if (enabled("info")) {
      console.log(`[${timestamp()}] INFO ${message}`);
    }
  },
  warn(message: string): void {
    if (enabled("warn")) {
      console.warn(`[${timestamp()}] WARN ${message}`);
    }
  },
  error(message: string): void {
    console.error(`[${timestamp()}] ERROR ${message}`);
  }
};
