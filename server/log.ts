export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function parseLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : "info";
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

function format(message: string, source: string): string {
  return `${timestamp()} [${source}] ${message}`;
}

export function debug(message: string, source = "tarshard") {
  if (enabled("debug")) console.debug(format(message, source));
}

export function log(message: string, source = "tarshard") {
  if (enabled("info")) console.log(format(message, source));
}

export function warn(message: string, source = "tarshard") {
  if (enabled("warn")) console.warn(format(message, source));
}

/** Logs at error level; the stack of `err` is appended when there is one. */
export function logError(message: string, err?: unknown, source = "tarshard") {
  if (!enabled("error")) return;
  if (err instanceof Error && err.stack) {
    console.error(format(`${message}\n${err.stack}`, source));
  } else {
    console.error(format(message, source));
  }
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}
