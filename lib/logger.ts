type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

export function logDebugWithTs(...args: unknown[]): void {
  if (!enabled("debug")) return;
  console.debug(`[${new Date().toISOString()}]`, ...args);
}

export function logWithTs(...args: unknown[]): void {
  if (!enabled("info")) return;
  console.log(`[${new Date().toISOString()}]`, ...args);
}

export function logWarnWithTs(...args: unknown[]): void {
  if (!enabled("warn")) return;
  console.warn(`[${new Date().toISOString()}]`, ...args);
}

export function logErrorWithTs(...args: unknown[]): void {
  console.error(`[${new Date().toISOString()}]`, ...args);
}
