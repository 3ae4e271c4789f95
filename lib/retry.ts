import { logWithTs, logErrorWithTs } from "@/lib/logger";

interface ErrorDetails {
  code?: string;
  statusCode?: number;
  message: string;
}

function readField(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function describeError(err: unknown): ErrorDetails {
  const cause = readField(err, "cause");
  const code = readField(cause, "code") ?? readField(err, "code");
  const status = readField(err, "status") ?? readField(err, "statusCode");
  return {
    code: typeof code === "string" ? code : undefined,
    statusCode: typeof status === "number" ? status : undefined,
    message: err instanceof Error ? err.message : String(err),
  };
}

/** Transient network errors (e.g., headers timeout, reset sockets, 5xx). */
export function isRetryableError(err: unknown): boolean {
  const { code, statusCode, message } = describeError(err);
  return (
    (code !== undefined && (code.startsWith("UND_ERR_") || code === "ECONNRESET" || code === "ETIMEDOUT")) ||
    message.includes("fetch failed") ||
    message.includes("ECONNREFUSED") ||
    message.includes("ETIMEDOUT") ||
    message.includes("ERR_HTTP") ||
    (statusCode !== undefined && statusCode >= 500 && statusCode < 600)
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

export async function retryWithBackoff<T>(
  label: string,
  fn: () => Promise<T>,
  attempts = 3,
  baseDelayMs = 2000
): Promise<T> {
  let lastError: unknown;

  for (let i = 0; i < attempts; i++) {
    try {
      if (attempts > 1) logWithTs(`🔄 ${label} (attempt ${i + 1}/${attempts})...`);
      return await fn();
    } catch (err) {
      lastError = err;
      const { code, statusCode, message } = describeError(err);

      logErrorWithTs(`❌ ${label} failed:`, {
        code,
        statusCode,
        message,
        attempt: `${i + 1}/${attempts}`,
      });

      if (!isRetryableError(err) || i === attempts - 1) {
        throw err;
      }

      const delay = baseDelayMs * Math.pow(2, i);
      logWithTs(`⏳ Retrying in ${(delay / 1000).toFixed(1)}s...`);
      await sleep(delay);
    }
  }

  throw lastError;
}
