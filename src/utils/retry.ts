import { Logger } from "../types/common";

/**
 * Options for the retry policy.
 */
export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier?: number;
}

export const DEFAULT_RETRY_CONFIG: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};

function property(err: unknown, key: string): unknown {
  return err !== null && typeof err === "object" ? Reflect.get(err, key) : undefined;
}

/**
 * Whether an RPC failure is transient and worth another attempt.
 */
export function isRetryable(err: unknown): boolean {
  if (!err) return false;
  const rawMessage = property(err, "message");
  const message = (typeof rawMessage === "string" ? rawMessage : String(err)).toLowerCase();
  const rawCode = property(err, "code");
  const code = typeof rawCode === "string" ? rawCode.toUpperCase() : "";
  const status = property(property(err, "response"), "status");

  return (
    status === 429 ||
    status === 503 ||
    code === "ECONNABORTED" ||
    code === "ETIMEDOUT" ||
    code === "ECONNRESET" ||
    code === "ECONNREFUSED" ||
    code === "ENOTFOUND" ||
    message.includes("timeout") ||
    message.includes("socket hang up") ||
    message.includes("too many requests") ||
    message.includes("service unavailable") ||
    message.includes("enotfound") ||
    message.includes("econnrefused") ||
    message.includes("econnreset") ||
    message.includes("etimedout")
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an async call with exponential backoff on retryable failures.
 * Non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
  logger?: Logger,
  label: string = "RPC",
): Promise<T> {
  const multiplier = options.backoffMultiplier ?? 2;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!isRetryable(err) || attempt >= options.maxRetries) {
        throw err;
      }

      const delay = Math.min(
        options.maxDelayMs,
        options.baseDelayMs * Math.pow(multiplier, attempt),
      );

      logger?.debug(`${label}: retrying after ${Math.round(delay)}ms`, {
        attempt: attempt + 1,
        maxRetries: options.maxRetries,
        error: err instanceof Error ? err.message : String(err),
      });

      await sleep(delay);
    }
  }
}
