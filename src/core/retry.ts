export type BackoffKind = "fixed" | "linear";

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
  backoff: BackoffKind;
}

export interface RetryHooks {
  /** Return false to give up immediately and rethrow. Defaults to retrying every error. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before the attempt that follows failed attempt number `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  switch (policy.backoff) {
    case "fixed":
      return policy.delayMs;
    case "linear":
      return policy.delayMs * attempt;
  }
}

export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retriable = hooks.shouldRetry ? hooks.shouldRetry(error, attempt) : true;
      if (!retriable || attempt >= maxAttempts) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      hooks.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
