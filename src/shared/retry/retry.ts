import { abortableSleep } from "../time/clock";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // extra attempts after the first (2 means up to 3 calls)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleep?: (ms: number) => Promise<void>;
};

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision;

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs">,
  customDelayMs?: number
): number => {
  if (typeof customDelayMs === "number" && Number.isFinite(customDelayMs) && customDelayMs >= 0) {
    return Math.min(opts.maxDelayMs, customDelayMs);
  }
  return Math.min(opts.maxDelayMs, opts.minDelayMs * Math.pow(2, attempt));
};

/**
 * Calls `fn` until it resolves, the decision says stop, or retries run out.
 * The last error is rethrown unchanged.
 */
export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    sleep = (ms: number) => abortableSleep(ms)
  } = opts;

  const maxAttempts = retries + 1;
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = normalizeDecision(shouldRetry(err));
      if (attempt >= retries || !decision.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const backoff = computeBackoffMs(attempt, opts, decision.delayMs);
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const waitMs = backoff + Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
    }
  }
};
