import { ProviderError } from "../../../domain/common/errors";

export type BackoffConfig = {
  baseMs: number;
  maxMs: number;
  /** Fraction of the delay added or removed at random; 0 disables jitter. */
  jitter: number;
};

export type RetryConfig = {
  maxRetries: number;
  backoff: BackoffConfig;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

/** Where a retried call stands: the attempt just made and how many are allowed. */
export type RetryState = {
  attempt: number;
  maxAttempts: number;
};

export type RetryStep =
  | { kind: "retry"; delayMs: number; state: RetryState }
  | { kind: "give-up"; reason: "permanent" | "exhausted" };

/** Exponential delay after `attempt` failed: `baseMs * 2^(attempt-1)`, capped, then jittered. */
export function computeBackoffMs(
  attempt: number,
  config: BackoffConfig,
  random: () => number = Math.random,
): number {
  const capped = Math.min(config.baseMs * 2 ** Math.max(0, attempt - 1), config.maxMs);
  const spread = 1 + (random() * 2 - 1) * config.jitter;
  return Math.max(0, Math.round(capped * spread));
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function initialRetryState(maxRetries: number): RetryState {
  return { attempt: 1, maxAttempts: Math.max(0, maxRetries) + 1 };
}

/**
 * Rate limits, 5xx responses, timeouts and network failures are transient.
 * Other provider errors (4xx, empty completions) are not.
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof ProviderError) return error.retryable;
  return error instanceof Error;
}

export function nextRetryStep(
  state: RetryState,
  error: unknown,
  backoff: BackoffConfig,
  random: () => number = Math.random,
): RetryStep {
  if (!isTransient(error)) return { kind: "give-up", reason: "permanent" };
  if (state.attempt >= state.maxAttempts) {
    return { kind: "give-up", reason: "exhausted" };
  }
  return {
    kind: "retry",
    delayMs: computeBackoffMs(state.attempt, backoff, random),
    state: { ...state, attempt: state.attempt + 1 },
  };
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
): Promise<T> {
  const wait = config.sleep ?? sleep;
  let state = initialRetryState(config.maxRetries);
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      const step = nextRetryStep(state, error, config.backoff, config.random);
      if (step.kind === "give-up") throw error;
      config.onRetry?.({ attempt: state.attempt, delayMs: step.delayMs, error });
      await wait(step.delayMs);
      state = step.state;
    }
  }
}
