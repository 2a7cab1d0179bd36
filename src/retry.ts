import { StageTimeoutError } from './survey/errors';

export interface BackoffShape {
  baseMs: number;
  maxMs: number;
  factor?: number;
  jitterMs?: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  backoff: BackoffShape;
}

export interface RetryHooks {
  label: string;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (info: { error: unknown; attempt: number; waitMs: number }) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export class RetryExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(label: string, attempts: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${label} failed after ${attempts} attempts: ${detail}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** attempt is 1-based: the wait before attempt 2 uses attempt = 1. */
export function computeBackoffMs(shape: BackoffShape, attempt: number, random: () => number = Math.random): number {
  const factor = shape.factor ?? 2;
  const exp = Math.min(shape.maxMs, shape.baseMs * Math.pow(factor, Math.max(attempt - 1, 0)));
  const jitter = shape.jitterMs ? Math.floor(random() * shape.jitterMs) : 0;
  return exp + jitter;
}

/**
 * Runs `fn` until it resolves or the policy is spent. Errors rejected by
 * `shouldRetry` are rethrown as-is; a spent budget throws RetryExhaustedError.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks,
): Promise<{ value: T; attempts: number }> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const wait = hooks.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (hooks.shouldRetry && !hooks.shouldRetry(error, attempt)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        break;
      }
      const waitMs = computeBackoffMs(policy.backoff, attempt, hooks.random);
      hooks.onRetry?.({ error, attempt, waitMs });
      await wait(waitMs);
    }
  }

  throw new RetryExhaustedError(hooks.label, maxAttempts, lastError);
}

/**
 * Gives `fn` an AbortSignal that fires after `timeoutMs` and rejects with
 * StageTimeoutError at that point, whether or not `fn` honours the signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new StageTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
