import { type Logger, silentLogger } from '../types.ts';
import { AuthError, isFatal } from './errors.ts';
import type { Token } from './token.ts';

/**
 * Creates a fresh token request. `attempt` starts at 1.
 */
export type TokenAttempt = (attempt: number, signal: AbortSignal) => Promise<Token>;

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface RetryPolicy {
  /** Retries after the first attempt (default 5) */
  maxRetries?: number;
  /** Base delay before the first retry (default 100 ms) */
  initialDelayMs?: number;
  /** Upper bound of the exponential base (default 10 s) */
  maxDelayMs?: number;
  /** Jitter source in [0, 1) */
  random?: () => number;
  sleep?: SleepFn;
  logger?: Logger;
  providerName?: string;
  signal?: AbortSignal;
}

export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_INITIAL_DELAY_MS = 100;
export const DEFAULT_MAX_DELAY_MS = 10_000;

/**
 * Delay before retry `retry` (1-based): exponential base capped at `maxDelayMs`,
 * with equal jitter so the result lies in [base/2, base].
 */
export function computeBackoff(retry: number, policy: Pick<RetryPolicy, 'initialDelayMs' | 'maxDelayMs' | 'random'> = {}): number {
  const initial = policy.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
  const cap = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const random = policy.random ?? Math.random;

  const base = Math.min(cap, initial * 2 ** (retry - 1));
  return base / 2 + random() * (base / 2);
}

export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Run `attempt` until it yields a token, a fatal error occurs, or the retry
 * budget is spent. The last error is rethrown.
 */
export async function refreshWithRetries(attempt: TokenAttempt, policy: RetryPolicy = {}): Promise<Token> {
  const maxRetries = policy.maxRetries ?? DEFAULT_MAX_RETRIES;
  const sleep = policy.sleep ?? abortableSleep;
  const logger = policy.logger ?? silentLogger;
  const signal = policy.signal ?? new AbortController().signal;
  const provider = policy.providerName ?? 'unknown';

  let attemptNumber = 1;
  for (;;) {
    if (signal.aborted) throw abortError(signal, provider);

    try {
      return await untilAborted(attempt(attemptNumber, signal), signal);
    } catch (error) {
      if (signal.aborted) throw abortError(signal, provider);
      if (isFatal(error)) throw error;
      if (attemptNumber > maxRetries) {
        logger.warn('Token refresh failed, retries exhausted', { provider, attempts: attemptNumber, error: messageOf(error) });
        throw error;
      }

      const delayMs = computeBackoff(attemptNumber, policy);
      logger.warn('Token refresh attempt failed, retrying', { provider, attempt: attemptNumber, delayMs, error: messageOf(error) });
      try {
        await sleep(delayMs, signal);
      } catch (sleepError) {
        if (signal.aborted) throw abortError(signal, provider);
        throw sleepError;
      }
      attemptNumber++;
    }
  }
}

/** Settles with `promise`, or rejects with the abort reason as soon as `signal` fires */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function abortError(signal: AbortSignal, provider: string): AuthError {
  if (signal.reason instanceof AuthError) return signal.reason;
  return new AuthError('Revoked', 'Token refresh was cancelled', { provider, cause: signal.reason });
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
