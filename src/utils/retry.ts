import type { RetryPolicy } from '../types/index.js';

/**
 * Hooks for a single `withRetry()` call.
 */
export interface RetryOptions {
    policy: RetryPolicy;
    /** Return false to fail immediately without further attempts */
    isRetryable?: (error: unknown) => boolean;
    /** Called before sleeping ahead of the next attempt */
    onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
    /** Injected for tests */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay before the attempt following `attempt` (1-based).
 * Exponential: multiplier * 2^(attempt-1) seconds, clamped to the policy bounds.
 */
export function computeBackoff(attempt: number, policy: RetryPolicy): number {
    const exponential = policy.multiplier * Math.pow(2, attempt - 1) * 1000;
    return Math.max(policy.minDelayMs, Math.min(policy.maxDelayMs, exponential));
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const { policy, isRetryable = () => true, onRetry, sleep = defaultSleep } = options;
    const maxAttempts = Math.max(1, policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !isRetryable(error)) {
                throw error;
            }
            const delayMs = computeBackoff(attempt, policy);
            onRetry?.({ attempt, delayMs, error });
            await sleep(delayMs);
        }
    }
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
