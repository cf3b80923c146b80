import { describe, it, expect, vi } from 'vitest';
import { computeBackoff, withRetry } from '../utils/retry.js';
import type { RetryPolicy } from '../types/index.js';

const POLICY: RetryPolicy = { maxAttempts: 3, multiplier: 1, minDelayMs: 4000, maxDelayMs: 10000 };
const noSleep = async (): Promise<void> => {};

describe('computeBackoff', () => {
    it('should clamp to the minimum delay', () => {
        expect(computeBackoff(1, POLICY)).toBe(4000);
        expect(computeBackoff(2, POLICY)).toBe(4000);
    });

    it('should grow exponentially between the bounds', () => {
        expect(computeBackoff(3, POLICY)).toBe(4000);
        expect(computeBackoff(4, POLICY)).toBe(8000);
    });

    it('should clamp to the maximum delay', () => {
        expect(computeBackoff(5, POLICY)).toBe(10000);
        expect(computeBackoff(10, POLICY)).toBe(10000);
    });
});

describe('withRetry', () => {
    it('should return the first successful result', async () => {
        const fn = vi.fn().mockResolvedValue('ok');

        await expect(withRetry(fn, { policy: POLICY, sleep: noSleep })).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(1);
        expect(fn).toHaveBeenCalledWith(1);
    });

    it('should retry until success and report each retry', async () => {
        const fn = vi
            .fn()
            .mockRejectedValueOnce(new Error('first'))
            .mockRejectedValueOnce(new Error('second'))
            .mockResolvedValue('third time');
        const sleep = vi.fn().mockResolvedValue(undefined);
        const onRetry = vi.fn();

        await expect(withRetry(fn, { policy: POLICY, sleep, onRetry })).resolves.toBe('third time');

        expect(fn).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls).toEqual([[4000], [4000]]);
        expect(onRetry).toHaveBeenCalledTimes(2);
        expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, delayMs: 4000 });
    });

    it('should rethrow the last error once attempts run out', async () => {
        const fn = vi
            .fn()
            .mockRejectedValueOnce(new Error('a'))
            .mockRejectedValueOnce(new Error('b'))
            .mockRejectedValueOnce(new Error('c'));

        await expect(withRetry(fn, { policy: POLICY, sleep: noSleep })).rejects.toThrow('c');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should stop at once on a non-retryable error', async () => {
        const fn = vi.fn().mockRejectedValue(new Error('fatal'));

        await expect(
            withRetry(fn, { policy: POLICY, sleep: noSleep, isRetryable: () => false })
        ).rejects.toThrow('fatal');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should make one attempt when maxAttempts is below 1', async () => {
        const fn = vi.fn().mockRejectedValue(new Error('once'));

        await expect(
            withRetry(fn, { policy: { ...POLICY, maxAttempts: 0 }, sleep: noSleep })
        ).rejects.toThrow('once');
        expect(fn).toHaveBeenCalledTimes(1);
    });
});
