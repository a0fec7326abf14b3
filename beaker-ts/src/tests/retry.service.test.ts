import { AxiosError, CanceledError } from 'axios';
import { computeBackoffDelay, isRetryableError, withRetry } from '../services/retry.service';
import { HttpStatusError, JobNotFound, StreamError, ValidationError } from '../lib/errors';
import { transientError } from './fakeTransport';

const fast = { baseDelayMs: 1, maxDelayMs: 1, jitter: 0 };

describe('withRetry', () => {
    test('returns the first success after transient failures', async () => {
        const operation = jest.fn<Promise<string>, [number]>()
            .mockRejectedValueOnce(transientError())
            .mockRejectedValueOnce(transientError())
            .mockResolvedValue('ok');
        const onRetry = jest.fn();

        await expect(withRetry(operation, { ...fast, maxAttempts: 3, onRetry })).resolves.toBe('ok');
        expect(operation).toHaveBeenCalledTimes(3);
        expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
        expect(onRetry.mock.calls.map(([info]) => info.attempt)).toEqual([1, 2]);
    });

    test('gives up after maxAttempts calls', async () => {
        const operation = jest.fn<Promise<string>, [number]>().mockRejectedValue(transientError());

        const error = await withRetry(operation, { ...fast, maxAttempts: 3 }).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(StreamError);
        expect(error).toMatchObject({ reason: 'exhausted', attempts: 3 });
        expect(operation).toHaveBeenCalledTimes(3);
    });

    test('does not retry a fatal error', async () => {
        const cause = new HttpStatusError(400, 'bad request');
        const operation = jest.fn<Promise<string>, [number]>().mockRejectedValue(cause);

        const error = await withRetry(operation, { ...fast, maxAttempts: 5 }).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(StreamError);
        expect(error).toMatchObject({ reason: 'fatal', attempts: 1, cause });
        expect(operation).toHaveBeenCalledTimes(1);
    });

    test('stops promptly when aborted during a long backoff', async () => {
        const controller = new AbortController();
        const operation = jest.fn<Promise<string>, [number]>().mockRejectedValue(transientError());
        setTimeout(() => controller.abort('stop'), 20);

        const started = Date.now();
        await expect(
            withRetry(operation, { baseDelayMs: 60_000, maxDelayMs: 60_000, jitter: 0, signal: controller.signal })
        ).rejects.toBe('stop');
        expect(Date.now() - started).toBeLessThan(1_000);
        expect(operation).toHaveBeenCalledTimes(1);
    });

    test('does not start when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort('gone');
        const operation = jest.fn<Promise<string>, [number]>().mockResolvedValue('ok');

        await expect(withRetry(operation, { signal: controller.signal })).rejects.toBe('gone');
        expect(operation).not.toHaveBeenCalled();
    });
});

describe('isRetryableError', () => {
    test.each([
        [429, true],
        [500, true],
        [503, true],
        [400, false],
        [409, false],
    ])('HTTP %i retryable: %s', (status, expected) => {
        expect(isRetryableError(new HttpStatusError(status, 'x'))).toBe(expected);
    });

    test('client errors are final', () => {
        expect(isRetryableError(new JobNotFound('job-1'))).toBe(false);
        expect(isRetryableError(new ValidationError('bad'))).toBe(false);
    });

    test('network failures are retried, bad options and cancellation are not', () => {
        expect(isRetryableError(new AxiosError('Network Error', 'ERR_NETWORK'))).toBe(true);
        expect(isRetryableError(new AxiosError('timeout', 'ECONNABORTED'))).toBe(true);
        expect(isRetryableError(new AxiosError('bad option', 'ERR_BAD_OPTION'))).toBe(false);
        expect(isRetryableError(new CanceledError())).toBe(false);
    });

    test('plain errors are retried only for transient codes', () => {
        expect(isRetryableError(transientError())).toBe(true);
        expect(isRetryableError(new Error('boom'))).toBe(false);
    });
});

describe('computeBackoffDelay', () => {
    const noJitter = () => 0.5;

    test('grows exponentially up to the cap', () => {
        const options = { baseDelayMs: 1_000, multiplier: 2, maxDelayMs: 30_000 };
        expect(computeBackoffDelay(1, options, noJitter)).toBe(1_000);
        expect(computeBackoffDelay(2, options, noJitter)).toBe(2_000);
        expect(computeBackoffDelay(3, options, noJitter)).toBe(4_000);
        expect(computeBackoffDelay(10, options, noJitter)).toBe(30_000);
    });

    test('applies jitter in both directions', () => {
        const options = { baseDelayMs: 1_000, jitter: 0.2 };
        expect(computeBackoffDelay(1, options, () => 0)).toBe(800);
        expect(computeBackoffDelay(1, options, () => 1)).toBe(1_200);
    });
});
