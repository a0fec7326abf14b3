/**
 * Retry wrapper for requests to the Beaker API.
 * Transient failures (network errors, timeouts, 429, 5xx) are retried with
 * exponential backoff and jitter; anything else surfaces at once.
 */

import axios from 'axios';
import logger from '../lib/logger';
import { raceAbort, sleep } from '../lib/abort';
import { BeakerError, HttpStatusError, StreamError } from '../lib/errors';
import {
    DEFAULT_BACKOFF_BASE_MS,
    DEFAULT_BACKOFF_JITTER,
    DEFAULT_BACKOFF_MAX_MS,
    DEFAULT_BACKOFF_MULTIPLIER,
    DEFAULT_MAX_ATTEMPTS,
} from '../config';
import type { RetryInfo } from '../types';

const TRANSIENT_ERROR_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'ETIMEDOUT',
    'EPIPE',
    'EAI_AGAIN',
    'ENOTFOUND',
    'ERR_NETWORK',
]);

export interface BackoffOptions {
    baseDelayMs?: number;
    multiplier?: number;
    maxDelayMs?: number;
    jitter?: number;
}

export interface RetryOptions extends BackoffOptions {
    maxAttempts?: number;
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (info: RetryInfo) => void;
    signal?: AbortSignal;
    random?: () => number;
}

function isStatusRetryable(status: number): boolean {
    return status === 429 || status >= 500;
}

function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
}

/**
 * Decide whether a failed request is worth repeating.
 */
export function isRetryableError(error: unknown): boolean {
    if (error instanceof HttpStatusError) return isStatusRetryable(error.status);
    // Every other client error (validation, decoding, not found) is final.
    if (error instanceof BeakerError) return false;
    if (axios.isCancel(error)) return false;
    if (axios.isAxiosError(error)) {
        if (error.response) return isStatusRetryable(error.response.status);
        // No response at all: the connection broke or never opened.
        return error.code !== 'ERR_BAD_OPTION' && error.code !== 'ERR_BAD_OPTION_VALUE' && error.code !== 'ERR_INVALID_URL';
    }
    const code = errorCode(error);
    return code !== undefined && TRANSIENT_ERROR_CODES.has(code);
}

/**
 * Delay before retry number `retryNumber` (1-based).
 */
export function computeBackoffDelay(
    retryNumber: number,
    options: BackoffOptions = {},
    random: () => number = Math.random
): number {
    const {
        baseDelayMs = DEFAULT_BACKOFF_BASE_MS,
        multiplier = DEFAULT_BACKOFF_MULTIPLIER,
        maxDelayMs = DEFAULT_BACKOFF_MAX_MS,
        jitter = DEFAULT_BACKOFF_JITTER,
    } = options;
    const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(multiplier, Math.max(0, retryNumber - 1)));
    const factor = 1 + jitter * (2 * random() - 1);
    return Math.max(0, Math.round(exponential * factor));
}

/**
 * Run `operation` until it succeeds, a non-retryable error occurs, or
 * `maxAttempts` calls have failed. Aborting `signal` stops immediately and
 * rethrows the abort reason unchanged.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const {
        maxAttempts = DEFAULT_MAX_ATTEMPTS,
        isRetryable = isRetryableError,
        onRetry,
        signal,
        random = Math.random,
    } = options;

    for (let attempt = 1; ; attempt++) {
        if (signal?.aborted) throw signal.reason;
        try {
            return await raceAbort(operation(attempt), signal);
        } catch (error) {
            if (signal?.aborted) throw signal.reason;
            if (!isRetryable(error)) {
                throw new StreamError('fatal', attempt, error);
            }
            if (attempt >= maxAttempts) {
                logger.error(`Request failed after ${attempt}/${maxAttempts} attempts: ${String(error)}`);
                throw new StreamError('exhausted', attempt, error);
            }
            const delayMs = computeBackoffDelay(attempt, options, random);
            logger.warn(`Retry attempt ${attempt + 1}/${maxAttempts}, waiting ${delayMs}ms...`);
            onRetry?.({ attempt, delayMs, error });
            await sleep(delayMs, signal);
        }
    }
}
