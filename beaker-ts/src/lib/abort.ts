import { setTimeout as setTimeoutPromise } from 'timers/promises';

/**
 * Sleep that rejects as soon as `signal` aborts, so callers never wait out a
 * full poll interval or backoff delay after cancellation.
 */
// Node clamps longer timer delays to 1ms.
export const MAX_TIMER_MS = 2_147_483_647;

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw abortError(signal);
    try {
        await setTimeoutPromise(ms, undefined, { signal });
    } catch (error) {
        // Surface the caller's reason rather than the timer's AbortError.
        if (signal?.aborted) throw abortError(signal);
        throw error;
    }
}

export function abortError(signal: AbortSignal): unknown {
    return signal.reason ?? new Error('The operation was aborted');
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts, whichever comes
 * first. Keeps cancellation prompt even when the wrapped call ignores signals.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return promise;
    if (signal.aborted) {
        // The abandoned call may still reject; that result is not wanted.
        void promise.catch(() => undefined);
        return Promise.reject(abortError(signal));
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(abortError(signal));
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

export class TimeoutReason extends Error {
    constructor(readonly afterMs: number) {
        super(`Timed out after ${afterMs}ms`);
        this.name = 'TimeoutReason';
    }
}

export interface WaitScope {
    readonly signal: AbortSignal;
    readonly startedAt: number;
    timedOut(): boolean;
    abort(reason?: unknown): void;
    dispose(): void;
}

/**
 * A child abort scope: aborts when the parent does, or when `timeoutMs` passes.
 * `dispose` must be called on every exit path to clear the timer and listener.
 */
export function createWaitScope(parent?: AbortSignal, timeoutMs?: number): WaitScope {
    const controller = new AbortController();
    const startedAt = Date.now();
    let didTimeOut = false;

    const onParentAbort = () => controller.abort(parent?.reason);
    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    if (timeoutMs !== undefined && !controller.signal.aborted) {
        timer = setTimeout(() => {
            didTimeOut = true;
            controller.abort(new TimeoutReason(timeoutMs));
        }, timeoutMs);
    }

    return {
        signal: controller.signal,
        startedAt,
        timedOut: () => didTimeOut,
        abort: (reason?: unknown) => controller.abort(reason),
        dispose: () => {
            if (timer) clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        },
    };
}

export function describeAbortReason(signal: AbortSignal): string {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) return reason.message;
    if (typeof reason === 'string') return reason;
    return 'canceled by caller';
}
