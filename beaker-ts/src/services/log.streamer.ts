/**
 * Streams a job's log lines, reconnecting from the last seen timestamp after
 * transient failures and stopping once the job is finalized and drained.
 */

import logger from '../lib/logger';
import { createWaitScope, sleep } from '../lib/abort';
import type { WaitScope } from '../lib/abort';
import { JobTimeoutError, StreamError, ValidationError, toStreamError } from '../lib/errors';
import { resolveSince } from '../lib/decode';
import { assertJobId, assertTimeout } from '../lib/validation';
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_POLL_INTERVAL_MS } from '../config';
import { computeBackoffDelay, isRetryableError, withRetry } from './retry.service';
import type { BackoffOptions } from './retry.service';
import type { JobHandle, JobTransport, LogLine, LogQuery, WatchObserver } from '../types';

export interface LogStreamerOptions {
    pollIntervalMs?: number;
    maxAttempts?: number;
    backoff?: BackoffOptions;
}

export interface FollowOptions {
    // A timestamp, or a duration before the call such as '5m'.
    since?: string | Date;
    tailLines?: number;
    // Keep the stream open while the job runs (default true).
    follow?: boolean;
    // The stream fails with JobTimeoutError once this much time has passed.
    timeoutMs?: number;
    signal?: AbortSignal;
    observer?: WatchObserver;
}

interface StreamSession {
    readonly jobId: JobHandle;
    cursor: string | null;
    readonly tailLines?: number;
    failures: number;
    emitted: number;
}

/**
 * Keep the lines of `batch` that are strictly after `floor` (the cursor the
 * connection was opened with) and not older than the last admitted line, then
 * advance the cursor. Lines sharing the cursor's timestamp are only dropped
 * when they come back on a new connection.
 */
export function admitBatch(
    session: { cursor: string | null },
    batch: readonly LogLine[],
    floor: string | null = session.cursor
): LogLine[] {
    let last = session.cursor;
    const fresh: LogLine[] = [];
    for (const line of batch) {
        if (floor !== null && line.timestamp <= floor) continue;
        if (last !== null && line.timestamp < last) continue;
        fresh.push(line);
        last = line.timestamp;
    }
    session.cursor = last;
    return fresh;
}

export class LogStreamer {
    constructor(
        private readonly transport: JobTransport,
        private readonly options: LogStreamerOptions = {}
    ) { }

    /**
     * Lazily yield the lines of `jobId` in timestamp order.
     * Arguments are checked here, before the first request is made.
     */
    follow(jobId: JobHandle, opts: FollowOptions = {}): AsyncGenerator<LogLine, void, undefined> {
        assertJobId(jobId);
        if (opts.since !== undefined && opts.tailLines !== undefined) {
            throw new ValidationError("'since' and 'tailLines' cannot be used together");
        }
        if (opts.tailLines !== undefined && (!Number.isInteger(opts.tailLines) || opts.tailLines <= 0)) {
            throw new ValidationError(`'tailLines' must be a positive integer, got ${opts.tailLines}`);
        }
        assertTimeout(opts.timeoutMs);
        let cursor: string | null = null;
        if (opts.since !== undefined) {
            try {
                cursor = resolveSince(opts.since);
            } catch (error) {
                throw new ValidationError(`Invalid 'since' value: ${String(opts.since)}`, { cause: error });
            }
        }

        const session: StreamSession = {
            jobId,
            cursor,
            ...(opts.tailLines !== undefined ? { tailLines: opts.tailLines } : {}),
            failures: 0,
            emitted: 0,
        };
        return this.stream(session, opts.follow ?? true, opts);
    }

    private async *stream(session: StreamSession, follow: boolean, opts: FollowOptions): AsyncGenerator<LogLine, void, undefined> {
        const { jobId } = session;
        const { observer } = opts;
        const maxAttempts = this.options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
        const pollIntervalMs = this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        // The timeout clock starts with the first read.
        const scope = createWaitScope(opts.signal, opts.timeoutMs);
        const { signal } = scope;
        let draining = false;

        try {
            for (;;) {
                if (signal.aborted) return stopped(scope, jobId);

                const query: LogQuery = { follow: follow && !draining };
                if (session.cursor !== null) {
                    query.since = session.cursor;
                } else if (session.tailLines !== undefined) {
                    query.tailLines = session.tailLines;
                }

                const floor = session.cursor;
                try {
                    for await (const batch of this.transport.fetchLogs(jobId, query, signal)) {
                        session.failures = 0;
                        const fresh = admitBatch(session, batch, floor);
                        if (fresh.length === 0) continue;
                        session.emitted += fresh.length;
                        observer?.onLogBatch?.(jobId, fresh, session.cursor);
                        yield* fresh;
                    }
                } catch (error) {
                    if (signal.aborted) return stopped(scope, jobId);
                    if (!isRetryableError(error)) {
                        throw toStreamError(error, session.failures + 1);
                    }
                    session.failures++;
                    if (session.failures >= maxAttempts) {
                        throw new StreamError('exhausted', session.failures, error);
                    }
                    const delayMs = computeBackoffDelay(session.failures, this.options.backoff);
                    logger.warn(`Log stream for job ${jobId} dropped, reconnecting in ${delayMs}ms from ${session.cursor ?? 'start'}`);
                    observer?.onRetry?.(jobId, { attempt: session.failures, delayMs, error });
                    if (!(await this.pause(delayMs, signal))) return stopped(scope, jobId);
                    continue;
                }

                // A one-shot fetch, or the last fetch after finalization, is complete.
                if (!query.follow) return;

                let finalized: boolean;
                try {
                    const status = await withRetry(() => this.transport.fetchStatus(jobId, signal), {
                        maxAttempts,
                        ...this.options.backoff,
                        signal,
                    });
                    finalized = status.currentState === 'finalized';
                } catch (error) {
                    if (signal.aborted) return stopped(scope, jobId);
                    throw toStreamError(error);
                }

                if (finalized) {
                    // Fetch once more so lines written just before finalization are not lost.
                    draining = true;
                    continue;
                }
                if (!(await this.pause(pollIntervalMs, signal))) return stopped(scope, jobId);
            }
        } finally {
            scope.dispose();
            logger.debug(`Log stream for job ${jobId} closed after ${session.emitted} lines`);
        }
    }

    // Resolves false when the wait was cut short by `signal`.
    private async pause(ms: number, signal: AbortSignal): Promise<boolean> {
        try {
            await sleep(ms, signal);
            return true;
        } catch (error) {
            if (signal.aborted) return false;
            throw error;
        }
    }
}

// Cancellation ends the stream quietly; running out of time does not.
function stopped(scope: WaitScope, jobId: JobHandle): void {
    if (scope.timedOut()) {
        throw new JobTimeoutError(jobId, Date.now() - scope.startedAt);
    }
}
