/**
 * Waits on many jobs at once and reports each outcome as soon as it is known.
 */

import logger from '../lib/logger';
import { createWaitScope } from '../lib/abort';
import type { WaitScope } from '../lib/abort';
import { toStreamError } from '../lib/errors';
import { assertTimeout, assertUniqueJobIds } from '../lib/validation';
import { describeOutcome } from './outcome.classifier';
import type { StatusPoller } from './status.poller';
import type { JobHandle, JobResult, OutcomeKind, WatchObserver } from '../types';

export interface AggregateOptions {
    // Stop at the first outcome that is not a success (default false).
    failFast?: boolean;
    timeoutMs?: number;
    signal?: AbortSignal;
    pollIntervalMs?: number;
    observer?: WatchObserver;
}

export const FAIL_FAST_REASON = 'fail-fast';

export class JobAggregator {
    constructor(private readonly poller: StatusPoller) { }

    /**
     * Yield one result per job, in completion order.
     * With `failFast`, the first unsuccessful result is followed by the
     * results of jobs that had already finished, then an `aborted` result for
     * every job still running, in input order.
     */
    asCompleted(jobIds: readonly JobHandle[], opts: AggregateOptions = {}): AsyncGenerator<JobResult, void, undefined> {
        assertUniqueJobIds(jobIds);
        assertTimeout(opts.timeoutMs);
        assertTimeout(opts.pollIntervalMs, 'pollIntervalMs');
        return this.collect([...jobIds], opts);
    }

    async awaitAll(jobIds: readonly JobHandle[], opts: AggregateOptions = {}): Promise<JobResult[]> {
        const results: JobResult[] = [];
        for await (const result of this.asCompleted(jobIds, opts)) {
            results.push(result);
        }
        return results;
    }

    private async *collect(jobIds: JobHandle[], opts: AggregateOptions): AsyncGenerator<JobResult, void, undefined> {
        if (jobIds.length === 0) return;
        const { observer, failFast = false } = opts;

        const scopes = new Map<JobHandle, WaitScope>();
        const pending = new Set<JobHandle>(jobIds);
        const queue: JobResult[] = [];
        const reported: JobResult[] = [];
        let wake: (() => void) | null = null;

        const deliver = (result: JobResult) => {
            queue.push(result);
            wake?.();
            wake = null;
        };

        observer?.onStart?.(jobIds);
        const tasks = jobIds.map((jobId) => {
            const scope = createWaitScope(opts.signal);
            scopes.set(jobId, scope);
            return this.poller
                .waitFor(jobId, {
                    signal: scope.signal,
                    timeoutMs: opts.timeoutMs,
                    pollIntervalMs: opts.pollIntervalMs,
                    observer,
                })
                .then(
                    (outcome) => deliver({ jobId, outcome }),
                    (error: unknown) => deliver({ jobId, outcome: { kind: 'stream-error', cause: toStreamError(error) } })
                );
        });

        const report = (result: JobResult) => {
            pending.delete(result.jobId);
            reported.push(result);
            logger.info(`Job ${result.jobId} ${describeOutcome(result.outcome)}`);
            observer?.onOutcome?.(result.jobId, result.outcome);
        };

        try {
            while (pending.size > 0) {
                if (queue.length === 0) {
                    await new Promise<void>((resolve) => {
                        wake = resolve;
                    });
                }
                const result = queue.shift();
                // Late results for jobs already reported as aborted are dropped.
                if (!result || !pending.has(result.jobId)) continue;

                report(result);
                yield result;

                // A caller abort is not a failure: each job already reports the caller's reason.
                if (failFast && !opts.signal?.aborted && result.outcome.kind !== 'succeeded' && pending.size > 0) {
                    logger.warn(`Job ${result.jobId} did not succeed; aborting ${pending.size} remaining job(s)`);
                    for (const jobId of pending) scopes.get(jobId)?.abort(FAIL_FAST_REASON);
                    await Promise.allSettled(tasks);

                    // Jobs that finished before the abort keep their real outcome.
                    for (const finished of queue.splice(0)) {
                        if (!pending.has(finished.jobId) || finished.outcome.kind === 'aborted') continue;
                        report(finished);
                        yield finished;
                    }
                    for (const jobId of jobIds) {
                        if (!pending.has(jobId)) continue;
                        const aborted: JobResult = { jobId, outcome: { kind: 'aborted', reason: FAIL_FAST_REASON } };
                        report(aborted);
                        yield aborted;
                    }
                }
            }
            observer?.onFinish?.(reported);
        } finally {
            // Also reached when the consumer stops early: no poller outlives the call.
            for (const scope of scopes.values()) scope.abort('aggregate closed');
            await Promise.allSettled(tasks);
            for (const scope of scopes.values()) scope.dispose();
        }
    }
}

export function summarizeResults(results: readonly JobResult[]): Record<OutcomeKind, number> {
    const summary: Record<OutcomeKind, number> = {
        'succeeded': 0,
        'failed': 0,
        'canceled': 0,
        'timed-out': 0,
        'stream-error': 0,
        'aborted': 0,
    };
    for (const { outcome } of results) summary[outcome.kind]++;
    return summary;
}
