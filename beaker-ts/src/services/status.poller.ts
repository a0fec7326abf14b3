/**
 * Polls a job's status until it is finalized, the caller cancels, or the
 * timeout passes.
 */

import logger from '../lib/logger';
import { createWaitScope, describeAbortReason, sleep } from '../lib/abort';
import { toStreamError } from '../lib/errors';
import { assertJobId, assertTimeout } from '../lib/validation';
import { DEFAULT_POLL_INTERVAL_MS } from '../config';
import { classify } from './outcome.classifier';
import { withRetry } from './retry.service';
import type { BackoffOptions } from './retry.service';
import { JOB_STATES } from '../types';
import type { JobHandle, JobStatus, JobTransport, Outcome, WatchObserver } from '../types';

export interface StatusPollerOptions {
    pollIntervalMs?: number;
    maxAttempts?: number;
    backoff?: BackoffOptions;
}

export interface WaitForOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
    pollIntervalMs?: number;
    observer?: WatchObserver;
}

// Per-call polling state; never shared between calls.
interface PollState {
    readonly jobId: JobHandle;
    lastSeenStatus: JobStatus | null;
    polls: number;
    retries: number;
}

function stateRank(status: JobStatus): number {
    return JOB_STATES.indexOf(status.currentState);
}

export class StatusPoller {
    constructor(
        private readonly transport: JobTransport,
        private readonly options: StatusPollerOptions = {}
    ) { }

    /**
     * Wait for `jobId` to reach a terminal state and classify it.
     * Never throws for remote failures: they come back as outcomes.
     */
    async waitFor(jobId: JobHandle, opts: WaitForOptions = {}): Promise<Outcome> {
        assertJobId(jobId);
        assertTimeout(opts.timeoutMs);
        const pollIntervalMs = opts.pollIntervalMs ?? this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        assertTimeout(pollIntervalMs, 'pollIntervalMs');
        const { observer } = opts;

        const scope = createWaitScope(opts.signal, opts.timeoutMs);
        const state: PollState = { jobId, lastSeenStatus: null, polls: 0, retries: 0 };
        const stopped = (): Outcome =>
            scope.timedOut()
                ? { kind: 'timed-out', afterMs: Date.now() - scope.startedAt }
                : { kind: 'aborted', reason: describeAbortReason(scope.signal) };

        try {
            for (;;) {
                if (scope.signal.aborted) return stopped();

                let status: JobStatus;
                try {
                    status = await withRetry(() => this.transport.fetchStatus(jobId, scope.signal), {
                        maxAttempts: this.options.maxAttempts,
                        ...this.options.backoff,
                        signal: scope.signal,
                        onRetry: (info) => {
                            state.retries++;
                            observer?.onRetry?.(jobId, info);
                        },
                    });
                } catch (error) {
                    if (scope.signal.aborted) return stopped();
                    const cause = toStreamError(error);
                    logger.error(`Polling job ${jobId} failed: ${cause.message}`);
                    return { kind: 'stream-error', cause };
                }

                this.record(state, status);
                observer?.onStatus?.(jobId, status);

                if (status.currentState === 'finalized') {
                    return classify(status);
                }

                try {
                    await sleep(pollIntervalMs, scope.signal);
                } catch (error) {
                    if (scope.signal.aborted) return stopped();
                    throw error;
                }
            }
        } finally {
            scope.dispose();
        }
    }

    private record(state: PollState, status: JobStatus): void {
        const previous = state.lastSeenStatus;
        if (previous && stateRank(status) < stateRank(previous)) {
            // Two responses raced; the later fetch wins.
            logger.warn(`Job ${state.jobId} went from '${previous.currentState}' back to '${status.currentState}'`);
        }
        state.lastSeenStatus = status;
        state.polls++;
        logger.debug(`Job ${state.jobId} is ${status.currentState} (poll ${state.polls}, ${state.retries} retries)`);
    }
}
