import { describeError, describeOutcome, summarizeResults } from '@beaker-watch/client';
import type { JobHandle, JobResult, JobStatus, Outcome, RetryInfo, WatchObserver } from '@beaker-watch/client';
import type { WatchManager } from './watchManager';
import type { OutcomeView } from './types';

export function toOutcomeView(jobId: JobHandle, outcome: Outcome): OutcomeView {
    const view: OutcomeView = { jobId, kind: outcome.kind, summary: describeOutcome(outcome) };
    switch (outcome.kind) {
        case 'succeeded':
        case 'failed':
            view.exitCode = outcome.exitCode;
            break;
        case 'canceled':
            view.code = outcome.code;
            break;
    }
    return view;
}

/**
 * Turns watch progress into SSE events for one watch.
 */
export class SseWatchObserver implements WatchObserver {
    constructor(
        private readonly watchId: string,
        private readonly manager: WatchManager
    ) { }

    onStatus(jobId: JobHandle, status: JobStatus): void {
        // Only state changes are worth a message; polls repeat the same state.
        if (this.manager.recordState(this.watchId, jobId, status.currentState)) {
            this.manager.emit(this.watchId, { type: 'status', jobId, state: status.currentState });
        }
    }

    onRetry(jobId: JobHandle, info: RetryInfo): void {
        this.manager.emit(this.watchId, {
            type: 'retry',
            jobId,
            attempt: info.attempt,
            delayMs: info.delayMs,
            error: describeError(info.error),
        });
    }

    onOutcome(jobId: JobHandle, outcome: Outcome): void {
        const view = toOutcomeView(jobId, outcome);
        this.manager.recordOutcome(this.watchId, view);
        this.manager.emit(this.watchId, { type: 'outcome', ...view });
    }

    onFinish(results: readonly JobResult[]): void {
        this.manager.emit(this.watchId, { type: 'done', summary: summarizeResults(results) });
    }
}
