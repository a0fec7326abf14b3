import { ValidationError } from '../lib/errors';
import type { CanceledCode, JobStatus, Outcome } from '../types';

const USER_CANCELLATIONS: ReadonlySet<CanceledCode> = new Set<CanceledCode>(['manual', 'user-preemption']);
const PREEMPTIONS: ReadonlySet<CanceledCode> = new Set<CanceledCode>([
    'system-preemption',
    'user-preemption',
    'sibling-task-preemption',
]);

/**
 * Turn the final status of a job into its outcome.
 * Pure: the same status always yields an equal outcome.
 */
export function classify(status: JobStatus): Outcome {
    if (status.currentState !== 'finalized') {
        throw new ValidationError(`Cannot classify a job in state '${status.currentState}'`);
    }

    if (status.canceledCode !== undefined) {
        return { kind: 'canceled', code: status.canceledCode, reason: status.canceledReason ?? status.message ?? '' };
    }
    // Canceled before the service recorded why.
    if (status.canceledAt !== undefined) {
        return { kind: 'canceled', code: 'unspecified', reason: status.canceledReason ?? status.message ?? '' };
    }

    if (status.exitCode === 0) {
        return { kind: 'succeeded', exitCode: 0 };
    }
    if (status.exitCode !== undefined) {
        return { kind: 'failed', exitCode: status.exitCode, message: status.message ?? `exited with code ${status.exitCode}` };
    }
    // Never ran: failed scheduling, or finalized before assignment.
    return {
        kind: 'failed',
        exitCode: null,
        message: status.failedSchedulingMessage ?? status.message ?? 'job finalized without an exit code',
    };
}

// Whether the user (as opposed to the system) caused the cancellation.
export function isUserCancellation(code: CanceledCode): boolean {
    return USER_CANCELLATIONS.has(code);
}

export function isPreemption(code: CanceledCode): boolean {
    return PREEMPTIONS.has(code);
}

export function isSuccess(outcome: Outcome): outcome is Extract<Outcome, { kind: 'succeeded' }> {
    return outcome.kind === 'succeeded';
}

export function describeOutcome(outcome: Outcome): string {
    switch (outcome.kind) {
        case 'succeeded':
            return `succeeded (exit code ${outcome.exitCode})`;
        case 'failed':
            return outcome.exitCode === null
                ? `failed: ${outcome.message}`
                : `failed with exit code ${outcome.exitCode}: ${outcome.message}`;
        case 'canceled':
            return outcome.reason ? `canceled (${outcome.code}): ${outcome.reason}` : `canceled (${outcome.code})`;
        case 'timed-out':
            return `timed out after ${outcome.afterMs}ms`;
        case 'stream-error':
            return `stream error: ${outcome.cause.message}`;
        case 'aborted':
            return `aborted: ${outcome.reason}`;
    }
}
