import { MAX_TIMER_MS } from './abort';
import { DuplicateJobError, ValidationError } from './errors';
import type { JobHandle } from '../types';

const JOB_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function assertJobId(jobId: unknown): asserts jobId is JobHandle {
    if (typeof jobId !== 'string' || !JOB_ID.test(jobId)) {
        throw new ValidationError(`Invalid job ID '${String(jobId)}'`);
    }
}

export function assertUniqueJobIds(jobIds: readonly JobHandle[]): void {
    const seen = new Set<JobHandle>();
    for (const jobId of jobIds) {
        assertJobId(jobId);
        if (seen.has(jobId)) throw new DuplicateJobError(jobId);
        seen.add(jobId);
    }
}

export function assertTimeout(timeoutMs: number | undefined, name = 'timeoutMs'): void {
    if (timeoutMs === undefined) return;
    if (!(timeoutMs > 0)) {
        throw new ValidationError(`'${name}' must be a positive number, got ${timeoutMs}`);
    }
    if (timeoutMs > MAX_TIMER_MS) {
        throw new ValidationError(`'${name}' must be at most ${MAX_TIMER_MS}ms, got ${timeoutMs}`);
    }
}
