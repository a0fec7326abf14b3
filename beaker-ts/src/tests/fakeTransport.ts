import { normalizeTimestamp } from '../lib/decode';
import type { CurrentJobState, JobHandle, JobStatus, JobTransport, LogLine, LogQuery } from '../types';

// A scripted response: a status to return, an error to throw, or a function for anything else.
export type StatusFn = (signal?: AbortSignal) => Promise<JobStatus>;
export type StatusStep = JobStatus | Error | StatusFn;

function isStatusFn(step: StatusStep): step is StatusFn {
    return typeof step === 'function';
}

export interface LogConnection {
    batches: LogLine[][];
    // Thrown after the batches, simulating a dropped connection.
    error?: unknown;
}

export const CREATED_AT = new Date('2024-05-01T10:00:00Z');

export function makeStatus(currentState: CurrentJobState, extra: Partial<JobStatus> = {}): JobStatus {
    return { currentState, createdAt: CREATED_AT, ...extra };
}

export function succeeded(): JobStatus {
    return makeStatus('finalized', { exitCode: 0, finalizedAt: new Date('2024-05-01T10:05:00Z') });
}

export function transientError(): Error {
    return Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
}

export function logLine(jobId: JobHandle, timestamp: string, payload: string, sequence = 0): LogLine {
    return { jobId, timestamp: normalizeTimestamp(timestamp), sequence, payload };
}

/**
 * In-process JobTransport driven by per-job scripts.
 * The last scripted step repeats once the others are used up.
 */
export class FakeTransport implements JobTransport {
    readonly statusCalls = new Map<JobHandle, number>();
    readonly logQueries: Array<{ jobId: JobHandle; query: LogQuery }> = [];
    readonly canceled: Array<{ jobId: JobHandle; reason?: string }> = [];
    private readonly statusScripts = new Map<JobHandle, StatusStep[]>();
    private readonly logScripts = new Map<JobHandle, LogConnection[]>();

    scriptStatus(jobId: JobHandle, ...steps: StatusStep[]): this {
        this.statusScripts.set(jobId, steps);
        return this;
    }

    scriptLogs(jobId: JobHandle, ...connections: LogConnection[]): this {
        this.logScripts.set(jobId, connections);
        return this;
    }

    calls(jobId: JobHandle): number {
        return this.statusCalls.get(jobId) ?? 0;
    }

    async fetchStatus(jobId: JobHandle, signal?: AbortSignal): Promise<JobStatus> {
        this.statusCalls.set(jobId, this.calls(jobId) + 1);
        const step = next(this.statusScripts.get(jobId));
        if (step === undefined) throw new Error(`no status scripted for ${jobId}`);
        if (step instanceof Error) throw step;
        if (isStatusFn(step)) return step(signal);
        return step;
    }

    async *fetchLogs(jobId: JobHandle, query: LogQuery): AsyncGenerator<LogLine[], void, undefined> {
        this.logQueries.push({ jobId, query: { ...query } });
        const connection = next(this.logScripts.get(jobId)) ?? { batches: [] };
        for (const batch of connection.batches) {
            yield batch;
        }
        if (connection.error !== undefined) throw connection.error;
    }

    async cancelJob(jobId: JobHandle, reason?: string): Promise<void> {
        this.canceled.push({ jobId, ...(reason !== undefined ? { reason } : {}) });
    }
}

function next<T>(steps: T[] | undefined): T | undefined {
    if (!steps || steps.length === 0) return undefined;
    return steps.length > 1 ? steps.shift() : steps[0];
}
