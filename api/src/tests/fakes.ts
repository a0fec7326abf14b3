import type { JobHandle, JobStatus, JobTransport, LogLine } from '@beaker-watch/client';

export const finalizedStatus: JobStatus = {
    currentState: 'finalized',
    createdAt: new Date('2024-05-01T10:00:00Z'),
    finalizedAt: new Date('2024-05-01T10:05:00Z'),
    exitCode: 0,
};

export const runningStatus: JobStatus = {
    currentState: 'running',
    createdAt: new Date('2024-05-01T10:00:00Z'),
    startedAt: new Date('2024-05-01T10:00:10Z'),
};

// Each job reports a fixed status; unknown jobs are still running.
export class StaticTransport implements JobTransport {
    constructor(private readonly statuses: Record<JobHandle, JobStatus>) { }

    async fetchStatus(jobId: JobHandle): Promise<JobStatus> {
        return this.statuses[jobId] ?? runningStatus;
    }

    async *fetchLogs(): AsyncGenerator<LogLine[], void, undefined> {
        // No log output.
    }

    async cancelJob(): Promise<void> {
        return undefined;
    }
}

// Collects what the manager writes to an SSE subscriber.
export class RecordingClient {
    readonly chunks: string[] = [];
    ended = false;
    private closeListener: (() => void) | null = null;

    write(chunk: string): boolean {
        this.chunks.push(chunk);
        return true;
    }

    end(): void {
        this.ended = true;
    }

    on(_event: 'close', listener: () => void): this {
        this.closeListener = listener;
        return this;
    }

    close(): void {
        this.closeListener?.();
    }

    events(): Array<Record<string, unknown>> {
        return this.chunks.map((chunk) => JSON.parse(chunk.replace(/^data: /, '').trim()));
    }
}
