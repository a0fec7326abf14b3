/**
 * Type definitions for the beaker-ts package
 */
import type { StreamError } from './lib/errors';

// A job is identified by its Beaker ID; the watcher never mutates it.
export type JobHandle = string;

// Lifecycle states, in the order a job moves through them.
export const JOB_STATES = ['created', 'scheduled', 'running', 'stopping', 'finalized'] as const;
export type CurrentJobState = typeof JOB_STATES[number];

export const CANCELED_CODES = [
    'unspecified',
    'system-preemption',
    'user-preemption',
    'idle',
    'manual',
    'timeout',
    'node-unavailable',
    'impossible-to-schedule',
    'sibling-task-failed',
    'sibling-task-preemption',
    'healthcheck-failed',
    'sibling-task-retry',
] as const;
export type CanceledCode = typeof CANCELED_CODES[number];

/**
 * A snapshot of a job's status as returned by one poll.
 * Snapshots are replaced on every poll, never updated in place.
 */
export interface JobStatus {
    readonly currentState: CurrentJobState;
    readonly createdAt: Date;
    readonly scheduledAt?: Date;
    readonly startedAt?: Date;
    readonly exitedAt?: Date;
    readonly failedAt?: Date;
    readonly canceledAt?: Date;
    readonly finalizedAt?: Date;
    readonly exitCode?: number;
    readonly canceledCode?: CanceledCode;
    readonly canceledReason?: string;
    readonly message?: string;
    readonly failedSchedulingMessage?: string;
}

/**
 * One line of job output.
 * `timestamp` is RFC 3339 UTC with nine fractional digits, so comparing two
 * timestamps as strings compares them chronologically.
 */
export interface LogLine {
    readonly jobId: JobHandle;
    readonly timestamp: string;
    readonly sequence: number;
    readonly payload: string;
}

export interface LogQuery {
    since?: string;
    tailLines?: number;
    follow: boolean;
}

export type Outcome =
    | { kind: 'succeeded'; exitCode: number }
    | { kind: 'failed'; exitCode: number | null; message: string }
    | { kind: 'canceled'; code: CanceledCode; reason: string }
    | { kind: 'timed-out'; afterMs: number }
    | { kind: 'stream-error'; cause: StreamError }
    | { kind: 'aborted'; reason: string };

export type OutcomeKind = Outcome['kind'];

export interface JobResult {
    jobId: JobHandle;
    outcome: Outcome;
}

/**
 * The remote operations the watcher depends on.
 * Implementations must be safe to call concurrently.
 */
export interface JobTransport {
    fetchStatus(jobId: JobHandle, signal?: AbortSignal): Promise<JobStatus>;
    fetchLogs(jobId: JobHandle, query: LogQuery, signal?: AbortSignal): AsyncIterable<LogLine[]>;
    cancelJob(jobId: JobHandle, reason?: string): Promise<void>;
}

export interface RetryInfo {
    attempt: number;
    delayMs: number;
    error: unknown;
}

// Progress hooks; every method is optional so observers only implement what they render.
export interface WatchObserver {
    onStart?(jobIds: readonly JobHandle[]): void;
    onStatus?(jobId: JobHandle, status: JobStatus): void;
    onRetry?(jobId: JobHandle, info: RetryInfo): void;
    onLogBatch?(jobId: JobHandle, lines: readonly LogLine[], cursor: string | null): void;
    onOutcome?(jobId: JobHandle, outcome: Outcome): void;
    onFinish?(results: readonly JobResult[]): void;
}

// Progress UI types (used by lib/ui.ts)
export type ProgressStyle = 'simple' | 'bar' | 'spinner' | 'none';
