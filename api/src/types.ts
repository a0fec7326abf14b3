import type { CanceledCode, CurrentJobState, JobHandle, OutcomeKind } from '@beaker-watch/client';

export type WatchStage = 'pending' | 'watching' | 'finished' | 'canceled' | 'error';

export const TERMINAL_STAGES: readonly WatchStage[] = ['finished', 'canceled', 'error'];

// JSON-safe form of an Outcome; the stream-error cause is reduced to its message.
export interface OutcomeView {
    jobId: JobHandle;
    kind: OutcomeKind;
    summary: string;
    exitCode?: number | null;
    code?: CanceledCode;
}

export interface WatchRequest {
    jobIds: JobHandle[];
    failFast?: boolean;
    timeoutMs?: number;
}

export interface WatchState {
    id: string;
    stage: WatchStage;
    jobIds: JobHandle[];
    failFast: boolean;
    timeoutMs?: number;
    states: Record<JobHandle, CurrentJobState>;
    outcomes: OutcomeView[];
    error?: string;
    createdAt: number;
    updatedAt: number;
}

export type SseEvent =
    | { type: 'stage'; stage: WatchStage }
    | { type: 'status'; jobId: JobHandle; state: CurrentJobState }
    | { type: 'retry'; jobId: JobHandle; attempt: number; delayMs: number; error: string }
    | ({ type: 'outcome' } & OutcomeView)
    | { type: 'done'; summary: Record<OutcomeKind, number> }
    | { type: 'error'; error: string };
