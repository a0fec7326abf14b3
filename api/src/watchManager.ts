import { v4 as uuidv4 } from 'uuid';
import { assertTimeout, assertUniqueJobIds, describeError, logger } from '@beaker-watch/client';
import type { CurrentJobState, JobAggregator, JobHandle } from '@beaker-watch/client';
import { SseWatchObserver } from './sseObserver';
import { TERMINAL_STAGES } from './types';
import type { OutcomeView, SseEvent, WatchRequest, WatchStage, WatchState } from './types';

// The subset of an express Response the manager writes to.
export interface SseClient {
    write(chunk: string): unknown;
    end(): unknown;
    on(event: 'close', listener: () => void): unknown;
}

export interface WatchManagerOptions {
    // Finished watches older than this are dropped when a new one is created.
    retentionMs?: number;
}

const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

export class WatchManager {
    private watches: Map<string, WatchState> = new Map();
    private streams: Map<string, Set<SseClient>> = new Map();
    private controllers: Map<string, AbortController> = new Map();
    private runs: Map<string, Promise<void>> = new Map();
    private readonly retentionMs: number;

    constructor(private readonly aggregator: JobAggregator, options: WatchManagerOptions = {}) {
        this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    }

    /**
     * Validate the request and start watching in the background.
     * Throws a ValidationError for bad job IDs or timeouts.
     */
    startWatch(request: WatchRequest): WatchState {
        assertUniqueJobIds(request.jobIds);
        assertTimeout(request.timeoutMs);
        this.prune();

        const id = uuidv4();
        const now = Date.now();
        const watch: WatchState = {
            id,
            stage: 'pending',
            jobIds: [...request.jobIds],
            failFast: request.failFast ?? false,
            ...(request.timeoutMs !== undefined ? { timeoutMs: request.timeoutMs } : {}),
            states: {},
            outcomes: [],
            createdAt: now,
            updatedAt: now,
        };
        this.watches.set(id, watch);
        this.streams.set(id, new Set());

        const controller = new AbortController();
        this.controllers.set(id, controller);
        this.runs.set(id, this.run(watch, controller.signal));
        logger.info(`Watch ${id} started for ${watch.jobIds.length} job(s)`);
        return watch;
    }

    getWatch(id: string): WatchState | undefined {
        return this.watches.get(id);
    }

    /**
     * Abort a running watch and wait for it to settle.
     * Resolves false when the watch does not exist.
     */
    async cancelWatch(id: string): Promise<boolean> {
        if (!this.watches.has(id)) return false;
        this.controllers.get(id)?.abort('canceled by client');
        await this.runs.get(id);
        return true;
    }

    // Resolves once the watch has finished; for callers that need the final state.
    async settled(id: string): Promise<WatchState | undefined> {
        await this.runs.get(id);
        return this.watches.get(id);
    }

    attachStream(id: string, client: SseClient): boolean {
        const watch = this.watches.get(id);
        const set = this.streams.get(id);
        if (!watch || !set) return false;

        // Replay what already happened so late subscribers see the full picture.
        this.send(client, { type: 'stage', stage: watch.stage });
        for (const outcome of watch.outcomes) {
            this.send(client, { type: 'outcome', ...outcome });
        }
        if (TERMINAL_STAGES.includes(watch.stage)) {
            client.end();
            return true;
        }

        set.add(client);
        client.on('close', () => {
            set.delete(client);
        });
        return true;
    }

    emit(id: string, event: SseEvent): void {
        const set = this.streams.get(id);
        if (!set) return;
        for (const client of set) {
            this.send(client, event);
        }
    }

    recordState(id: string, jobId: JobHandle, state: CurrentJobState): boolean {
        const watch = this.watches.get(id);
        if (!watch || watch.states[jobId] === state) return false;
        this.updateWatch(id, { states: { ...watch.states, [jobId]: state } });
        return true;
    }

    recordOutcome(id: string, view: OutcomeView): void {
        const watch = this.watches.get(id);
        if (!watch) return;
        this.updateWatch(id, { outcomes: [...watch.outcomes, view] });
    }

    private async run(watch: WatchState, signal: AbortSignal): Promise<void> {
        const { id } = watch;
        this.setStage(id, 'watching');
        try {
            await this.aggregator.awaitAll(watch.jobIds, {
                failFast: watch.failFast,
                timeoutMs: watch.timeoutMs,
                signal,
                observer: new SseWatchObserver(id, this),
            });
            this.setStage(id, signal.aborted ? 'canceled' : 'finished');
        } catch (error) {
            const message = describeError(error);
            logger.error(`Watch ${id} failed: ${message}`);
            this.updateWatch(id, { error: message });
            this.emit(id, { type: 'error', error: message });
            this.setStage(id, 'error');
        } finally {
            this.controllers.delete(id);
            this.closeStreams(id);
        }
    }

    private setStage(id: string, stage: WatchStage): void {
        this.updateWatch(id, { stage });
        this.emit(id, { type: 'stage', stage });
    }

    private updateWatch(id: string, updates: Partial<WatchState>): void {
        const watch = this.watches.get(id);
        if (!watch) return;
        this.watches.set(id, { ...watch, ...updates, updatedAt: Date.now() });
    }

    private send(client: SseClient, event: SseEvent): void {
        client.write(`data: ${JSON.stringify(event)}\n\n`);
    }

    private closeStreams(id: string): void {
        const set = this.streams.get(id);
        if (!set) return;
        for (const client of set) {
            client.end();
        }
        set.clear();
    }

    private prune(): void {
        const cutoff = Date.now() - this.retentionMs;
        for (const [id, watch] of this.watches) {
            if (TERMINAL_STAGES.includes(watch.stage) && watch.updatedAt < cutoff) {
                this.watches.delete(id);
                this.streams.delete(id);
                this.runs.delete(id);
            }
        }
    }
}
