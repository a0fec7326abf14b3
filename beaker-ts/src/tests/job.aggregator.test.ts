import { setTimeout as delay } from 'timers/promises';
import { FAIL_FAST_REASON, JobAggregator, summarizeResults } from '../services/job.aggregator';
import { StatusPoller } from '../services/status.poller';
import { MAX_TIMER_MS } from '../lib/abort';
import { DuplicateJobError, JobNotFound, ValidationError } from '../lib/errors';
import { FakeTransport, makeStatus, succeeded } from './fakeTransport';
import type { JobResult, WatchObserver } from '../types';

const pollerOptions = { pollIntervalMs: 10, maxAttempts: 2, backoff: { baseDelayMs: 1, maxDelayMs: 1, jitter: 0 } };
const running = makeStatus('running');

function aggregatorFor(transport: FakeTransport): JobAggregator {
    return new JobAggregator(new StatusPoller(transport, pollerOptions));
}

describe('JobAggregator', () => {
    test('reports every job once, in completion order', async () => {
        const transport = new FakeTransport()
            .scriptStatus('slow', running, running, succeeded())
            .scriptStatus('fast', succeeded())
            .scriptStatus('broken', running, new JobNotFound('broken'));

        const results = await aggregatorFor(transport).awaitAll(['slow', 'fast', 'broken']);

        expect(results.map(({ jobId, outcome }) => [jobId, outcome.kind])).toEqual([
            ['fast', 'succeeded'],
            ['broken', 'stream-error'],
            ['slow', 'succeeded'],
        ]);
    });

    test('fail-fast reports the failure, then aborts the rest in input order', async () => {
        const transport = new FakeTransport()
            .scriptStatus('a', running)
            .scriptStatus('b', makeStatus('finalized', { exitCode: 3 }))
            .scriptStatus('c', running);

        const results = await aggregatorFor(transport).awaitAll(['a', 'b', 'c'], { failFast: true });

        expect(results).toEqual([
            { jobId: 'b', outcome: { kind: 'failed', exitCode: 3, message: 'exited with code 3' } },
            { jobId: 'a', outcome: { kind: 'aborted', reason: FAIL_FAST_REASON } },
            { jobId: 'c', outcome: { kind: 'aborted', reason: FAIL_FAST_REASON } },
        ]);

        // The remaining pollers have stopped.
        const polled = transport.calls('a');
        await delay(50);
        expect(transport.calls('a')).toBe(polled);
    });

    test('fail-fast keeps the real outcome of jobs that finished alongside the failure', async () => {
        const transport = new FakeTransport()
            .scriptStatus('a', makeStatus('finalized', { exitCode: 1 }))
            .scriptStatus('b', succeeded())
            .scriptStatus('c', running);

        const results = await aggregatorFor(transport).awaitAll(['a', 'b', 'c'], { failFast: true });

        expect(results).toEqual([
            { jobId: 'a', outcome: { kind: 'failed', exitCode: 1, message: 'exited with code 1' } },
            { jobId: 'b', outcome: { kind: 'succeeded', exitCode: 0 } },
            { jobId: 'c', outcome: { kind: 'aborted', reason: FAIL_FAST_REASON } },
        ]);
    });

    test('fail-fast keeps the caller reason when the caller aborts', async () => {
        const transport = new FakeTransport().scriptStatus('a', running).scriptStatus('b', running);
        const controller = new AbortController();
        setTimeout(() => controller.abort('shutting down'), 20);

        const results = await aggregatorFor(transport).awaitAll(['a', 'b'], { failFast: true, signal: controller.signal });
        expect(results.map(({ outcome }) => outcome)).toEqual([
            { kind: 'aborted', reason: 'shutting down' },
            { kind: 'aborted', reason: 'shutting down' },
        ]);
    });

    test('without fail-fast a failure does not stop the others', async () => {
        const transport = new FakeTransport()
            .scriptStatus('a', running, succeeded())
            .scriptStatus('b', makeStatus('finalized', { exitCode: 3 }));

        const results = await aggregatorFor(transport).awaitAll(['a', 'b']);
        expect(summarizeResults(results)).toEqual({
            'succeeded': 1,
            'failed': 1,
            'canceled': 0,
            'timed-out': 0,
            'stream-error': 0,
            'aborted': 0,
        });
    });

    test('applies the timeout to each job', async () => {
        const transport = new FakeTransport().scriptStatus('a', running).scriptStatus('b', succeeded());

        const results = await aggregatorFor(transport).awaitAll(['a', 'b'], { timeoutMs: 40 });
        expect(results.map(({ jobId, outcome }) => [jobId, outcome.kind])).toEqual([
            ['b', 'succeeded'],
            ['a', 'timed-out'],
        ]);
    });

    test('caller cancellation aborts every pending job', async () => {
        const transport = new FakeTransport().scriptStatus('a', running).scriptStatus('b', running);
        const controller = new AbortController();
        setTimeout(() => controller.abort('shutting down'), 20);

        const results = await aggregatorFor(transport).awaitAll(['a', 'b'], { signal: controller.signal });
        expect(results).toHaveLength(2);
        for (const { outcome } of results) {
            expect(outcome).toEqual({ kind: 'aborted', reason: 'shutting down' });
        }
    });

    test('stopping iteration early stops polling', async () => {
        const transport = new FakeTransport().scriptStatus('a', succeeded()).scriptStatus('b', running);

        for await (const result of aggregatorFor(transport).asCompleted(['a', 'b'])) {
            expect(result.jobId).toBe('a');
            break;
        }
        const polled = transport.calls('b');
        await delay(50);
        expect(transport.calls('b')).toBe(polled);
    });

    test('notifies the observer', async () => {
        const transport = new FakeTransport().scriptStatus('a', succeeded());
        const observer = { onStart: jest.fn(), onOutcome: jest.fn(), onFinish: jest.fn() } satisfies WatchObserver;

        await aggregatorFor(transport).awaitAll(['a'], { observer });

        expect(observer.onStart).toHaveBeenCalledWith(['a']);
        expect(observer.onOutcome).toHaveBeenCalledWith('a', { kind: 'succeeded', exitCode: 0 });
        const finished: JobResult[] = [{ jobId: 'a', outcome: { kind: 'succeeded', exitCode: 0 } }];
        expect(observer.onFinish).toHaveBeenCalledWith(finished);
    });

    test('an empty list completes immediately', async () => {
        await expect(aggregatorFor(new FakeTransport()).awaitAll([])).resolves.toEqual([]);
    });

    test('rejects duplicate or invalid job IDs before polling', () => {
        const transport = new FakeTransport();
        const aggregator = aggregatorFor(transport);

        expect(() => aggregator.asCompleted(['a', 'b', 'a'])).toThrow(DuplicateJobError);
        expect(() => aggregator.asCompleted(['ok', ' spaced '])).toThrow(ValidationError);
        expect(() => aggregator.asCompleted(['a'], { timeoutMs: -1 })).toThrow(ValidationError);
        expect(() => aggregator.asCompleted(['a'], { timeoutMs: MAX_TIMER_MS + 1 })).toThrow(ValidationError);
        expect(() => aggregator.asCompleted(['a'], { pollIntervalMs: MAX_TIMER_MS + 1 })).toThrow(ValidationError);
        expect(transport.calls('a')).toBe(0);
    });
});
