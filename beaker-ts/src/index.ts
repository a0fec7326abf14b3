export { BeakerClient, createBeakerClient } from './services/beaker.client';
export { StatusPoller } from './services/status.poller';
export type { StatusPollerOptions, WaitForOptions } from './services/status.poller';
export { LogStreamer, admitBatch } from './services/log.streamer';
export type { LogStreamerOptions, FollowOptions } from './services/log.streamer';
export { JobAggregator, FAIL_FAST_REASON, summarizeResults } from './services/job.aggregator';
export type { AggregateOptions } from './services/job.aggregator';
export { classify, describeOutcome, isPreemption, isSuccess, isUserCancellation } from './services/outcome.classifier';
export { withRetry, isRetryableError, computeBackoffDelay } from './services/retry.service';
export type { RetryOptions, BackoffOptions } from './services/retry.service';
export { createWatcher } from './services/watch.service';
export type { Watcher } from './services/watch.service';
export { loadClientConfig, describeConfig } from './config';
export type { ClientConfig, ClientConfigOverrides } from './config';
export * from './lib/errors';
export { assertJobId, assertUniqueJobIds, assertTimeout } from './lib/validation';
export { normalizeTimestamp, parseDuration, resolveSince, decodeJob, decodeJobStatus } from './lib/decode';
export type { DecodedJob } from './lib/decode';
export { default as logger } from './lib/logger';
export { MAX_TIMER_MS } from './lib/abort';
// Re-export common types for consumers (e.g., api package)
export { JOB_STATES, CANCELED_CODES } from './types';
export type {
    JobHandle,
    CurrentJobState,
    CanceledCode,
    JobStatus,
    LogLine,
    LogQuery,
    Outcome,
    OutcomeKind,
    JobResult,
    JobTransport,
    RetryInfo,
    WatchObserver,
    ProgressStyle,
} from './types';
