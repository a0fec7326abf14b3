/**
 * Wires a transport, poller, streamer and aggregator from one configuration.
 */

import { createBeakerClient } from './beaker.client';
import { StatusPoller } from './status.poller';
import { LogStreamer } from './log.streamer';
import { JobAggregator } from './job.aggregator';
import type { ClientConfig } from '../config';
import type { JobTransport } from '../types';

export interface Watcher {
    transport: JobTransport;
    poller: StatusPoller;
    streamer: LogStreamer;
    aggregator: JobAggregator;
}

/**
 * Build the watch services. `transport` defaults to an HTTP client for
 * `config.address`, which requires a token.
 */
export function createWatcher(config: ClientConfig, transport: JobTransport = createBeakerClient(config)): Watcher {
    const shared = {
        pollIntervalMs: config.pollIntervalMs,
        maxAttempts: config.maxAttempts,
        backoff: config.backoff,
    };
    const poller = new StatusPoller(transport, shared);
    return {
        transport,
        poller,
        streamer: new LogStreamer(transport, shared),
        aggregator: new JobAggregator(poller),
    };
}
