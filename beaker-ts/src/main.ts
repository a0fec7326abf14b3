#!/usr/bin/env node
/**
 * Command line entry point: wait on jobs, follow their logs, cancel them.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import logger from './lib/logger';
import { describeError } from './lib/errors';
import { ConsoleWatchObserver, formatStatus, printMessage, printResult } from './lib/ui';
import { classify, describeOutcome } from './services/outcome.classifier';
import { createBeakerClient } from './services/beaker.client';
import { createWatcher } from './services/watch.service';
import { DEFAULT_PROGRESS_STYLE, PROGRESS_STYLES, loadClientConfig } from './config';
import type { ClientConfigOverrides } from './config';

// Ctrl-C cancels the running watch instead of killing the process.
function interruptSignal(): AbortSignal {
    const controller = new AbortController();
    process.once('SIGINT', () => {
        logger.warn('Interrupted, stopping...');
        controller.abort('interrupted');
    });
    return controller.signal;
}

function secondsToMs(seconds: number | undefined, name: string): number | undefined {
    if (seconds === undefined) return undefined;
    if (!Number.isFinite(seconds) || seconds <= 0) {
        throw new Error(`--${name} must be a positive number of seconds`);
    }
    return Math.round(seconds * 1000);
}

async function run(debug: boolean | undefined, action: () => Promise<number>): Promise<void> {
    if (debug) {
        logger.level = 'debug';
    }
    try {
        process.exit(await action());
    } catch (error) {
        logger.error(`Error: ${describeError(error)}`);
        printMessage(`Error: ${describeError(error)}`, 'error');
        process.exit(1);
    }
}

yargs(hideBin(process.argv))
    .scriptName('beaker-watch')
    .usage('$0 <command> [options]')
    .option('debug', {
        describe: 'Enable debug logging',
        type: 'boolean',
        default: false,
    })
    .command(
        'wait <jobIds..>',
        'Wait for jobs to finish and report each outcome',
        (y) =>
            y
                .positional('jobIds', {
                    describe: 'IDs of the jobs to wait on',
                    type: 'string',
                    array: true,
                    demandOption: true,
                })
                .option('timeout', {
                    describe: 'Give up on each job after this many seconds',
                    type: 'number',
                })
                .option('fail-fast', {
                    describe: 'Stop waiting once any job does not succeed',
                    type: 'boolean',
                    default: false,
                })
                .option('poll-interval', {
                    describe: 'Seconds between status polls',
                    type: 'number',
                })
                .option('progress', {
                    describe: 'Progress display style',
                    choices: PROGRESS_STYLES,
                    default: DEFAULT_PROGRESS_STYLE,
                })
                .example('$0 wait 01ABC 01DEF', 'Wait for two jobs')
                .example('$0 wait 01ABC --timeout 600 --fail-fast', 'Give up after ten minutes or the first failure'),
        (argv) =>
            run(argv.debug, async () => {
                const pollIntervalMs = secondsToMs(argv['poll-interval'], 'poll-interval');
                const overrides: ClientConfigOverrides = pollIntervalMs !== undefined ? { pollIntervalMs } : {};
                const { aggregator } = createWatcher(loadClientConfig(overrides));
                const observer = new ConsoleWatchObserver({ style: argv.progress });
                try {
                    const results = await aggregator.awaitAll(argv.jobIds, {
                        failFast: argv['fail-fast'],
                        timeoutMs: secondsToMs(argv.timeout, 'timeout'),
                        signal: interruptSignal(),
                        observer,
                    });
                    return results.every((result) => result.outcome.kind === 'succeeded') ? 0 : 1;
                } finally {
                    observer.cleanup();
                }
            })
    )
    .command(
        'logs <jobId>',
        "Print a job's logs, following them until the job finishes",
        (y) =>
            y
                .positional('jobId', {
                    describe: 'ID of the job',
                    type: 'string',
                    demandOption: true,
                })
                .option('since', {
                    describe: 'Only lines after this RFC 3339 timestamp, or from this long ago (e.g. 90s, 5m, 2h)',
                    type: 'string',
                })
                .option('tail', {
                    describe: 'Start from the last N lines',
                    type: 'number',
                })
                .option('follow', {
                    describe: 'Keep streaming while the job runs (--no-follow to fetch once)',
                    type: 'boolean',
                    default: true,
                })
                .option('timestamps', {
                    describe: 'Prefix each line with its timestamp',
                    type: 'boolean',
                    default: false,
                })
                .option('timeout', {
                    describe: 'Give up after this many seconds',
                    type: 'number',
                })
                .conflicts('since', 'tail')
                .example('$0 logs 01ABC --tail 100', 'Follow the last 100 lines')
                .example('$0 logs 01ABC --since 10m', 'Follow from ten minutes ago'),
        (argv) =>
            run(argv.debug, async () => {
                const { streamer } = createWatcher(loadClientConfig());
                const lines = streamer.follow(argv.jobId, {
                    since: argv.since,
                    tailLines: argv.tail,
                    follow: argv.follow,
                    timeoutMs: secondsToMs(argv.timeout, 'timeout'),
                    signal: interruptSignal(),
                });
                for await (const line of lines) {
                    process.stdout.write(argv.timestamps ? `${line.timestamp} ${line.payload}\n` : `${line.payload}\n`);
                }
                return 0;
            })
    )
    .command(
        'cancel <jobId>',
        'Cancel a job',
        (y) =>
            y
                .positional('jobId', {
                    describe: 'ID of the job',
                    type: 'string',
                    demandOption: true,
                })
                .option('reason', {
                    describe: 'Why the job is being canceled',
                    type: 'string',
                }),
        (argv) =>
            run(argv.debug, async () => {
                await createBeakerClient(loadClientConfig()).cancelJob(argv.jobId, argv.reason);
                printMessage(`Canceled job ${argv.jobId}`, 'success');
                return 0;
            })
    )
    .command(
        'status <jobId>',
        "Show a job's current status",
        (y) =>
            y.positional('jobId', {
                describe: 'ID of the job',
                type: 'string',
                demandOption: true,
            }),
        (argv) =>
            run(argv.debug, async () => {
                const job = await createBeakerClient(loadClientConfig()).getJob(argv.jobId);
                printResult(`Job ${job.id}${job.name ? ` (${job.name})` : ''}`, formatStatus(job.status));
                if (job.status.currentState === 'finalized') {
                    printMessage(describeOutcome(classify(job.status)), 'info');
                }
                return 0;
            })
    )
    .demandCommand(1, 'You must provide a valid command')
    .strict()
    .help()
    .alias('h', 'help')
    .version()
    .alias('v', 'version')
    .parse();
