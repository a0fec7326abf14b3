/**
 * Terminal progress display for job watches.
 */

import ora from 'ora';
import type { Ora } from 'ora';
import * as cliProgress from 'cli-progress';
import chalk from 'chalk';
import { describeOutcome } from '../services/outcome.classifier';
import { summarizeResults } from '../services/job.aggregator';
import { SPINNER_CHARS, PROGRESS_BAR_LENGTH } from '../config';
import type {
    CurrentJobState,
    JobHandle,
    JobResult,
    JobStatus,
    Outcome,
    ProgressStyle,
    RetryInfo,
    WatchObserver,
} from '../types';

export type MessageStyle = 'info' | 'success' | 'warning' | 'error';

export interface ConsoleObserverOptions {
    style: ProgressStyle;
    // Defaults to whether stderr is a TTY.
    interactive?: boolean;
    // Where result lines go (default console.log).
    write?: (line: string) => void;
}

function isInteractiveTerminal(): boolean {
    return Boolean(process.stderr.isTTY);
}

/**
 * Format milliseconds as mm:ss
 */
export function formatElapsed(ms: number): string {
    const seconds = Math.max(0, Math.floor(ms / 1000));
    const mins = Math.floor(seconds / 60);
    const secs = seconds % 60;
    return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}

export function outcomeStyle(outcome: Outcome): MessageStyle {
    switch (outcome.kind) {
        case 'succeeded':
            return 'success';
        case 'failed':
        case 'stream-error':
            return 'error';
        case 'canceled':
        case 'timed-out':
        case 'aborted':
            return 'warning';
    }
}

export function formatOutcome(jobId: JobHandle, outcome: Outcome): string {
    return `${jobId}: ${describeOutcome(outcome)}`;
}

export function formatSummary(results: readonly JobResult[]): string {
    const summary = summarizeResults(results);
    const parts = Object.entries(summary)
        .filter(([, count]) => count > 0)
        .map(([kind, count]) => `${count} ${kind}`);
    return `${results.length} job(s): ${parts.length > 0 ? parts.join(', ') : 'none'}`;
}

const STATUS_FIELDS = [
    ['created', 'createdAt'],
    ['scheduled', 'scheduledAt'],
    ['started', 'startedAt'],
    ['exited', 'exitedAt'],
    ['failed', 'failedAt'],
    ['canceled', 'canceledAt'],
    ['finalized', 'finalizedAt'],
] as const;

// One "label: value" line per field that is set.
export function formatStatus(status: JobStatus): string {
    const lines = [`state: ${status.currentState}`];
    for (const [label, key] of STATUS_FIELDS) {
        const value = status[key];
        if (value) lines.push(`${label}: ${value.toISOString()}`);
    }
    if (status.exitCode !== undefined) lines.push(`exit code: ${status.exitCode}`);
    if (status.canceledCode !== undefined) lines.push(`canceled code: ${status.canceledCode}`);
    if (status.canceledReason) lines.push(`canceled for: ${status.canceledReason}`);
    if (status.failedSchedulingMessage) lines.push(`scheduling: ${status.failedSchedulingMessage}`);
    if (status.message) lines.push(`message: ${status.message}`);
    return lines.join('\n');
}

/**
 * Renders watch progress with ora, cli-progress or plain lines.
 * Progress goes to stderr and only on a TTY; outcome lines always go to `write`.
 */
export class ConsoleWatchObserver implements WatchObserver {
    private readonly style: ProgressStyle;
    private readonly interactive: boolean;
    private readonly write: (line: string) => void;
    private spinner: Ora | null = null;
    private progressBar: cliProgress.SingleBar | null = null;
    private readonly states = new Map<JobHandle, CurrentJobState>();
    private readonly deferred: string[] = [];
    private total = 0;
    private done = 0;
    private startTime = Date.now();

    constructor(options: ConsoleObserverOptions) {
        this.style = options.style;
        this.interactive = options.interactive ?? isInteractiveTerminal();
        this.write = options.write ?? ((line) => console.log(line));
    }

    onStart(jobIds: readonly JobHandle[]): void {
        this.total = jobIds.length;
        this.done = 0;
        this.startTime = Date.now();
        this.cleanup();
        const title = `Waiting for ${this.total} job(s)`;

        if (this.style === 'simple') {
            this.write(`${title}...`);
            return;
        }
        if (!this.interactive || this.style === 'none') {
            return;
        }

        switch (this.style) {
            case 'spinner':
                this.spinner = ora({
                    text: `${title}...`,
                    spinner: { frames: SPINNER_CHARS },
                }).start();
                break;
            case 'bar':
                this.progressBar = new cliProgress.SingleBar({
                    format: `${title} |${chalk.cyan('{bar}')}| {value}/{total} | {elapsed} | {last}`,
                    barCompleteChar: '█',
                    barIncompleteChar: '░',
                    hideCursor: true,
                    clearOnComplete: false,
                    barsize: PROGRESS_BAR_LENGTH,
                });
                this.progressBar.start(this.total, 0, { elapsed: '00:00', last: '' });
                break;
        }
    }

    onStatus(jobId: JobHandle, status: JobStatus): void {
        const previous = this.states.get(jobId);
        this.states.set(jobId, status.currentState);
        if (previous === status.currentState) return;

        if (this.style === 'simple') {
            this.write(`${jobId}: ${status.currentState}`);
        } else if (this.spinner) {
            this.spinner.text = `${this.done}/${this.total} done | ${jobId} ${status.currentState} | ${formatElapsed(Date.now() - this.startTime)}`;
        }
    }

    onRetry(jobId: JobHandle, info: RetryInfo): void {
        const text = `${jobId}: request failed, retry ${info.attempt + 1} in ${info.delayMs}ms`;
        if (this.style === 'simple') {
            this.write(styleMessage(text, 'warning'));
        } else if (this.spinner) {
            this.spinner.text = text;
        }
    }

    onOutcome(jobId: JobHandle, outcome: Outcome): void {
        this.done++;
        const line = styleMessage(formatOutcome(jobId, outcome), outcomeStyle(outcome));

        if (this.progressBar) {
            // The bar owns the terminal until it stops.
            this.deferred.push(line);
            this.progressBar.update(this.done, {
                elapsed: formatElapsed(Date.now() - this.startTime),
                last: `${jobId} ${outcome.kind}`,
            });
            return;
        }
        if (this.spinner) {
            this.spinner.clear();
            this.write(line);
            this.spinner.text = `${this.done}/${this.total} done | ${formatElapsed(Date.now() - this.startTime)}`;
            this.spinner.render();
            return;
        }
        this.write(line);
    }

    onFinish(results: readonly JobResult[]): void {
        const allSucceeded = results.every((result) => result.outcome.kind === 'succeeded');
        const summary = `${formatSummary(results)} in ${formatElapsed(Date.now() - this.startTime)}`;

        if (this.spinner) {
            if (allSucceeded) {
                this.spinner.succeed(summary);
            } else {
                this.spinner.fail(summary);
            }
            this.spinner = null;
            return;
        }
        if (this.progressBar) {
            this.progressBar.stop();
            this.progressBar = null;
            for (const line of this.deferred.splice(0)) this.write(line);
        }
        if (this.style !== 'none') {
            this.write(styleMessage(summary, allSucceeded ? 'success' : 'error'));
        }
    }

    /**
     * Stop any live display, e.g. when the watch is interrupted.
     */
    cleanup(): void {
        if (this.spinner) {
            this.spinner.stop();
            this.spinner = null;
        }
        if (this.progressBar) {
            this.progressBar.stop();
            this.progressBar = null;
        }
        for (const line of this.deferred.splice(0)) this.write(line);
    }
}

/**
 * Create a styled message using chalk
 */
export function styleMessage(message: string, style: MessageStyle): string {
    switch (style) {
        case 'info':
            return chalk.blue(message);
        case 'success':
            return chalk.green(message);
        case 'warning':
            return chalk.yellow(message);
        case 'error':
            return chalk.red(message);
        default:
            return message;
    }
}

export function printMessage(message: string, style: MessageStyle): void {
    console.log(styleMessage(message, style));
}

/**
 * Print a titled block to the console
 */
export function printResult(title: string, content: string): void {
    console.log('\n' + chalk.bold.cyan(title));
    console.log(chalk.gray('─'.repeat(process.stdout.columns || 80)));
    console.log(content);
    console.log(chalk.gray('─'.repeat(process.stdout.columns || 80)) + '\n');
}
