/**
 * Constants and configuration values for the beaker-ts package.
 */
import * as dotenv from 'dotenv';
import { MAX_TIMER_MS } from './lib/abort';
import { ConfigurationError } from './lib/errors';
import type { ProgressStyle } from './types';

// Load environment variables
dotenv.config();

// API configuration
export const DEFAULT_ADDRESS = 'https://beaker.org';
export const API_VERSION = 'v3';
export const USER_AGENT = 'beaker-watch/0.1.0';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 5;

// Backoff between retries: base * multiplier^(n-1), capped, +/- jitter
export const DEFAULT_BACKOFF_BASE_MS = 1_000;
export const DEFAULT_BACKOFF_MULTIPLIER = 2;
export const DEFAULT_BACKOFF_MAX_MS = 30_000;
export const DEFAULT_BACKOFF_JITTER = 0.2;

export const DEFAULT_POLL_INTERVAL_MS = 2_000;

// Progress display configuration
export const PROGRESS_STYLES = ['simple', 'bar', 'spinner', 'none'] as const satisfies readonly ProgressStyle[];
export const DEFAULT_PROGRESS_STYLE: ProgressStyle = 'spinner';
export const SPINNER_CHARS = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
export const PROGRESS_BAR_LENGTH = 40;

export interface BackoffConfig {
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
    jitter: number;
}

export interface ClientConfig {
    address: string;
    token?: string;
    requestTimeoutMs: number;
    maxAttempts: number;
    backoff: BackoffConfig;
    pollIntervalMs: number;
}

export type ClientConfigOverrides = Partial<Omit<ClientConfig, 'backoff'>> & {
    backoff?: Partial<BackoffConfig>;
};

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${key} must be a number, got '${raw}'`);
    }
    return value;
}

// Delays end up in timers, which cannot go past MAX_TIMER_MS.
function assertDelay(name: string, value: number): void {
    if (!(value > 0)) {
        throw new ConfigurationError(`${name} must be positive, got ${value}`);
    }
    if (value > MAX_TIMER_MS) {
        throw new ConfigurationError(`${name} must be at most ${MAX_TIMER_MS}ms, got ${value}`);
    }
}

/**
 * Build the client configuration from the environment, with explicit overrides
 * taking precedence. Nothing here is read implicitly by the core services:
 * they receive the resulting object.
 */
export function loadClientConfig(
    overrides: ClientConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env
): ClientConfig {
    const config: ClientConfig = {
        address: overrides.address ?? env.BEAKER_ADDR ?? DEFAULT_ADDRESS,
        token: overrides.token ?? env.BEAKER_TOKEN,
        requestTimeoutMs: overrides.requestTimeoutMs ?? readNumber(env, 'BEAKER_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
        maxAttempts: overrides.maxAttempts ?? readNumber(env, 'BEAKER_MAX_ATTEMPTS', DEFAULT_MAX_ATTEMPTS),
        backoff: {
            baseDelayMs: overrides.backoff?.baseDelayMs ?? readNumber(env, 'BEAKER_BACKOFF_BASE_MS', DEFAULT_BACKOFF_BASE_MS),
            multiplier: overrides.backoff?.multiplier ?? readNumber(env, 'BEAKER_BACKOFF_MULTIPLIER', DEFAULT_BACKOFF_MULTIPLIER),
            maxDelayMs: overrides.backoff?.maxDelayMs ?? readNumber(env, 'BEAKER_BACKOFF_MAX_MS', DEFAULT_BACKOFF_MAX_MS),
            jitter: overrides.backoff?.jitter ?? DEFAULT_BACKOFF_JITTER,
        },
        pollIntervalMs: overrides.pollIntervalMs ?? readNumber(env, 'BEAKER_POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS),
    };

    assertDelay('requestTimeoutMs', config.requestTimeoutMs);
    assertDelay('pollIntervalMs', config.pollIntervalMs);
    assertDelay('backoff.baseDelayMs', config.backoff.baseDelayMs);
    assertDelay('backoff.maxDelayMs', config.backoff.maxDelayMs);
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
        throw new ConfigurationError(`maxAttempts must be an integer >= 1, got ${config.maxAttempts}`);
    }
    if (config.backoff.multiplier < 1) {
        throw new ConfigurationError(`backoff.multiplier must be >= 1, got ${config.backoff.multiplier}`);
    }
    if (config.backoff.jitter < 0 || config.backoff.jitter >= 1) {
        throw new ConfigurationError(`backoff.jitter must be in [0, 1), got ${config.backoff.jitter}`);
    }
    return config;
}

export function requireToken(config: ClientConfig): string {
    if (!config.token) {
        throw new ConfigurationError('Missing API token: set BEAKER_TOKEN or pass a token explicitly');
    }
    return config.token;
}

// Printable form of the configuration; the token is masked.
export function describeConfig(config: ClientConfig): string {
    const { token, backoff, ...rest } = config;
    return JSON.stringify({ ...rest, token: token ? '***' : null, backoff });
}
