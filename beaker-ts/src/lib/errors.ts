/**
 * Errors raised by the beaker-ts client.
 * Job failures are not errors: they are reported as Outcome values.
 */

export class BeakerError extends Error {
    constructor(message?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Misuse of the API, raised before any network I/O.
export class ValidationError extends BeakerError {}

export class DuplicateJobError extends ValidationError {
    constructor(readonly jobId: string) {
        super(`Job '${jobId}' was given more than once`);
    }
}

export class ConfigurationError extends BeakerError {}

export class NotFoundError extends BeakerError {}

export class JobNotFound extends NotFoundError {
    constructor(readonly jobId: string) {
        super(`Job '${jobId}' not found`);
    }
}

export class PermissionsError extends BeakerError {}

export class HttpStatusError extends BeakerError {
    constructor(readonly status: number, message: string) {
        super(`[code=${status}] ${message}`);
    }
}

// A bounded wait (such as following logs with a timeout) ran out of time.
export class JobTimeoutError extends BeakerError {
    constructor(readonly jobId: string, readonly afterMs: number) {
        super(`Gave up on job '${jobId}' after ${afterMs}ms`);
    }
}

// The remote service answered with something we could not decode.
export class DecodeError extends BeakerError {}

export type StreamErrorReason = 'fatal' | 'exhausted';

/**
 * Communication with the service failed: either a non-retryable error, or
 * retryable errors until the attempt budget ran out.
 */
export class StreamError extends BeakerError {
    constructor(
        readonly reason: StreamErrorReason,
        readonly attempts: number,
        cause: unknown,
    ) {
        super(
            reason === 'exhausted'
                ? `Gave up after ${attempts} attempts: ${describeError(cause)}`
                : `Request failed: ${describeError(cause)}`,
            { cause },
        );
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

export function toStreamError(error: unknown, attempts = 1): StreamError {
    if (error instanceof StreamError) return error;
    return new StreamError('fatal', attempts, error);
}
