/**
 * Decoding of Beaker API payloads into the typed model.
 * Remote enumerations are decoded defensively: unknown values map to an
 * explicit fallback instead of failing.
 */
import { z } from 'zod';
import { DecodeError } from './errors';
import { CANCELED_CODES } from '../types';
import type { CanceledCode, CurrentJobState, JobHandle, JobStatus, LogLine } from '../types';

const RFC3339 = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Normalise a timestamp to `YYYY-MM-DDTHH:MM:SS.fffffffffZ`.
 * Sub-millisecond digits are kept, which `Date` would drop.
 */
export function normalizeTimestamp(input: string | Date): string {
    if (input instanceof Date) {
        if (Number.isNaN(input.getTime())) throw new DecodeError('Invalid date');
        return `${input.toISOString().slice(0, 23)}000000Z`;
    }
    const match = RFC3339.exec(input.trim());
    if (!match) throw new DecodeError(`Invalid timestamp '${input}'`);
    const [, seconds, fraction = '', zone] = match;
    const nanos = fraction.padEnd(9, '0');
    if (zone === 'Z') return `${seconds}.${nanos}Z`;
    const utc = new Date(`${seconds}${zone}`);
    if (Number.isNaN(utc.getTime())) throw new DecodeError(`Invalid timestamp '${input}'`);
    return `${utc.toISOString().slice(0, 19)}.${nanos}Z`;
}

const DURATION = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/;
const DURATION_UNIT_MS: Record<string, number> = { ms: 1, s: 1_000, m: 60_000, h: 3_600_000, d: 86_400_000 };

/**
 * Parse a relative duration such as `90s`, `5m` or `1.5h` into milliseconds.
 * Returns undefined for anything else.
 */
export function parseDuration(input: string): number | undefined {
    const match = DURATION.exec(input.trim());
    if (!match) return undefined;
    const [, amount = '', unit = ''] = match;
    const factor = DURATION_UNIT_MS[unit];
    return factor === undefined ? undefined : Number(amount) * factor;
}

/**
 * Resolve a `since` value to a cursor: an absolute timestamp, or a duration
 * measured back from `now`.
 */
export function resolveSince(since: string | Date, now: number = Date.now()): string {
    if (typeof since === 'string') {
        const agoMs = parseDuration(since);
        if (agoMs !== undefined) return normalizeTimestamp(new Date(now - agoMs));
    }
    return normalizeTimestamp(since);
}

// Beaker reports unset timestamps as the zero time (year 1).
function toOptionalDate(value: string | null | undefined, ctx: z.RefinementCtx): Date | undefined {
    if (value === null || value === undefined || value === '') return undefined;
    if (value.startsWith('0001-01-01')) return undefined;
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp '${value}'` });
        return z.NEVER;
    }
    return date;
}

const optionalTimestamp = z.string().nullish().transform(toOptionalDate);

/**
 * Accepts the wire enum number, the `CANCELATION_CODE_*` name, or a lowercase
 * name. Returns undefined for the explicit "unspecified" value, which is what
 * the service sends for jobs that were never canceled.
 */
export function decodeCanceledCode(raw: unknown): CanceledCode | undefined {
    if (raw === null || raw === undefined || raw === '' || raw === 0) return undefined;
    if (typeof raw === 'number') {
        return CANCELED_CODES[raw] ?? 'unspecified';
    }
    if (typeof raw !== 'string') return 'unspecified';
    const name = raw.trim().replace(/^CANCELATION_CODE_/i, '').toLowerCase().replace(/_/g, '-');
    if (name === 'unspecified') return undefined;
    return CANCELED_CODES.find((code) => code === name) ?? 'unspecified';
}

const JobStatusPayload = z.object({
    created: z.string().transform((value, ctx) => {
        const date = toOptionalDate(value, ctx);
        if (date === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing creation time' });
            return z.NEVER;
        }
        return date;
    }),
    scheduled: optionalTimestamp,
    started: optionalTimestamp,
    exited: optionalTimestamp,
    failed: optionalTimestamp,
    finalized: optionalTimestamp,
    canceled: optionalTimestamp,
    idleSince: optionalTimestamp,
    exitCode: z.number().int().nullish(),
    message: z.string().nullish(),
    canceledFor: z.string().nullish(),
    canceledCode: z.union([z.number(), z.string()]).nullish(),
    failedSchedulingMessage: z.string().nullish(),
});

export const JobPayload = z.object({
    id: z.string(),
    name: z.string().nullish(),
    status: JobStatusPayload,
});

type DecodedStatus = z.output<typeof JobStatusPayload>;

export function deriveCurrentState(status: DecodedStatus): CurrentJobState {
    if (status.finalized) return 'finalized';
    if (status.exited || status.canceled) return 'stopping';
    if (status.started || status.idleSince) return 'running';
    if (status.scheduled) return 'scheduled';
    return 'created';
}

function toJobStatus(status: DecodedStatus): JobStatus {
    const canceledCode = decodeCanceledCode(status.canceledCode);
    return {
        currentState: deriveCurrentState(status),
        createdAt: status.created,
        ...(status.scheduled ? { scheduledAt: status.scheduled } : {}),
        ...(status.started ? { startedAt: status.started } : {}),
        ...(status.exited ? { exitedAt: status.exited } : {}),
        ...(status.failed ? { failedAt: status.failed } : {}),
        ...(status.canceled ? { canceledAt: status.canceled } : {}),
        ...(status.finalized ? { finalizedAt: status.finalized } : {}),
        ...(typeof status.exitCode === 'number' ? { exitCode: status.exitCode } : {}),
        ...(canceledCode ? { canceledCode } : {}),
        ...(status.canceledFor ? { canceledReason: status.canceledFor } : {}),
        ...(status.message ? { message: status.message } : {}),
        ...(status.failedSchedulingMessage ? { failedSchedulingMessage: status.failedSchedulingMessage } : {}),
    };
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export interface DecodedJob {
    id: JobHandle;
    name?: string;
    status: JobStatus;
}

export function decodeJob(payload: unknown): DecodedJob {
    const parsed = JobPayload.safeParse(payload);
    if (!parsed.success) {
        throw new DecodeError(`Malformed job response: ${formatIssues(parsed.error)}`);
    }
    const { id, name, status } = parsed.data;
    return { id, ...(name ? { name } : {}), status: toJobStatus(status) };
}

export function decodeJobStatus(payload: unknown): JobStatus {
    const parsed = JobStatusPayload.safeParse(payload);
    if (!parsed.success) {
        throw new DecodeError(`Malformed job status: ${formatIssues(parsed.error)}`);
    }
    return toJobStatus(parsed.data);
}

/**
 * Decode one `<timestamp> <payload>` line of job output.
 */
export function decodeLogLine(raw: string, jobId: JobHandle, sequence: number): LogLine {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    const space = line.indexOf(' ');
    const stamp = space === -1 ? line : line.slice(0, space);
    const payload = space === -1 ? '' : line.slice(space + 1);
    return { jobId, timestamp: normalizeTimestamp(stamp), sequence, payload };
}
