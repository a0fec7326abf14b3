/**
 * HTTP transport for the Beaker API.
 * One axios instance is shared by every caller; requests hold no state
 * between calls, so concurrent pollers can use the same client.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse, Method, ResponseType } from 'axios';
import type { Readable } from 'stream';
import { StringDecoder } from 'string_decoder';
import logger from '../lib/logger';
import { decodeJob, decodeLogLine } from '../lib/decode';
import type { DecodedJob } from '../lib/decode';
import { HttpStatusError, JobNotFound, PermissionsError } from '../lib/errors';
import { assertJobId } from '../lib/validation';
import { API_VERSION, USER_AGENT, describeConfig, requireToken } from '../config';
import type { ClientConfig } from '../config';
import type { JobHandle, JobStatus, JobTransport, LogLine, LogQuery } from '../types';

interface RequestOptions {
    jobId?: JobHandle;
    data?: unknown;
    params?: Record<string, string>;
    signal?: AbortSignal;
    responseType?: ResponseType;
    timeout?: number;
}

function extractMessage(data: unknown): string | undefined {
    if (typeof data !== 'object' || data === null || !('message' in data)) return undefined;
    const { message } = data;
    return typeof message === 'string' ? message : undefined;
}

export class BeakerClient implements JobTransport {
    private readonly http: AxiosInstance;

    constructor(config: ClientConfig, http?: AxiosInstance) {
        this.http = http ?? axios.create({
            baseURL: `${config.address.replace(/\/$/, '')}/api/${API_VERSION}`,
            timeout: config.requestTimeoutMs,
            headers: {
                'Authorization': `Bearer ${requireToken(config)}`,
                'Content-Type': 'application/json',
                'User-Agent': USER_AGENT,
            },
        });
        logger.debug(`Initialized BeakerClient with ${describeConfig(config)}`);
    }

    async getJob(jobId: JobHandle, signal?: AbortSignal): Promise<DecodedJob> {
        assertJobId(jobId);
        const response = await this.request<unknown>('GET', `jobs/${encodeURIComponent(jobId)}`, { jobId, signal });
        return decodeJob(response.data);
    }

    async fetchStatus(jobId: JobHandle, signal?: AbortSignal): Promise<JobStatus> {
        const job = await this.getJob(jobId, signal);
        return job.status;
    }

    /**
     * Stream the job's log. Each network chunk becomes one batch of complete
     * lines; a partial trailing line is held back until the next chunk.
     */
    async *fetchLogs(jobId: JobHandle, query: LogQuery, signal?: AbortSignal): AsyncGenerator<LogLine[], void, undefined> {
        assertJobId(jobId);
        const params: Record<string, string> = { follow: String(query.follow) };
        if (query.since !== undefined) params.since = query.since;
        if (query.tailLines !== undefined) params.tail = String(query.tailLines);

        const response = await this.request<Readable>('GET', `jobs/${encodeURIComponent(jobId)}/logs`, {
            jobId,
            params,
            signal,
            responseType: 'stream',
            // A followed log can stay quiet for a long time.
            ...(query.follow ? { timeout: 0 } : {}),
        });

        const stream = response.data;
        const decoder = new StringDecoder('utf8');
        let remainder = '';
        try {
            for await (const chunk of stream) {
                const bytes: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
                const lines = (remainder + decoder.write(bytes)).split('\n');
                remainder = lines.pop() ?? '';
                const batch = this.decodeBatch(lines, jobId);
                if (batch.length > 0) yield batch;
            }
            const last = this.decodeBatch([remainder + decoder.end()], jobId);
            if (last.length > 0) yield last;
        } finally {
            stream.destroy();
        }
    }

    async cancelJob(jobId: JobHandle, reason?: string): Promise<void> {
        assertJobId(jobId);
        await this.request<unknown>('PATCH', `jobs/${encodeURIComponent(jobId)}`, {
            jobId,
            data: { status: { canceled: true, ...(reason ? { canceledFor: reason } : {}) } },
        });
        logger.info(`Canceled job ${jobId}${reason ? `: ${reason}` : ''}`);
    }

    async finalizeJob(jobId: JobHandle): Promise<DecodedJob> {
        assertJobId(jobId);
        const response = await this.request<unknown>('PATCH', `jobs/${encodeURIComponent(jobId)}`, {
            jobId,
            data: { status: { finalized: true } },
        });
        return decodeJob(response.data);
    }

    private decodeBatch(lines: string[], jobId: JobHandle): LogLine[] {
        const batch: LogLine[] = [];
        for (const raw of lines) {
            if (raw.trim() === '') continue;
            batch.push(decodeLogLine(raw, jobId, batch.length));
        }
        return batch;
    }

    private async request<T>(method: Method, resource: string, opts: RequestOptions = {}): Promise<AxiosResponse<T>> {
        logger.debug(`SEND ${method} ${resource}`);
        try {
            const response = await this.http.request<T>({
                method,
                url: resource,
                data: opts.data,
                params: opts.params,
                signal: opts.signal,
                responseType: opts.responseType,
                ...(opts.timeout !== undefined ? { timeout: opts.timeout } : {}),
            });
            logger.debug(`RECV ${method} ${resource} ${response.status}`);
            return response;
        } catch (error) {
            throw this.mapError(error, opts.jobId);
        }
    }

    // HTTP error responses become typed errors; network errors pass through for retry classification.
    private mapError(error: unknown, jobId?: JobHandle): unknown {
        if (!axios.isAxiosError(error) || !error.response) return error;
        let status = error.response.status;
        const message = extractMessage(error.response.data) ?? error.message;
        // The service sometimes reports conflicts as 400.
        if (status === 400 && message.includes('already in use')) status = 409;
        logger.debug(`RECV error ${status}: ${message}`);
        if (status === 404 && jobId !== undefined) return new JobNotFound(jobId);
        if (status === 403) return new PermissionsError(message);
        return new HttpStatusError(status, message);
    }
}

export function createBeakerClient(config: ClientConfig): BeakerClient {
    return new BeakerClient(config);
}
