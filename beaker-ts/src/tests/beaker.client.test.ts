import { Readable } from 'stream';
import axios, { AxiosError } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { BeakerClient } from '../services/beaker.client';
import { loadClientConfig } from '../config';
import { ConfigurationError, HttpStatusError, JobNotFound, PermissionsError } from '../lib/errors';
import { isRetryableError } from '../services/retry.service';
import type { LogLine } from '../types';

interface Reply {
    status: number;
    data: unknown;
}

// An axios instance whose adapter answers in process.
function createHttp(reply: (config: InternalAxiosRequestConfig) => Reply) {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
        baseURL: 'https://beaker.test/api/v3',
        adapter: async (config) => {
            requests.push(config);
            const { status, data } = reply(config);
            const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
            if (status >= 400) {
                throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
            }
            return response;
        },
    });
    return { http, requests };
}

const config = loadClientConfig({ token: 'test-secret' }, {});

const runningJob = {
    id: 'job-1',
    name: 'train',
    status: { created: '2024-05-01T10:00:00Z', started: '2024-05-01T10:00:10Z' },
};

describe('BeakerClient', () => {
    test('requires a token', () => {
        expect(() => new BeakerClient(loadClientConfig({}, {}))).toThrow(ConfigurationError);
    });

    test('getJob decodes the job', async () => {
        const { http, requests } = createHttp(() => ({ status: 200, data: runningJob }));
        const client = new BeakerClient(config, http);

        const job = await client.getJob('job-1');
        expect(job.name).toBe('train');
        expect(job.status.currentState).toBe('running');
        expect(requests[0]?.method).toBe('get');
        expect(requests[0]?.url).toBe('jobs/job-1');
    });

    test('fetchStatus returns the status only', async () => {
        const { http } = createHttp(() => ({ status: 200, data: runningJob }));
        const status = await new BeakerClient(config, http).fetchStatus('job-1');
        expect(status.startedAt).toEqual(new Date('2024-05-01T10:00:10Z'));
    });

    test('maps 404 to JobNotFound', async () => {
        const { http } = createHttp(() => ({ status: 404, data: { message: 'not found' } }));
        await expect(new BeakerClient(config, http).fetchStatus('job-1')).rejects.toBeInstanceOf(JobNotFound);
    });

    test('maps 403 to PermissionsError', async () => {
        const { http } = createHttp(() => ({ status: 403, data: { message: 'forbidden' } }));
        await expect(new BeakerClient(config, http).fetchStatus('job-1')).rejects.toThrow(new PermissionsError('forbidden'));
    });

    test('maps other statuses to HttpStatusError, retryable for 5xx', async () => {
        const { http } = createHttp(() => ({ status: 503, data: { message: 'try later' } }));
        const error = await new BeakerClient(config, http).fetchStatus('job-1').catch((e: unknown) => e);
        expect(error).toBeInstanceOf(HttpStatusError);
        expect(error).toMatchObject({ status: 503, message: '[code=503] try later' });
        expect(isRetryableError(error)).toBe(true);
    });

    test('treats "already in use" as a conflict', async () => {
        const { http } = createHttp(() => ({ status: 400, data: { message: 'name already in use' } }));
        const error = await new BeakerClient(config, http).finalizeJob('job-1').catch((e: unknown) => e);
        expect(error).toMatchObject({ status: 409 });
        expect(isRetryableError(error)).toBe(false);
    });

    test('cancelJob patches the status', async () => {
        const { http, requests } = createHttp(() => ({ status: 200, data: runningJob }));
        await new BeakerClient(config, http).cancelJob('job-1', 'no longer needed');

        expect(requests[0]?.method).toBe('patch');
        expect(JSON.parse(String(requests[0]?.data))).toEqual({ status: { canceled: true, canceledFor: 'no longer needed' } });
    });

    test('fetchLogs yields complete lines per chunk', async () => {
        const chunks = [
            Buffer.from('2024-05-01T10:00:00Z first\n2024-05-01T10:00:01Z sec'),
            Buffer.from('ond\n'),
            Buffer.from('2024-05-01T10:00:02.5Z third'),
        ];
        const { http, requests } = createHttp(() => ({ status: 200, data: Readable.from(chunks) }));
        const client = new BeakerClient(config, http);

        const batches: LogLine[][] = [];
        for await (const batch of client.fetchLogs('job-1', { follow: true, since: '2024-05-01T09:00:00.000000000Z' })) {
            batches.push(batch);
        }

        expect(batches.map((batch) => batch.map((line) => line.payload))).toEqual([['first'], ['second'], ['third']]);
        expect(batches[2]?.[0]?.timestamp).toBe('2024-05-01T10:00:02.500000000Z');
        expect(requests[0]?.url).toBe('jobs/job-1/logs');
        expect(requests[0]?.params).toEqual({ follow: 'true', since: '2024-05-01T09:00:00.000000000Z' });
        expect(requests[0]?.responseType).toBe('stream');
    });

    test('fetchLogs passes the tail size', async () => {
        const { http, requests } = createHttp(() => ({ status: 200, data: Readable.from([]) }));
        const batches: LogLine[][] = [];
        for await (const batch of new BeakerClient(config, http).fetchLogs('job-1', { follow: false, tailLines: 20 })) {
            batches.push(batch);
        }
        expect(batches).toEqual([]);
        expect(requests[0]?.params).toEqual({ follow: 'false', tail: '20' });
    });
});
