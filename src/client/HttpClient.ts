/**
 * HTTP Client
 * Axios wrapper for the SideFX Web API RPC endpoint and build downloads
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import * as fs from 'fs';
import { Transform, type Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { TokenManager } from '../auth/TokenManager.js';
import { DEFAULT_ENDPOINT_URL } from '../utils/config.js';
import { DownloadError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface HttpClientConfig {
    endpointUrl?: string;
    tokenManager: TokenManager;
    logger?: Logger;
}

export type RpcFailure =
    | { ok: false; kind: 'http'; status: number; statusText: string; body: string }
    | { ok: false; kind: 'network'; message: string }
    | { ok: false; kind: 'malformed'; message: string };

export type RpcResult<T = unknown> = { ok: true; data: T } | RpcFailure;

/** JSON value that can travel inside the RPC envelope */
export type RpcValue = string | number | boolean | null | RpcValue[] | { [key: string]: RpcValue };

/**
 * Build the form value for an RPC call: [functionName, args, kwargs]
 */
export function encodeEnvelope(
    functionName: string,
    args: RpcValue[] = [],
    kwargs: Record<string, RpcValue> = {}
): string {
    return JSON.stringify([functionName, args, kwargs]);
}

export function describeFailure(failure: RpcFailure): string {
    switch (failure.kind) {
        case 'http':
            return `HTTP ${failure.status} ${failure.statusText}`.trim();
        case 'network':
        case 'malformed':
            return failure.message;
    }
}

export class HttpClient {
    private readonly client: AxiosInstance;
    private readonly tokenManager: TokenManager;
    private readonly logger: Logger;
    readonly endpointUrl: string;

    constructor(config: HttpClientConfig) {
        this.tokenManager = config.tokenManager;
        this.logger = config.logger ?? silentLogger;
        this.endpointUrl = config.endpointUrl || DEFAULT_ENDPOINT_URL;

        this.client = axios.create({
            // every status is returned as a value, see call()
            validateStatus: () => true,
        });

        // Add auth interceptor
        this.client.interceptors.request.use(async (requestConfig) => {
            const accessToken = await this.tokenManager.getAccessToken();
            requestConfig.headers.Authorization = `Bearer ${accessToken}`;
            return requestConfig;
        });
    }

    /**
     * Call a remote function. HTTP and network failures are returned,
     * not thrown; token failures from the interceptor still throw.
     */
    async call(
        functionName: string,
        args: RpcValue[] = [],
        kwargs: Record<string, RpcValue> = {}
    ): Promise<RpcResult> {
        const form = new URLSearchParams({ json: encodeEnvelope(functionName, args, kwargs) });
        this.logger.debug(`POST ${this.endpointUrl} ${form.get('json')}`);

        let response: AxiosResponse<unknown>;
        try {
            response = await this.client.post<unknown>(this.endpointUrl, form, { responseType: 'json' });
        } catch (error) {
            if (!axios.isAxiosError(error)) throw error;
            this.logger.debug(`${functionName}: ${error.message}`);
            return { ok: false, kind: 'network', message: error.message };
        }

        if (response.status === 200) {
            return { ok: true, data: response.data };
        }

        const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
        this.logger.debug(`${response.status} ${response.statusText} ${body}`);
        return { ok: false, kind: 'http', status: response.status, statusText: response.statusText, body };
    }

    /**
     * Stream an unauthenticated URL to a file. The partial file is removed
     * on failure. Resolves with the number of bytes written.
     */
    async download(
        url: string,
        destination: string,
        onProgress?: (received: number, total: number | undefined) => void
    ): Promise<number> {
        let response: AxiosResponse<Readable>;
        try {
            response = await axios.get<Readable>(url, { responseType: 'stream' });
        } catch (error) {
            throw new DownloadError(url, errorMessage(error));
        }

        const length = Number(response.headers['content-length']);
        const total = Number.isFinite(length) && length > 0 ? length : undefined;
        let received = 0;

        const counter = new Transform({
            transform(chunk: Buffer, _encoding, callback) {
                received += chunk.length;
                onProgress?.(received, total);
                callback(null, chunk);
            },
        });

        try {
            await pipeline(response.data, counter, fs.createWriteStream(destination));
        } catch (error) {
            fs.rmSync(destination, { force: true });
            throw new DownloadError(url, errorMessage(error));
        }

        this.logger.debug(`Wrote ${received} bytes to ${destination}`);
        return received;
    }
}
