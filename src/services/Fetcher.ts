import axios, { AxiosError, AxiosInstance } from 'axios';
import { NetworkFailure } from '../errors';
import { ContentFetcher, FetchOptions, FetchResult } from '../types';
import { fingerprint } from './ContentHasher';

const USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64)',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7)',
    'Mozilla/5.0 (X11; Linux x86_64)',
    'Mozilla/5.0 (iPhone; CPU iPhone OS 14_0 like Mac OS X)',
];

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED_TIMEOUT']);

export const DEFAULT_MAX_CONTENT_BYTES = 10 * 1024 * 1024;

export interface HttpFetcherOptions {
    /** Bodies larger than this fail with reason `too_large`. */
    maxContentBytes?: number;
    random?: () => number;
}

export class HttpFetcher implements ContentFetcher {
    private readonly httpClient: AxiosInstance;
    private readonly maxContentBytes: number;
    private readonly random: () => number;

    constructor(httpClient?: AxiosInstance, options: HttpFetcherOptions = {}) {
        this.maxContentBytes = options.maxContentBytes ?? DEFAULT_MAX_CONTENT_BYTES;
        this.random = options.random ?? Math.random;
        this.httpClient =
            httpClient ||
            axios.create({
                headers: {
                    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                },
                maxRedirects: 5,
            });
    }

    pickUserAgent(): string {
        const index = Math.min(Math.floor(this.random() * USER_AGENTS.length), USER_AGENTS.length - 1);
        return USER_AGENTS[index];
    }

    async fetch(url: string, options: FetchOptions): Promise<FetchResult> {
        try {
            const response = await this.httpClient.get<unknown>(url, {
                timeout: options.timeoutMs,
                maxContentLength: this.maxContentBytes,
                signal: options.signal,
                responseType: 'text',
                // keep the body exactly as served; no JSON parsing
                transformResponse: [(data: unknown) => data],
                headers: { 'User-Agent': this.pickUserAgent() },
            });
            const content =
                typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
            return { success: true, content, status: response.status, fingerprint: fingerprint(content) };
        } catch (error) {
            return { success: false, error: toNetworkFailure(url, error) };
        }
    }
}

export function toNetworkFailure(url: string, error: unknown): NetworkFailure {
    if (axios.isCancel(error)) {
        return new NetworkFailure('aborted', `Fetch of ${url} was aborted`, undefined, { cause: error });
    }
    if (axios.isAxiosError(error)) {
        if (error.response) {
            const { status, statusText } = error.response;
            return new NetworkFailure(
                'http_status',
                `Fetch of ${url} failed: ${status} ${statusText ?? ''}`.trim(),
                status,
                { cause: error }
            );
        }
        // axios gives an oversized body no response and no dedicated code
        if (error.code === AxiosError.ERR_BAD_RESPONSE && /maxContentLength/.test(error.message)) {
            return new NetworkFailure('too_large', `Fetch of ${url} failed: ${error.message}`, undefined, {
                cause: error,
            });
        }
        if (error.code && TIMEOUT_CODES.has(error.code)) {
            return new NetworkFailure('timeout', `Fetch of ${url} timed out`, undefined, { cause: error });
        }
        return new NetworkFailure('connection', `Fetch of ${url} failed: ${error.message}`, undefined, {
            cause: error,
        });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new NetworkFailure('connection', `Fetch of ${url} failed: ${message}`, undefined, { cause: error });
}
