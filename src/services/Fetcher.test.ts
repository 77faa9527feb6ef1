import axios, { AxiosError, AxiosRequestConfig } from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { fingerprint } from './ContentHasher';
import { DEFAULT_MAX_CONTENT_BYTES, HttpFetcher, toNetworkFailure } from './Fetcher';

describe('HttpFetcher', () => {
    const url = 'https://example.com/news';
    let mock: MockAdapter;
    let fetcher: HttpFetcher;

    beforeEach(() => {
        const axiosInstance = axios.create();
        mock = new MockAdapter(axiosInstance);
        fetcher = new HttpFetcher(axiosInstance, { random: () => 0.5 });
    });

    afterEach(() => {
        mock.reset();
    });

    it('should return the body as served', async () => {
        mock.onGet(url).reply(200, '<html>hi</html>');

        await expect(fetcher.fetch(url, { timeoutMs: 1000 })).resolves.toEqual({
            success: true,
            content: '<html>hi</html>',
            status: 200,
            fingerprint: fingerprint('<html>hi</html>'),
        });
    });

    it('should not parse JSON bodies', async () => {
        mock.onGet(url).reply(200, '{"a":1}');

        const result = await fetcher.fetch(url, { timeoutMs: 1000 });
        expect(result).toEqual({ success: true, content: '{"a":1}', status: 200, fingerprint: fingerprint('{"a":1}') });
    });

    it('should send the timeout and a rotating user agent', async () => {
        let captured: AxiosRequestConfig | undefined;
        mock.onGet(url).reply((config) => {
            captured = config;
            return [200, 'ok'];
        });

        await fetcher.fetch(url, { timeoutMs: 2500 });

        expect(captured?.timeout).toBe(2500);
        expect(captured?.maxContentLength).toBe(DEFAULT_MAX_CONTENT_BYTES);
        expect(captured?.headers?.['User-Agent']).toBe('Mozilla/5.0 (X11; Linux x86_64)');
    });

    it('should report non-2xx responses as http_status failures', async () => {
        mock.onGet(url).reply(404, 'missing');

        const result = await fetcher.fetch(url, { timeoutMs: 1000 });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.reason).toBe('http_status');
            expect(result.error.status).toBe(404);
        }
    });

    it('should report timeouts', async () => {
        mock.onGet(url).timeout();

        const result = await fetcher.fetch(url, { timeoutMs: 1000 });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.reason).toBe('timeout');
            expect(result.error.message).toBe(`Fetch of ${url} timed out`);
        }
    });

    it('should report connection errors', async () => {
        mock.onGet(url).networkError();

        const result = await fetcher.fetch(url, { timeoutMs: 1000 });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.reason).toBe('connection');
        }
    });

    it('should report an aborted fetch without throwing', async () => {
        mock.onGet(url).reply(200, 'late');
        const controller = new AbortController();
        controller.abort();

        const result = await fetcher.fetch(url, { timeoutMs: 1000, signal: controller.signal });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.reason).toBe('aborted');
        }
    });

    it('should bound the response body at the configured size', async () => {
        const axiosInstance = axios.create();
        const bounded = new MockAdapter(axiosInstance);
        let captured: AxiosRequestConfig | undefined;
        bounded.onGet(url).reply((config) => {
            captured = config;
            return [200, 'ok'];
        });

        await new HttpFetcher(axiosInstance, { maxContentBytes: 2048 }).fetch(url, { timeoutMs: 1000 });

        expect(captured?.maxContentLength).toBe(2048);
    });

    it('should report an oversized body as too_large', () => {
        const error = new AxiosError('maxContentLength size of 2048 exceeded', AxiosError.ERR_BAD_RESPONSE);

        const failure = toNetworkFailure(url, error);

        expect(failure.reason).toBe('too_large');
        expect(failure.message).toBe(`Fetch of ${url} failed: maxContentLength size of 2048 exceeded`);
        expect(failure.status).toBeUndefined();
    });
});
