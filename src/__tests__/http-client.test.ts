import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError, IntervalLimiter } from '../utils/http-client.js';
import { initLogger } from '../utils/logger.js';

function okResponse(body: unknown) {
    return {
        ok: true,
        status: 200,
        statusText: 'OK',
        headers: new Map([['content-type', 'application/json']]),
        json: async () => body,
        text: async () => JSON.stringify(body),
    };
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeAll(() => {
        initLogger({ level: 'error', jsonLogs: true });
    });

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, rateLimits: { pubmed: 1000 } });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('pubmed')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should count requests per source and reset', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(okResponse({ ok: 1 })));

            await client.get('https://api.example.com/a', { source: 'pubmed' });
            await client.get('https://api.example.com/b', { source: 'pubmed' });

            expect(client.getAllRequestCounts()).toEqual({ pubmed: 2 });
            client.resetCounts();
            expect(client.getRequestCount('pubmed')).toBe(0);
        });
    });

    describe('responses', () => {
        it('should parse JSON by content type and send a User-Agent', async () => {
            const mockFetch = vi.fn().mockResolvedValue(okResponse({ data: 'ok' }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await new HttpClient({ version: '9.9.9', email: 'tester@example.com' })
                .get<{ data: string }>('https://api.example.com/json');

            expect(response.data).toEqual({ data: 'ok' });
            expect(response.headers).toEqual({ 'content-type': 'application/json' });
            expect(mockFetch.mock.calls[0]?.[1]?.headers).toEqual({
                'User-Agent': 'industry-papers/9.9.9 (mailto:tester@example.com)',
            });
            expect(mockFetch.mock.calls[0]?.[1]?.method).toBe('GET');
            expect(mockFetch.mock.calls[0]?.[1]).not.toHaveProperty('body');
        });

        it('should return text for other content types', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue({
                ok: true,
                status: 200,
                statusText: 'OK',
                headers: new Map([['content-type', 'text/xml']]),
                text: async () => '<a/>',
            }));

            const response = await client.get<string>('https://api.example.com/xml');
            expect(response.data).toBe('<a/>');
        });
    });

    describe('HttpError', () => {
        it('should carry the status and response', () => {
            const error = new HttpError('Bad Request', 400, { error: 'bad request' });
            expect(error.message).toBe('Bad Request');
            expect(error.status).toBe(400);
            expect(error.response).toEqual({ error: 'bad request' });
            expect(error.name).toBe('HttpError');
        });

        it('should be thrown for a non-success status, without retry', async () => {
            const mockFetch = vi.fn().mockResolvedValue({
                ok: false,
                status: 503,
                statusText: 'Service Unavailable',
                headers: new Map([['content-type', 'text/plain']]),
                text: async () => 'busy',
            });
            vi.stubGlobal('fetch', mockFetch);

            const error = await client.get('https://api.example.com/down').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 503, message: 'HTTP 503: Service Unavailable', response: 'busy' });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should use status 0 for network failures', async () => {
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

            await expect(client.get('https://api.example.com/x')).rejects.toMatchObject({
                status: 0,
                message: 'Network error: fetch failed',
            });
        });

        it('should use status 0 for timeouts', async () => {
            vi.stubGlobal('fetch', vi.fn((_url: string, init?: RequestInit) => new Promise((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => {
                    const abort = new Error('This operation was aborted');
                    abort.name = 'AbortError';
                    reject(abort);
                });
            })));

            await expect(client.get('https://api.example.com/slow', { timeout: 20 })).rejects.toMatchObject({
                status: 0,
                message: 'Request timeout after 20ms: https://api.example.com/slow',
            });
        });
    });

    describe('rate limiting', () => {
        it('should space requests to the same source', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(okResponse({ data: 'ok' })));
            const limited = new HttpClient({ rateLimits: { pubmed: 10 } });

            const start = Date.now();
            await Promise.all([
                limited.get('https://api.example.com/1', { source: 'pubmed' }),
                limited.get('https://api.example.com/2', { source: 'pubmed' }),
                limited.get('https://api.example.com/3', { source: 'pubmed' }),
            ]);
            const elapsed = Date.now() - start;

            // 3 requests at 10/s: two intervals of 100ms
            expect(elapsed).toBeGreaterThanOrEqual(180);
            expect(limited.getRequestCount('pubmed')).toBe(3);
        });
    });
});

describe('IntervalLimiter', () => {
    it('should derive the interval from the rate', () => {
        expect(new IntervalLimiter(3).intervalMs).toBe(334);
        expect(new IntervalLimiter(10).intervalMs).toBe(100);
    });

    it('should reject a non-positive rate', () => {
        expect(() => new IntervalLimiter(0)).toThrow(RangeError);
    });

    it('should let the first call through immediately', async () => {
        const limiter = new IntervalLimiter(1);
        const start = Date.now();
        await limiter.acquire();
        expect(Date.now() - start).toBeLessThan(50);
    });
});
