import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { HttpClient, HttpError } from '../utils/http-client.js';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, email: 'test@example.com' });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('crossref')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should track request counts per source', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ ok: true })));

            await client.get('https://api.example.com/a', { source: 'crossref' });
            await client.get('https://api.example.com/b', { source: 'crossref' });
            await client.post('https://api.example.com/c', { q: 1 }, { source: 'openai' });

            expect(client.getAllRequestCounts()).toEqual({ crossref: 2, openai: 1 });
        });

        it('should reset counts', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({})));
            await client.get('https://api.example.com/a', { source: 'crossref' });

            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('request', () => {
        it('should parse JSON bodies and send the contact User-Agent', async () => {
            const mockFetch = vi.fn().mockImplementation(async () => jsonResponse({ message: 'hi' }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get<{ message: string }>('https://api.example.com/works');

            expect(response.status).toBe(200);
            expect(response.ok).toBe(true);
            expect(response.data).toEqual({ message: 'hi' });
            expect(response.headers['content-type']).toBe('application/json');

            const init: RequestInit = mockFetch.mock.calls[0]?.[1];
            expect(init.headers).toEqual({ 'User-Agent': 'propextract/1.0.0 (mailto:test@example.com)' });
        });

        it('should serialize object bodies as JSON', async () => {
            const mockFetch = vi.fn().mockImplementation(async () => jsonResponse({}));
            vi.stubGlobal('fetch', mockFetch);

            await client.post('https://api.example.com/chat', { model: 'm' }, { headers: { Authorization: 'Bearer test-secret' } });

            const init: RequestInit = mockFetch.mock.calls[0]?.[1];
            expect(init.method).toBe('POST');
            expect(init.body).toBe('{"model":"m"}');
            expect(init.headers).toEqual({
                'User-Agent': 'propextract/1.0.0 (mailto:test@example.com)',
                Authorization: 'Bearer test-secret',
                'Content-Type': 'application/json',
            });
        });

        it('should return text for non-JSON responses', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => new Response('plain body', { status: 200 })));

            const response = await client.get('https://api.example.com/text');
            expect(response.data).toBe('plain body');
        });

        it('should throw a non-retryable HttpError on 404', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ error: 'missing' }, 404)));

            const error = await client.get('https://api.example.com/missing').catch((e: unknown) => e);
            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 404, retryable: false, response: { error: 'missing' } });
        });

        it('should mark 429 and 5xx as retryable', async () => {
            vi.stubGlobal(
                'fetch',
                vi.fn()
                    .mockImplementationOnce(async () => jsonResponse({}, 429))
                    .mockImplementationOnce(async () => jsonResponse({}, 503))
            );

            await expect(client.get('https://api.example.com/a')).rejects.toMatchObject({ status: 429, retryable: true });
            await expect(client.get('https://api.example.com/b')).rejects.toMatchObject({ status: 503, retryable: true });
        });

        it('should classify network failures as retryable with status 0', async () => {
            const cause = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed', { cause })));

            await expect(client.get('https://api.example.com/a')).rejects.toMatchObject({
                status: 0,
                retryable: true,
                message: 'Network error: fetch failed',
            });
        });

        it('should report aborted requests as timeouts', async () => {
            const abort = new Error('aborted');
            abort.name = 'AbortError';
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(abort));

            await expect(client.get('https://api.example.com/slow', { timeout: 50 })).rejects.toMatchObject({
                status: 0,
                retryable: true,
                message: 'Request timeout after 50ms: https://api.example.com/slow',
            });
        });
    });

    describe('download', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'propextract-http-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should stream the body to disk', async () => {
            const payload = '%PDF-1.4 '.repeat(2000);
            vi.stubGlobal(
                'fetch',
                vi.fn().mockImplementation(
                    async () => new Response(payload, { status: 200, headers: { 'content-type': 'application/pdf' } })
                )
            );

            const target = join(dir, 'nested', 'paper.pdf');
            const result = await client.download('https://publisher.example.com/paper/pdf', target, { source: 'publisher' });

            expect(result).toEqual({ path: target, bytes: payload.length, contentType: 'application/pdf' });
            expect(readFileSync(target, 'utf-8')).toBe(payload);
            expect(client.getRequestCount('publisher')).toBe(1);
        });

        it('should not create the file on an error response', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => new Response('nope', { status: 403 })));

            const target = join(dir, 'paper.pdf');
            await expect(client.download('https://publisher.example.com/x', target)).rejects.toMatchObject({
                status: 403,
                retryable: false,
            });
            expect(existsSync(target)).toBe(false);
        });

        it('should remove a partial file when the body fails mid-stream', async () => {
            const body = new ReadableStream<Uint8Array>({
                start(controller) {
                    controller.enqueue(new Uint8Array(100));
                },
                pull(controller) {
                    controller.error(new Error('socket hang up'));
                },
            });
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => new Response(body, { status: 200 })));

            const target = join(dir, 'paper.pdf');
            await expect(client.download('https://publisher.example.com/x', target)).rejects.toThrow();
            expect(existsSync(target)).toBe(false);
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ data: 'ok' })));

            const start = Date.now();

            // Publisher downloads are limited to 1/s with no burst
            await Promise.all([
                client.request('https://publisher.example.com/1', { source: 'publisher' }),
                client.request('https://publisher.example.com/2', { source: 'publisher' }),
            ]);

            const elapsed = Date.now() - start;

            // The first token is immediately available; the second needs ~1 second
            expect(elapsed).toBeGreaterThanOrEqual(900);
            expect(client.getRequestCount('publisher')).toBe(2);
        });
    });
});
