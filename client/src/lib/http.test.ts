import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fetchWithTimeout } from './http';

describe('fetchWithTimeout', () => {
    const mockFetch = vi.fn();

    beforeEach(() => {
        mockFetch.mockReset();
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.unstubAllGlobals();
    });

    it('passes the init through with an abort signal attached', async () => {
        const response = { status: 200 };
        mockFetch.mockResolvedValue(response);

        await expect(fetchWithTimeout('/api/timeseries', 1000, { method: 'GET' })).resolves.toBe(response);

        const [url, init] = mockFetch.mock.calls[0];
        expect(url).toBe('/api/timeseries');
        expect(init.method).toBe('GET');
        expect(init.signal).toBeInstanceOf(AbortSignal);
        expect(init.signal.aborted).toBe(false);
    });

    it('rejects with the timeout message once the bound passes', async () => {
        vi.useFakeTimers();
        mockFetch.mockImplementation(
            (_url: string, init: RequestInit) =>
                new Promise((_resolve, reject) => {
                    init.signal?.addEventListener('abort', () => {
                        reject(new DOMException('The operation was aborted.', 'AbortError'));
                    });
                })
        );

        const pending = fetchWithTimeout('/api/timeseries', 25);
        const assertion = expect(pending).rejects.toThrow('Request timed out after 25ms');
        await vi.advanceTimersByTimeAsync(25);
        await assertion;
    });

    it('rethrows other failures unchanged', async () => {
        const failure = new TypeError('Failed to fetch');
        mockFetch.mockRejectedValue(failure);

        await expect(fetchWithTimeout('/api/timeseries', 1000)).rejects.toBe(failure);
    });
});
