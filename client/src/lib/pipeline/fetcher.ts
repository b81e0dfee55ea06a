/**
 * Remote Fetcher - the pipeline's only network boundary.
 *
 * One GET per call, bounded by a fixed timeout, never retried. Transport
 * failures and undecodable bodies are NetworkError; non-2xx responses are
 * HttpStatusError. The body's shape is the normalizer's concern.
 */

import { TIMESERIES_TIMEOUT_MS } from '@/lib/config';
import { fetchWithTimeout } from '@/lib/http';
import { toRequestUrl } from './requestBuilder';
import { fail, ok, type FetchError, type RawResponse, type RequestDescriptor, type Result } from './types';

export interface FetchTimeseriesOptions {
    timeoutMs?: number;
}

export async function fetchTimeseries(
    descriptor: RequestDescriptor,
    options: FetchTimeseriesOptions = {}
): Promise<Result<RawResponse, FetchError>> {
    const timeoutMs = options.timeoutMs ?? TIMESERIES_TIMEOUT_MS;

    let response: Response;
    try {
        response = await fetchWithTimeout(toRequestUrl(descriptor), timeoutMs, {
            method: 'GET',
            headers: { Accept: 'application/json' }
        });
    } catch (error) {
        return fail({
            kind: 'NetworkError',
            message: error instanceof Error ? error.message : String(error)
        });
    }

    if (!response.ok) {
        return fail({
            kind: 'HttpStatusError',
            status: response.status,
            message: response.statusText || 'Request failed'
        });
    }

    try {
        const data: RawResponse = await response.json();
        return ok(data);
    } catch (error) {
        return fail({
            kind: 'NetworkError',
            message: `Invalid JSON in response body: ${error instanceof Error ? error.message : String(error)}`
        });
    }
}
