/**
 * Request Builder
 *
 * Pure: validates a parameter snapshot and produces one frozen request
 * descriptor, or the first validation failure found. Checks run in order:
 * station, range presence, date formatting, range order.
 */

import { DEFAULT_VARIABLE } from '@shared/synoptic';
import type { SynopticConfig } from '@/lib/config';
import { formatSynopticTimestamp, parseDateInput } from '@/lib/timeUtils';
import {
    fail,
    ok,
    type DashboardParameters,
    type DateInput,
    type QueryEntry,
    type RequestDescriptor,
    type Result,
    type ValidationError,
    type ValidationReason
} from './types';

export type RequestConfig = Pick<SynopticConfig, 'timeseriesUrl' | 'token'>;

function invalid(reason: ValidationReason): { ok: false; error: ValidationError } {
    return fail({ kind: 'ValidationError', reason });
}

/**
 * Variables the request asks for: the selection as given, or the single
 * default when the selection is empty.
 */
export function resolveVariables(variables: readonly string[] | null | undefined): string[] {
    if (!variables || variables.length === 0) return [DEFAULT_VARIABLE];
    return [...variables];
}

export function formatVariables(variables: readonly string[] | null | undefined): string {
    return resolveVariables(variables).join(',');
}

function formatEndpoint(value: DateInput): string | null {
    const parts = parseDateInput(value);
    return parts ? formatSynopticTimestamp(parts) : null;
}

export function buildRequest(
    parameters: DashboardParameters,
    config: RequestConfig
): Result<RequestDescriptor, ValidationError> {
    const station = parameters.station.trim();
    if (!station) return invalid('MissingStation');

    const { start, end } = parameters.range;
    if (start === null || start === undefined || end === null || end === undefined) {
        return invalid('MissingDateRange');
    }

    const formattedStart = formatEndpoint(start);
    const formattedEnd = formatEndpoint(end);
    if (!formattedStart || !formattedEnd) return invalid('MalformedDate');

    // Same fixed width, so lexical order is chronological order.
    if (formattedStart > formattedEnd) return invalid('InvertedDateRange');

    const variables = resolveVariables(parameters.variables);
    const query: QueryEntry[] = [
        ['stid', station],
        ['start', formattedStart],
        ['end', formattedEnd],
        ['vars', formatVariables(variables)],
        ['token', config.token]
    ];

    return ok(
        Object.freeze({
            baseUrl: config.timeseriesUrl,
            query: Object.freeze(query.map((entry) => Object.freeze(entry))),
            variables: Object.freeze(variables)
        })
    );
}

export function toRequestUrl(descriptor: RequestDescriptor): string {
    const params = new URLSearchParams();
    descriptor.query.forEach(([field, value]) => params.append(field, value));
    return `${descriptor.baseUrl}?${params.toString()}`;
}

/** URL for logs: the token value is never printed. */
export function describeRequest(descriptor: RequestDescriptor): string {
    const params = new URLSearchParams();
    descriptor.query.forEach(([field, value]) => {
        params.append(field, field === 'token' && value ? 'REDACTED' : value);
    });
    return `${descriptor.baseUrl}?${params.toString()}`;
}
