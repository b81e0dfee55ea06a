/**
 * Normalizer
 *
 * Reads the observation block of STATION[0] and emits one TimeSeries per
 * requested variable that is present, in request order. Absent variables are
 * reported in `missing` rather than dropped; deciding what that means for the
 * render is the pipeline's call.
 */

import { observationKey } from '@shared/synoptic';
import { parseObservationTime } from '@/lib/timeUtils';
import {
    fail,
    ok,
    type NormalizedObservations,
    type RawResponse,
    type Result,
    type SeriesPoint,
    type TimeSeries,
    type UnexpectedShapeError
} from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unexpected(detail: string): { ok: false; error: UnexpectedShapeError } {
    return fail({ kind: 'UnexpectedShape', detail });
}

function toObservationValue(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Locate OBSERVATIONS in the first station entry.
 */
export function extractObservationBlock(
    raw: RawResponse
): Result<Record<string, unknown>, UnexpectedShapeError> {
    if (!isRecord(raw)) return unexpected('response is not a JSON object');

    const stations = raw.STATION;
    if (!Array.isArray(stations)) return unexpected('STATION is missing or not a list');
    if (stations.length === 0) return unexpected('STATION is empty');

    const first: unknown = stations[0];
    if (!isRecord(first) || !isRecord(first.OBSERVATIONS)) {
        return unexpected('STATION[0] has no OBSERVATIONS');
    }
    return ok(first.OBSERVATIONS);
}

function buildSeries(variable: string, times: (number | null)[], values: unknown[]): TimeSeries {
    const points: SeriesPoint[] = times.map((time, index) => ({
        time,
        value: index < values.length ? toObservationValue(values[index]) : null
    }));
    return { variable, points };
}

export function normalizeObservations(
    raw: RawResponse,
    variables: readonly string[]
): Result<NormalizedObservations, UnexpectedShapeError> {
    const block = extractObservationBlock(raw);
    if (!block.ok) return block;

    const observations = block.value;
    const rawTimes = Array.isArray(observations.date_time) ? observations.date_time : [];
    const times = rawTimes.map((entry: unknown) => parseObservationTime(entry));

    const series: TimeSeries[] = [];
    const missing: string[] = [];

    for (const variable of variables) {
        const values = observations[observationKey(variable)];
        if (!Array.isArray(values)) {
            missing.push(variable);
            continue;
        }
        series.push(buildSeries(variable, times, values));
    }

    return ok({ series, missing });
}
