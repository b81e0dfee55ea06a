/**
 * Observation pipeline - core type definitions.
 *
 * Every stage returns a tagged Result; downstream stages match on `ok`
 * and `error.kind` instead of probing payloads for sentinel keys.
 */

import type { TimeseriesQueryField } from '@shared/synoptic';

// =============================================================================
// Results & Errors
// =============================================================================

export type Result<T, E = PipelineError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export type ValidationReason =
    | 'MissingStation'
    | 'MissingDateRange'
    | 'MalformedDate'
    | 'InvertedDateRange';

export type ValidationError = { kind: 'ValidationError'; reason: ValidationReason };
export type NetworkError = { kind: 'NetworkError'; message: string };
export type HttpStatusError = { kind: 'HttpStatusError'; status: number; message: string };
export type UnexpectedShapeError = { kind: 'UnexpectedShape'; detail: string };
export type MissingVariableError = { kind: 'MissingVariable'; variables: string[] };
export type NoDataError = { kind: 'NoData'; variable: string };

export type FetchError = NetworkError | HttpStatusError;

export type PipelineError =
    | ValidationError
    | NetworkError
    | HttpStatusError
    | UnexpectedShapeError
    | MissingVariableError
    | NoDataError;

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

// =============================================================================
// Parameters
// =============================================================================

/**
 * A date endpoint as the UI supplies it: a Date, an ISO date ("YYYY-MM-DD")
 * or an ISO date-time without offset ("YYYY-MM-DDTHH:mm[:ss]").
 */
export type DateInput = Date | string;

export interface DateRange {
    start: DateInput | null;
    end: DateInput | null;
}

export interface DashboardParameters {
    station: string;
    /** Canonical ordered selection; never de-duplicated here. */
    variables: readonly string[];
    range: DateRange;
}

// =============================================================================
// Request
// =============================================================================

export type QueryEntry = readonly [field: TimeseriesQueryField, value: string];

export interface RequestDescriptor {
    readonly baseUrl: string;
    /** stid, start, end, vars, token - in that order */
    readonly query: readonly QueryEntry[];
    /** Variables the request asks for, after the empty-selection fallback */
    readonly variables: readonly string[];
}

// =============================================================================
// Series & Table
// =============================================================================

/** Opaque parsed JSON body of a timeseries response. */
export type RawResponse = unknown;

export interface SeriesPoint {
    /** Epoch ms; null marks an unparsable timestamp */
    time: number | null;
    /** null marks a missing observation */
    value: number | null;
}

export interface TimeSeries {
    variable: string;
    points: SeriesPoint[];
}

export interface NormalizedObservations {
    series: TimeSeries[];
    /** Requested variables absent from OBSERVATIONS, in request order */
    missing: string[];
}

export interface MergedRow {
    time: number | null;
    values: Record<string, number | null>;
}

export interface MergedTable {
    /** Column order after Time, i.e. join order */
    variables: string[];
    rows: MergedRow[];
}

export const TIME_COLUMN = 'Time';

// =============================================================================
// Plot
// =============================================================================

export type AxisMode = 'none' | 'single' | 'dual';

export interface AxisPlan {
    mode: AxisMode;
    primary: string | null;
    secondary: string | null;
    /** Variables beyond the first two; table-only */
    ignored: string[];
}

// =============================================================================
// View
// =============================================================================

export type DashboardView =
    | {
        status: 'ready';
        request: RequestDescriptor;
        table: MergedTable;
        plan: AxisPlan;
    }
    | {
        status: 'error';
        error: PipelineError;
        message: string;
    };
