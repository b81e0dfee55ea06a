/**
 * Synoptic Data API - shared constants.
 *
 * Used by the client pipeline (direct calls) and by the server proxy.
 */

export const SYNOPTIC_TIMESERIES_URL = 'https://api.synopticdata.com/v2/stations/timeseries';

/** Query fields in the order the request builder emits them. */
export const TIMESERIES_QUERY_FIELDS = ['stid', 'start', 'end', 'vars', 'token'] as const;

export type TimeseriesQueryField = (typeof TIMESERIES_QUERY_FIELDS)[number];

export const STATION_IDS = [
    'RFBRC',
    'RFSMM',
    'RFSPV',
    'RFNSA',
    'RFNST',
    'RFGLS',
    'RFSKM',
    'RFGLR',
    'ASEC2',
] as const;

export type StationId = (typeof STATION_IDS)[number];

export const VARIABLE_NAMES = [
    'air_temp',
    'dew_point_temperature',
    'relative_humidity',
    'soil_temp',
    'precip_accum',
    'soil_moisture',
    'wind_speed',
    'wind_direction',
    'solar_radiation',
    'snow_depth',
    'snow_water_equiv',
] as const;

export type VariableName = (typeof VARIABLE_NAMES)[number];

/** Variable requested when the selection is empty. */
export const DEFAULT_VARIABLE: VariableName = 'air_temp';

/** Observation arrays are keyed `<variable>_set_1` inside OBSERVATIONS. */
export function observationKey(variable: string): string {
    return `${variable}_set_1`;
}
