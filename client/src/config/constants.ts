/**
 * Application Constants
 *
 * Initial dashboard selection and display labels. Station and variable
 * enumerations live in @shared/synoptic.
 */

import type { StationId, VariableName } from '@shared/synoptic';

// ─────────────────────────────────────────────────────────────────────────────
// Initial Selection
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_STATION: StationId = 'RFBRC';

export const DEFAULT_VARIABLES: readonly VariableName[] = ['air_temp'];

/** Initial date range, inclusive, as ISO dates */
export const DEFAULT_DATE_RANGE = {
    start: '2025-02-06',
    end: '2025-02-07',
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Labels
// ─────────────────────────────────────────────────────────────────────────────

export const VARIABLE_LABELS: Record<VariableName, string> = {
    air_temp: 'Air temperature',
    dew_point_temperature: 'Dew point',
    relative_humidity: 'Relative humidity',
    soil_temp: 'Soil temperature',
    precip_accum: 'Accumulated precipitation',
    soil_moisture: 'Soil moisture',
    wind_speed: 'Wind speed',
    wind_direction: 'Wind direction',
    solar_radiation: 'Solar radiation',
    snow_depth: 'Snow depth',
    snow_water_equiv: 'Snow water equivalent',
};

// ─────────────────────────────────────────────────────────────────────────────
// Chart Colors
// ─────────────────────────────────────────────────────────────────────────────

/** Primary axis series, then secondary */
export const SERIES_COLORS = ['#2563eb', '#dc2626'] as const;
