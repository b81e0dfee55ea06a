import { describe, it, expect } from 'vitest';
import { chartTitle, selectAxisPlan, toChartRows } from '../plotSelector';
import type { MergedTable } from '../types';

describe('selectAxisPlan', () => {
    it('plots nothing without variables', () => {
        expect(selectAxisPlan([])).toEqual({ mode: 'none', primary: null, secondary: null, ignored: [] });
    });

    it('uses a single axis for one variable', () => {
        expect(selectAxisPlan(['a'])).toEqual({ mode: 'single', primary: 'a', secondary: null, ignored: [] });
    });

    it('uses a dual axis for two variables', () => {
        expect(selectAxisPlan(['a', 'b'])).toEqual({ mode: 'dual', primary: 'a', secondary: 'b', ignored: [] });
    });

    it('plots the same pair for three variables and ignores the rest', () => {
        const two = selectAxisPlan(['a', 'b']);
        const three = selectAxisPlan(['a', 'b', 'c']);

        expect(three.mode).toBe(two.mode);
        expect(three.primary).toBe(two.primary);
        expect(three.secondary).toBe(two.secondary);
        expect(three.ignored).toEqual(['c']);
    });
});

describe('chartTitle', () => {
    it('names the plotted variables', () => {
        expect(chartTitle(selectAxisPlan([]))).toBe('Weather Observations');
        expect(chartTitle(selectAxisPlan(['air_temp']))).toBe('Weather Observations (air_temp)');
        expect(chartTitle(selectAxisPlan(['air_temp', 'soil_temp', 'wind_speed']))).toBe(
            'Weather Observations (air_temp & soil_temp)'
        );
    });
});

describe('toChartRows', () => {
    const table: MergedTable = {
        variables: ['air_temp', 'soil_temp', 'wind_speed'],
        rows: [
            { time: 2000, values: { air_temp: 2, soil_temp: null, wind_speed: 7 } },
            { time: 1000, values: { air_temp: 1, soil_temp: 5, wind_speed: 6 } },
            { time: null, values: { air_temp: 9, soil_temp: 9, wind_speed: 9 } }
        ]
    };

    it('keeps the plotted columns in ascending time and drops untimed rows', () => {
        expect(toChartRows(table, selectAxisPlan(table.variables))).toEqual([
            { time: 1000, air_temp: 1, soil_temp: 5 },
            { time: 2000, air_temp: 2, soil_temp: null }
        ]);
    });

    it('returns nothing when there is nothing to plot', () => {
        expect(toChartRows(table, selectAxisPlan([]))).toEqual([]);
    });
});
