/**
 * Plot Selector
 *
 * Axis policy is a function of the variable count alone:
 * 0 → nothing to plot, 1 → single axis, ≥2 → first two on a dual axis and
 * the rest left to the table.
 */

import type { AxisPlan, MergedTable } from './types';

export function selectAxisPlan(variables: readonly string[]): AxisPlan {
    if (variables.length === 0) {
        return { mode: 'none', primary: null, secondary: null, ignored: [] };
    }
    if (variables.length === 1) {
        return { mode: 'single', primary: variables[0], secondary: null, ignored: [] };
    }
    const [primary, secondary, ...ignored] = variables;
    return { mode: 'dual', primary, secondary, ignored };
}

export function chartTitle(plan: AxisPlan): string {
    if (plan.primary === null) return 'Weather Observations';
    if (plan.secondary === null) return `Weather Observations (${plan.primary})`;
    return `Weather Observations (${plan.primary} & ${plan.secondary})`;
}

/** One flat record per timestamp, shaped for the charting library. */
export type ChartRow = { time: number } & Record<string, number | null>;

/**
 * Rows carrying only the plotted columns, in ascending time. Rows without a
 * usable time cannot be placed on the time axis and are left out.
 */
export function toChartRows(table: MergedTable, plan: AxisPlan): ChartRow[] {
    const plotted = [plan.primary, plan.secondary].filter((column): column is string => column !== null);
    if (plotted.length === 0) return [];

    const rows: ChartRow[] = [];
    for (const row of table.rows) {
        if (row.time === null) continue;
        const chartRow: ChartRow = { time: row.time };
        plotted.forEach((column) => {
            chartRow[column] = row.values[column] ?? null;
        });
        rows.push(chartRow);
    }
    return rows.sort((a, b) => a.time - b.time);
}
