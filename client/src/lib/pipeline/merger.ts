/**
 * Merger - outer join of per-variable series on time.
 *
 * The first series seeds the table as-is; every later series is outer-joined
 * onto the accumulator. A join emits rows in ascending time with
 * missing-time rows last, pairs equal keys on both sides as a cartesian
 * product, and fills the other side's columns with null where a key exists
 * on one side only.
 */

import type { MergedRow, MergedTable, SeriesPoint, TimeSeries } from './types';

const MISSING_TIME_KEY = 'missing';

function timeKey(time: number | null): string {
    return time === null ? MISSING_TIME_KEY : String(time);
}

function compareTimes(a: number | null, b: number | null): number {
    if (a === b) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    return a - b;
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const item of items) {
        const key = keyOf(item);
        const group = groups.get(key);
        if (group) {
            group.push(item);
        } else {
            groups.set(key, [item]);
        }
    }
    return groups;
}

/**
 * Column name for a variable; a repeated variable gets `_2`, `_3`, ...
 */
function uniqueColumn(variable: string, taken: readonly string[]): string {
    if (!taken.includes(variable)) return variable;
    let suffix = 2;
    while (taken.includes(`${variable}_${suffix}`)) suffix++;
    return `${variable}_${suffix}`;
}

export function emptyTable(): MergedTable {
    return { variables: [], rows: [] };
}

function seedTable(series: TimeSeries): MergedTable {
    return {
        variables: [series.variable],
        rows: series.points.map((point) => ({
            time: point.time,
            values: { [series.variable]: point.value }
        }))
    };
}

export function outerJoin(table: MergedTable, series: TimeSeries): MergedTable {
    const column = uniqueColumn(series.variable, table.variables);
    const leftGroups = groupBy(table.rows, (row) => timeKey(row.time));
    const rightGroups = groupBy(series.points, (point) => timeKey(point.time));

    const keyTimes = new Map<string, number | null>();
    table.rows.forEach((row) => keyTimes.set(timeKey(row.time), row.time));
    series.points.forEach((point) => keyTimes.set(timeKey(point.time), point.time));
    const orderedKeys = [...keyTimes.entries()].sort(([, a], [, b]) => compareTimes(a, b));

    const emptyLeft: Record<string, number | null> = {};
    table.variables.forEach((variable) => {
        emptyLeft[variable] = null;
    });

    const rows: MergedRow[] = [];
    for (const [key, time] of orderedKeys) {
        const left: MergedRow[] = leftGroups.get(key) ?? [];
        const right: SeriesPoint[] = rightGroups.get(key) ?? [];

        if (left.length > 0 && right.length > 0) {
            for (const row of left) {
                for (const point of right) {
                    rows.push({ time, values: { ...row.values, [column]: point.value } });
                }
            }
        } else if (left.length > 0) {
            left.forEach((row) => rows.push({ time, values: { ...row.values, [column]: null } }));
        } else {
            right.forEach((point) => rows.push({ time, values: { ...emptyLeft, [column]: point.value } }));
        }
    }

    return { variables: [...table.variables, column], rows };
}

export function mergeSeries(series: readonly TimeSeries[]): MergedTable {
    let table = emptyTable();
    series.forEach((entry, index) => {
        table = index === 0 ? seedTable(entry) : outerJoin(table, entry);
    });
    return table;
}
