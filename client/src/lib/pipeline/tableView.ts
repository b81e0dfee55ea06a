/**
 * Table view - the merged table, or the failure reason, as rows of strings.
 */

import { formatTableTime } from '@/lib/timeUtils';
import { TIME_COLUMN, type DashboardView } from './types';

export const ERROR_COLUMN = 'Error';

export interface TableView {
    columns: string[];
    rows: Record<string, string>[];
}

function formatCell(value: number | null | undefined): string {
    return value === null || value === undefined ? '' : String(value);
}

export function toTableView(view: DashboardView): TableView {
    if (view.status === 'error') {
        return { columns: [ERROR_COLUMN], rows: [{ [ERROR_COLUMN]: view.message }] };
    }

    const { variables, rows } = view.table;
    return {
        columns: [TIME_COLUMN, ...variables],
        rows: rows.map((row) => {
            const cells: Record<string, string> = {
                [TIME_COLUMN]: row.time === null ? '' : formatTableTime(row.time)
            };
            variables.forEach((variable) => {
                cells[variable] = formatCell(row.values[variable]);
            });
            return cells;
        })
    };
}
