/**
 * Parameter Store
 *
 * Single source of truth for the dashboard's station, variable selection and
 * date range. It normalizes input *shape* only:
 * - variables: a single value, a comma-separated string or a collection all
 *   become one ordered string[] (no de-duplication, no membership checks)
 * - dates: a cleared picker ("") becomes null
 *
 * Validation belongs to the request builder.
 */

import type { DashboardParameters, DateInput, DateRange } from './types';

export type VariableSelection = string | readonly string[] | null | undefined;
export type DateSelection = DateInput | null | undefined;

export function normalizeVariableSelection(selection: VariableSelection): string[] {
    if (selection === null || selection === undefined) return [];
    const items = typeof selection === 'string' ? selection.split(',') : selection;
    return items
        .map((item) => String(item).trim())
        .filter((item) => item.length > 0);
}

function normalizeDateSelection(selection: DateSelection): DateInput | null {
    if (selection === null || selection === undefined) return null;
    if (typeof selection === 'string' && selection.trim() === '') return null;
    return selection;
}

export interface ParameterInput {
    station?: string | null;
    variables?: VariableSelection;
    range?: { start?: DateSelection; end?: DateSelection };
}

export class ParameterStore {
    private snapshot: DashboardParameters;
    private readonly listeners = new Set<() => void>();

    constructor(initial: ParameterInput = {}) {
        this.snapshot = {
            station: initial.station ?? '',
            variables: normalizeVariableSelection(initial.variables),
            range: {
                start: normalizeDateSelection(initial.range?.start),
                end: normalizeDateSelection(initial.range?.end)
            }
        };
    }

    // Arrow properties so React can pass them around unbound.

    /**
     * Current parameters. Referentially stable until the next change,
     * as useSyncExternalStore requires.
     */
    getSnapshot = (): DashboardParameters => this.snapshot;

    subscribe = (listener: () => void): (() => void) => {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    };

    setStation = (station: string | null): void => {
        this.update({ station: station ?? '' });
    };

    setVariables = (selection: VariableSelection): void => {
        this.update({ variables: normalizeVariableSelection(selection) });
    };

    setDateRange = (start: DateSelection, end: DateSelection): void => {
        const range: DateRange = {
            start: normalizeDateSelection(start),
            end: normalizeDateSelection(end)
        };
        this.update({ range });
    };

    private update(patch: Partial<DashboardParameters>): void {
        this.snapshot = { ...this.snapshot, ...patch };
        this.listeners.forEach((listener) => listener());
    }
}
