/**
 * Dashboard Pipeline
 *
 * Wires the parameter store through request → fetch → normalize → merge →
 * plot. Each stage sits behind a memo cell keyed on its own inputs, so a
 * parameter change only recomputes the stages it actually reaches and an
 * equivalent parameter set never triggers another fetch.
 */

import type { SynopticConfig } from '@/lib/config';
import { describePipelineError } from './errors';
import { fetchTimeseries } from './fetcher';
import { memoize } from './memo';
import { mergeSeries } from './merger';
import { normalizeObservations } from './normalizer';
import type { ParameterStore } from './parameterStore';
import { selectAxisPlan } from './plotSelector';
import { buildRequest, describeRequest, toRequestUrl } from './requestBuilder';
import type {
    DashboardView,
    DateInput,
    FetchError,
    PipelineError,
    RawResponse,
    RequestDescriptor,
    Result,
    TimeSeries
} from './types';

export type PipelineStage = 'request' | 'fetch' | 'normalize' | 'merge' | 'plot';

export interface DashboardPipelineOptions {
    config: SynopticConfig;
    /** Overrides `config.timeoutMs` for timeseries GETs */
    timeoutMs?: number;
}

export class DashboardPipeline {
    private readonly config: SynopticConfig;
    private readonly timeoutMs: number;
    /** Tail of the fetch chain; the next fetch starts once it settles. */
    private lastFetch: Promise<void> = Promise.resolve();

    private readonly requestMemo = memoize(
        (station: string, variables: readonly string[], start: DateInput | null, end: DateInput | null) => {
            const request = buildRequest({ station, variables, range: { start, end } }, this.config);
            if (request.ok) {
                console.info(`[pipeline] Generated URL: ${describeRequest(request.value)}`);
            }
            return request;
        }
    );

    private readonly fetchMemo = memoize(
        (descriptor: RequestDescriptor) => this.enqueueFetch(descriptor),
        { key: (descriptor) => [toRequestUrl(descriptor)] }
    );

    private readonly normalizeMemo = memoize((raw: RawResponse, variables: readonly string[]) =>
        normalizeObservations(raw, variables)
    );

    private readonly mergeMemo = memoize((series: readonly TimeSeries[]) => mergeSeries(series));

    private readonly planMemo = memoize((variables: readonly string[]) => selectAxisPlan(variables));

    constructor(
        private readonly store: ParameterStore,
        options: DashboardPipelineOptions
    ) {
        this.config = options.config;
        this.timeoutMs = options.timeoutMs ?? options.config.timeoutMs;
    }

    /**
     * Pull the current view. Never rejects for pipeline failures; those come
     * back as an error view.
     */
    async evaluate(): Promise<DashboardView> {
        const { station, variables, range } = this.store.getSnapshot();

        const request = this.requestMemo.get(station, variables, range.start, range.end);
        if (!request.ok) return this.failure(request.error);

        const fetched = await this.fetchMemo.get(request.value);
        if (!fetched.ok) return this.failure(fetched.error);

        const normalized = this.normalizeMemo.get(fetched.value, request.value.variables);
        if (!normalized.ok) return this.failure(normalized.error);

        const { series, missing } = normalized.value;
        if (missing.length > 0) {
            return this.failure({ kind: 'MissingVariable', variables: missing });
        }
        const empty = series.find((entry) => entry.points.length === 0);
        if (empty) {
            return this.failure({ kind: 'NoData', variable: empty.variable });
        }

        const table = this.mergeMemo.get(series);
        const plan = this.planMemo.get(table.variables);
        return { status: 'ready', request: request.value, table, plan };
    }

    /** Forget the fetched response so the next evaluate fetches again. */
    refresh(): void {
        this.fetchMemo.invalidate();
    }

    stageComputations(): Record<PipelineStage, number> {
        return {
            request: this.requestMemo.computations,
            fetch: this.fetchMemo.computations,
            normalize: this.normalizeMemo.computations,
            merge: this.mergeMemo.computations,
            plot: this.planMemo.computations
        };
    }

    private enqueueFetch(descriptor: RequestDescriptor): Promise<Result<RawResponse, FetchError>> {
        const run = this.lastFetch.then(() => fetchTimeseries(descriptor, { timeoutMs: this.timeoutMs }));
        this.lastFetch = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    private failure(error: PipelineError): DashboardView {
        const message = describePipelineError(error);
        console.warn(`[pipeline] ${error.kind}: ${message}`);
        return { status: 'error', error, message };
    }
}
