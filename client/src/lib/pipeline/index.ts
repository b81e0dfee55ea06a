export * from './types';
export { describePipelineError } from './errors';
export { ParameterStore, normalizeVariableSelection } from './parameterStore';
export type { ParameterInput, VariableSelection, DateSelection } from './parameterStore';
export { buildRequest, describeRequest, toRequestUrl } from './requestBuilder';
export { fetchTimeseries } from './fetcher';
export { normalizeObservations } from './normalizer';
export { mergeSeries } from './merger';
export { chartTitle, selectAxisPlan, toChartRows } from './plotSelector';
export type { ChartRow } from './plotSelector';
export { memoize } from './memo';
export { DashboardPipeline } from './pipeline';
export type { DashboardPipelineOptions, PipelineStage } from './pipeline';
export { toTableView, ERROR_COLUMN } from './tableView';
export type { TableView } from './tableView';
