import { STATION_IDS, VARIABLE_NAMES } from '@shared/synoptic';
import { VARIABLE_LABELS } from '@/config/constants';
import type { DashboardParameters } from '@/lib/pipeline';
import { toDateInputValue } from '@/lib/timeUtils';

interface ParameterPanelProps {
  parameters: DashboardParameters;
  onStationChange: (station: string) => void;
  onVariablesChange: (variables: string[]) => void;
  onDateRangeChange: (start: string, end: string) => void;
}

export function ParameterPanel({
  parameters,
  onStationChange,
  onVariablesChange,
  onDateRangeChange
}: ParameterPanelProps) {
  const start = toDateInputValue(parameters.range.start);
  const end = toDateInputValue(parameters.range.end);

  // Keep the user's selection order; a newly ticked variable goes last.
  const toggleVariable = (variable: string, checked: boolean) => {
    const without = parameters.variables.filter((selected) => selected !== variable);
    onVariablesChange(checked ? [...without, variable] : without);
  };

  return (
    <aside className="space-y-6 rounded-lg border border-slate-200 bg-white p-4">
      <div className="space-y-2">
        <label htmlFor="station" className="text-sm font-medium">Select Station</label>
        <select
          id="station"
          value={parameters.station}
          onChange={(event) => onStationChange(event.target.value)}
          className="w-full rounded-md border border-slate-300 px-2 py-1.5 text-sm"
        >
          {STATION_IDS.map((station) => (
            <option key={station} value={station}>{station}</option>
          ))}
        </select>
      </div>

      <fieldset className="space-y-1">
        <legend className="mb-2 text-sm font-medium">Select Variables</legend>
        {VARIABLE_NAMES.map((variable) => (
          <label key={variable} className="flex items-center gap-2 text-sm">
            <input
              type="checkbox"
              checked={parameters.variables.includes(variable)}
              onChange={(event) => toggleVariable(variable, event.target.checked)}
            />
            <span title={VARIABLE_LABELS[variable]}>{variable}</span>
          </label>
        ))}
      </fieldset>

      <div className="space-y-2">
        <span className="text-sm font-medium">Select Date Range</span>
        <div className="flex flex-col gap-2">
          <input
            type="date"
            aria-label="Start date"
            value={start}
            onChange={(event) => onDateRangeChange(event.target.value, end)}
            className="rounded-md border border-slate-300 px-2 py-1.5 text-sm"
          />
          <input
            type="date"
            aria-label="End date"
            value={end}
            onChange={(event) => onDateRangeChange(start, event.target.value)}
            className="rounded-md border border-slate-300 px-2 py-1.5 text-sm"
          />
        </div>
      </div>
    </aside>
  );
}
