/**
 * ObservationChart Component
 * One line per plotted variable; with two variables the second gets its own
 * right-hand axis.
 */

import { useMemo } from 'react';
import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis
} from 'recharts';
import { SERIES_COLORS } from '@/config/constants';
import { chartTitle, toChartRows, type DashboardView } from '@/lib/pipeline';
import { formatAxisTime, formatTableTime } from '@/lib/timeUtils';

interface ObservationChartProps {
  view: DashboardView | null;
}

function Placeholder({ message }: { message: string }) {
  return (
    <div className="flex h-80 items-center justify-center text-sm text-slate-500">
      {message}
    </div>
  );
}

export function ObservationChart({ view }: ObservationChartProps) {
  const rows = useMemo(
    () => (view?.status === 'ready' ? toChartRows(view.table, view.plan) : []),
    [view]
  );

  if (!view) return <Placeholder message="Loading observations…" />;
  if (view.status === 'error') return <Placeholder message="No data available" />;

  const { plan } = view;
  if (plan.primary === null) return <Placeholder message="No variables selected" />;
  if (rows.length === 0) return <Placeholder message="No data available" />;

  return (
    <figure className="space-y-2">
      <figcaption className="text-center text-sm font-medium">{chartTitle(plan)}</figcaption>
      <div className="h-80">
        <ResponsiveContainer width="100%" height="100%">
          <LineChart data={rows} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis
              dataKey="time"
              type="number"
              scale="time"
              domain={['dataMin', 'dataMax']}
              tickFormatter={formatAxisTime}
              fontSize={12}
            />
            <YAxis
              yAxisId="primary"
              stroke={SERIES_COLORS[0]}
              fontSize={12}
              label={{ value: plan.primary, angle: -90, position: 'insideLeft' }}
            />
            {plan.secondary !== null && (
              <YAxis
                yAxisId="secondary"
                orientation="right"
                stroke={SERIES_COLORS[1]}
                fontSize={12}
                label={{ value: plan.secondary, angle: 90, position: 'insideRight' }}
              />
            )}
            <Tooltip labelFormatter={(label) => (typeof label === 'number' ? formatTableTime(label) : String(label))} />
            <Legend />
            <Line
              yAxisId="primary"
              type="monotone"
              dataKey={plan.primary}
              stroke={SERIES_COLORS[0]}
              dot={false}
              connectNulls={false}
              isAnimationActive={false}
            />
            {plan.secondary !== null && (
              <Line
                yAxisId="secondary"
                type="monotone"
                dataKey={plan.secondary}
                stroke={SERIES_COLORS[1]}
                dot={false}
                connectNulls={false}
                isAnimationActive={false}
              />
            )}
          </LineChart>
        </ResponsiveContainer>
      </div>
      {plan.ignored.length > 0 && (
        <p className="text-center text-xs text-slate-500">
          Table only: {plan.ignored.join(', ')}
        </p>
      )}
    </figure>
  );
}
