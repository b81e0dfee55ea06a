import { useMemo } from 'react';
import { toTableView, type DashboardView } from '@/lib/pipeline';
import { cn } from '@/lib/utils';

interface ObservationTableProps {
  view: DashboardView | null;
  isLoading?: boolean;
}

export function ObservationTable({ view, isLoading = false }: ObservationTableProps) {
  const table = useMemo(() => (view ? toTableView(view) : null), [view]);

  if (!table) {
    return <p className="p-4 text-sm text-slate-500">Loading observations…</p>;
  }

  return (
    <div className={cn('max-h-96 overflow-auto', isLoading && 'opacity-60')}>
      <table className="w-full border-collapse text-sm">
        <thead className="sticky top-0 bg-slate-50">
          <tr>
            {table.columns.map((column) => (
              <th key={column} scope="col" className="border-b border-slate-200 px-3 py-2 text-left font-medium">
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {table.rows.map((row, index) => (
            <tr key={index} className="even:bg-slate-50/50">
              {table.columns.map((column) => (
                <td key={column} className="whitespace-pre-wrap border-b border-slate-100 px-3 py-1.5 tabular-nums">
                  {row[column]}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
