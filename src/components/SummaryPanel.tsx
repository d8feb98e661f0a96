'use client';

import { NumericStats, TableSummary } from '@/lib/types';

const STAT_ROWS: { key: keyof NumericStats; label: string }[] = [
  { key: 'count', label: 'count' },
  { key: 'mean', label: 'mean' },
  { key: 'std', label: 'std' },
  { key: 'min', label: 'min' },
  { key: 'q25', label: '25%' },
  { key: 'q50', label: '50%' },
  { key: 'q75', label: '75%' },
  { key: 'max', label: 'max' },
];

function formatStat(value: number | null): string {
  if (value === null) return '-';
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}

export function SummaryPanel({ summary, datasetLabel }: { summary: TableSummary; datasetLabel: string }) {
  const numericColumns = Object.keys(summary.numericStats);

  return (
    <div className="space-y-3 text-sm text-gray-700 dark:text-slate-200">
      <h3 className="text-lg font-semibold">Data Summary</h3>
      <div>
        <span className="font-semibold">Dataset:</span> {datasetLabel}
      </div>
      <div>
        <span className="font-semibold">Rows:</span> {summary.rowCount.toLocaleString('en-US')}
      </div>
      <div>
        <span className="font-semibold">Columns:</span> {summary.columnCount}
      </div>

      {summary.concentrationRange && (
        <div>
          <span className="font-semibold">Concentration range:</span> {summary.concentrationRange.min} -{' '}
          {summary.concentrationRange.max}
        </div>
      )}

      {summary.compoundCounts && summary.compoundCounts.length > 0 && (
        <div>
          <div className="font-semibold mb-1">Points per compound:</div>
          <ul className="space-y-0.5">
            {summary.compoundCounts.map(({ compound, count }) => (
              <li key={compound} className="flex justify-between">
                <span>{compound}</span>
                <span className="font-mono">{count}</span>
              </li>
            ))}
          </ul>
        </div>
      )}

      {numericColumns.length > 0 && (
        <div>
          <div className="font-semibold mb-1">Numeric Summary:</div>
          <div className="overflow-x-auto">
            <table className="w-full border-collapse text-xs">
              <thead>
                <tr className="bg-gray-100 dark:bg-slate-800">
                  <th className="border border-gray-300 dark:border-slate-600 px-2 py-1" />
                  {numericColumns.map(col => (
                    <th key={col} className="border border-gray-300 dark:border-slate-600 px-2 py-1 font-medium">
                      {col}
                    </th>
                  ))}
                </tr>
              </thead>
              <tbody>
                {STAT_ROWS.map(({ key, label }) => (
                  <tr key={key}>
                    <td className="border border-gray-300 dark:border-slate-600 px-2 py-1 font-medium">{label}</td>
                    {numericColumns.map(col => (
                      <td
                        key={col}
                        className="border border-gray-300 dark:border-slate-600 px-2 py-1 text-right font-mono"
                      >
                        {formatStat(summary.numericStats[col][key])}
                      </td>
                    ))}
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </div>
      )}
    </div>
  );
}
