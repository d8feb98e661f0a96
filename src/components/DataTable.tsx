'use client';

import { useMemo } from 'react';
import { ChevronLeft, ChevronRight, Info, Search } from 'lucide-react';
import { useDashboardStore } from '@/store/useDashboardStore';
import { PAGE_SIZE_OPTIONS } from '@/lib/constants';
import { paginate } from '@/lib/pagination';
import { columnNames } from '@/lib/table';
import { CellValue, Table } from '@/lib/types';

function formatCell(value: CellValue): string {
  if (value === null) return '';
  if (typeof value === 'number') return String(value);
  return value;
}

export function DataTable({ table }: { table: Table }) {
  const {
    tableView,
    setShowData,
    setPageSize,
    setPage,
    setSearchTerm,
    setSortColumn,
  } = useDashboardStore();

  const columns = columnNames(table);
  const result = useMemo(
    () =>
      paginate(table, {
        pageSize: tableView.pageSize,
        page: tableView.page,
        sortColumn: tableView.sortColumn,
        searchTerm: tableView.searchTerm,
      }),
    [table, tableView.pageSize, tableView.page, tableView.sortColumn, tableView.searchTerm]
  );

  return (
    <div className="space-y-4">
      <label className="flex items-center gap-2 cursor-pointer">
        <input
          type="checkbox"
          checked={tableView.showData}
          onChange={e => setShowData(e.target.checked)}
          className="rounded"
        />
        <span className="text-sm text-gray-700 dark:text-slate-200">Show raw data</span>
      </label>

      {tableView.showData && (
        <>
          <div className="flex flex-wrap items-end gap-4">
            <div className="flex-1 min-w-[200px]">
              <label htmlFor="data-search" className="block text-sm text-gray-600 dark:text-slate-300 mb-1">
                Search in data
              </label>
              <div className="relative">
                <Search className="w-4 h-4 absolute left-2 top-2 text-gray-400" />
                <input
                  id="data-search"
                  type="text"
                  value={tableView.searchTerm}
                  onChange={e => setSearchTerm(e.target.value)}
                  className="w-full pl-8 pr-2 py-1 border border-gray-300 rounded text-sm dark:bg-slate-800 dark:border-slate-600"
                />
              </div>
            </div>

            <div>
              <label htmlFor="data-sort" className="block text-sm text-gray-600 dark:text-slate-300 mb-1">
                Sort by
              </label>
              <select
                id="data-sort"
                value={tableView.sortColumn ?? ''}
                onChange={e => setSortColumn(e.target.value || null)}
                className="px-2 py-1 border border-gray-300 rounded text-sm dark:bg-slate-800 dark:border-slate-600"
              >
                <option value="">(original order)</option>
                {columns.map(col => (
                  <option key={col} value={col}>
                    {col}
                  </option>
                ))}
              </select>
            </div>

            <div>
              <label htmlFor="data-page-size" className="block text-sm text-gray-600 dark:text-slate-300 mb-1">
                Rows per page
              </label>
              <select
                id="data-page-size"
                value={tableView.pageSize}
                onChange={e => setPageSize(Number(e.target.value))}
                className="px-2 py-1 border border-gray-300 rounded text-sm dark:bg-slate-800 dark:border-slate-600"
              >
                {PAGE_SIZE_OPTIONS.map(size => (
                  <option key={size} value={size}>
                    {size}
                  </option>
                ))}
              </select>
            </div>
          </div>

          {result.kind === 'empty' ? (
            <div className="flex items-center gap-2 p-4 rounded-lg bg-blue-50 text-blue-800 dark:bg-slate-800 dark:text-blue-200">
              <Info className="w-4 h-4" />
              No data matches your search criteria.
            </div>
          ) : (
            <>
              <div className="overflow-x-auto">
                <table className="w-full border-collapse text-sm">
                  <thead>
                    <tr className="bg-gray-100 dark:bg-slate-800">
                      {columns.map(col => (
                        <th
                          key={col}
                          className="border border-gray-300 dark:border-slate-600 px-3 py-2 text-left font-medium"
                        >
                          {col}
                        </th>
                      ))}
                    </tr>
                  </thead>
                  <tbody>
                    {result.displayRows.map((row, i) => (
                      <tr key={result.startIndex + i} className="hover:bg-blue-50 dark:hover:bg-slate-800">
                        {columns.map(col => (
                          <td
                            key={col}
                            className={`border border-gray-300 dark:border-slate-600 px-3 py-2 ${
                              typeof row[col] === 'number' ? 'text-right font-mono' : ''
                            }`}
                          >
                            {formatCell(row[col])}
                          </td>
                        ))}
                      </tr>
                    ))}
                  </tbody>
                </table>
              </div>

              <div className="flex items-center justify-between text-sm text-gray-600 dark:text-slate-300">
                <span>{result.caption}</span>
                <div className="flex items-center gap-2">
                  <button
                    onClick={() => setPage(result.page - 1)}
                    disabled={result.page <= 1}
                    aria-label="Previous page"
                    className="p-1 rounded hover:bg-gray-100 disabled:opacity-40"
                  >
                    <ChevronLeft className="w-4 h-4" />
                  </button>
                  <label htmlFor="data-page">Page</label>
                  <input
                    id="data-page"
                    type="number"
                    min={1}
                    max={result.totalPages}
                    value={result.page}
                    onChange={e => setPage(Number(e.target.value))}
                    className="w-16 px-2 py-1 border border-gray-300 rounded text-sm dark:bg-slate-800 dark:border-slate-600"
                  />
                  <span>of {result.totalPages}</span>
                  <button
                    onClick={() => setPage(result.page + 1)}
                    disabled={result.page >= result.totalPages}
                    aria-label="Next page"
                    className="p-1 rounded hover:bg-gray-100 disabled:opacity-40"
                  >
                    <ChevronRight className="w-4 h-4" />
                  </button>
                </div>
              </div>
            </>
          )}
        </>
      )}
    </div>
  );
}
