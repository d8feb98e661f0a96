import { DISPLAY_DECIMALS } from './constants';
import { assertColumns, categoricalColumns, compareCells, isMissing } from './table';
import { CellValue, PageRequest, PageResult, Row, Table } from './types';

/**
 * Case-insensitive substring match over the categorical columns; a row
 * matches when any of them contains the term.
 */
export function searchRows(table: Table, searchTerm: string | undefined): Row[] {
  const term = (searchTerm ?? '').trim().toLowerCase();
  if (!term) return [...table.rows];

  const columns = categoricalColumns(table);
  return table.rows.filter(row =>
    columns.some(col => {
      const value = row[col];
      return !isMissing(value) && String(value).toLowerCase().includes(term);
    })
  );
}

/**
 * Stable ascending sort by one column.
 */
export function sortRows(rows: readonly Row[], column: string | null | undefined): Row[] {
  if (!column) return [...rows];
  return [...rows].sort((a, b) => compareCells(a[column], b[column]));
}

export function roundForDisplay(row: Row, decimals: number = DISPLAY_DECIMALS): Row {
  const factor = Math.pow(10, decimals);
  const rounded: Record<string, CellValue> = {};
  for (const [key, value] of Object.entries(row)) {
    rounded[key] =
      typeof value === 'number' && Number.isFinite(value) && !Number.isInteger(value)
        ? Math.round(value * factor) / factor
        : value;
  }
  return rounded;
}

export function formatCaption(startIndex: number, endIndex: number, totalRows: number): string {
  const fmt = (n: number) => n.toLocaleString('en-US');
  return `Showing ${fmt(startIndex + 1)}-${fmt(endIndex)} of ${fmt(totalRows)} rows`;
}

export function totalPageCount(totalRows: number, pageSize: number): number {
  return Math.max(1, Math.ceil(totalRows / pageSize));
}

/**
 * Search, sort, then cut one 1-based page. No surviving rows gives the
 * explicit empty state instead of an empty page.
 */
export function paginate(table: Table, request: PageRequest): PageResult {
  if (!Number.isInteger(request.pageSize) || request.pageSize < 1) {
    throw new RangeError(`Page size must be a positive integer, got ${request.pageSize}`);
  }
  if (request.sortColumn) {
    assertColumns(table.schema, [request.sortColumn]);
  }

  const matched = sortRows(searchRows(table, request.searchTerm), request.sortColumn);
  const totalRows = matched.length;
  if (totalRows === 0) {
    return { kind: 'empty' };
  }

  const totalPages = totalPageCount(totalRows, request.pageSize);
  const page = Math.min(Math.max(1, Math.floor(request.page) || 1), totalPages);
  const startIndex = (page - 1) * request.pageSize;
  const endIndex = Math.min(startIndex + request.pageSize, totalRows);
  const rows = matched.slice(startIndex, endIndex);

  return {
    kind: 'page',
    rows,
    displayRows: rows.map(row => roundForDisplay(row)),
    page,
    totalPages,
    startIndex,
    endIndex,
    totalRows,
    caption: formatCaption(startIndex, endIndex, totalRows),
  };
}
