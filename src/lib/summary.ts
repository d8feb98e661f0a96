import { describe } from './statistics';
import { distinctStrings, hasColumn, isMissing, numericColumns, numericValues } from './table';
import { Table, TableSummary } from './types';

export function compoundCounts(table: Table): { compound: string; count: number }[] | null {
  if (!hasColumn(table, 'compound')) return null;

  const counts = new Map<string, number>(distinctStrings(table, 'compound').map(c => [c, 0]));
  for (const row of table.rows) {
    const value = row.compound;
    if (isMissing(value)) continue;
    const key = String(value);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts, ([compound, count]) => ({ compound, count }));
}

/**
 * Concentration range for display: min to 3 decimals, max to 1.
 */
export function concentrationRange(table: Table): { min: string; max: string } | null {
  if (!hasColumn(table, 'concentration')) return null;
  const values = numericValues(table, 'concentration');
  if (values.length === 0) return null;

  return {
    min: Math.min(...values).toFixed(3),
    max: Math.max(...values).toFixed(1),
  };
}

export function summarize(table: Table): TableSummary {
  const numericStats: TableSummary['numericStats'] = {};
  for (const column of numericColumns(table)) {
    numericStats[column] = describe(numericValues(table, column));
  }

  return {
    rowCount: table.rows.length,
    columnCount: table.schema.length,
    numericStats,
    compoundCounts: compoundCounts(table),
    concentrationRange: concentrationRange(table),
  };
}
