import { CATEGORICAL_UNIQUE_LIMIT } from './constants';
import { SchemaError } from './errors';
import { CellValue, ColumnDef, ColumnInfo, ColumnType, Row, Schema, Table } from './types';

/**
 * Build an immutable table. Rows are frozen together with the row array, so
 * every table derived from this one can share them.
 */
export function createTable(schema: Schema, rows: readonly Row[]): Table {
  const frozenSchema = Object.freeze(schema.map(col => Object.freeze({ ...col })));
  const frozenRows = Object.freeze(rows.map(row => (Object.isFrozen(row) ? row : Object.freeze({ ...row }))));
  return Object.freeze({ schema: frozenSchema, rows: frozenRows });
}

/**
 * Derive a table with the same schema. Used by filters and sorts.
 */
export function withRows(table: Table, rows: readonly Row[]): Table {
  return Object.freeze({ schema: table.schema, rows: Object.freeze([...rows]) });
}

export function columnNames(table: Table): string[] {
  return table.schema.map(col => col.name);
}

export function findColumn(schema: Schema, name: string): ColumnDef | undefined {
  return schema.find(col => col.name === name);
}

export function hasColumn(table: Table, name: string): boolean {
  return findColumn(table.schema, name) !== undefined;
}

/**
 * Check that columns exist (and optionally have a given type) before any
 * string lookup is trusted.
 */
export function assertColumns(schema: Schema, names: readonly string[], type?: ColumnType): void {
  for (const name of names) {
    const col = findColumn(schema, name);
    if (!col) {
      throw new SchemaError(`Unknown column: ${name}`);
    }
    if (type && col.type !== type) {
      throw new SchemaError(`Column '${name}' is ${col.type}, expected ${type}`);
    }
  }
}

export function columnsOfType(table: Table, type: ColumnType): string[] {
  return table.schema.filter(col => col.type === type).map(col => col.name);
}

export function numericColumns(table: Table): string[] {
  return columnsOfType(table, 'numeric');
}

export function categoricalColumns(table: Table): string[] {
  return columnsOfType(table, 'categorical');
}

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

export function columnValues(table: Table, name: string): CellValue[] {
  assertColumns(table.schema, [name]);
  return table.rows.map(row => row[name] ?? null);
}

/**
 * Non-missing numeric values of a column, in row order.
 */
export function numericValues(table: Table, name: string): number[] {
  const values: number[] = [];
  for (const value of columnValues(table, name)) {
    if (typeof value === 'number' && !Number.isNaN(value)) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Distinct non-missing values in order of first appearance.
 */
export function distinctValues(table: Table, name: string): CellValue[] {
  const seen = new Set<CellValue>();
  for (const value of columnValues(table, name)) {
    if (!isMissing(value)) {
      seen.add(value);
    }
  }
  return Array.from(seen);
}

export function distinctStrings(table: Table, name: string): string[] {
  return distinctValues(table, name).map(String);
}

export function sortedDistinctNumbers(table: Table, name: string): number[] {
  return Array.from(new Set(numericValues(table, name))).sort((a, b) => a - b);
}

/**
 * Ascending comparison: numbers numerically, everything else by string,
 * missing values last.
 */
export function compareCells(a: CellValue | undefined, b: CellValue | undefined): number {
  const aMissing = isMissing(a);
  const bMissing = isMissing(b);
  if (aMissing || bMissing) {
    return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const as = String(a);
  const bs = String(b);
  return as < bs ? -1 : as > bs ? 1 : 0;
}

export function describeColumns(table: Table): Record<string, ColumnInfo> {
  const info: Record<string, ColumnInfo> = {};
  for (const col of table.schema) {
    const uniqueValues = distinctValues(table, col.name).length;
    info[col.name] = {
      type: col.type,
      uniqueValues,
      isCategorical: col.type === 'categorical' && uniqueValues < CATEGORICAL_UNIQUE_LIMIT,
      isNumeric: col.type === 'numeric',
      isDatetime: col.type === 'datetime' || col.name.toLowerCase().includes('date'),
    };
  }
  return info;
}
