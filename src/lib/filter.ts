import { assertColumns, withRows } from './table';
import { CellValue, Predicate, Row, Table } from './types';

function rowMatches(row: Row, predicates: { column: string; allowed: Set<CellValue> }[]): boolean {
  return predicates.every(({ column, allowed }) => allowed.has(row[column] ?? null));
}

/**
 * Keep rows passing every predicate, in their original order.
 * A predicate with no values does not filter its column.
 */
export function applyFilters(table: Table, predicates: readonly Predicate[]): Table {
  assertColumns(
    table.schema,
    predicates.map(p => p.column)
  );

  const active = predicates
    .filter(p => p.values.length > 0)
    .map(p => ({ column: p.column, allowed: new Set<CellValue>(p.values) }));

  if (active.length === 0) {
    return withRows(table, table.rows);
  }

  return withRows(
    table,
    table.rows.filter(row => rowMatches(row, active))
  );
}

export interface FilterKey {
  readOut: string;
  compounds: readonly string[];
  measurements: readonly string[];
}

function serializeKey(key: FilterKey): string {
  return JSON.stringify([key.readOut, [...key.compounds].sort(), [...key.measurements].sort()]);
}

/**
 * Memoized compound filter for one loaded table. Entries live as long as the
 * table does; a new load gets a new cache.
 */
export class FilterCache {
  private readonly entries = new Map<string, Table>();
  private hitCount = 0;
  private missCount = 0;

  constructor(private readonly table: Table) {}

  get source(): Table {
    return this.table;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }

  get size(): number {
    return this.entries.size;
  }

  filter(key: FilterKey): Table {
    const cacheKey = serializeKey(key);
    const cached = this.entries.get(cacheKey);
    if (cached) {
      this.hitCount++;
      return cached;
    }

    this.missCount++;
    const result = applyFilters(this.table, [
      { column: 'read_out', values: [key.readOut] },
      { column: 'compound', values: key.compounds },
      { column: 'measurement_name', values: key.measurements },
    ]);
    this.entries.set(cacheKey, result);
    return result;
  }

  clear(): void {
    this.entries.clear();
    this.hitCount = 0;
    this.missCount = 0;
  }
}
