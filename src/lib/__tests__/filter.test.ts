import { describe, it, expect } from 'vitest';
import { SchemaError } from '../errors';
import { applyFilters, FilterCache } from '../filter';
import { compoundRow, compoundTable } from './fixtures';

const table = compoundTable([
  compoundRow({ compound: 'A' }),
  compoundRow({ compound: 'B' }),
  compoundRow({ compound: 'A', read_out: 'voltage' }),
  compoundRow({ compound: 'C', measurement_name: 'Falling Slope' }),
]);

describe('applyFilters', () => {
  it('keeps matching rows in their original order', () => {
    const result = applyFilters(table, [{ column: 'compound', values: ['A'] }]);
    expect(result.rows).toEqual([table.rows[0], table.rows[2]]);
  });

  it('is idempotent', () => {
    const predicates = [
      { column: 'read_out', values: ['calcium'] },
      { column: 'compound', values: ['A', 'C'] },
    ];
    const once = applyFilters(table, predicates);
    const twice = applyFilters(once, predicates);
    expect(twice.rows).toEqual(once.rows);
  });

  it('gives the same rows whatever the predicate order', () => {
    const byReadOut = { column: 'read_out', values: ['calcium'] };
    const byCompound = { column: 'compound', values: ['A', 'B'] };
    expect(applyFilters(table, [byReadOut, byCompound]).rows).toEqual(
      applyFilters(table, [byCompound, byReadOut]).rows
    );
  });

  it('does not filter a column whose predicate has no values', () => {
    const result = applyFilters(table, [{ column: 'compound', values: [] }]);
    expect(result.rows).toEqual(table.rows);
    expect(result.schema).toBe(table.schema);
  });

  it('rejects unknown columns', () => {
    expect(() => applyFilters(table, [{ column: 'plate', values: ['1'] }])).toThrow(SchemaError);
  });

  it('returns a frozen table', () => {
    const result = applyFilters(table, [{ column: 'compound', values: ['B'] }]);
    expect(Object.isFrozen(result.rows)).toBe(true);
  });
});

describe('FilterCache', () => {
  it('filters by read-out, compounds and measurements', () => {
    const cache = new FilterCache(table);
    const result = cache.filter({ readOut: 'calcium', compounds: ['B', 'A'], measurements: ['Rising Slope'] });
    expect(result.rows).toEqual([table.rows[0], table.rows[1]]);
    expect(cache.misses).toBe(1);
    expect(cache.hits).toBe(0);
  });

  it('ignores the order of compounds and measurements in the key', () => {
    const cache = new FilterCache(table);
    const first = cache.filter({ readOut: 'calcium', compounds: ['B', 'A'], measurements: ['Rising Slope'] });
    const second = cache.filter({ readOut: 'calcium', compounds: ['A', 'B'], measurements: ['Rising Slope'] });
    expect(second).toBe(first);
    expect(cache.hits).toBe(1);
    expect(cache.size).toBe(1);
  });

  it('keeps separate entries per read-out', () => {
    const cache = new FilterCache(table);
    cache.filter({ readOut: 'calcium', compounds: ['A'], measurements: ['Rising Slope'] });
    const voltage = cache.filter({ readOut: 'voltage', compounds: ['A'], measurements: ['Rising Slope'] });
    expect(voltage.rows).toEqual([table.rows[2]]);
    expect(cache.size).toBe(2);
    expect(cache.misses).toBe(2);
  });

  it('clear drops entries and counters', () => {
    const cache = new FilterCache(table);
    cache.filter({ readOut: 'calcium', compounds: ['A'], measurements: ['Rising Slope'] });
    cache.filter({ readOut: 'calcium', compounds: ['A'], measurements: ['Rising Slope'] });
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.hits).toBe(0);
    expect(cache.misses).toBe(0);
    expect(cache.source).toBe(table);
  });
});
