import { afterEach, describe, it, expect, vi } from 'vitest';
import { SchemaError } from '../errors';
import {
  availableOptions,
  availableReadOuts,
  defaultSelection,
  resolveMeasurements,
  resolveSelection,
  selectionOptions,
} from '../selection';
import { createTable } from '../table';
import { compoundRow, compoundTable, selection } from './fixtures';

const table = compoundTable([
  compoundRow({ read_out: 'voltage', compound: 'X', measurement_name: 'Rising Slope' }),
  compoundRow({ read_out: 'voltage', compound: 'Y', measurement_name: 'Foo' }),
  compoundRow({ read_out: 'voltage', compound: 'X', measurement_name: 'Amplitude' }),
  compoundRow({ read_out: 'calcium', compound: 'Z', measurement_name: 'Rising Slope' }),
  compoundRow({ read_out: 'calcium', compound: 'W', measurement_name: 'Falling Slope' }),
]);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveMeasurements', () => {
  it('keeps only whitelisted measurements for a known read-out', () => {
    expect(resolveMeasurements('voltage', ['Rising Slope', 'Foo'])).toEqual(['Rising Slope']);
  });

  it('accepts everything present for an unknown read-out', () => {
    expect(resolveMeasurements('other', ['b', 'a', 'b'])).toEqual(['a', 'b']);
  });

  it('treats read-outs named like object members as unknown', () => {
    expect(resolveMeasurements('constructor', ['Foo'])).toEqual(['Foo']);
    expect(resolveMeasurements('toString', ['b', 'a'])).toEqual(['a', 'b']);
  });
});

describe('selectionOptions', () => {
  it('builds the options of a table once', () => {
    const options = selectionOptions(table);
    expect(selectionOptions(table)).toBe(options);
    expect(availableReadOuts(table)).toBe(options.readOuts);
    expect(availableOptions(table, 'voltage')).toBe(availableOptions(table, 'voltage'));
  });

  it('keeps using the same options across selection passes', () => {
    const options = selectionOptions(table);
    resolveSelection(table, selection({ readOut: 'calcium', compounds: ['Z'] }));
    resolveSelection(table, selection({ readOut: 'calcium', compounds: ['W'], measurements: ['Falling Slope'] }));
    expect(selectionOptions(table)).toBe(options);
  });

  it('builds separate options for another table', () => {
    const other = compoundTable([compoundRow({ compound: 'V' })]);
    expect(selectionOptions(other)).not.toBe(selectionOptions(table));
    expect(availableOptions(other, 'calcium')).toEqual({ compounds: ['V'], measurements: ['Rising Slope'] });
  });

  it('has no options for a read-out absent from the table', () => {
    expect(availableOptions(table, 'thallium')).toEqual({ compounds: [], measurements: [] });
  });
});

describe('availableOptions', () => {
  it('lists compounds and valid measurements of one read-out, sorted', () => {
    expect(availableOptions(table, 'voltage')).toEqual({
      compounds: ['X', 'Y'],
      measurements: ['Amplitude', 'Rising Slope'],
    });
  });

  it('lists read-outs sorted', () => {
    expect(availableReadOuts(table)).toEqual(['calcium', 'voltage']);
  });
});

describe('defaultSelection', () => {
  it('picks the first read-out and up to three compounds and measurements', () => {
    expect(defaultSelection(table)).toEqual({
      readOut: 'calcium',
      compounds: ['W', 'Z'],
      measurements: ['Falling Slope', 'Rising Slope'],
      poolScreens: false,
      colorBy: 'compound',
    });
  });
});

describe('resolveSelection', () => {
  it('drops measurements the read-out does not allow', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const resolved = resolveSelection(
      table,
      selection({ readOut: 'voltage', compounds: ['X'], measurements: ['Rising Slope', 'Foo'] })
    );

    expect(resolved.status).toBe('ready');
    if (resolved.status !== 'ready') return;
    expect(resolved.selection.measurements).toEqual(['Rising Slope']);
    expect(resolved.predicates).toEqual([
      { column: 'read_out', values: ['voltage'] },
      { column: 'compound', values: ['X'] },
      { column: 'measurement_name', values: ['Rising Slope'] },
    ]);
    expect(warn).toHaveBeenCalledWith("Ignoring measurements not valid for read-out 'voltage': Foo");
  });

  it('reports an empty compound pick', () => {
    expect(resolveSelection(table, selection({ readOut: 'voltage', compounds: [] }))).toEqual({
      status: 'empty',
      reason: 'compounds',
    });
  });

  it('drops compounds that belong to another read-out', () => {
    expect(resolveSelection(table, selection({ readOut: 'voltage', compounds: ['Z'] }))).toEqual({
      status: 'empty',
      reason: 'compounds',
    });
  });

  it('reports an empty measurement pick', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(
      resolveSelection(table, selection({ readOut: 'voltage', compounds: ['X'], measurements: ['Foo'] }))
    ).toEqual({ status: 'empty', reason: 'measurements' });
  });

  it('reports a read-out missing from the table', () => {
    expect(resolveSelection(table, selection({ readOut: 'thallium' }))).toEqual({
      status: 'empty',
      reason: 'read-out',
    });
  });

  it('removes duplicate compounds', () => {
    const resolved = resolveSelection(table, selection({ readOut: 'voltage', compounds: ['Y', 'X', 'Y'], measurements: ['Amplitude'] }));
    expect(resolved.status === 'ready' && resolved.selection.compounds).toEqual(['Y', 'X']);
  });

  it('resolves read-outs named like object members', () => {
    const odd = compoundTable([
      compoundRow({ read_out: 'toString', compound: 'Q', measurement_name: 'Foo' }),
      compoundRow({ read_out: 'constructor', compound: 'R', measurement_name: 'Bar' }),
    ]);
    expect(availableReadOuts(odd)).toEqual(['constructor', 'toString']);

    const resolved = resolveSelection(odd, selection({ readOut: 'toString', compounds: ['Q'], measurements: ['Foo'] }));
    expect(resolved.status === 'ready' && resolved.selection.measurements).toEqual(['Foo']);

    const other = resolveSelection(odd, selection({ readOut: 'constructor', compounds: ['R'], measurements: ['Bar'] }));
    expect(other.status === 'ready' && other.predicates).toEqual([
      { column: 'read_out', values: ['constructor'] },
      { column: 'compound', values: ['R'] },
      { column: 'measurement_name', values: ['Bar'] },
    ]);
  });

  it('requires the compound columns', () => {
    const bare = createTable([{ name: 'read_out', type: 'categorical' }], []);
    expect(() => resolveSelection(bare, selection())).toThrow(SchemaError);
  });
});
