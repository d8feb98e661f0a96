import { DEFAULT_SELECTION_SIZE, READ_OUT_MEASUREMENTS } from './constants';
import { assertColumns, isMissing } from './table';
import { RawSelection, ResolvedSelection, Table } from './types';

export const COMPOUND_COLUMNS = ['read_out', 'compound', 'measurement_name', 'screen', 'concentration', 'average'];

const byText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export interface ReadOutOptions {
  readonly compounds: readonly string[];
  readonly measurements: readonly string[];
}

const NO_OPTIONS: ReadOutOptions = Object.freeze({ compounds: Object.freeze([]), measurements: Object.freeze([]) });

/**
 * Measurements valid for a read-out: the whitelist intersected with what is
 * present, sorted. Unknown read-outs accept every present measurement.
 */
export function resolveMeasurements(readOut: string, presentMeasurements: Iterable<string>): string[] {
  const allowed = READ_OUT_MEASUREMENTS.get(readOut);
  const present = Array.from(new Set(presentMeasurements));
  const valid = allowed ? present.filter(m => allowed.includes(m)) : present;
  return valid.sort(byText);
}

export function defaultMeasurements(validMeasurements: readonly string[]): string[] {
  return validMeasurements.slice(0, DEFAULT_SELECTION_SIZE);
}

/**
 * Read-outs of a table with the compounds and valid measurements under each,
 * gathered in a single pass over the rows.
 */
export class SelectionOptions {
  readonly readOuts: readonly string[];
  private readonly byReadOut: ReadonlyMap<string, ReadOutOptions>;

  constructor(table: Table) {
    const found = new Map<string, { compounds: Set<string>; measurements: Set<string> }>();
    for (const row of table.rows) {
      const readOut = row.read_out;
      if (isMissing(readOut)) continue;
      const key = String(readOut);
      let entry = found.get(key);
      if (!entry) {
        entry = { compounds: new Set(), measurements: new Set() };
        found.set(key, entry);
      }
      const compound = row.compound;
      if (!isMissing(compound)) entry.compounds.add(String(compound));
      const measurement = row.measurement_name;
      if (!isMissing(measurement)) entry.measurements.add(String(measurement));
    }

    const byReadOut = new Map<string, ReadOutOptions>();
    for (const [readOut, entry] of found) {
      byReadOut.set(
        readOut,
        Object.freeze({
          compounds: Object.freeze(Array.from(entry.compounds).sort(byText)),
          measurements: Object.freeze(resolveMeasurements(readOut, entry.measurements)),
        })
      );
    }
    this.byReadOut = byReadOut;
    this.readOuts = Object.freeze(Array.from(found.keys()).sort(byText));
  }

  has(readOut: string): boolean {
    return this.byReadOut.has(readOut);
  }

  forReadOut(readOut: string): ReadOutOptions {
    return this.byReadOut.get(readOut) ?? NO_OPTIONS;
  }
}

// One index per table; tables are frozen once created
const optionsByTable = new WeakMap<Table, SelectionOptions>();

export function selectionOptions(table: Table): SelectionOptions {
  let options = optionsByTable.get(table);
  if (!options) {
    options = new SelectionOptions(table);
    optionsByTable.set(table, options);
  }
  return options;
}

export function availableReadOuts(table: Table): readonly string[] {
  return selectionOptions(table).readOuts;
}

/**
 * Compounds and measurements present in the rows of one read-out.
 */
export function availableOptions(table: Table, readOut: string): ReadOutOptions {
  return selectionOptions(table).forReadOut(readOut);
}

export function defaultSelection(table: Table): RawSelection {
  const readOut = availableReadOuts(table)[0] ?? '';
  const { compounds, measurements } = availableOptions(table, readOut);
  return {
    readOut,
    compounds: compounds.slice(0, DEFAULT_SELECTION_SIZE),
    measurements: defaultMeasurements(measurements),
    poolScreens: false,
    colorBy: 'compound',
  };
}

/**
 * Validate raw widget picks against the table. An empty result means the
 * caller must stop: nothing downstream runs on an empty selection.
 */
export function resolveSelection(table: Table, raw: RawSelection): ResolvedSelection {
  assertColumns(table.schema, COMPOUND_COLUMNS);

  const index = selectionOptions(table);
  if (!raw.readOut || !index.has(raw.readOut)) {
    return { status: 'empty', reason: 'read-out' };
  }

  const options = index.forReadOut(raw.readOut);
  const compounds = Array.from(new Set(raw.compounds)).filter(c => options.compounds.includes(c));
  if (compounds.length === 0) {
    return { status: 'empty', reason: 'compounds' };
  }

  const dropped = raw.measurements.filter(m => !options.measurements.includes(m));
  if (dropped.length > 0) {
    console.warn(`Ignoring measurements not valid for read-out '${raw.readOut}': ${dropped.join(', ')}`);
  }
  const measurements = Array.from(new Set(raw.measurements)).filter(m => options.measurements.includes(m));
  if (measurements.length === 0) {
    return { status: 'empty', reason: 'measurements' };
  }

  return {
    status: 'ready',
    selection: {
      readOut: raw.readOut,
      compounds,
      measurements,
      poolScreens: raw.poolScreens,
      colorBy: raw.colorBy,
    },
    predicates: [
      { column: 'read_out', values: [raw.readOut] },
      { column: 'compound', values: compounds },
      { column: 'measurement_name', values: measurements },
    ],
  };
}
