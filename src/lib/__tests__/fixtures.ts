import { COMPOUND_SCHEMA } from '../datasets';
import { createTable } from '../table';
import { RawSelection, Row, Table } from '../types';

const BASE_ROW: Row = {
  read_out: 'calcium',
  compound: 'A',
  measurement_name: 'Rising Slope',
  screen: 1,
  concentration: 1,
  average: 0,
  SEM: null,
  STDEV: null,
};

export function compoundRow(overrides: Row = {}): Row {
  return { ...BASE_ROW, ...overrides };
}

export function compoundTable(rows: Row[]): Table {
  return createTable(COMPOUND_SCHEMA, rows);
}

export function selection(overrides: Partial<RawSelection> = {}): RawSelection {
  return {
    readOut: 'calcium',
    compounds: ['A'],
    measurements: ['Rising Slope'],
    poolScreens: false,
    colorBy: 'compound',
    ...overrides,
  };
}
