import Papa from 'papaparse';
import { COMPOUND_CSV_COLUMNS } from './constants';
import { COMPOUND_SCHEMA } from './datasets';
import { CsvFormatError } from './errors';
import { createTable } from './table';
import { CellValue, Row, Table } from './types';

// Header names that mark a saved row index
const INDEX_HEADERS = ['', 'unnamed: 0', 'index'];

const TEXT_COLUMNS = ['read-out', 'compound', 'measurement_name'];

/**
 * Map CSV header names onto table column names
 */
function columnNameFor(header: string): string {
  return header === 'read-out' ? 'read_out' : header;
}

function parseNumber(raw: string | undefined, integer: boolean): number | null {
  const trimmed = raw?.trim() ?? '';
  if (!trimmed) return null;
  const value = Number(trimmed);
  if (!Number.isFinite(value)) return null;
  return integer && !Number.isInteger(value) ? null : value;
}

/**
 * Parse a compound screening CSV into a table. A leading index column is
 * dropped; blank or unreadable numbers become missing values.
 */
export function parseCompoundCsv(csvText: string): Table {
  const result = Papa.parse<string[]>(csvText, {
    skipEmptyLines: true,
  });

  const rows = result.data;
  if (rows.length < 2) {
    throw new CsvFormatError('CSV must have a header row and at least one data row');
  }

  const headers = rows[0].map(h => h.trim());
  const offset = INDEX_HEADERS.includes(headers[0].toLowerCase()) ? 1 : 0;
  const dataHeaders = headers.slice(offset).map(h => (h === 'read_out' ? 'read-out' : h));

  const missing = COMPOUND_CSV_COLUMNS.filter(col => !dataHeaders.includes(col));
  if (missing.length > 0) {
    throw new CsvFormatError(`Missing required columns: ${missing.join(', ')}`);
  }

  const positions = new Map(COMPOUND_CSV_COLUMNS.map(col => [col, dataHeaders.indexOf(col) + offset]));
  let unreadable = 0;

  const parsed: Row[] = rows.slice(1).map(cells => {
    const row: Record<string, CellValue> = {};
    for (const col of COMPOUND_CSV_COLUMNS) {
      const raw = cells[positions.get(col) ?? -1];
      if (TEXT_COLUMNS.includes(col)) {
        const text = raw?.trim() ?? '';
        row[columnNameFor(col)] = text === '' ? null : text;
      } else {
        const value = parseNumber(raw, col === 'screen');
        if (value === null && raw?.trim()) unreadable++;
        row[columnNameFor(col)] = value;
      }
    }
    return row;
  });

  if (unreadable > 0) {
    console.warn(`${unreadable} non-numeric cells treated as missing`);
  }

  return createTable(COMPOUND_SCHEMA, parsed);
}
