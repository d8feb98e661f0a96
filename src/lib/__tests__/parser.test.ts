import { afterEach, describe, it, expect, vi } from 'vitest';
import { CsvFormatError } from '../errors';
import { parseCompoundCsv } from '../parser';
import { columnNames } from '../table';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseCompoundCsv', () => {
  it('drops a leading index column and renames read-out', () => {
    const table = parseCompoundCsv(
      [
        ',read-out,compound,measurement_name,screen,concentration,average,SEM,STDEV',
        '0,calcium,CPD-1,Rising Slope,1,0.1,5.5,0.2,0.4',
      ].join('\n')
    );

    expect(columnNames(table)).toEqual([
      'read_out',
      'compound',
      'measurement_name',
      'screen',
      'concentration',
      'average',
      'SEM',
      'STDEV',
    ]);
    expect(table.rows).toEqual([
      {
        read_out: 'calcium',
        compound: 'CPD-1',
        measurement_name: 'Rising Slope',
        screen: 1,
        concentration: 0.1,
        average: 5.5,
        SEM: 0.2,
        STDEV: 0.4,
      },
    ]);
  });

  it('reads columns in any order', () => {
    const table = parseCompoundCsv(
      ['compound,read_out,measurement_name,concentration,screen,average,STDEV,SEM', 'CPD-2,voltage,Amplitude,10,2,3,1,0.5'].join(
        '\n'
      )
    );
    expect(table.rows[0]).toEqual({
      read_out: 'voltage',
      compound: 'CPD-2',
      measurement_name: 'Amplitude',
      screen: 2,
      concentration: 10,
      average: 3,
      SEM: 0.5,
      STDEV: 1,
    });
  });

  it('treats blank and unreadable numbers as missing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const table = parseCompoundCsv(
      [
        'read-out,compound,measurement_name,screen,concentration,average,SEM,STDEV',
        'calcium,CPD-1,Rising Slope,1,0.1,n/a,,0.4',
      ].join('\n')
    );

    expect(table.rows[0].average).toBeNull();
    expect(table.rows[0].SEM).toBeNull();
    expect(warn).toHaveBeenCalledWith('1 non-numeric cells treated as missing');
  });

  it('rejects numbers with trailing text and fractional screens', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const table = parseCompoundCsv(
      [
        'read-out,compound,measurement_name,screen,concentration,average,SEM,STDEV',
        'calcium,CPD-1,Rising Slope,2.7,0.1,1.5abc,0.2,0.4',
        'calcium,CPD-1,Rising Slope,3,1e-1,2,0.2,0.4',
      ].join('\n')
    );

    expect(table.rows[0].screen).toBeNull();
    expect(table.rows[0].average).toBeNull();
    expect(table.rows[1].screen).toBe(3);
    expect(table.rows[1].concentration).toBe(0.1);
    expect(warn).toHaveBeenCalledWith('2 non-numeric cells treated as missing');
  });

  it('names missing required columns', () => {
    expect(() =>
      parseCompoundCsv(['read-out,compound,measurement_name,screen,concentration,average', 'calcium,A,B,1,1,1'].join('\n'))
    ).toThrow('Missing required columns: SEM, STDEV');
  });

  it('needs at least one data row', () => {
    expect(() => parseCompoundCsv('read-out,compound\n')).toThrow(CsvFormatError);
  });
});
