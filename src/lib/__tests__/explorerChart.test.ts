import { afterEach, describe, it, expect, vi } from 'vitest';
import { ChartConstructionError } from '../errors';
import { buildExplorerChart } from '../explorerChart';
import { createTable } from '../table';
import { ExplorerChartOptions } from '../types';

const table = createTable(
  [
    { name: 'date', type: 'datetime' },
    { name: 'region', type: 'categorical' },
    { name: 'sales', type: 'numeric' },
    { name: 'units', type: 'numeric' },
  ],
  [
    { date: '2024-01-03', region: 'North', sales: 10, units: 1 },
    { date: '2024-01-01', region: 'South', sales: 20, units: 2 },
    { date: '2024-01-02', region: 'North', sales: 30, units: 3 },
  ]
);

function options(overrides: Partial<ExplorerChartOptions> = {}): ExplorerChartOptions {
  return {
    plotType: 'Scatter Plot',
    x: 'units',
    y: 'sales',
    colorBy: 'region',
    title: 'Sales',
    height: 600,
    showGrid: true,
    ...overrides,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildExplorerChart', () => {
  it('builds one scatter series per colour group', () => {
    const spec = buildExplorerChart(table, options());
    const series = spec.panels[0].series;

    expect(series.map(s => s.name)).toEqual(['North', 'South']);
    expect(series[0].x).toEqual([1, 3]);
    expect(series[0].y).toEqual([10, 30]);
    expect(series[0].mode).toBe('markers');
    expect(series[0].hoverText[0]).toBe('North<br>units: 1<br>sales: 10');
    expect(spec.xAxis).toEqual({ kind: 'numeric', title: 'units' });
    expect(spec.yAxisTitle).toBe('sales');
    expect(spec.panels[0].title).toBe('Sales');
    expect(spec.height).toBe(600);
  });

  it('sorts line charts along x', () => {
    const spec = buildExplorerChart(table, options({ plotType: 'Line Chart', x: 'date', colorBy: null }));
    const [series] = spec.panels[0].series;

    expect(series.name).toBe('sales');
    expect(series.type).toBe('line');
    expect(series.x).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
    expect(series.y).toEqual([20, 30, 10]);
    expect(spec.xAxis).toEqual({ kind: 'text', title: 'date' });
  });

  it('builds bar series', () => {
    const spec = buildExplorerChart(table, options({ plotType: 'Bar Chart', x: 'region', colorBy: null }));
    expect(spec.panels[0].series[0].type).toBe('bar');
    expect(spec.panels[0].series[0].x).toEqual(['North', 'South', 'North']);
  });

  it('bins numeric histograms', () => {
    const spec = buildExplorerChart(table, options({ plotType: 'Histogram', x: 'sales' }));
    const [series] = spec.panels[0].series;
    expect(series.y).toEqual([1, 1, 1]);
    expect(spec.yAxisTitle).toBe('count');
  });

  it('counts categories for categorical histograms', () => {
    const spec = buildExplorerChart(table, options({ plotType: 'Histogram', x: 'region' }));
    const [series] = spec.panels[0].series;
    expect(series.x).toEqual(['North', 'South']);
    expect(series.y).toEqual([2, 1]);
  });

  it('summarises each group for box plots', () => {
    const spec = buildExplorerChart(table, options({ plotType: 'Box Plot' }));
    const [north] = spec.panels[0].series;
    expect(north.x).toEqual(['North']);
    expect(north.box).toEqual({ min: 10, q1: 15, median: 20, q3: 25, max: 30, outliers: [] });
    expect(spec.xAxis).toEqual({ kind: 'text', title: 'region' });
  });

  it('rejects a non-numeric y column', () => {
    expect(() => buildExplorerChart(table, options({ y: 'region' }))).toThrow(ChartConstructionError);
    expect(() => buildExplorerChart(table, options({ plotType: 'Box Plot', y: 'date' }))).toThrow(
      "Y-axis column 'date' must be numeric for a Box Plot"
    );
  });

  it('rejects a missing x column', () => {
    expect(() => buildExplorerChart(table, options({ x: 'profit' }))).toThrow(
      "X-axis column 'profit' does not exist in this dataset"
    );
  });

  it('draws a single series when the colour column is numeric', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const spec = buildExplorerChart(table, options({ colorBy: 'units' }));
    expect(spec.panels[0].series.map(s => s.name)).toEqual(['sales']);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
