import { afterEach, describe, it, expect, vi } from 'vitest';
import { FilterCache } from '../filter';
import { defaultExplorerSelection, explorerPredicates, runCompoundAnalysis, runExplorer } from '../pipeline';
import { generateSampleData } from '../sampleData';
import { compoundRow, compoundTable, selection } from './fixtures';

const table = compoundTable([
  compoundRow({ compound: 'A', measurement_name: 'Rising Slope', screen: 1, average: 1 }),
  compoundRow({ compound: 'A', measurement_name: 'Rising Slope', screen: 2, average: 2 }),
  compoundRow({ compound: 'B', measurement_name: 'Falling Slope', screen: 1, average: 3 }),
]);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runCompoundAnalysis', () => {
  it('stops before filtering when no compound is selected', () => {
    const cache = new FilterCache(table);
    expect(runCompoundAnalysis(cache, selection({ compounds: [] }))).toEqual({
      status: 'empty-selection',
      reason: 'compounds',
    });
    expect(cache.misses).toBe(0);
    expect(cache.size).toBe(0);
  });

  it('filters, charts and summarizes a selection', () => {
    const analysis = runCompoundAnalysis(new FilterCache(table), selection());
    expect(analysis.status).toBe('ready');
    if (analysis.status !== 'ready') return;

    expect(analysis.screens).toEqual([1, 2]);
    expect(analysis.filtered.rows).toHaveLength(2);
    expect(analysis.summary.rowCount).toBe(2);
    expect(analysis.chart.status).toBe('ok');
    expect(analysis.chart.status === 'ok' && analysis.chart.spec.cols).toBe(2);
  });

  it('reuses the cached filter on a repeated selection', () => {
    const cache = new FilterCache(table);
    runCompoundAnalysis(cache, selection());
    runCompoundAnalysis(cache, selection());
    expect(cache.misses).toBe(1);
    expect(cache.hits).toBe(1);
  });

  it('reports a selection whose rows are all filtered out', () => {
    const analysis = runCompoundAnalysis(
      new FilterCache(table),
      selection({ compounds: ['A'], measurements: ['Falling Slope'] })
    );
    expect(analysis.status === 'ready' && analysis.chart).toEqual({ status: 'no-rows' });
  });

  it('captures chart construction errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const noScreens = compoundTable([compoundRow({ screen: null, average: 1 })]);
    const analysis = runCompoundAnalysis(new FilterCache(noScreens), selection());

    expect(analysis.status === 'ready' && analysis.chart).toEqual({
      status: 'error',
      message: 'No screen values in the selected data',
    });
    expect(error).toHaveBeenCalledWith('Error creating plot:', 'No screen values in the selected data');
  });
});

describe('explorer', () => {
  const datasets = generateSampleData({ now: new Date('2024-06-30T00:00:00Z') });

  it('defaults stock prices to the first three symbols coloured by symbol', () => {
    const explorer = defaultExplorerSelection('stock_prices', datasets.stock_prices);
    expect(explorer).toEqual({
      datasetId: 'stock_prices',
      plotType: 'Scatter Plot',
      x: 'date',
      y: 'price',
      colorBy: 'symbol',
      filterValues: ['AAPL', 'GOOGL', 'MSFT'],
      title: 'Stock Prices - Scatter Plot',
      height: 600,
      showGrid: true,
    });
    expect(explorerPredicates(explorer)).toEqual([{ column: 'symbol', values: ['AAPL', 'GOOGL', 'MSFT'] }]);
  });

  it('defaults sales data to no filter and no colour', () => {
    const explorer = defaultExplorerSelection('sales_data', datasets.sales_data);
    expect(explorer.y).toBe('sales_amount');
    expect(explorer.colorBy).toBeNull();
    expect(explorerPredicates(explorer)).toEqual([]);
  });

  it('filters to the selected symbols and charts one series per symbol', () => {
    const analysis = runExplorer(datasets, defaultExplorerSelection('stock_prices', datasets.stock_prices));
    expect(analysis.dataset.kind).toBe('sample');
    expect(analysis.filtered.rows).toHaveLength(3 * 252);
    expect(analysis.chart.status === 'ok' && analysis.chart.spec.panels[0].series.map(s => s.name)).toEqual([
      'AAPL',
      'GOOGL',
      'MSFT',
    ]);
  });

  it('keeps every row when no symbol is picked', () => {
    const explorer = { ...defaultExplorerSelection('stock_prices', datasets.stock_prices), filterValues: [] };
    expect(runExplorer(datasets, explorer).filtered.rows).toHaveLength(5 * 252);
  });

  it('reports a categorical y column as a chart error', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const explorer = { ...defaultExplorerSelection('weather_data', datasets.weather_data), y: 'city' };
    const analysis = runExplorer(datasets, explorer);
    expect(analysis.chart.status).toBe('error');
    expect(analysis.summary.rowCount).toBe(3 * 365);
  });
});
