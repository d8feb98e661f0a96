import { buildCompoundChart } from './chartSpec';
import { PLOT_HEIGHT_RANGE, DEFAULT_SELECTION_SIZE } from './constants';
import { defaultPlotTitle, LoadedDataset, SAMPLE_DATASETS, sampleDataset, SampleDatasetId, SampleDatasets } from './datasets';
import { ChartConstructionError } from './errors';
import { buildExplorerChart } from './explorerChart';
import { applyFilters, FilterCache } from './filter';
import { resolveSelection } from './selection';
import { summarize } from './summary';
import { columnNames, distinctStrings, numericColumns } from './table';
import {
  ChartSpec,
  CompoundChartOptions,
  EmptySelectionReason,
  ExplorerChartOptions,
  Predicate,
  RawSelection,
  Selection,
  Table,
  TableSummary,
} from './types';

export type ChartResult =
  | { status: 'ok'; spec: ChartSpec }
  | { status: 'no-rows' }
  | { status: 'error'; message: string };

export type CompoundAnalysis =
  | { status: 'empty-selection'; reason: EmptySelectionReason }
  | {
      status: 'ready';
      selection: Selection;
      screens: number[];
      filtered: Table;
      chart: ChartResult;
      summary: TableSummary;
    };

export interface ExplorerSelection extends ExplorerChartOptions {
  datasetId: SampleDatasetId;
  filterValues: string[];
}

export interface ExplorerAnalysis {
  dataset: LoadedDataset;
  filtered: Table;
  chart: ChartResult;
  summary: TableSummary;
}

/**
 * Chart failures are reported, not thrown, so the summary and table still
 * render. Anything other than a construction error is a bug and propagates.
 */
function tryChart(filtered: Table, build: () => ChartSpec): ChartResult {
  if (filtered.rows.length === 0) {
    return { status: 'no-rows' };
  }
  try {
    return { status: 'ok', spec: build() };
  } catch (err) {
    if (err instanceof ChartConstructionError) {
      console.error('Error creating plot:', err.message);
      return { status: 'error', message: err.message };
    }
    throw err;
  }
}

/**
 * One recomputation pass of the compound dashboard: resolve, filter, chart,
 * summarize. Stops before filtering when the selection is empty.
 */
export function runCompoundAnalysis(
  cache: FilterCache,
  raw: RawSelection,
  options: CompoundChartOptions = {}
): CompoundAnalysis {
  const resolved = resolveSelection(cache.source, raw);
  if (resolved.status === 'empty') {
    return { status: 'empty-selection', reason: resolved.reason };
  }

  const { selection } = resolved;
  const filtered = cache.filter({
    readOut: selection.readOut,
    compounds: selection.compounds,
    measurements: selection.measurements,
  });
  const screens = Array.from(
    new Set(filtered.rows.map(row => row.screen).filter((s): s is number => typeof s === 'number'))
  ).sort((a, b) => a - b);

  return {
    status: 'ready',
    selection,
    screens,
    filtered,
    chart: tryChart(filtered, () => buildCompoundChart(filtered, selection, options)),
    summary: summarize(filtered),
  };
}

/**
 * Sidebar defaults for a sample dataset: first column on x, first numeric
 * column on y, the dataset's colour column, the first three filter values.
 */
export function defaultExplorerSelection(datasetId: SampleDatasetId, table: Table): ExplorerSelection {
  const descriptor = SAMPLE_DATASETS[datasetId];
  const columns = columnNames(table);
  const numeric = numericColumns(table);
  const plotType = 'Scatter Plot';

  return {
    datasetId,
    plotType,
    x: columns[0],
    y: numeric[0] ?? columns[0],
    colorBy: descriptor.colorBy,
    filterValues: descriptor.filterColumn
      ? distinctStrings(table, descriptor.filterColumn).slice(0, DEFAULT_SELECTION_SIZE)
      : [],
    title: defaultPlotTitle(datasetId, plotType),
    height: PLOT_HEIGHT_RANGE.default,
    showGrid: true,
  };
}

export function explorerPredicates(selection: ExplorerSelection): Predicate[] {
  const column = SAMPLE_DATASETS[selection.datasetId].filterColumn;
  return column ? [{ column, values: selection.filterValues }] : [];
}

/**
 * One recomputation pass of the sample explorer. An empty stock or city pick
 * means no filtering, as in the sidebar.
 */
export function runExplorer(datasets: SampleDatasets, selection: ExplorerSelection): ExplorerAnalysis {
  const dataset = sampleDataset(datasets, selection.datasetId);
  const filtered = applyFilters(dataset.table, explorerPredicates(selection));

  return {
    dataset,
    filtered,
    chart: tryChart(filtered, () => buildExplorerChart(filtered, selection)),
    summary: summarize(filtered),
  };
}
