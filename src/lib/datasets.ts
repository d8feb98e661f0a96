import { PlotType, Schema, Table } from './types';

export type SampleDatasetId = 'sales_data' | 'stock_prices' | 'weather_data';

export type DatasetId = SampleDatasetId | 'compound_screening';

export interface SampleDatasetDescriptor {
  id: SampleDatasetId;
  label: string;
  // Multi-select filter offered in the sidebar
  filterColumn: string | null;
  filterLabel: string | null;
  // Fixed colour column; null lets the user choose
  colorBy: string | null;
  schema: Schema;
}

export const SAMPLE_DATASETS: Record<SampleDatasetId, SampleDatasetDescriptor> = {
  sales_data: {
    id: 'sales_data',
    label: 'Sales Data',
    filterColumn: null,
    filterLabel: null,
    colorBy: null,
    schema: [
      { name: 'date', type: 'datetime' },
      { name: 'region', type: 'categorical' },
      { name: 'product', type: 'categorical' },
      { name: 'sales_amount', type: 'numeric' },
      { name: 'units_sold', type: 'numeric' },
      { name: 'profit_margin', type: 'numeric' },
    ],
  },
  stock_prices: {
    id: 'stock_prices',
    label: 'Stock Prices',
    filterColumn: 'symbol',
    filterLabel: 'Select Stocks',
    colorBy: 'symbol',
    schema: [
      { name: 'date', type: 'datetime' },
      { name: 'symbol', type: 'categorical' },
      { name: 'price', type: 'numeric' },
      { name: 'volume', type: 'numeric' },
      { name: 'market_cap', type: 'numeric' },
    ],
  },
  weather_data: {
    id: 'weather_data',
    label: 'Weather Data',
    filterColumn: 'city',
    filterLabel: 'Select Cities',
    colorBy: 'city',
    schema: [
      { name: 'date', type: 'datetime' },
      { name: 'city', type: 'categorical' },
      { name: 'temperature', type: 'numeric' },
      { name: 'humidity', type: 'numeric' },
      { name: 'precipitation', type: 'numeric' },
      { name: 'wind_speed', type: 'numeric' },
    ],
  },
};

export const SAMPLE_DATASET_IDS: SampleDatasetId[] = ['sales_data', 'stock_prices', 'weather_data'];

// Compound screening columns after CSV load (read-out renamed to read_out)
export const COMPOUND_SCHEMA: Schema = [
  { name: 'read_out', type: 'categorical' },
  { name: 'compound', type: 'categorical' },
  { name: 'measurement_name', type: 'categorical' },
  { name: 'screen', type: 'numeric' },
  { name: 'concentration', type: 'numeric' },
  { name: 'average', type: 'numeric' },
  { name: 'SEM', type: 'numeric' },
  { name: 'STDEV', type: 'numeric' },
];

export type SampleDatasets = Record<SampleDatasetId, Table>;

// Each loaded dataset carries its own table; resolved once at load time
export type LoadedDataset =
  | { kind: 'sample'; id: SampleDatasetId; descriptor: SampleDatasetDescriptor; table: Table }
  | { kind: 'compound'; id: 'compound_screening'; source: string; table: Table };

export type CompoundDataset = Extract<LoadedDataset, { kind: 'compound' }>;

export function sampleDataset(datasets: SampleDatasets, id: SampleDatasetId): LoadedDataset {
  return { kind: 'sample', id, descriptor: SAMPLE_DATASETS[id], table: datasets[id] };
}

export function compoundDataset(table: Table, source: string): CompoundDataset {
  return { kind: 'compound', id: 'compound_screening', source, table };
}

export function datasetLabel(dataset: LoadedDataset): string {
  switch (dataset.kind) {
    case 'sample':
      return dataset.descriptor.label;
    case 'compound':
      return dataset.source;
  }
}

export function isSampleDatasetId(id: string): id is SampleDatasetId {
  return SAMPLE_DATASET_IDS.some(known => known === id);
}

export function defaultPlotTitle(id: SampleDatasetId, plotType: PlotType): string {
  return `${SAMPLE_DATASETS[id].label} - ${plotType}`;
}
