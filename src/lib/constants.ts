import { PlotType, Theme } from './types';

// Measurements allowed per read-out; unknown read-outs allow everything present
export const READ_OUT_MEASUREMENTS: ReadonlyMap<string, readonly string[]> = new Map<string, readonly string[]>([
  ['calcium', ['Rising Slope', 'Falling Slope', 'Pulse Width 50%', 'Area Under the Curve']],
  [
    'voltage',
    [
      'Pulse Width 10%',
      'Pulse Width 50%',
      'Pulse Width 90%',
      'Rising Slope',
      'Falling Slope',
      'Triangulation',
      'Amplitude',
    ],
  ],
]);

export const DEFAULT_SELECTION_SIZE = 3;

// Qualitative series palette, cycled when exhausted
export const SERIES_COLORS = [
  '#636EFA',
  '#EF553B',
  '#00CC96',
  '#AB63FA',
  '#FFA15A',
  '#19D3F3',
  '#FF6692',
  '#B6E880',
  '#FF97FF',
  '#FECB52',
];

// Compound chart sizing
export const MIN_CHART_HEIGHT = 400;
export const PANEL_HEIGHT = 250;

// Half-width of the pooled-mode mean segment, in category units
export const MEAN_SEGMENT_HALF_WIDTH = 0.2;

export const PLOT_TYPES: PlotType[] = ['Scatter Plot', 'Line Chart', 'Bar Chart', 'Histogram', 'Box Plot'];

export const PLOT_HEIGHT_RANGE = { min: 400, max: 800, default: 600 };

export const PAGE_SIZE_OPTIONS = [10, 25, 50, 100];
export const DEFAULT_PAGE_SIZE = 25;

export const DISPLAY_DECIMALS = 3;

// Columns with fewer distinct strings than this count as categorical
export const CATEGORICAL_UNIQUE_LIMIT = 20;

export const SAMPLE_DATA_SEED = 42;

// Required columns of the compound screening CSV
export const COMPOUND_CSV_COLUMNS = [
  'read-out',
  'compound',
  'measurement_name',
  'screen',
  'concentration',
  'average',
  'SEM',
  'STDEV',
];

export const THEME_COLORS: Record<Theme, { grid: string; axis: string; background: string; text: string }> = {
  light: { grid: '#e2e8f0', axis: '#64748b', background: '#ffffff', text: '#0f172a' },
  dark: { grid: '#334155', axis: '#94a3b8', background: '#0f172a', text: '#f1f5f9' },
};
