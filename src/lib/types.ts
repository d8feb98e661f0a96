// Semantic column types
export type ColumnType = 'categorical' | 'numeric' | 'datetime';

export type CellValue = string | number | null;

export interface ColumnDef {
  name: string;
  type: ColumnType;
}

export type Schema = readonly ColumnDef[];

export type Row = Readonly<Record<string, CellValue>>;

// Immutable in-memory table; filtering always yields a new one
export interface Table {
  readonly schema: Schema;
  readonly rows: readonly Row[];
}

// Set-membership test on one column. Empty values = no filtering on that column.
export interface Predicate {
  column: string;
  values: readonly CellValue[];
}

export type ColorBy = 'compound' | 'measurement';

// Raw picks coming from the sidebar widgets
export interface RawSelection {
  readOut: string;
  compounds: readonly string[];
  measurements: readonly string[];
  poolScreens: boolean;
  colorBy: ColorBy;
}

export interface Selection {
  readOut: string;
  compounds: readonly string[];
  measurements: readonly string[];
  poolScreens: boolean;
  colorBy: ColorBy;
}

export type EmptySelectionReason = 'read-out' | 'compounds' | 'measurements';

export type ResolvedSelection =
  | { status: 'ready'; selection: Selection; predicates: Predicate[] }
  | { status: 'empty'; reason: EmptySelectionReason };

// Shared categorical x-axis over concentrations
export interface ConcentrationAxis {
  kind: 'category';
  values: readonly number[];
  labels: readonly string[];
}

export type XAxisSpec =
  | ConcentrationAxis
  | { kind: 'numeric'; title: string }
  | { kind: 'text'; title: string };

export type SeriesType = 'scatter' | 'line' | 'bar' | 'box';

export type SeriesMode = 'markers' | 'lines' | 'lines+markers';

// 'mean' series are the pooled-mode mean indicators
export type SeriesRole = 'data' | 'mean';

export interface BoxStats {
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  outliers: number[];
}

export interface Series {
  name: string;
  type: SeriesType;
  mode: SeriesMode;
  role: SeriesRole;
  x: (number | string)[];
  y: number[];
  errorY?: number[];
  box?: BoxStats;
  color: string;
  legendGroup: string;
  showLegend: boolean;
  hoverText: string[];
}

export interface Panel {
  row: number;
  col: number;
  title: string;
  series: Series[];
}

export interface ChartSpec {
  title: string;
  height: number;
  showGrid: boolean;
  rows: number;
  cols: number;
  xAxis: XAxisSpec;
  yAxisTitle: string;
  panels: Panel[];
}

export type PlotType = 'Scatter Plot' | 'Line Chart' | 'Bar Chart' | 'Histogram' | 'Box Plot';

export interface ExplorerChartOptions {
  plotType: PlotType;
  x: string;
  y: string;
  colorBy: string | null;
  title: string;
  height: number;
  showGrid: boolean;
}

export interface CompoundChartOptions {
  title?: string;
  showGrid?: boolean;
}

export interface NumericStats {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  q25: number | null;
  q50: number | null;
  q75: number | null;
  max: number | null;
}

export interface TableSummary {
  rowCount: number;
  columnCount: number;
  numericStats: Record<string, NumericStats>;
  compoundCounts: { compound: string; count: number }[] | null;
  concentrationRange: { min: string; max: string } | null;
}

export interface ColumnInfo {
  type: ColumnType;
  uniqueValues: number;
  isCategorical: boolean;
  isNumeric: boolean;
  isDatetime: boolean;
}

export interface PageRequest {
  pageSize: number;
  page: number;
  sortColumn?: string | null;
  searchTerm?: string;
}

export type PageResult =
  | { kind: 'empty' }
  | {
      kind: 'page';
      rows: Row[];
      displayRows: Row[];
      page: number;
      totalPages: number;
      startIndex: number;
      endIndex: number;
      totalRows: number;
      caption: string;
    };

export type Theme = 'light' | 'dark';
