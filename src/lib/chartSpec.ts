import { MEAN_SEGMENT_HALF_WIDTH, MIN_CHART_HEIGHT, PANEL_HEIGHT, SERIES_COLORS } from './constants';
import { ChartConstructionError } from './errors';
import { COMPOUND_COLUMNS } from './selection';
import { mean } from './statistics';
import { findColumn, sortedDistinctNumbers } from './table';
import {
  CellValue,
  ChartSpec,
  CompoundChartOptions,
  ConcentrationAxis,
  Panel,
  Row,
  Selection,
  Series,
  Table,
} from './types';

// One plottable row of the compound table
interface Point {
  compound: string;
  measurement: string;
  screen: number | null;
  concentration: number;
  average: number;
  sem: number | null;
}

function asNumber(value: CellValue | undefined): number | null {
  return typeof value === 'number' && !Number.isNaN(value) ? value : null;
}

function toPoint(row: Row): Point | null {
  const concentration = asNumber(row.concentration);
  const average = asNumber(row.average);
  if (concentration === null || average === null) return null;
  return {
    compound: String(row.compound),
    measurement: String(row.measurement_name),
    screen: asNumber(row.screen),
    concentration,
    average,
    sem: asNumber(row.SEM),
  };
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function colorFor(key: string, order: readonly string[]): string {
  const idx = Math.max(0, order.indexOf(key));
  return SERIES_COLORS[idx % SERIES_COLORS.length];
}

export function chartHeight(rowCount: number): number {
  return Math.max(MIN_CHART_HEIGHT, PANEL_HEIGHT * rowCount);
}

/**
 * Sorted distinct concentrations over the whole filtered table. Every panel
 * places a concentration at the same index of this axis.
 */
export function buildConcentrationAxis(table: Table): ConcentrationAxis {
  const values = sortedDistinctNumbers(table, 'concentration');
  return {
    kind: 'category',
    values,
    labels: values.map(v => String(v)),
  };
}

function pointHover(point: Point, label: string, detail?: string): string {
  const lines = [detail ? `${point.compound} (${detail})` : point.compound, `Concentration: ${label}`];
  lines.push(`Value: ${point.average.toFixed(2)}`);
  if (point.sem !== null) {
    lines.push(`SEM: ${point.sem.toFixed(2)}`);
  }
  return lines.join('<br>');
}

function errorValues(points: Point[]): number[] | undefined {
  if (points.every(p => p.sem === null)) return undefined;
  return points.map(p => p.sem ?? 0);
}

class AxisIndex {
  private readonly positions = new Map<number, number>();

  constructor(readonly axis: ConcentrationAxis) {
    axis.values.forEach((value, i) => this.positions.set(value, i));
  }

  indexOf(concentration: number): number {
    const idx = this.positions.get(concentration);
    if (idx === undefined) {
      throw new ChartConstructionError(`Concentration ${concentration} is missing from the shared axis`);
    }
    return idx;
  }

  label(concentration: number): string {
    return this.axis.labels[this.indexOf(concentration)];
  }
}

function byConcentration(a: Point, b: Point): number {
  return a.concentration - b.concentration;
}

/**
 * Faceted layout: one column per screen, one row per row key. With colorBy
 * 'compound' rows are measurements and series are compounds; with
 * 'measurement' the two swap. Legend visibility is decided in row-major order
 * (row outer, screen inner).
 */
function buildPerScreenPanels(points: Point[], selection: Selection, index: AxisIndex, screens: number[]): Panel[] {
  const byMeasurement = selection.colorBy === 'measurement';
  const rowKeys = byMeasurement ? selection.compounds : selection.measurements;
  const seriesKeys = byMeasurement ? selection.measurements : selection.compounds;
  const rowOf = (p: Point) => (byMeasurement ? p.compound : p.measurement);
  const seriesOf = (p: Point) => (byMeasurement ? p.measurement : p.compound);

  const seen = new Set<string>();
  const panels: Panel[] = [];

  rowKeys.forEach((rowKey, r) => {
    screens.forEach((screen, c) => {
      const series: Series[] = [];

      for (const key of seriesKeys) {
        const matching = points
          .filter(p => p.screen === screen && rowOf(p) === rowKey && seriesOf(p) === key)
          .sort(byConcentration);
        if (matching.length === 0) continue;

        series.push({
          name: key,
          type: 'scatter',
          mode: 'lines+markers',
          role: 'data',
          x: matching.map(p => index.indexOf(p.concentration)),
          y: matching.map(p => p.average),
          errorY: errorValues(matching),
          color: colorFor(key, seriesKeys),
          legendGroup: key,
          showLegend: !seen.has(key),
          hoverText: matching.map(p =>
            pointHover(p, index.label(p.concentration), byMeasurement ? p.measurement : undefined)
          ),
        });
        seen.add(key);
      }

      panels.push({
        row: r + 1,
        col: c + 1,
        title: screens.length > 1 ? `${rowKey} | Screen ${screen}` : rowKey,
        series,
      });
    });
  });

  return panels;
}

/**
 * Screens combined: one row per measurement. Each replicate row is drawn as a
 * point, with a short horizontal segment at the mean of each concentration.
 */
function buildPooledPanels(points: Point[], selection: Selection, index: AxisIndex): Panel[] {
  const seen = new Set<string>();

  return selection.measurements.map((measurement, r) => {
    const series: Series[] = [];

    for (const compound of selection.compounds) {
      const matching = points
        .filter(p => p.measurement === measurement && p.compound === compound)
        .sort(byConcentration);
      if (matching.length === 0) continue;

      const color = colorFor(compound, selection.compounds);

      series.push({
        name: compound,
        type: 'scatter',
        mode: 'markers',
        role: 'data',
        x: matching.map(p => index.indexOf(p.concentration)),
        y: matching.map(p => p.average),
        errorY: errorValues(matching),
        color,
        legendGroup: compound,
        showLegend: !seen.has(compound),
        hoverText: matching.map(p => pointHover(p, index.label(p.concentration))),
      });
      seen.add(compound);

      for (const concentration of index.axis.values) {
        const replicates = matching.filter(p => p.concentration === concentration);
        if (replicates.length === 0) continue;

        const x = index.indexOf(concentration);
        const m = mean(replicates.map(p => p.average));
        const hover = `${compound} mean<br>Concentration: ${index.label(concentration)}<br>Mean: ${m.toFixed(2)}`;

        series.push({
          name: `${compound} mean`,
          type: 'scatter',
          mode: 'lines',
          role: 'mean',
          x: [x - MEAN_SEGMENT_HALF_WIDTH, x + MEAN_SEGMENT_HALF_WIDTH],
          y: [m, m],
          color,
          legendGroup: compound,
          showLegend: false,
          hoverText: [hover, hover],
        });
      }
    }

    return { row: r + 1, col: 1, title: measurement, series };
  });
}

/**
 * Build the compound screening chart from an already filtered table.
 */
export function buildCompoundChart(
  table: Table,
  selection: Selection,
  options: CompoundChartOptions = {}
): ChartSpec {
  const missing = COMPOUND_COLUMNS.filter(name => !findColumn(table.schema, name));
  if (missing.length > 0) {
    throw new ChartConstructionError(`Missing columns: ${missing.join(', ')}`);
  }

  const points: Point[] = [];
  for (const row of table.rows) {
    const point = toPoint(row);
    if (point) points.push(point);
  }

  const axis = buildConcentrationAxis(table);
  const index = new AxisIndex(axis);
  const title = options.title ?? `${selection.readOut} read-out`;
  const showGrid = options.showGrid ?? true;
  // Pooled rows are always measurements
  const rowCount =
    !selection.poolScreens && selection.colorBy === 'measurement'
      ? selection.compounds.length
      : selection.measurements.length;
  const height = chartHeight(rowCount);

  if (selection.poolScreens) {
    return deepFreeze({
      title,
      height,
      showGrid,
      rows: rowCount,
      cols: 1,
      xAxis: axis,
      yAxisTitle: 'average',
      panels: buildPooledPanels(points, selection, index),
    });
  }

  const screens = sortedDistinctNumbers(table, 'screen');
  if (screens.length === 0) {
    throw new ChartConstructionError('No screen values in the selected data');
  }

  return deepFreeze({
    title,
    height,
    showGrid,
    rows: rowCount,
    cols: screens.length,
    xAxis: axis,
    yAxisTitle: 'average',
    panels: buildPerScreenPanels(points, selection, index, screens),
  });
}
