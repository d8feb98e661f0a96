import { ChartConstructionError } from './errors';
import { colorFor, deepFreeze } from './chartSpec';
import { boxStats, histogram } from './statistics';
import { compareCells, findColumn, isMissing } from './table';
import { CellValue, ChartSpec, ExplorerChartOptions, Row, Series, SeriesMode, SeriesType, Table, XAxisSpec } from './types';

const UNGROUPED = '__all__';

function requireColumn(table: Table, name: string, role: string) {
  const col = findColumn(table.schema, name);
  if (!col) {
    throw new ChartConstructionError(`${role} column '${name}' does not exist in this dataset`);
  }
  return col;
}

function formatValue(value: CellValue): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  return value === null ? '' : value;
}

/**
 * Split rows by the colour column, groups in order of first appearance.
 * Numeric colour columns are not grouped.
 */
function groupRows(table: Table, colorBy: string | null): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  const col = colorBy ? findColumn(table.schema, colorBy) : undefined;

  if (!col || col.type === 'numeric') {
    if (col) {
      console.warn(`Colour column '${col.name}' is numeric; drawing a single series`);
    }
    groups.set(UNGROUPED, [...table.rows]);
    return groups;
  }

  for (const row of table.rows) {
    const value = row[col.name];
    if (isMissing(value)) continue;
    const key = String(value);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

function xyBuilder(type: SeriesType, mode: SeriesMode, sortByX: boolean) {
  return (table: Table, options: ExplorerChartOptions): { series: Series[]; xAxis: XAxisSpec } => {
    const xCol = requireColumn(table, options.x, 'X-axis');
    const yCol = requireColumn(table, options.y, 'Y-axis');
    if (yCol.type !== 'numeric') {
      throw new ChartConstructionError(`Y-axis column '${yCol.name}' must be numeric for a ${options.plotType}`);
    }

    const groups = groupRows(table, options.colorBy);
    const keys = Array.from(groups.keys());
    const series: Series[] = [];

    for (const [key, rows] of groups) {
      const usable = rows.filter(row => !isMissing(row[xCol.name]) && typeof row[yCol.name] === 'number');
      if (usable.length === 0) continue;
      const ordered = sortByX ? [...usable].sort((a, b) => compareCells(a[xCol.name], b[xCol.name])) : usable;
      const name = key === UNGROUPED ? yCol.name : key;

      series.push({
        name,
        type,
        mode,
        role: 'data',
        x: ordered.map(row => {
          const v = row[xCol.name];
          return typeof v === 'number' ? v : String(v);
        }),
        y: ordered.map(row => Number(row[yCol.name])),
        color: colorFor(key, keys),
        legendGroup: name,
        showLegend: true,
        hoverText: ordered.map(row => {
          const lines = [
            `${xCol.name}: ${formatValue(row[xCol.name])}`,
            `${yCol.name}: ${formatValue(row[yCol.name])}`,
          ];
          return (key === UNGROUPED ? lines : [key, ...lines]).join('<br>');
        }),
      });
    }

    return {
      series,
      xAxis: xCol.type === 'numeric' ? { kind: 'numeric', title: xCol.name } : { kind: 'text', title: xCol.name },
    };
  };
}

function histogramSeries(table: Table, options: ExplorerChartOptions): { series: Series[]; xAxis: XAxisSpec } {
  const xCol = requireColumn(table, options.x, 'X-axis');
  const color = colorFor(UNGROUPED, [UNGROUPED]);

  if (xCol.type === 'numeric') {
    const values = table.rows.map(row => row[xCol.name]).filter((v): v is number => typeof v === 'number' && !Number.isNaN(v));
    const bins = histogram(values);
    return {
      xAxis: { kind: 'numeric', title: xCol.name },
      series: [
        {
          name: 'count',
          type: 'bar',
          mode: 'markers',
          role: 'data',
          x: bins.map(b => (b.start + b.end) / 2),
          y: bins.map(b => b.count),
          color,
          legendGroup: 'count',
          showLegend: true,
          hoverText: bins.map(b => `${xCol.name}: ${b.start.toFixed(2)} - ${b.end.toFixed(2)}<br>count: ${b.count}`),
        },
      ],
    };
  }

  const counts = new Map<string, number>();
  for (const row of table.rows) {
    const value = row[xCol.name];
    if (isMissing(value)) continue;
    counts.set(String(value), (counts.get(String(value)) ?? 0) + 1);
  }
  const labels = Array.from(counts.keys());

  return {
    xAxis: { kind: 'text', title: xCol.name },
    series: [
      {
        name: 'count',
        type: 'bar',
        mode: 'markers',
        role: 'data',
        x: labels,
        y: labels.map(label => counts.get(label) ?? 0),
        color,
        legendGroup: 'count',
        showLegend: true,
        hoverText: labels.map(label => `${xCol.name}: ${label}<br>count: ${counts.get(label) ?? 0}`),
      },
    ],
  };
}

function boxSeries(table: Table, options: ExplorerChartOptions): { series: Series[]; xAxis: XAxisSpec } {
  const yCol = requireColumn(table, options.y, 'Y-axis');
  if (yCol.type !== 'numeric') {
    throw new ChartConstructionError(`Y-axis column '${yCol.name}' must be numeric for a Box Plot`);
  }

  const groups = groupRows(table, options.colorBy);
  const keys = Array.from(groups.keys());
  const series: Series[] = [];

  for (const [key, rows] of groups) {
    const values = rows.map(row => row[yCol.name]).filter((v): v is number => typeof v === 'number' && !Number.isNaN(v));
    if (values.length === 0) continue;
    const name = key === UNGROUPED ? yCol.name : key;
    const stats = boxStats(values);

    series.push({
      name,
      type: 'box',
      mode: 'markers',
      role: 'data',
      x: [name],
      y: values,
      box: stats,
      color: colorFor(key, keys),
      legendGroup: name,
      showLegend: true,
      hoverText: [
        [`${name}`, `max: ${stats.max.toFixed(2)}`, `q3: ${stats.q3.toFixed(2)}`, `median: ${stats.median.toFixed(2)}`,
          `q1: ${stats.q1.toFixed(2)}`, `min: ${stats.min.toFixed(2)}`].join('<br>'),
      ],
    });
  }

  const colorCol = options.colorBy ? findColumn(table.schema, options.colorBy) : undefined;
  return { series, xAxis: { kind: 'text', title: colorCol && colorCol.type !== 'numeric' ? colorCol.name : '' } };
}

const BUILDERS = {
  'Scatter Plot': xyBuilder('scatter', 'markers', false),
  'Line Chart': xyBuilder('line', 'lines', true),
  'Bar Chart': xyBuilder('bar', 'markers', false),
  Histogram: histogramSeries,
  'Box Plot': boxSeries,
} satisfies Record<ExplorerChartOptions['plotType'], (table: Table, options: ExplorerChartOptions) => { series: Series[]; xAxis: XAxisSpec }>;

/**
 * Single-panel chart for the sample dataset explorer.
 */
export function buildExplorerChart(table: Table, options: ExplorerChartOptions): ChartSpec {
  const { series, xAxis } = BUILDERS[options.plotType](table, options);

  return deepFreeze({
    title: options.title,
    height: options.height,
    showGrid: options.showGrid,
    rows: 1,
    cols: 1,
    xAxis,
    yAxisTitle: options.plotType === 'Histogram' ? 'count' : options.y,
    panels: [{ row: 1, col: 1, title: options.title, series }],
  });
}
