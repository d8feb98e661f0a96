'use client';

import { AlertCircle, Info } from 'lucide-react';
import {
  Bar,
  CartesianGrid,
  Cell,
  ComposedChart,
  ErrorBar,
  Legend,
  ResponsiveContainer,
  Scatter,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { THEME_COLORS } from '@/lib/constants';
import { ChartResult } from '@/lib/pipeline';
import { ChartSpec, Panel, Series, Theme, XAxisSpec } from '@/lib/types';

interface ChartPoint {
  x: number | string;
  y: number;
  error?: number;
  hover: string;
}

function seriesPoints(series: Series): ChartPoint[] {
  return series.x.map((x, i) => ({
    x,
    y: series.y[i],
    error: series.errorY?.[i],
    hover: series.hoverText[i] ?? '',
  }));
}

// Bars that share an x value stack, so sum them per series
function barRows(series: Series[]): Record<string, number | string>[] {
  const rows = new Map<string, Record<string, number | string>>();
  for (const s of series) {
    s.x.forEach((x, i) => {
      const key = String(x);
      const row = rows.get(key) ?? { x };
      const current = row[s.name];
      row[s.name] = (typeof current === 'number' ? current : 0) + s.y[i];
      rows.set(key, row);
    });
  }
  return Array.from(rows.values());
}

function boxRows(series: Series[]) {
  return series.flatMap(s =>
    s.box
      ? [
          {
            x: String(s.x[0]),
            color: s.color,
            base: s.box.q1,
            lower: s.box.median - s.box.q1,
            upper: s.box.q3 - s.box.median,
            whiskerLow: s.box.min,
            whiskerHigh: s.box.max,
            hover: s.hoverText[0] ?? '',
          },
        ]
      : []
  );
}

function HoverTooltip({ active, payload }: { active?: boolean; payload?: { payload?: { hover?: unknown } }[] }) {
  const hover = payload?.[0]?.payload?.hover;
  if (!active || typeof hover !== 'string' || !hover) return null;

  return (
    <div className="p-2 rounded border text-xs bg-white border-gray-200 text-gray-900 dark:bg-slate-800 dark:border-slate-700 dark:text-white">
      {hover.split('<br>').map((line, i) => (
        <div key={i} className={i === 0 ? 'font-semibold' : undefined}>
          {line}
        </div>
      ))}
    </div>
  );
}

function xAxisProps(axis: XAxisSpec) {
  switch (axis.kind) {
    case 'category':
      return {
        type: 'number' as const,
        domain: [-0.5, Math.max(axis.values.length - 0.5, 0.5)],
        ticks: axis.values.map((_, i) => i),
        tickFormatter: (value: number) => axis.labels[value] ?? '',
        label: { value: 'concentration', position: 'insideBottom' as const, offset: -5 },
      };
    case 'numeric':
      return {
        type: 'number' as const,
        domain: ['auto', 'auto'],
        label: { value: axis.title, position: 'insideBottom' as const, offset: -5 },
      };
    case 'text':
      return {
        type: 'category' as const,
        allowDuplicatedCategory: false,
        label: { value: axis.title, position: 'insideBottom' as const, offset: -5 },
      };
  }
}

function PanelChart({ spec, panel, theme, height }: { spec: ChartSpec; panel: Panel; theme: Theme; height: number }) {
  const colors = THEME_COLORS[theme];
  const bars = panel.series.filter(s => s.type === 'bar');
  const boxes = panel.series.filter(s => s.type === 'box');
  const points = panel.series.filter(s => s.type === 'scatter' || s.type === 'line');

  const boxData = boxRows(boxes);
  const chartData = boxes.length > 0 ? boxData : barRows(bars);

  return (
    <div className="border border-gray-200 dark:border-slate-700 rounded-lg p-2">
      <h4 className="text-sm font-semibold text-center mb-1 text-gray-800 dark:text-slate-100">{panel.title}</h4>
      <div style={{ height }}>
        <ResponsiveContainer width="100%" height="100%">
          <ComposedChart data={chartData} margin={{ top: 10, right: 20, left: 10, bottom: 20 }}>
            {spec.showGrid && <CartesianGrid strokeDasharray="3 3" stroke={colors.grid} />}
            <XAxis dataKey="x" stroke={colors.axis} {...xAxisProps(spec.xAxis)} />
            <YAxis
              stroke={colors.axis}
              domain={['auto', 'auto']}
              label={{ value: spec.yAxisTitle, angle: -90, position: 'insideLeft', fill: colors.axis }}
            />
            <Tooltip content={<HoverTooltip />} />
            <Legend verticalAlign="top" />

            {bars.map(s => (
              <Bar
                key={`${s.name}-bar`}
                dataKey={s.name}
                name={s.name}
                fill={s.color}
                stackId="bars"
                legendType={s.showLegend ? 'square' : 'none'}
                isAnimationActive={false}
              />
            ))}

            {boxes.length > 0 && [
              <Bar key="box-base" dataKey="base" stackId="box" fill="transparent" legendType="none" isAnimationActive={false} />,
              <Bar key="box-lower" dataKey="lower" stackId="box" name="q1 - median" legendType="none" isAnimationActive={false}>
                {boxData.map(row => (
                  <Cell key={`${row.x}-lower`} fill={row.color} fillOpacity={0.5} />
                ))}
              </Bar>,
              <Bar key="box-upper" dataKey="upper" stackId="box" name="median - q3" legendType="none" isAnimationActive={false}>
                {boxData.map(row => (
                  <Cell key={`${row.x}-upper`} fill={row.color} fillOpacity={0.8} />
                ))}
              </Bar>,
              <Scatter key="whisker-low" dataKey="whiskerLow" fill={colors.axis} shape="cross" legendType="none" />,
              <Scatter key="whisker-high" dataKey="whiskerHigh" fill={colors.axis} shape="cross" legendType="none" />,
            ]}

            {points.map((s, i) => (
              <Scatter
                key={`${s.legendGroup}-${s.role}-${i}`}
                name={s.name}
                data={seriesPoints(s)}
                dataKey="y"
                fill={s.color}
                stroke={s.color}
                line={s.mode !== 'markers' ? { stroke: s.color, strokeWidth: s.role === 'mean' ? 3 : 2 } : false}
                shape={s.mode === 'lines' ? () => <g /> : 'circle'}
                legendType={s.showLegend ? 'circle' : 'none'}
                isAnimationActive={false}
              >
                {s.errorY && <ErrorBar dataKey="error" direction="y" stroke={s.color} width={4} />}
              </Scatter>
            ))}
          </ComposedChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
}

export function ChartGrid({ spec, theme }: { spec: ChartSpec; theme: Theme }) {
  const panelHeight = Math.max(200, Math.floor(spec.height / Math.max(spec.rows, 1)));
  const panels = [...spec.panels].sort((a, b) => a.row - b.row || a.col - b.col);

  return (
    <div className="grid gap-3" style={{ gridTemplateColumns: `repeat(${spec.cols}, minmax(0, 1fr))` }}>
      {panels.map(panel => (
        <PanelChart key={`${panel.row}-${panel.col}`} spec={spec} panel={panel} theme={theme} height={panelHeight} />
      ))}
    </div>
  );
}

export function Charts({ result, theme }: { result: ChartResult; theme: Theme }) {
  if (result.status === 'no-rows') {
    return (
      <div className="flex items-center gap-2 p-4 rounded-lg bg-blue-50 text-blue-800 dark:bg-slate-800 dark:text-blue-200">
        <Info className="w-4 h-4" />
        No rows match the current filters.
      </div>
    );
  }

  if (result.status === 'error') {
    return (
      <div className="space-y-2">
        <div className="flex items-center gap-2 p-4 rounded-lg bg-red-50 text-red-700">
          <AlertCircle className="w-4 h-4" />
          Error creating plot: {result.message}
        </div>
        <div className="p-3 rounded-lg bg-blue-50 text-blue-800 text-sm">
          Please check your parameter selections and try again.
        </div>
      </div>
    );
  }

  return <ChartGrid spec={result.spec} theme={theme} />;
}
