'use client';

import { useState, type ReactNode } from 'react';
import { ChevronDown, ChevronRight, RefreshCw } from 'lucide-react';
import { useDashboardStore } from '@/store/useDashboardStore';
import { PLOT_HEIGHT_RANGE, PLOT_TYPES } from '@/lib/constants';
import { isSampleDatasetId, SAMPLE_DATASET_IDS, SAMPLE_DATASETS } from '@/lib/datasets';
import { availableOptions, availableReadOuts } from '@/lib/selection';
import { columnNames, describeColumns, distinctStrings } from '@/lib/table';
import { ColorBy, PlotType } from '@/lib/types';
import { DataUploader } from '@/components/DataUploader';

const selectClass =
  'w-full px-2 py-1 border border-gray-300 rounded text-sm dark:bg-slate-800 dark:border-slate-600 dark:text-slate-100';

function isPlotType(value: string): value is PlotType {
  return PLOT_TYPES.some(p => p === value);
}

function Section({ title, children }: { title: string; children: ReactNode }) {
  const [expanded, setExpanded] = useState(true);

  return (
    <div className="mb-6">
      <button
        onClick={() => setExpanded(!expanded)}
        className="flex items-center gap-1 font-semibold text-gray-700 dark:text-slate-200 mb-2 hover:text-gray-900"
      >
        {expanded ? <ChevronDown className="w-4 h-4" /> : <ChevronRight className="w-4 h-4" />}
        {title}
      </button>
      {expanded && <div className="space-y-3">{children}</div>}
    </div>
  );
}

function CheckboxList({
  options,
  selected,
  onToggle,
}: {
  options: readonly string[];
  selected: readonly string[];
  onToggle: (value: string) => void;
}) {
  return (
    <div className="space-y-1 max-h-64 overflow-y-auto">
      {options.map(option => (
        <label
          key={option}
          className="flex items-center gap-2 cursor-pointer text-sm p-1 rounded hover:bg-gray-100 dark:hover:bg-slate-800"
        >
          <input
            type="checkbox"
            checked={selected.includes(option)}
            onChange={() => onToggle(option)}
            className="rounded"
          />
          <span className="truncate" title={option}>
            {option}
          </span>
        </label>
      ))}
    </div>
  );
}

function ExplorerControls() {
  const {
    sampleData,
    explorer,
    setDataset,
    setPlotType,
    setAxis,
    setColorBy,
    toggleFilterValue,
    setPlotTitle,
    setPlotHeight,
    setShowGrid,
    refreshSampleData,
  } = useDashboardStore();

  const table = sampleData[explorer.datasetId];
  const descriptor = SAMPLE_DATASETS[explorer.datasetId];
  const columns = columnNames(table);
  const columnInfo = describeColumns(table);
  const colorOptions = columns.filter(col => columnInfo[col].isCategorical);
  const filterOptions = descriptor.filterColumn ? distinctStrings(table, descriptor.filterColumn) : [];

  return (
    <>
      <Section title="Dashboard Controls">
        <div>
          <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">Select Dataset</label>
          <select
            value={explorer.datasetId}
            onChange={e => {
              if (isSampleDatasetId(e.target.value)) setDataset(e.target.value);
            }}
            className={selectClass}
          >
            {SAMPLE_DATASET_IDS.map(id => (
              <option key={id} value={id}>
                {SAMPLE_DATASETS[id].label}
              </option>
            ))}
          </select>
        </div>

        <div>
          <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">Select Plot Type</label>
          <select
            value={explorer.plotType}
            onChange={e => {
              if (isPlotType(e.target.value)) setPlotType(e.target.value);
            }}
            className={selectClass}
          >
            {PLOT_TYPES.map(type => (
              <option key={type} value={type}>
                {type}
              </option>
            ))}
          </select>
        </div>
      </Section>

      <Section title="Plot Parameters">
        <div>
          <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">X-Axis</label>
          <select value={explorer.x} onChange={e => setAxis('x', e.target.value)} className={selectClass}>
            {columns.map(col => (
              <option key={col} value={col}>
                {col}
              </option>
            ))}
          </select>
        </div>

        <div>
          <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">Y-Axis</label>
          <select value={explorer.y} onChange={e => setAxis('y', e.target.value)} className={selectClass}>
            {columns.map(col => (
              <option key={col} value={col}>
                {col}
              </option>
            ))}
          </select>
        </div>

        {descriptor.colorBy === null ? (
          <div>
            <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">Color By</label>
            <select
              value={explorer.colorBy ?? ''}
              onChange={e => setColorBy(e.target.value || null)}
              className={selectClass}
            >
              <option value="">None</option>
              {colorOptions.map(col => (
                <option key={col} value={col}>
                  {col}
                </option>
              ))}
            </select>
          </div>
        ) : (
          <div className="text-xs text-gray-500 dark:text-slate-400">Colored by {descriptor.colorBy}</div>
        )}

        {descriptor.filterColumn && (
          <div>
            <div className="text-sm text-gray-600 dark:text-slate-300 mb-1">
              {descriptor.filterLabel} ({explorer.filterValues.length}/{filterOptions.length})
            </div>
            <CheckboxList options={filterOptions} selected={explorer.filterValues} onToggle={toggleFilterValue} />
          </div>
        )}
      </Section>

      <Section title="Appearance">
        <div>
          <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">Plot Title</label>
          <input
            type="text"
            value={explorer.title}
            onChange={e => setPlotTitle(e.target.value)}
            className={selectClass}
          />
        </div>

        <div>
          <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">
            Plot Height: {explorer.height}
          </label>
          <input
            type="range"
            min={PLOT_HEIGHT_RANGE.min}
            max={PLOT_HEIGHT_RANGE.max}
            value={explorer.height}
            onChange={e => setPlotHeight(Number(e.target.value))}
            className="w-full"
          />
        </div>

        <label className="flex items-center gap-2 cursor-pointer">
          <input
            type="checkbox"
            checked={explorer.showGrid}
            onChange={e => setShowGrid(e.target.checked)}
            className="rounded"
          />
          <span className="text-sm text-gray-700 dark:text-slate-200">Show Grid</span>
        </label>
      </Section>

      <button
        onClick={refreshSampleData}
        className="flex items-center gap-2 px-4 py-2 border border-gray-300 dark:border-slate-600 rounded-lg hover:bg-gray-100 dark:hover:bg-slate-800 text-sm"
      >
        <RefreshCw className="w-4 h-4" />
        Refresh Data
      </button>
    </>
  );
}

function CompoundControls() {
  const {
    compoundDataset,
    compound,
    setReadOut,
    toggleCompound,
    toggleMeasurement,
    selectAllCompounds,
    deselectAllCompounds,
    setPoolScreens,
    setCompoundColorBy,
  } = useDashboardStore();

  const readOuts = availableReadOuts(compoundDataset.table);
  const options = availableOptions(compoundDataset.table, compound.readOut);

  return (
    <>
      <Section title="Data Source">
        <DataUploader />
      </Section>

      <Section title="Selection">
        <div>
          <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">Read-out</label>
          <select value={compound.readOut} onChange={e => setReadOut(e.target.value)} className={selectClass}>
            {readOuts.map(r => (
              <option key={r} value={r}>
                {r}
              </option>
            ))}
          </select>
        </div>

        <div>
          <div className="flex items-center justify-between text-sm text-gray-600 dark:text-slate-300 mb-1">
            <span>
              Compounds ({compound.compounds.length}/{options.compounds.length})
            </span>
            <span className="flex gap-2 text-xs">
              <button onClick={selectAllCompounds} className="text-blue-600 hover:underline">
                All
              </button>
              <button onClick={deselectAllCompounds} className="text-blue-600 hover:underline">
                None
              </button>
            </span>
          </div>
          <CheckboxList options={options.compounds} selected={compound.compounds} onToggle={toggleCompound} />
        </div>

        <div>
          <div className="text-sm text-gray-600 dark:text-slate-300 mb-1">
            Measurements ({compound.measurements.length}/{options.measurements.length})
          </div>
          <CheckboxList options={options.measurements} selected={compound.measurements} onToggle={toggleMeasurement} />
        </div>
      </Section>

      <Section title="Layout">
        <label className="flex items-center gap-2 cursor-pointer">
          <input
            type="checkbox"
            checked={compound.poolScreens}
            onChange={e => setPoolScreens(e.target.checked)}
            className="rounded"
          />
          <span className="text-sm text-gray-700 dark:text-slate-200">Pool screens</span>
        </label>

        <div>
          <label className="block text-sm text-gray-600 dark:text-slate-300 mb-1">Color by</label>
          <select
            value={compound.colorBy}
            disabled={compound.poolScreens}
            onChange={e => {
              const value: ColorBy = e.target.value === 'measurement' ? 'measurement' : 'compound';
              setCompoundColorBy(value);
            }}
            className={selectClass}
          >
            <option value="compound">Compound</option>
            <option value="measurement">Measurement</option>
          </select>
        </div>
      </Section>
    </>
  );
}

export function Sidebar() {
  const activeView = useDashboardStore(state => state.activeView);

  return (
    <div className="w-72 border-r border-gray-200 dark:border-slate-700 bg-gray-50 dark:bg-slate-900 p-4 overflow-y-auto">
      {activeView === 'explorer' ? <ExplorerControls /> : <CompoundControls />}
    </div>
  );
}
