'use client';

import { create } from 'zustand';
import { DEFAULT_PAGE_SIZE, DEFAULT_SELECTION_SIZE } from '@/lib/constants';
import { compoundDataset, CompoundDataset, defaultPlotTitle, SampleDatasetId, SampleDatasets } from '@/lib/datasets';
import { FilterCache } from '@/lib/filter';
import { parseCompoundCsv } from '@/lib/parser';
import { defaultExplorerSelection, ExplorerSelection } from '@/lib/pipeline';
import { generateCompoundScreeningData, generateSampleData } from '@/lib/sampleData';
import { availableOptions, defaultMeasurements, defaultSelection } from '@/lib/selection';
import { ColorBy, PlotType, RawSelection, Theme } from '@/lib/types';

export type DashboardView = 'explorer' | 'compound';

export interface TableViewState {
  showData: boolean;
  pageSize: number;
  page: number;
  searchTerm: string;
  sortColumn: string | null;
}

interface DashboardState {
  // Data (immutable once loaded)
  sampleData: SampleDatasets;
  compoundDataset: CompoundDataset;
  compoundCache: FilterCache;

  // UI State
  activeView: DashboardView;
  theme: Theme;
  explorer: ExplorerSelection;
  titleEdited: boolean;
  compound: RawSelection;
  tableView: TableViewState;
}

interface DashboardActions {
  setActiveView: (view: DashboardView) => void;
  setTheme: (theme: Theme) => void;
  toggleTheme: () => void;
  refreshSampleData: () => void;
  setDataset: (id: SampleDatasetId) => void;
  setPlotType: (plotType: PlotType) => void;
  setAxis: (axis: 'x' | 'y', column: string) => void;
  setColorBy: (column: string | null) => void;
  toggleFilterValue: (value: string) => void;
  setPlotTitle: (title: string) => void;
  setPlotHeight: (height: number) => void;
  setShowGrid: (show: boolean) => void;
  loadCompoundCSV: (csvText: string, source: string) => void;
  setReadOut: (readOut: string) => void;
  toggleCompound: (compound: string) => void;
  toggleMeasurement: (measurement: string) => void;
  selectAllCompounds: () => void;
  deselectAllCompounds: () => void;
  setPoolScreens: (pool: boolean) => void;
  setCompoundColorBy: (colorBy: ColorBy) => void;
  setShowData: (show: boolean) => void;
  setPageSize: (pageSize: number) => void;
  setPage: (page: number) => void;
  setSearchTerm: (term: string) => void;
  setSortColumn: (column: string | null) => void;
}

type DashboardStore = DashboardState & DashboardActions;

export const DEMO_COMPOUND_SOURCE = 'Demo screening data';

const INITIAL_TABLE_VIEW: TableViewState = {
  showData: false,
  pageSize: DEFAULT_PAGE_SIZE,
  page: 1,
  searchTerm: '',
  sortColumn: null,
};

function toggle(values: readonly string[], value: string): string[] {
  return values.includes(value) ? values.filter(v => v !== value) : [...values, value];
}

function initialState(): DashboardState {
  const sampleData = generateSampleData();
  const compoundTable = generateCompoundScreeningData();
  return {
    sampleData,
    compoundDataset: compoundDataset(compoundTable, DEMO_COMPOUND_SOURCE),
    compoundCache: new FilterCache(compoundTable),
    activeView: 'explorer',
    theme: 'light',
    explorer: defaultExplorerSelection('sales_data', sampleData.sales_data),
    titleEdited: false,
    compound: defaultSelection(compoundTable),
    tableView: INITIAL_TABLE_VIEW,
  };
}

export const useDashboardStore = create<DashboardStore>((set, get) => ({
  ...initialState(),

  setActiveView: (view: DashboardView) => {
    set({ activeView: view, tableView: { ...get().tableView, page: 1, searchTerm: '', sortColumn: null } });
  },

  setTheme: (theme: Theme) => {
    set({ theme });
  },

  toggleTheme: () => {
    set({ theme: get().theme === 'light' ? 'dark' : 'light' });
  },

  refreshSampleData: () => {
    const { explorer } = get();
    const sampleData = generateSampleData();
    set({
      sampleData,
      explorer: defaultExplorerSelection(explorer.datasetId, sampleData[explorer.datasetId]),
      titleEdited: false,
      tableView: { ...get().tableView, page: 1 },
    });
  },

  setDataset: (id: SampleDatasetId) => {
    const { sampleData, explorer, titleEdited } = get();
    const next = defaultExplorerSelection(id, sampleData[id]);
    set({
      explorer: {
        ...next,
        plotType: explorer.plotType,
        height: explorer.height,
        showGrid: explorer.showGrid,
        title: titleEdited ? explorer.title : defaultPlotTitle(id, explorer.plotType),
      },
      tableView: { ...get().tableView, page: 1, searchTerm: '', sortColumn: null },
    });
  },

  setPlotType: (plotType: PlotType) => {
    const { explorer, titleEdited } = get();
    set({
      explorer: {
        ...explorer,
        plotType,
        title: titleEdited ? explorer.title : defaultPlotTitle(explorer.datasetId, plotType),
      },
    });
  },

  setAxis: (axis: 'x' | 'y', column: string) => {
    const { explorer } = get();
    set({ explorer: axis === 'x' ? { ...explorer, x: column } : { ...explorer, y: column } });
  },

  setColorBy: (column: string | null) => {
    set({ explorer: { ...get().explorer, colorBy: column } });
  },

  toggleFilterValue: (value: string) => {
    const { explorer } = get();
    set({
      explorer: { ...explorer, filterValues: toggle(explorer.filterValues, value) },
      tableView: { ...get().tableView, page: 1 },
    });
  },

  setPlotTitle: (title: string) => {
    set({ explorer: { ...get().explorer, title }, titleEdited: true });
  },

  setPlotHeight: (height: number) => {
    set({ explorer: { ...get().explorer, height } });
  },

  setShowGrid: (show: boolean) => {
    set({ explorer: { ...get().explorer, showGrid: show } });
  },

  loadCompoundCSV: (csvText: string, source: string) => {
    const compoundTable = parseCompoundCsv(csvText);
    set({
      compoundDataset: compoundDataset(compoundTable, source),
      compoundCache: new FilterCache(compoundTable),
      compound: defaultSelection(compoundTable),
      tableView: { ...get().tableView, page: 1, searchTerm: '', sortColumn: null },
    });
  },

  setReadOut: (readOut: string) => {
    const { compoundDataset: dataset, compound } = get();
    const options = availableOptions(dataset.table, readOut);
    set({
      compound: {
        ...compound,
        readOut,
        compounds: options.compounds.slice(0, DEFAULT_SELECTION_SIZE),
        measurements: defaultMeasurements(options.measurements),
      },
      tableView: { ...get().tableView, page: 1 },
    });
  },

  toggleCompound: (compoundName: string) => {
    const { compound } = get();
    set({
      compound: { ...compound, compounds: toggle(compound.compounds, compoundName) },
      tableView: { ...get().tableView, page: 1 },
    });
  },

  toggleMeasurement: (measurement: string) => {
    const { compound } = get();
    set({
      compound: { ...compound, measurements: toggle(compound.measurements, measurement) },
      tableView: { ...get().tableView, page: 1 },
    });
  },

  selectAllCompounds: () => {
    const { compoundDataset: dataset, compound } = get();
    set({ compound: { ...compound, compounds: availableOptions(dataset.table, compound.readOut).compounds } });
  },

  deselectAllCompounds: () => {
    set({ compound: { ...get().compound, compounds: [] } });
  },

  setPoolScreens: (pool: boolean) => {
    set({ compound: { ...get().compound, poolScreens: pool } });
  },

  setCompoundColorBy: (colorBy: ColorBy) => {
    set({ compound: { ...get().compound, colorBy } });
  },

  setShowData: (show: boolean) => {
    set({ tableView: { ...get().tableView, showData: show } });
  },

  setPageSize: (pageSize: number) => {
    set({ tableView: { ...get().tableView, pageSize, page: 1 } });
  },

  setPage: (page: number) => {
    set({ tableView: { ...get().tableView, page } });
  },

  setSearchTerm: (term: string) => {
    set({ tableView: { ...get().tableView, searchTerm: term, page: 1 } });
  },

  setSortColumn: (column: string | null) => {
    set({ tableView: { ...get().tableView, sortColumn: column, page: 1 } });
  },
}));
