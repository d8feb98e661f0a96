'use client';

import { useMemo } from 'react';
import { BarChart3, FlaskConical, Info, Moon, Sun } from 'lucide-react';
import { useDashboardStore } from '@/store/useDashboardStore';
import { Charts } from '@/components/Charts';
import { DataTable } from '@/components/DataTable';
import { Sidebar } from '@/components/Sidebar';
import { SummaryPanel } from '@/components/SummaryPanel';
import { datasetLabel } from '@/lib/datasets';
import { runCompoundAnalysis, runExplorer } from '@/lib/pipeline';
import { EmptySelectionReason } from '@/lib/types';

const EMPTY_SELECTION_MESSAGES: Record<EmptySelectionReason, string> = {
  'read-out': 'Please select a read-out.',
  compounds: 'Please select at least one compound.',
  measurements: 'Please select at least one measurement.',
};

function ExplorerView() {
  const { sampleData, explorer, theme } = useDashboardStore();
  const analysis = useMemo(() => runExplorer(sampleData, explorer), [sampleData, explorer]);

  return (
    <div className="space-y-6">
      <div className="grid grid-cols-1 xl:grid-cols-3 gap-6">
        <div className="xl:col-span-2">
          <Charts result={analysis.chart} theme={theme} />
        </div>
        <SummaryPanel summary={analysis.summary} datasetLabel={datasetLabel(analysis.dataset)} />
      </div>
      <DataTable table={analysis.filtered} />
    </div>
  );
}

function CompoundView() {
  const { compoundCache, compound, compoundDataset, theme } = useDashboardStore();
  const analysis = useMemo(() => runCompoundAnalysis(compoundCache, compound), [compoundCache, compound]);

  if (analysis.status === 'empty-selection') {
    return (
      <div className="flex items-center gap-2 p-4 rounded-lg bg-yellow-50 text-yellow-800 dark:bg-slate-800 dark:text-yellow-200">
        <Info className="w-4 h-4" />
        {EMPTY_SELECTION_MESSAGES[analysis.reason]}
      </div>
    );
  }

  return (
    <div className="space-y-6">
      <div className="text-sm text-gray-600 dark:text-slate-300">
        {analysis.selection.compounds.length} compounds, {analysis.selection.measurements.length} measurements
        {analysis.selection.poolScreens ? ', screens pooled' : `, ${analysis.screens.length} screens`}
      </div>
      <Charts result={analysis.chart} theme={theme} />
      <div className="grid grid-cols-1 xl:grid-cols-3 gap-6">
        <div className="xl:col-span-2">
          <DataTable table={analysis.filtered} />
        </div>
        <SummaryPanel summary={analysis.summary} datasetLabel={datasetLabel(compoundDataset)} />
      </div>
    </div>
  );
}

export default function Home() {
  const { activeView, setActiveView, theme, toggleTheme } = useDashboardStore();

  return (
    <div className={theme === 'dark' ? 'dark' : undefined}>
      <div className="min-h-screen bg-gray-100 dark:bg-slate-950 text-gray-900 dark:text-slate-100 flex flex-col">
        {/* Header */}
        <header className="bg-white dark:bg-slate-900 border-b border-gray-200 dark:border-slate-700 px-6 py-4">
          <div className="flex items-center justify-between">
            <div>
              <h1 className="text-xl font-bold">Data Dashboard</h1>
              <p className="text-sm text-gray-600 dark:text-slate-400">
                Explore sample datasets and compound screening read-outs
              </p>
            </div>
            <button
              onClick={toggleTheme}
              aria-label="Toggle theme"
              className="flex items-center gap-2 px-4 py-2 border border-gray-300 dark:border-slate-600 rounded-lg hover:bg-gray-50 dark:hover:bg-slate-800 transition-colors"
            >
              {theme === 'dark' ? <Sun className="w-4 h-4" /> : <Moon className="w-4 h-4" />}
              {theme === 'dark' ? 'Light' : 'Dark'}
            </button>
          </div>

          {/* Tabs */}
          <div className="flex gap-1 mt-4">
            <button
              onClick={() => setActiveView('explorer')}
              className={`flex items-center gap-2 px-4 py-2 rounded-t-lg transition-colors ${
                activeView === 'explorer'
                  ? 'bg-blue-600 text-white'
                  : 'bg-gray-200 text-gray-700 hover:bg-gray-300 dark:bg-slate-800 dark:text-slate-300'
              }`}
            >
              <BarChart3 className="w-4 h-4" />
              Sample Explorer
            </button>
            <button
              onClick={() => setActiveView('compound')}
              className={`flex items-center gap-2 px-4 py-2 rounded-t-lg transition-colors ${
                activeView === 'compound'
                  ? 'bg-purple-600 text-white'
                  : 'bg-gray-200 text-gray-700 hover:bg-gray-300 dark:bg-slate-800 dark:text-slate-300'
              }`}
            >
              <FlaskConical className="w-4 h-4" />
              Compound Screening
            </button>
          </div>
        </header>

        {/* Main Content */}
        <div className="flex-1 flex overflow-hidden">
          <Sidebar />

          <main className="flex-1 overflow-auto p-6 bg-white dark:bg-slate-900">
            {activeView === 'explorer' ? <ExplorerView /> : <CompoundView />}
          </main>
        </div>

        <footer className="bg-white dark:bg-slate-900 border-t border-gray-200 dark:border-slate-700 px-6 py-3 text-center text-sm text-gray-500">
          Sample data is regenerated on refresh. Upload a compound CSV from the sidebar to replace the demo screen.
        </footer>
      </div>
    </div>
  );
}
