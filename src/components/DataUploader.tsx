'use client';

import { useCallback, useState } from 'react';
import { AlertCircle, FileText, Upload } from 'lucide-react';
import { useDashboardStore } from '@/store/useDashboardStore';

export function DataUploader() {
  const [isDragging, setIsDragging] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const loadCompoundCSV = useDashboardStore(state => state.loadCompoundCSV);
  const compoundSource = useDashboardStore(state => state.compoundDataset.source);

  const handleFile = useCallback(
    (file: File) => {
      setError(null);

      if (!file.name.toLowerCase().endsWith('.csv')) {
        setError('Please upload a CSV file');
        return;
      }

      const reader = new FileReader();
      reader.onload = e => {
        const text = e.target?.result;
        if (typeof text !== 'string') {
          setError('Failed to read file');
          return;
        }
        try {
          loadCompoundCSV(text, file.name);
        } catch (err) {
          setError(err instanceof Error ? err.message : 'Failed to parse CSV');
        }
      };
      reader.onerror = () => {
        setError('Failed to read file');
      };
      reader.readAsText(file);
    },
    [loadCompoundCSV]
  );

  const handleDrop = useCallback(
    (e: React.DragEvent) => {
      e.preventDefault();
      setIsDragging(false);

      const file = e.dataTransfer.files[0];
      if (file) {
        handleFile(file);
      }
    },
    [handleFile]
  );

  const handleDragOver = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    setIsDragging(true);
  }, []);

  const handleDragLeave = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    setIsDragging(false);
  }, []);

  const handleInputChange = useCallback(
    (e: React.ChangeEvent<HTMLInputElement>) => {
      const file = e.target.files?.[0];
      if (file) {
        handleFile(file);
      }
    },
    [handleFile]
  );

  return (
    <div className="space-y-3">
      <div className="flex items-center gap-2 text-xs text-gray-500 dark:text-slate-400">
        <FileText className="w-4 h-4" />
        <span className="truncate" title={compoundSource}>
          {compoundSource}
        </span>
      </div>

      <div
        onDrop={handleDrop}
        onDragOver={handleDragOver}
        onDragLeave={handleDragLeave}
        className={`
          border-2 border-dashed rounded-lg p-4
          flex flex-col items-center justify-center gap-2
          transition-colors cursor-pointer
          ${isDragging
            ? 'border-blue-500 bg-blue-50 dark:bg-slate-800'
            : 'border-gray-300 hover:border-gray-400 dark:border-slate-600'
          }
        `}
      >
        <input type="file" accept=".csv" onChange={handleInputChange} className="hidden" id="csv-upload" />
        <label htmlFor="csv-upload" className="cursor-pointer flex flex-col items-center gap-2">
          <Upload className="w-6 h-6 text-gray-500" />
          <p className="text-sm font-medium text-gray-700 dark:text-slate-200 text-center">
            Drop a compound read-out CSV
          </p>
          <p className="text-xs text-gray-500 dark:text-slate-400">or click to browse</p>
        </label>
      </div>

      {error && (
        <div className="p-3 bg-red-50 border border-red-200 rounded-lg flex items-center gap-2">
          <AlertCircle className="w-4 h-4 text-red-500 flex-shrink-0" />
          <p className="text-sm text-red-700">{error}</p>
        </div>
      )}
    </div>
  );
}
