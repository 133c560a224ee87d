import React, { useRef, useState } from 'react';
import { AlertCircle, Check, Cloud, FileText, HardDrive, RefreshCw, Upload } from 'lucide-react';
import { Dataset, DatasetInfo } from '../types';
import { DATASETS } from '../config';
import { parseDatasetBuffer } from '../services/datasetLoader';
import { errorMessage } from '../services/errorUtils';

interface DatasetSourceProps {
  selectedName: string | null;
  loading: boolean;
  error: string | null;
  onSelectRemote: (info: DatasetInfo) => void;
  onFileLoaded: (dataset: Dataset, fileName: string) => void;
  onFileError: (message: string) => void;
}

const DatasetSource: React.FC<DatasetSourceProps> = ({
  selectedName, loading, error, onSelectRemote, onFileLoaded, onFileError,
}) => {
  const [mode, setMode] = useState<'remote' | 'local'>('remote');
  const [parsing, setParsing] = useState(false);
  const fileInputRef = useRef<HTMLInputElement>(null);

  // --- Local Mode Logic ---
  const handleFileChange = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;

    setParsing(true);
    try {
      const dataset = await parseDatasetBuffer(await file.arrayBuffer());
      onFileLoaded(dataset, file.name);
    } catch (err) {
      console.error(err);
      onFileError(`Could not read ${file.name}: ${errorMessage(err)}`);
    } finally {
      setParsing(false);
    }
  };

  const tabClass = (active: boolean) =>
    `flex items-center px-4 py-2 font-medium text-sm transition-colors border-b-2 ${
      active ? 'border-blue-600 text-blue-600' : 'border-transparent text-slate-500 hover:text-slate-700'
    }`;

  return (
    <div className="bg-white rounded-lg shadow-sm border border-slate-200 p-4">
      <div className="flex border-b border-slate-200 mb-4">
        <button onClick={() => setMode('remote')} className={tabClass(mode === 'remote')}>
          <Cloud className="w-4 h-4 mr-2" />
          Available datasets
        </button>
        <button onClick={() => setMode('local')} className={tabClass(mode === 'local')}>
          <HardDrive className="w-4 h-4 mr-2" />
          Local file
        </button>
      </div>

      {mode === 'remote' ? (
        <ul className="divide-y divide-slate-100 border border-slate-200 rounded-md overflow-hidden">
          {DATASETS.map(info => (
            <li
              key={info.name}
              onClick={() => onSelectRemote(info)}
              className={`flex items-center justify-between px-4 py-3 hover:bg-blue-50 transition cursor-pointer ${
                selectedName === info.name ? 'bg-blue-50 ring-1 ring-inset ring-blue-200' : ''
              }`}
            >
              <div className="flex items-center">
                <FileText className="w-4 h-4 text-slate-400 mr-3" />
                <span className="text-sm text-slate-700 font-medium">{info.name}</span>
              </div>
              {selectedName === info.name && loading ? (
                <span className="text-xs text-blue-600 flex items-center">
                  <RefreshCw className="w-3 h-3 mr-1 animate-spin" /> Loading
                </span>
              ) : selectedName === info.name ? (
                <span className="text-xs text-green-600 flex items-center">
                  <Check className="w-3 h-3 mr-1" /> Selected
                </span>
              ) : null}
            </li>
          ))}
        </ul>
      ) : (
        <div
          className="border-2 border-dashed border-slate-300 rounded-lg p-8 flex flex-col items-center justify-center bg-white hover:bg-slate-50 transition cursor-pointer group"
          onClick={() => fileInputRef.current?.click()}
        >
          <div className="bg-blue-50 p-4 rounded-full mb-4 group-hover:scale-110 transition-transform">
            <Upload className="w-8 h-8 text-blue-500" />
          </div>
          <h3 className="text-lg font-semibold text-slate-700">Upload a price file</h3>
          <p className="text-sm text-slate-500 mt-2">CSV or gzip-compressed CSV</p>
          <p className="text-xs text-slate-400 mt-1">Needs Date, Delivery Hour and Pricing Location columns</p>
          <input
            type="file"
            ref={fileInputRef}
            onChange={e => { void handleFileChange(e); }}
            accept=".csv,.gz"
            className="hidden"
          />
          {parsing && (
            <p className="mt-4 text-blue-600 font-medium flex items-center">
              <RefreshCw className="w-4 h-4 mr-2 animate-spin" /> Parsing data...
            </p>
          )}
        </div>
      )}

      {error && (
        <div className="mt-4 p-4 bg-red-50 border border-red-200 rounded-md flex items-center text-red-700 animate-fade-in">
          <AlertCircle className="w-5 h-5 mr-2" />
          {error}
        </div>
      )}
    </div>
  );
};

export default DatasetSource;
