import React from 'react';
import { Table } from 'lucide-react';
import { DateRange, PriceRow } from '../types';
import { formatCell } from './DataTable';

interface DataPreviewProps {
  rows: PriceRow[];
  columns: string[];
  dateRange: DateRange;
}

const PREVIEW_SIZE = 10;

const DataPreview: React.FC<DataPreviewProps> = ({ rows, columns, dateRange }) => {
  // Take the first rows inside the date range
  const previewRows: PriceRow[] = [];
  for (const row of rows) {
    if (row.date >= dateRange.start && row.date <= dateRange.end) {
      previewRows.push(row);
    }
    if (previewRows.length >= PREVIEW_SIZE) break;
  }

  return (
    <div className="bg-white rounded-lg shadow border border-slate-200">
      <div className="p-4 border-b border-slate-100 bg-slate-50 flex items-center justify-between">
        <div className="flex items-center">
          <Table className="w-5 h-5 text-blue-600 mr-2" />
          <h3 className="font-bold text-slate-800">Raw data preview (first {PREVIEW_SIZE} rows)</h3>
        </div>
        <span className="text-xs text-slate-500">
          {dateRange.start} → {dateRange.end}
        </span>
      </div>

      <div className="overflow-x-auto">
        <table className="min-w-full divide-y divide-slate-200 text-sm">
          <thead className="bg-slate-100">
            <tr>
              <th className="px-4 py-3 text-left font-medium text-slate-600">Pricing Location</th>
              <th className="px-4 py-3 text-left font-medium text-slate-600">Date</th>
              <th className="px-4 py-3 text-left font-medium text-slate-600">Hour</th>
              {columns.map(col => (
                <th key={col} className="px-4 py-3 text-left font-medium text-slate-600">{col}</th>
              ))}
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-200">
            {previewRows.length === 0 ? (
              <tr>
                <td colSpan={columns.length + 3} className="p-8 text-center text-slate-500">
                  No data in selected date range
                </td>
              </tr>
            ) : (
              previewRows.map((row, idx) => (
                <tr key={idx} className="hover:bg-slate-50">
                  <td className="px-4 py-2 text-slate-700 whitespace-nowrap">{row.location}</td>
                  <td className="px-4 py-2 text-slate-700 whitespace-nowrap">{row.date}</td>
                  <td className="px-4 py-2 text-slate-700">
                    {row.deliveryHour}{row.interval !== undefined ? ` · ${row.interval}` : ''}
                  </td>
                  {columns.map(col => (
                    <td key={col} className="px-4 py-2 font-mono text-blue-700">{formatCell(row.values[col] ?? null)}</td>
                  ))}
                </tr>
              ))
            )}
          </tbody>
        </table>
      </div>
    </div>
  );
};

export default DataPreview;
