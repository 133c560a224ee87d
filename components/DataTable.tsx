import React, { useState } from 'react';
import Papa from 'papaparse';
import { ArrowUpDown, Download } from 'lucide-react';
import { PriceRow } from '../types';

export type Cell = string | number | null;

export interface TableRow {
  key: string;
  cells: Record<string, Cell>;
}

interface DataTableProps {
  title: string;
  columns: string[];
  rows: TableRow[];
  fileName: string;
  maxRows?: number;
}

export const formatCell = (value: Cell): string => {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
};

// Nulls sort last in both directions
const compareCells = (a: Cell, b: Cell): number => {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
};

export const priceRowsToTable = (rows: PriceRow[], columns: string[]): TableRow[] =>
  rows.map((r, i) => {
    const cells: Record<string, Cell> = {
      'Pricing Location': r.location,
      'Date': r.date,
      'Delivery Hour': r.deliveryHour,
    };
    if (r.interval !== undefined) cells['Interval'] = r.interval;
    for (const col of columns) cells[col] = r.values[col] ?? null;
    return { key: String(i), cells };
  });

export const priceTableColumns = (rows: PriceRow[], columns: string[]): string[] => [
  'Pricing Location',
  'Date',
  'Delivery Hour',
  ...(rows.some(r => r.interval !== undefined) ? ['Interval'] : []),
  ...columns,
];

const DataTable: React.FC<DataTableProps> = ({ title, columns, rows, fileName, maxRows = 500 }) => {
  const [sortConfig, setSortConfig] = useState<{ key: string; direction: 'asc' | 'desc' } | null>(null);

  const sortedRows = React.useMemo(() => {
    const sortableItems = [...rows];
    if (sortConfig !== null) {
      const sign = sortConfig.direction === 'asc' ? 1 : -1;
      sortableItems.sort((a, b) => {
        const av = a.cells[sortConfig.key] ?? null;
        const bv = b.cells[sortConfig.key] ?? null;
        return av === null || bv === null ? compareCells(av, bv) : sign * compareCells(av, bv);
      });
    }
    return sortableItems;
  }, [rows, sortConfig]);

  const requestSort = (key: string) => {
    let direction: 'asc' | 'desc' = 'asc';
    if (sortConfig && sortConfig.key === key && sortConfig.direction === 'asc') {
      direction = 'desc';
    }
    setSortConfig({ key, direction });
  };

  const exportCSV = () => {
    const csv = Papa.unparse({
      fields: columns,
      data: rows.map(r => columns.map(c => r.cells[c] ?? '')),
    });
    const blob = new Blob(['\uFEFF' + csv], { type: 'text/csv;charset=utf-8' });
    const href = URL.createObjectURL(blob);
    const link = document.createElement('a');
    link.setAttribute('href', href);
    link.setAttribute('download', fileName);
    document.body.appendChild(link);
    link.click();
    document.body.removeChild(link);
    URL.revokeObjectURL(href);
  };

  const visibleRows = sortedRows.slice(0, maxRows);

  return (
    <div className="bg-white shadow rounded-lg overflow-hidden">
      <div className="p-4 border-b border-slate-100 flex justify-between items-center bg-slate-50">
        <h3 className="font-semibold text-slate-800">{title}</h3>
        <button
          onClick={exportCSV}
          className="flex items-center px-3 py-1.5 bg-blue-600 text-white text-sm rounded hover:bg-blue-700 transition"
        >
          <Download className="w-4 h-4 mr-1" />
          Export CSV
        </button>
      </div>
      <div className="overflow-x-auto max-h-96">
        <table className="min-w-full divide-y divide-slate-200">
          <thead className="bg-slate-50">
            <tr>
              {columns.map(col => (
                <th
                  key={col}
                  onClick={() => requestSort(col)}
                  className="px-4 py-3 text-left text-xs font-medium text-slate-500 uppercase tracking-wider cursor-pointer hover:bg-slate-100"
                >
                  <div className="flex items-center">{col} <ArrowUpDown className="w-3 h-3 ml-1" /></div>
                </th>
              ))}
            </tr>
          </thead>
          <tbody className="bg-white divide-y divide-slate-200">
            {visibleRows.map(row => (
              <tr key={row.key} className="hover:bg-slate-50 transition">
                {columns.map(col => (
                  <td key={col} className="px-4 py-2 whitespace-nowrap text-sm text-slate-700">{formatCell(row.cells[col] ?? null)}</td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
      {sortedRows.length > maxRows && (
        <div className="p-3 bg-slate-50 border-t border-slate-100 text-center text-xs text-slate-500">
          Showing {maxRows} of {sortedRows.length} rows; the export contains all of them.
        </div>
      )}
    </div>
  );
};

export default DataTable;
