import React, { useMemo } from 'react';
import { AlertCircle, BarChart3, Calendar, Loader2 } from 'lucide-react';
import { Dataset, DateRange, Direction, StatisticsKey, StatisticsMetric } from '../types';
import { STATISTICS_METRICS } from '../config';
import { filterByDateRange } from '../services/filters';
import { buildStatistics, DIRECTIONS } from '../services/statistics';
import { buildRankingView } from '../services/ranking';
import RankingChart from './RankingChart';
import DataTable, { TableRow } from './DataTable';

interface StatisticsPageProps {
  dataset: Dataset | null;
  loading: boolean;
  error: string | null;
  dateRange: DateRange;
  setDateRange: (r: DateRange) => void;
  selection: StatisticsKey;
  setSelection: (k: StatisticsKey) => void;
}

const DIRECTION_LABELS: Record<Direction, string> = { low: 'Low', high: 'High' };

const isMetric = (value: string): value is StatisticsMetric =>
  STATISTICS_METRICS.some(m => m === value);

const StatisticsPage: React.FC<StatisticsPageProps> = ({
  dataset, loading, error, dateRange, setDateRange, selection, setSelection,
}) => {
  const filteredRows = useMemo(
    () => (dataset ? filterByDateRange(dataset.rows, dateRange) : []),
    [dataset, dateRange],
  );

  // Nothing is computed for an empty window
  const bundle = useMemo(
    () => (filteredRows.length > 0 ? buildStatistics(filteredRows) : null),
    [filteredRows],
  );

  const view = useMemo(() => (bundle ? buildRankingView(bundle, selection) : null), [bundle, selection]);

  const hourlyRows: TableRow[] = useMemo(
    () => (bundle ? bundle.hourlyAverages.map(h => ({ key: String(h.hour), cells: { Hour: h.hour, ...h.values } })) : []),
    [bundle],
  );

  return (
    <div className="animate-fade-in space-y-6">
      <div className="bg-white p-6 rounded-lg shadow border border-slate-200">
        <div className="grid grid-cols-1 md:grid-cols-3 gap-6">
          <div>
            <label className="block text-sm font-medium text-slate-700 mb-2 flex items-center">
              <Calendar className="w-4 h-4 mr-1" />
              Date range
            </label>
            <div className="flex space-x-2">
              <input
                type="date"
                value={dateRange.start}
                onChange={e => setDateRange({ ...dateRange, start: e.target.value })}
                className="w-1/2 border-slate-300 rounded-md shadow-sm p-2 border"
              />
              <input
                type="date"
                value={dateRange.end}
                onChange={e => setDateRange({ ...dateRange, end: e.target.value })}
                className="w-1/2 border-slate-300 rounded-md shadow-sm p-2 border"
              />
            </div>
          </div>
          <div>
            <label className="block text-sm font-medium text-slate-700 mb-2">Choose type</label>
            <select
              value={selection.direction}
              onChange={e => setSelection({ ...selection, direction: e.target.value === 'high' ? 'high' : 'low' })}
              className="w-full border-slate-300 rounded-md shadow-sm p-2 border bg-slate-50"
            >
              {DIRECTIONS.map(d => (
                <option key={d} value={d}>{DIRECTION_LABELS[d]}</option>
              ))}
            </select>
          </div>
          <div>
            <label className="block text-sm font-medium text-slate-700 mb-2">Choose metric</label>
            <select
              value={selection.metric}
              onChange={e => {
                const metric = e.target.value;
                if (isMetric(metric)) setSelection({ ...selection, metric });
              }}
              className="w-full border-slate-300 rounded-md shadow-sm p-2 border bg-slate-50"
            >
              {STATISTICS_METRICS.map(m => (
                <option key={m} value={m}>{m}</option>
              ))}
            </select>
          </div>
        </div>
      </div>

      {loading || (!dataset && !error) ? (
        <div className="flex items-center justify-center h-40 text-slate-500">
          <Loader2 className="w-6 h-6 mr-2 animate-spin text-blue-500" />
          Loading dataset...
        </div>
      ) : error ? (
        <div className="p-4 bg-red-50 border border-red-200 rounded-md flex items-center text-red-700">
          <AlertCircle className="w-5 h-5 mr-2" />
          {error}
        </div>
      ) : !view ? (
        <div className="p-4 bg-amber-50 border border-amber-200 rounded-md flex items-center text-amber-800">
          <AlertCircle className="w-5 h-5 mr-2" />
          No data in selected date range.
        </div>
      ) : (
        <>
          <h3 className="text-lg font-bold text-slate-800 flex items-center">
            <BarChart3 className="w-5 h-5 mr-2 text-blue-600" />
            {DIRECTION_LABELS[selection.direction]} {selection.metric}
          </h3>
          <RankingChart view={view} />
          <DataTable
            title="Average by delivery hour"
            columns={['Hour', ...STATISTICS_METRICS]}
            rows={hourlyRows}
            fileName="hourly_averages.csv"
          />
        </>
      )}
    </div>
  );
};

export default StatisticsPage;
