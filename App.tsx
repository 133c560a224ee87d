import React, { useEffect, useState } from 'react';
import { Activity, BarChart3, Clock, Database, LayoutDashboard, Loader2 } from 'lucide-react';
import DatasetSource from './components/DatasetSource';
import MarketDashboard from './components/MarketDashboard';
import StatisticsPage from './components/StatisticsPage';
import { Dataset, DatasetInfo, DateRange, MarketFilterState, StatisticsKey } from './types';
import { DISPATCH_TYPES, STATISTICS_DATASET, STATISTICS_METRICS, UPDATE_NOTICE } from './config';
import { availablePriceTypes, dateBounds, inferDatasetKind } from './services/filters';
import { useDataset } from './hooks/useDataset';

type Page = 'dashboard' | 'statistics';

// Where the dashboard dataset came from
type DashboardSource = { type: 'remote'; info: DatasetInfo } | { type: 'local'; fileName: string };

const EMPTY_RANGE: DateRange = { start: '', end: '' };

const App: React.FC = () => {
  const [page, setPage] = useState<Page>('dashboard');

  // --- Market Dashboard State ---
  const [source, setSource] = useState<DashboardSource | null>(null);
  const dashboard = useDataset(source?.type === 'remote' ? source.info.url : null);
  const [filters, setFilters] = useState<MarketFilterState>({
    locations: [],
    dateRange: EMPTY_RANGE,
    dispatchTypes: [...DISPATCH_TYPES],
    priceType: 'LMP',
    includeAverage: true,
  });

  // --- Statistics State ---
  const statistics = useDataset(page === 'statistics' ? STATISTICS_DATASET.url : null);
  const [statsRange, setStatsRange] = useState<DateRange>(EMPTY_RANGE);
  const [statsRangeFor, setStatsRangeFor] = useState<Dataset | null>(null);
  const [selection, setSelection] = useState<StatisticsKey>({ direction: 'low', metric: STATISTICS_METRICS[0] });

  const dashboardKind = dashboard.dataset
    ? source?.type === 'remote' ? source.info.kind : inferDatasetKind(dashboard.dataset.columns)
    : 'energy';
  const dashboardGranularity = dashboard.dataset?.hasIntervals ? 'interval' : 'hourly';

  // Reset the filters to the full span of every newly loaded dataset
  useEffect(() => {
    const dataset = dashboard.dataset;
    if (!dataset) return;
    const priceTypes = availablePriceTypes(dashboardKind, dataset.columns);
    setFilters(prev => ({
      ...prev,
      locations: [],
      dateRange: dateBounds(dataset.rows) ?? EMPTY_RANGE,
      priceType: priceTypes.includes(prev.priceType) ? prev.priceType : priceTypes[0],
    }));
  }, [dashboard.dataset]);

  // Reset the range while rendering so the page never sees a new dataset with the old range
  if (statistics.dataset !== statsRangeFor) {
    setStatsRangeFor(statistics.dataset);
    if (statistics.dataset) setStatsRange(dateBounds(statistics.dataset.rows) ?? EMPTY_RANGE);
  }

  const handleFileLoaded = (dataset: Dataset, fileName: string) => {
    setSource({ type: 'local', fileName });
    dashboard.setLocal(dataset);
  };

  const selectedName = source?.type === 'remote' ? source.info.name : null;

  const pageButton = (target: Page, label: string, icon: React.ReactNode) => (
    <button
      onClick={() => setPage(target)}
      className={`flex items-center px-3 py-2 rounded-md text-sm transition ${
        page === target ? 'bg-blue-50 text-blue-600 font-semibold' : 'text-slate-500 hover:text-slate-700'
      }`}
    >
      {icon}
      {label}
    </button>
  );

  return (
    <div className="min-h-screen bg-slate-50 pb-12 font-inter">
      {/* Header */}
      <header className="bg-white shadow-sm border-b border-slate-200 sticky top-0 z-20">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 h-16 flex items-center justify-between">
          <div className="flex items-center space-x-3">
            <div className="bg-blue-600 p-2 rounded-lg">
              <Activity className="w-6 h-6 text-white" />
            </div>
            <h1 className="text-xl font-bold text-slate-800">Grid Price Dashboard</h1>
          </div>

          <nav className="flex items-center space-x-2">
            {pageButton('dashboard', 'Market Dashboard', <LayoutDashboard className="w-4 h-4 mr-2" />)}
            {pageButton('statistics', 'Statistics', <BarChart3 className="w-4 h-4 mr-2" />)}
          </nav>
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8">
        {page === 'dashboard' && (
          <div className="space-y-6">
            <div>
              <h2 className="text-lg font-bold text-slate-800 flex items-center mb-3">
                <Database className="w-5 h-5 mr-2 text-blue-500" />
                Dataset
                {source?.type === 'local' && (
                  <span className="ml-2 text-xs font-normal text-slate-500">{source.fileName}</span>
                )}
              </h2>
              <DatasetSource
                selectedName={selectedName}
                loading={dashboard.loading}
                error={dashboard.error}
                onSelectRemote={info => setSource({ type: 'remote', info })}
                onFileLoaded={handleFileLoaded}
                onFileError={dashboard.setError}
              />
            </div>

            {dashboard.loading ? (
              <div className="flex items-center justify-center h-40 text-slate-500">
                <Loader2 className="w-6 h-6 mr-2 animate-spin text-blue-500" />
                Loading dataset...
              </div>
            ) : dashboard.dataset ? (
              <MarketDashboard
                dataset={dashboard.dataset}
                kind={dashboardKind}
                granularity={dashboardGranularity}
                filters={filters}
                setFilters={setFilters}
              />
            ) : null}
          </div>
        )}

        {page === 'statistics' && (
          <StatisticsPage
            dataset={statistics.dataset}
            loading={statistics.loading}
            error={statistics.error}
            dateRange={statsRange}
            setDateRange={setStatsRange}
            selection={selection}
            setSelection={setSelection}
          />
        )}

        <div className="text-center text-slate-400 mt-12 text-sm flex items-center justify-center">
          <Clock className="w-4 h-4 mr-1" />
          {UPDATE_NOTICE}
        </div>
      </main>
    </div>
  );
};

export default App;
