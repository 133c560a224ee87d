import React, { useMemo } from 'react';
import { Dataset, DatasetKind, Granularity, MarketFilterState } from '../types';
import { labelFor } from '../config';
import {
  applyFilters,
  availablePriceTypes,
  averageAcrossLocations,
  buildSeries,
  columnsForDispatch,
  compareSlots,
  distinctLocations,
  filterByDateRange,
  FilteredTable,
  meltRows,
} from '../services/filters';
import MarketFilters from './MarketFilters';
import PriceEvolutionChart from './PriceEvolutionChart';
import DataTable, { priceRowsToTable, priceTableColumns } from './DataTable';
import DataPreview from './DataPreview';

interface MarketDashboardProps {
  dataset: Dataset;
  kind: DatasetKind;
  granularity: Granularity;
  filters: MarketFilterState;
  setFilters: (f: MarketFilterState) => void;
}

const MarketDashboard: React.FC<MarketDashboardProps> = ({ dataset, kind, granularity, filters, setFilters }) => {
  const locations = useMemo(() => distinctLocations(dataset.rows), [dataset]);
  const priceTypes = useMemo(() => availablePriceTypes(kind, dataset.columns), [kind, dataset]);
  const { dateRange, dispatchTypes, priceType, includeAverage } = filters;

  // Location traces only once at least one location is picked
  const filtered = useMemo<FilteredTable>(() => {
    if (filters.locations.length === 0) return { rows: [], columns: [] };
    const table = applyFilters(dataset, {
      locations: filters.locations,
      startDate: dateRange.start,
      endDate: dateRange.end,
      dispatchTypes,
    });
    return { rows: [...table.rows].sort(compareSlots), columns: table.columns };
  }, [dataset, filters.locations, dateRange, dispatchTypes]);

  const averaged = useMemo<FilteredTable>(() => {
    if (!includeAverage) return { rows: [], columns: [] };
    const columns = columnsForDispatch(dataset.columns, dispatchTypes);
    return { rows: averageAcrossLocations(filterByDateRange(dataset.rows, dateRange), columns), columns };
  }, [dataset, includeAverage, dateRange, dispatchTypes]);

  const series = useMemo(
    () => buildSeries(meltRows(filtered.rows, filtered.columns, priceType, dispatchTypes)),
    [filtered, priceType, dispatchTypes],
  );
  const averageSeries = useMemo(
    () => buildSeries(meltRows(averaged.rows, averaged.columns, priceType, dispatchTypes)),
    [averaged, priceType, dispatchTypes],
  );

  const label = labelFor(priceType);
  const title = `${label} per ${granularity === 'interval' ? 'interval' : 'hour'} across markets`;

  return (
    <div className="animate-fade-in space-y-6">
      <MarketFilters locations={locations} priceTypes={priceTypes} filters={filters} setFilters={setFilters} />

      <h2 className="text-2xl font-bold text-slate-800">{label} Price Evolution</h2>
      <PriceEvolutionChart title={title} series={series} averageSeries={averageSeries} />

      {filtered.rows.length > 0 && (
        <DataTable
          title="Overview of filtered data"
          columns={priceTableColumns(filtered.rows, filtered.columns)}
          rows={priceRowsToTable(filtered.rows, filtered.columns)}
          fileName="filtered_data.csv"
        />
      )}

      {averaged.rows.length > 0 && (
        <DataTable
          title="Overview of the average"
          columns={priceTableColumns(averaged.rows, averaged.columns)}
          rows={priceRowsToTable(averaged.rows, averaged.columns)}
          fileName="average.csv"
        />
      )}

      <DataPreview rows={dataset.rows} columns={columnsForDispatch(dataset.columns, dispatchTypes)} dateRange={dateRange} />
    </div>
  );
};

export default MarketDashboard;
