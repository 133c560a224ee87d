import { DatasetInfo, DispatchType, StatisticsMetric } from './types';

const STORAGE_BASE = 'https://storage.googleapis.com/ieso_monitoring_market_data';

export const DATASETS: DatasetInfo[] = [
  {
    name: 'Energy - Hourly',
    url: `${STORAGE_BASE}/energy/processed/energy_historical_hourly.csv.gz`,
    kind: 'energy',
    granularity: 'hourly',
  },
  {
    name: 'Operating Reserve - Hourly',
    url: `${STORAGE_BASE}/operating_reserve/processed/OR_historical_hourly.csv.gz`,
    kind: 'operatingReserve',
    granularity: 'hourly',
  },
  {
    name: 'Energy - 5-min intervals',
    url: `${STORAGE_BASE}/energy/processed/energy_historical_interval.csv.gz`,
    kind: 'energy',
    granularity: 'interval',
  },
  {
    name: 'Operating Reserve - 5-min intervals',
    url: `${STORAGE_BASE}/operating_reserve/processed/OR_historical_interval.csv.gz`,
    kind: 'operatingReserve',
    granularity: 'interval',
  },
];

// The statistics page always ranks on the hourly energy dataset
export const STATISTICS_DATASET: DatasetInfo = DATASETS[0];

export const DISPATCH_TYPES: DispatchType[] = ['Day_Ahead', 'Pre_Dispatch', 'Real_Time'];

export const ENERGY_PRICE_TYPES = ['LMP', 'Energy Loss Price', 'Energy Congestion Price'];

export const OPERATING_RESERVE_PRICE_TYPES = [
  'LMP 10S',
  'Congestion Price 10S',
  'LMP 10N',
  'Congestion Price 10N',
  'LMP 30R',
  'Congestion Price 30R',
];

// Derived columns that are not split per dispatch type
export const SPREAD_COLUMNS = [
  'spread_4h_Real_Time',
  'spread_4h_Day_Ahead',
  'spread_4h_Pre_Dispatch',
  'spread_Day_Ahead_vs_Real_Time',
];

export const PRICE_LABELS: Record<string, string> = {
  'LMP': 'LMP',
  'Energy Loss Price': 'Energy Loss Price',
  'Energy Congestion Price': 'Energy Congestion Price',
  'spread_4h_Real_Time': 'Spread 4h – Real-Time',
  'spread_4h_Day_Ahead': 'Spread 4h – Day-Ahead',
  'spread_4h_Pre_Dispatch': 'Spread 4h – Pre-Dispatch',
  'spread_Day_Ahead_vs_Real_Time': 'Spread – DA vs RT',
};

export const STATISTICS_METRICS: StatisticsMetric[] = [
  'LMP_Day_Ahead',
  'LMP_Real_Time',
  'spread_4h_Day_Ahead',
  'spread_4h_Real_Time',
  'spread_Day_Ahead_vs_Real_Time',
];

/** Number of pricing locations kept in every top/bottom table. */
export const TOP_N = 5;

export const DATASET_CACHE_TTL_MS = 60 * 60 * 1000;

export const AVERAGE_LOCATION = 'Average';

export const UPDATE_NOTICE = 'This dashboard is updated every day at 10am Toronto time';

export const labelFor = (priceType: string): string => PRICE_LABELS[priceType] ?? priceType;
