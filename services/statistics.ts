import {
  Direction,
  PriceRow,
  RankedLocation,
  StatisticsBundle,
  StatisticsKey,
  StatisticsMetric,
} from '../types';
import { STATISTICS_METRICS, TOP_N } from '../config';
import { computeHourlyAverages } from './filters';
import { meanOfPresent } from './mathUtils';
import { StatisticsLookupError } from './errorUtils';

export const DIRECTIONS: Direction[] = ['low', 'high'];

export interface BuildStatisticsOptions {
  topN?: number;
  columns?: string[]; // columns for the hourly averages; defaults to the statistics metrics
}

/**
 * Mean of `metric` per pricing location, in order of first appearance.
 * Locations with no value for the metric are left out.
 */
export function locationAverages(rows: PriceRow[], metric: string): RankedLocation[] {
  const byLocation = new Map<string, Array<number | null>>();
  for (const row of rows) {
    const values = byLocation.get(row.location);
    const value = row.values[metric] ?? null;
    if (values) values.push(value);
    else byLocation.set(row.location, [value]);
  }

  const averages: RankedLocation[] = [];
  byLocation.forEach((values, location) => {
    const value = meanOfPresent(values);
    if (value !== null) averages.push({ location, value });
  });
  return averages;
}

/**
 * Top `count` pricing locations by their average `metric` over the rows.
 * - `low` sorts ascending, `high` descending
 * - the sort is stable: equal averages keep first-appearance order
 * - returns min(count, locations with a value) entries
 */
export function sortAndExtractTop(
  rows: PriceRow[],
  metric: string,
  count: number,
  direction: Direction,
): RankedLocation[] {
  if (count <= 0) return [];
  const sign = direction === 'low' ? 1 : -1;
  return locationAverages(rows, metric)
    .sort((a, b) => sign * (a.value - b.value))
    .slice(0, count);
}

/**
 * Build the top/bottom tables for every direction and metric, plus the
 * hour-of-day averages, from an already date-filtered set of rows.
 */
export function buildStatistics(rows: PriceRow[], options: BuildStatisticsOptions = {}): StatisticsBundle {
  const topN = options.topN ?? TOP_N;
  const columns = options.columns ?? STATISTICS_METRICS;

  const tablesFor = (direction: Direction): Record<StatisticsMetric, RankedLocation[]> => ({
    LMP_Day_Ahead: sortAndExtractTop(rows, 'LMP_Day_Ahead', topN, direction),
    LMP_Real_Time: sortAndExtractTop(rows, 'LMP_Real_Time', topN, direction),
    spread_4h_Day_Ahead: sortAndExtractTop(rows, 'spread_4h_Day_Ahead', topN, direction),
    spread_4h_Real_Time: sortAndExtractTop(rows, 'spread_4h_Real_Time', topN, direction),
    spread_Day_Ahead_vs_Real_Time: sortAndExtractTop(rows, 'spread_Day_Ahead_vs_Real_Time', topN, direction),
  });

  return {
    top: { low: tablesFor('low'), high: tablesFor('high') },
    hourlyAverages: computeHourlyAverages(rows, columns),
  };
}

/**
 * Table for a direction/metric pair.
 * @throws StatisticsLookupError when the bundle was built without it
 */
export function getTopTable(bundle: StatisticsBundle, key: StatisticsKey): RankedLocation[] {
  const byMetric: Partial<Record<StatisticsMetric, RankedLocation[]>> | undefined = bundle.top[key.direction];
  const table = byMetric?.[key.metric];
  if (table === undefined) {
    throw new StatisticsLookupError(`No statistics table for ${key.direction} ${key.metric}`);
  }
  return table;
}
