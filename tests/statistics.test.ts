import { buildStatistics, getTopTable, locationAverages, sortAndExtractTop } from '../services/statistics';
import { StatisticsLookupError } from '../services/errorUtils';
import { STATISTICS_METRICS, TOP_N } from '../config';
import type { StatisticsBundle } from '../types';
import { row } from './helpers/rows';

describe('sortAndExtractTop', () => {
  const rows = [
    row('A', '2025-05-01', 1, { LMP_Day_Ahead: 10 }),
    row('B', '2025-05-01', 1, { LMP_Day_Ahead: 30 }),
    row('C', '2025-05-01', 1, { LMP_Day_Ahead: 20 }),
  ];

  test('low returns the smallest values in ascending order', () => {
    expect(sortAndExtractTop(rows, 'LMP_Day_Ahead', 2, 'low')).toEqual([
      { location: 'A', value: 10 },
      { location: 'C', value: 20 },
    ]);
  });

  test('high returns the largest values in descending order', () => {
    expect(sortAndExtractTop(rows, 'LMP_Day_Ahead', 2, 'high')).toEqual([
      { location: 'B', value: 30 },
      { location: 'C', value: 20 },
    ]);
  });

  test('returns every location when count exceeds them', () => {
    expect(sortAndExtractTop(rows, 'LMP_Day_Ahead', 10, 'low')).toHaveLength(3);
  });

  test('returns nothing for a non-positive count', () => {
    expect(sortAndExtractTop(rows, 'LMP_Day_Ahead', 0, 'high')).toEqual([]);
  });

  test('ranks locations by their average over all their rows', () => {
    const multi = [
      row('A', '2025-05-01', 1, { LMP_Day_Ahead: 10 }),
      row('B', '2025-05-01', 1, { LMP_Day_Ahead: 12 }),
      row('A', '2025-05-01', 2, { LMP_Day_Ahead: 20 }),
      row('B', '2025-05-01', 2, { LMP_Day_Ahead: 14 }),
    ];
    expect(sortAndExtractTop(multi, 'LMP_Day_Ahead', 2, 'low')).toEqual([
      { location: 'B', value: 13 },
      { location: 'A', value: 15 },
    ]);
  });

  test('keeps first-appearance order for ties', () => {
    const ties = [
      row('X', '2025-05-01', 1, { LMP_Day_Ahead: 5 }),
      row('Y', '2025-05-01', 1, { LMP_Day_Ahead: 5 }),
      row('Z', '2025-05-01', 1, { LMP_Day_Ahead: 5 }),
    ];
    expect(sortAndExtractTop(ties, 'LMP_Day_Ahead', 3, 'low').map(r => r.location)).toEqual(['X', 'Y', 'Z']);
    expect(sortAndExtractTop(ties, 'LMP_Day_Ahead', 3, 'high').map(r => r.location)).toEqual(['X', 'Y', 'Z']);
  });

  test('skips missing cells and locations without any value', () => {
    const sparse = [
      row('A', '2025-05-01', 1, { LMP_Day_Ahead: null }),
      row('A', '2025-05-01', 2, { LMP_Day_Ahead: 8 }),
      row('B', '2025-05-01', 1, { LMP_Day_Ahead: null }),
      row('C', '2025-05-01', 1, {}),
    ];
    expect(locationAverages(sparse, 'LMP_Day_Ahead')).toEqual([{ location: 'A', value: 8 }]);
    expect(sortAndExtractTop(sparse, 'LMP_Day_Ahead', 5, 'high')).toEqual([{ location: 'A', value: 8 }]);
  });
});

describe('buildStatistics', () => {
  const rows = [
    row('A', '2025-05-01', 1, {
      LMP_Day_Ahead: 10, LMP_Real_Time: 11, spread_4h_Day_Ahead: 1,
      spread_4h_Real_Time: 2, spread_Day_Ahead_vs_Real_Time: -1,
    }),
    row('B', '2025-05-01', 1, {
      LMP_Day_Ahead: 30, LMP_Real_Time: 25, spread_4h_Day_Ahead: 3,
      spread_4h_Real_Time: 4, spread_Day_Ahead_vs_Real_Time: 5,
    }),
    row('A', '2025-05-01', 2, {
      LMP_Day_Ahead: 20, LMP_Real_Time: 21, spread_4h_Day_Ahead: 1,
      spread_4h_Real_Time: 2, spread_Day_Ahead_vs_Real_Time: -1,
    }),
  ];

  test('builds ten direction/metric tables', () => {
    const bundle = buildStatistics(rows);
    expect(Object.keys(bundle.top.low).length + Object.keys(bundle.top.high).length).toBe(10);
    for (const metric of STATISTICS_METRICS) {
      expect(bundle.top.low[metric]).toHaveLength(2);
      expect(bundle.top.high[metric]).toHaveLength(2);
    }
  });

  test('fills the tables from the matching metric', () => {
    const bundle = buildStatistics(rows);
    expect(bundle.top.low.LMP_Day_Ahead).toEqual([
      { location: 'A', value: 15 },
      { location: 'B', value: 30 },
    ]);
    expect(bundle.top.high.spread_Day_Ahead_vs_Real_Time).toEqual([
      { location: 'B', value: 5 },
      { location: 'A', value: -1 },
    ]);
  });

  test('computes hour-of-day averages once', () => {
    const bundle = buildStatistics(rows);
    expect(bundle.hourlyAverages.map(h => h.hour)).toEqual([1, 2]);
    expect(bundle.hourlyAverages[0].values.LMP_Day_Ahead).toBe(20);
    expect(bundle.hourlyAverages[1].values.LMP_Real_Time).toBe(21);
  });

  test('caps every table at TOP_N by default', () => {
    const many = Array.from({ length: TOP_N + 3 }, (_, i) =>
      row(`L${i}`, '2025-05-01', 1, { LMP_Day_Ahead: i }),
    );
    const bundle = buildStatistics(many);
    expect(bundle.top.low.LMP_Day_Ahead).toHaveLength(TOP_N);
    expect(bundle.top.high.LMP_Day_Ahead[0]).toEqual({ location: `L${TOP_N + 2}`, value: TOP_N + 2 });
  });

  test('honours a custom top N', () => {
    const bundle = buildStatistics(rows, { topN: 1 });
    expect(bundle.top.high.LMP_Real_Time).toEqual([{ location: 'B', value: 25 }]);
  });
});

describe('getTopTable', () => {
  test('returns the table for the key', () => {
    const bundle = buildStatistics([row('A', '2025-05-01', 1, { LMP_Real_Time: 42 })]);
    expect(getTopTable(bundle, { direction: 'high', metric: 'LMP_Real_Time' })).toEqual([
      { location: 'A', value: 42 },
    ]);
  });

  test('throws when the bundle lacks the table', () => {
    const partial: StatisticsBundle = buildStatistics([]);
    Reflect.deleteProperty(partial.top.low, 'LMP_Day_Ahead');
    expect(() => getTopTable(partial, { direction: 'low', metric: 'LMP_Day_Ahead' })).toThrow(StatisticsLookupError);
  });
});
