import {
  Dataset,
  DatasetKind,
  DateRange,
  DispatchType,
  HourlyAverage,
  MeltedPoint,
  PriceRow,
  PriceSeries,
} from '../types';
import {
  AVERAGE_LOCATION,
  ENERGY_PRICE_TYPES,
  OPERATING_RESERVE_PRICE_TYPES,
  SPREAD_COLUMNS,
} from '../config';
import { meanOfPresent } from './mathUtils';

const MILLISECONDS_PER_HOUR = 60 * 60 * 1000;
const MILLISECONDS_PER_MINUTE = 60 * 1000;

export interface MarketFilterOptions {
  locations?: string[];
  startDate?: string;
  endDate?: string;
  dispatchTypes?: DispatchType[];
}

export interface FilteredTable {
  rows: PriceRow[];
  columns: string[];
}

/**
 * Keep rows whose date lies in [start, end], both ends inclusive.
 * Dates are YYYY-MM-DD so string comparison is date order.
 * An inverted range gives an empty list.
 */
export const filterByDateRange = (rows: PriceRow[], range: DateRange): PriceRow[] => {
  return rows.filter(r => r.date >= range.start && r.date <= range.end);
};

/** Columns belonging to the selected dispatch types (all columns when none are selected). */
export const columnsForDispatch = (columns: string[], dispatchTypes?: DispatchType[]): string[] => {
  if (!dispatchTypes || dispatchTypes.length === 0) return [...columns];
  return columns.filter(col => dispatchTypes.some(d => col.endsWith(d)));
};

export const applyFilters = (dataset: Dataset, options: MarketFilterOptions): FilteredTable => {
  let rows = dataset.rows;

  if (options.locations && options.locations.length > 0) {
    const wanted = new Set(options.locations);
    rows = rows.filter(r => wanted.has(r.location));
  }

  if (options.startDate && options.endDate) {
    rows = filterByDateRange(rows, { start: options.startDate, end: options.endDate });
  }

  return { rows, columns: columnsForDispatch(dataset.columns, options.dispatchTypes) };
};

const meanByColumn = (group: PriceRow[], columns: string[]): Record<string, number | null> => {
  const values: Record<string, number | null> = {};
  for (const col of columns) {
    values[col] = meanOfPresent(group.map(r => r.values[col]));
  }
  return values;
};

/**
 * Average every column per hour of day across all dates and locations.
 * One entry per hour present in the input, ascending.
 */
export const computeHourlyAverages = (rows: PriceRow[], columns: string[]): HourlyAverage[] => {
  const grouped = new Map<number, PriceRow[]>();
  for (const row of rows) {
    const group = grouped.get(row.deliveryHour);
    if (group) group.push(row);
    else grouped.set(row.deliveryHour, [row]);
  }

  return [...grouped.keys()]
    .sort((a, b) => a - b)
    .map(hour => ({ hour, values: meanByColumn(grouped.get(hour) ?? [], columns) }));
};

/**
 * Average across locations for each (date, hour[, interval]) slot.
 * The rows produced carry the synthetic "Average" location so they can be
 * plotted next to real pricing locations.
 */
export const averageAcrossLocations = (rows: PriceRow[], columns: string[]): PriceRow[] => {
  const grouped = new Map<string, PriceRow[]>();
  for (const row of rows) {
    const key = `${row.date}|${row.deliveryHour}|${row.interval ?? ''}`;
    const group = grouped.get(key);
    if (group) group.push(row);
    else grouped.set(key, [row]);
  }

  const averaged: PriceRow[] = [];
  grouped.forEach(group => {
    const first = group[0];
    const row: PriceRow = {
      date: first.date,
      deliveryHour: first.deliveryHour,
      location: AVERAGE_LOCATION,
      values: meanByColumn(group, columns),
    };
    if (first.interval !== undefined) row.interval = first.interval;
    averaged.push(row);
  });

  return averaged.sort(compareSlots);
};

export const compareSlots = (a: PriceRow, b: PriceRow): number => {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.deliveryHour !== b.deliveryHour) return a.deliveryHour - b.deliveryHour;
  return (a.interval ?? 0) - (b.interval ?? 0);
};

export const isSpreadColumn = (priceType: string): boolean => SPREAD_COLUMNS.includes(priceType);

export const priceColumnFor = (priceType: string, dispatch: DispatchType): string => {
  return isSpreadColumn(priceType) ? priceType : `${priceType}_${dispatch}`;
};

export const availablePriceTypes = (kind: DatasetKind, columns: string[]): string[] => {
  if (kind === 'operatingReserve') return [...OPERATING_RESERVE_PRICE_TYPES];
  const spreads = SPREAD_COLUMNS.filter(col => columns.includes(col));
  return [...ENERGY_PRICE_TYPES, ...spreads];
};

/**
 * Start of the delivery slot in UTC ms: date + hour hours, plus
 * (interval - 1) * 5 minutes for 5-min data.
 */
export const timestampOf = (date: string, deliveryHour: number, interval?: number): number => {
  const base = Date.parse(`${date}T00:00:00Z`) + deliveryHour * MILLISECONDS_PER_HOUR;
  return interval === undefined ? base : base + (interval - 1) * 5 * MILLISECONDS_PER_MINUTE;
};

/**
 * Reshape rows to one point per (row, market) for the chosen price type.
 * Market is the dispatch type, or the column itself for spread columns.
 * Returns [] when none of the candidate columns is available.
 */
export const meltRows = (
  rows: PriceRow[],
  columns: string[],
  priceType: string,
  dispatchTypes: DispatchType[],
): MeltedPoint[] => {
  const spread = isSpreadColumn(priceType);
  const valueColumns: Array<{ column: string; market: string }> = [];
  for (const dispatch of dispatchTypes) {
    const column = priceColumnFor(priceType, dispatch);
    if (!columns.includes(column) || valueColumns.some(v => v.column === column)) continue;
    valueColumns.push({ column, market: spread ? priceType : dispatch });
  }
  if (valueColumns.length === 0) return [];

  const points: MeltedPoint[] = [];
  for (const { column, market } of valueColumns) {
    for (const row of rows) {
      const point: MeltedPoint = {
        location: row.location,
        date: row.date,
        deliveryHour: row.deliveryHour,
        market,
        price: row.values[column] ?? null,
        timestamp: timestampOf(row.date, row.deliveryHour, row.interval),
      };
      if (row.interval !== undefined) point.interval = row.interval;
      points.push(point);
    }
  }
  return points;
};

/** One series per market and location, points in time order. */
export const buildSeries = (points: MeltedPoint[]): PriceSeries[] => {
  const series = new Map<string, PriceSeries>();
  for (const point of points) {
    const key = `${point.market}|${point.location}`;
    let entry = series.get(key);
    if (!entry) {
      entry = {
        name: `${point.location} – ${point.market}`,
        market: point.market,
        location: point.location,
        points: [],
      };
      series.set(key, entry);
    }
    entry.points.push(point);
  }

  const result = [...series.values()];
  result.forEach(s => s.points.sort((a, b) => a.timestamp - b.timestamp));
  return result;
};

export const distinctLocations = (rows: PriceRow[]): string[] => {
  return [...new Set(rows.map(r => r.location))];
};

export const dateBounds = (rows: PriceRow[]): DateRange | null => {
  if (rows.length === 0) return null;
  let start = rows[0].date;
  let end = rows[0].date;
  for (const r of rows) {
    if (r.date < start) start = r.date;
    if (r.date > end) end = r.date;
  }
  return { start, end };
};

// Local uploads carry no catalog entry; operating reserve files have class-suffixed price columns
export const inferDatasetKind = (columns: string[]): DatasetKind => {
  return columns.some(col => OPERATING_RESERVE_PRICE_TYPES.some(p => col.startsWith(p))) ? 'operatingReserve' : 'energy';
};
