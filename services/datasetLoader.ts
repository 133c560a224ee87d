import Papa from 'papaparse';
import { Dataset, PriceRow } from '../types';
import { DATASET_CACHE_TTL_MS } from '../config';
import { DatasetFormatError, DatasetLoadError, errorMessage } from './errorUtils';

export const DATE_COLUMN = 'Date';
export const HOUR_COLUMN = 'Delivery Hour';
export const LOCATION_COLUMN = 'Pricing Location';
export const INTERVAL_COLUMN = 'Interval';

const REQUIRED_COLUMNS = [DATE_COLUMN, HOUR_COLUMN, LOCATION_COLUMN];
const ID_COLUMNS = new Set([...REQUIRED_COLUMNS, INTERVAL_COLUMN]);

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type Fetcher = (url: string) => Promise<FetchResponseLike>;

export interface LoadOptions {
  fetcher?: Fetcher;
  now?: number; // for testability; defaults to Date.now()
  ttlMs?: number;
}

interface CacheEntry {
  loadedAt: number;
  dataset: Dataset;
}

const cache = new Map<string, CacheEntry>();

const defaultFetcher: Fetcher = (url) => fetch(url);

const toNumber = (raw: string | undefined): number | null => {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const n = Number(trimmed);
  return Number.isNaN(n) ? null : n;
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Normalize a date cell to YYYY-MM-DD.
 * ISO strings (with or without a time part) are cut to their date; anything
 * else goes through Date.parse and is read in local time.
 */
export const normalizeDate = (raw: string | undefined): string | null => {
  if (!raw) return null;
  const trimmed = raw.trim();
  const iso = ISO_DATE.exec(trimmed);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;

  const timestamp = Date.parse(trimmed);
  if (Number.isNaN(timestamp)) return null;
  const d = new Date(timestamp);
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, '0')}-${String(d.getDate()).padStart(2, '0')}`;
};

export const isGzip = (bytes: Uint8Array): boolean =>
  bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;

/**
 * Decode a downloaded body to text, gunzipping it first when it starts with
 * the gzip magic bytes (servers may already have removed the encoding).
 */
export async function decodeBody(buffer: ArrayBuffer): Promise<string> {
  const bytes = new Uint8Array(buffer);
  if (!isGzip(bytes)) {
    return new TextDecoder().decode(bytes);
  }
  const stream = new Blob([buffer]).stream().pipeThrough(new DecompressionStream('gzip'));
  return new Response(stream).text();
}

/**
 * Parse a price CSV into a Dataset.
 * - `Date`, `Delivery Hour` and `Pricing Location` are required
 * - `Interval` is kept when present (5-min datasets)
 * - every other column is numeric; empty or non-numeric cells become null
 * - rows without a readable date or hour are dropped
 * - rows are returned sorted by date (stable, file order within a date)
 */
export function parseDataset(csvText: string): Dataset {
  const result = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  if (result.errors.length > 0) {
    console.warn(`CSV parser reported ${result.errors.length} malformed rows`, result.errors.slice(0, 5));
  }

  const headers = result.meta.fields ?? [];
  for (const col of REQUIRED_COLUMNS) {
    if (!headers.includes(col)) {
      throw new DatasetFormatError(`Missing column "${col}" in dataset`);
    }
  }

  const hasIntervals = headers.includes(INTERVAL_COLUMN);
  const columns = headers.filter((h) => !ID_COLUMNS.has(h));
  const rows: PriceRow[] = [];

  for (const record of result.data) {
    const date = normalizeDate(record[DATE_COLUMN]);
    const deliveryHour = toNumber(record[HOUR_COLUMN]);
    if (date === null || deliveryHour === null) continue;

    const values: Record<string, number | null> = {};
    for (const col of columns) {
      values[col] = toNumber(record[col]);
    }

    const row: PriceRow = {
      date,
      deliveryHour,
      location: (record[LOCATION_COLUMN] ?? '').trim(),
      values,
    };
    if (hasIntervals) {
      const interval = toNumber(record[INTERVAL_COLUMN]);
      if (interval !== null) row.interval = interval;
    }
    rows.push(row);
  }

  rows.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  return { rows, columns, hasIntervals };
}

export async function parseDatasetBuffer(buffer: ArrayBuffer): Promise<Dataset> {
  return parseDataset(await decodeBody(buffer));
}

/**
 * Download and parse a dataset, reusing a cached copy younger than the TTL.
 */
export async function loadDataset(url: string, options: LoadOptions = {}): Promise<Dataset> {
  const { fetcher = defaultFetcher, now = Date.now(), ttlMs = DATASET_CACHE_TTL_MS } = options;

  const cached = cache.get(url);
  if (cached && now - cached.loadedAt < ttlMs) {
    console.info(`Serving ${url} from cache`);
    return cached.dataset;
  }

  let response: FetchResponseLike;
  try {
    response = await fetcher(url);
  } catch (err) {
    throw new DatasetLoadError(`Could not reach ${url}: ${errorMessage(err)}`);
  }
  if (!response.ok) {
    throw new DatasetLoadError(`Failed to download ${url}: HTTP ${response.status} ${response.statusText}`, response.status);
  }

  const dataset = await parseDatasetBuffer(await response.arrayBuffer());
  cache.set(url, { loadedAt: now, dataset });
  console.info(`Loaded ${dataset.rows.length} rows from ${url}`);
  return dataset;
}

export function clearDatasetCache(): void {
  cache.clear();
}
