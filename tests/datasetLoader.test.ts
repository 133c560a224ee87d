import { gzipSync } from 'zlib';
import {
  clearDatasetCache,
  FetchResponseLike,
  isGzip,
  loadDataset,
  normalizeDate,
  parseDataset,
  parseDatasetBuffer,
} from '../services/datasetLoader';
import { DatasetFormatError, DatasetLoadError } from '../services/errorUtils';
import { DATASET_CACHE_TTL_MS } from '../config';

const CSV = [
  'Date,Delivery Hour,Pricing Location,LMP_Day_Ahead,LMP_Real_Time',
  '2025-05-02,1,B,12.5,',
  '2025-05-01 00:00:00,2, A ,10,n/a',
  '',
].join('\n');

const copyBytes = (bytes: Uint8Array): ArrayBuffer => {
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

const toBuffer = (text: string): ArrayBuffer => copyBytes(new TextEncoder().encode(text));

const gzipped = (text: string): ArrayBuffer => copyBytes(gzipSync(text));

const bufferResponse = (buffer: ArrayBuffer): FetchResponseLike => ({
  ok: true,
  status: 200,
  statusText: 'OK',
  arrayBuffer: () => Promise.resolve(buffer),
});

const okResponse = (text: string): FetchResponseLike => bufferResponse(toBuffer(text));

describe('normalizeDate', () => {
  test('cuts ISO values to their date', () => {
    expect(normalizeDate('2025-05-01')).toBe('2025-05-01');
    expect(normalizeDate(' 2025-05-01T13:00:00 ')).toBe('2025-05-01');
  });

  test('reads other formats in local time', () => {
    expect(normalizeDate('05/03/2025')).toBe('2025-05-03');
  });

  test('returns null for unreadable values', () => {
    expect(normalizeDate('')).toBeNull();
    expect(normalizeDate(undefined)).toBeNull();
    expect(normalizeDate('not a date')).toBeNull();
  });
});

describe('parseDataset', () => {
  test('splits id columns from numeric price columns', () => {
    const dataset = parseDataset(CSV);
    expect(dataset.columns).toEqual(['LMP_Day_Ahead', 'LMP_Real_Time']);
    expect(dataset.hasIntervals).toBe(false);
  });

  test('turns empty and non-numeric cells into null and sorts by date', () => {
    const dataset = parseDataset(CSV);
    expect(dataset.rows).toEqual([
      { date: '2025-05-01', deliveryHour: 2, location: 'A', values: { LMP_Day_Ahead: 10, LMP_Real_Time: null } },
      { date: '2025-05-02', deliveryHour: 1, location: 'B', values: { LMP_Day_Ahead: 12.5, LMP_Real_Time: null } },
    ]);
  });

  test('keeps the interval of 5-min data', () => {
    const dataset = parseDataset('Date,Delivery Hour,Interval,Pricing Location,LMP_Real_Time\n2025-05-01,1,3,A,20\n');
    expect(dataset.hasIntervals).toBe(true);
    expect(dataset.columns).toEqual(['LMP_Real_Time']);
    expect(dataset.rows[0].interval).toBe(3);
  });

  test('drops rows without a readable hour', () => {
    const dataset = parseDataset('Date,Delivery Hour,Pricing Location,x\n2025-05-01,,A,1\n2025-05-01,4,A,2\n');
    expect(dataset.rows.map(r => r.deliveryHour)).toEqual([4]);
  });

  test('rejects a file without the id columns', () => {
    expect(() => parseDataset('Date,Pricing Location,x\n2025-05-01,A,1\n')).toThrow(DatasetFormatError);
    expect(() => parseDataset('Date,Pricing Location,x\n2025-05-01,A,1\n')).toThrow('Missing column "Delivery Hour" in dataset');
  });
});

describe('isGzip', () => {
  test('recognizes the gzip magic bytes', () => {
    expect(isGzip(new Uint8Array([0x1f, 0x8b, 0x08]))).toBe(true);
    expect(isGzip(new Uint8Array([0x44, 0x61]))).toBe(false);
    expect(isGzip(new Uint8Array([0x1f]))).toBe(false);
  });

  test('plain buffers are parsed as text', async () => {
    const dataset = await parseDatasetBuffer(toBuffer(CSV));
    expect(dataset.rows).toHaveLength(2);
  });

  test('gzip buffers are decompressed before parsing', async () => {
    const dataset = await parseDatasetBuffer(gzipped('Date,Delivery Hour,Pricing Location,LMP_Day_Ahead\n2025-05-01,1,A,10\n'));
    expect(dataset.rows).toEqual([
      { date: '2025-05-01', deliveryHour: 1, location: 'A', values: { LMP_Day_Ahead: 10 } },
    ]);
  });
});

describe('loadDataset', () => {
  const DATA_URL = 'https://example.test/prices.csv';

  beforeEach(() => {
    clearDatasetCache();
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('downloads and parses the dataset', async () => {
    const fetcher = jest.fn((_url: string) => Promise.resolve(okResponse(CSV)));
    const dataset = await loadDataset(DATA_URL, { fetcher, now: 0 });
    expect(fetcher).toHaveBeenCalledWith(DATA_URL);
    expect(dataset.rows.map(r => r.location)).toEqual(['A', 'B']);
  });

  test('downloads a gzip-compressed dataset', async () => {
    const fetcher = jest.fn((_url: string) => Promise.resolve(bufferResponse(gzipped(CSV))));
    const dataset = await loadDataset(`${DATA_URL}.gz`, { fetcher, now: 0 });
    expect(dataset.columns).toEqual(['LMP_Day_Ahead', 'LMP_Real_Time']);
    expect(dataset.rows.map(r => [r.location, r.values.LMP_Day_Ahead])).toEqual([['A', 10], ['B', 12.5]]);
  });

  test('reuses the cached copy until the TTL runs out', async () => {
    const fetcher = jest.fn((_url: string) => Promise.resolve(okResponse(CSV)));
    const first = await loadDataset(DATA_URL, { fetcher, now: 1000 });
    const second = await loadDataset(DATA_URL, { fetcher, now: 1000 + DATASET_CACHE_TTL_MS - 1 });
    expect(second).toBe(first);
    expect(fetcher).toHaveBeenCalledTimes(1);

    await loadDataset(DATA_URL, { fetcher, now: 1000 + DATASET_CACHE_TTL_MS });
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  test('raises a load error on an HTTP failure', async () => {
    const fetcher = jest.fn((_url: string): Promise<FetchResponseLike> => Promise.resolve({
      ok: false,
      status: 404,
      statusText: 'Not Found',
      arrayBuffer: () => Promise.resolve(new ArrayBuffer(0)),
    }));
    const load = loadDataset(DATA_URL, { fetcher, now: 0 });
    await expect(load).rejects.toBeInstanceOf(DatasetLoadError);
    await expect(load).rejects.toThrow(`Failed to download ${DATA_URL}: HTTP 404 Not Found`);
  });

  test('raises a load error when the host cannot be reached', async () => {
    const fetcher = jest.fn((_url: string): Promise<FetchResponseLike> => Promise.reject(new Error('offline')));
    await expect(loadDataset(DATA_URL, { fetcher, now: 0 })).rejects.toThrow(`Could not reach ${DATA_URL}: offline`);
  });

  test('does not cache failures', async () => {
    const fetcher = jest
      .fn((_url: string): Promise<FetchResponseLike> => Promise.resolve(okResponse(CSV)))
      .mockImplementationOnce(() => Promise.reject(new Error('offline')));
    await expect(loadDataset(DATA_URL, { fetcher, now: 0 })).rejects.toThrow(DatasetLoadError);
    const dataset = await loadDataset(DATA_URL, { fetcher, now: 0 });
    expect(dataset.rows).toHaveLength(2);
  });
});
