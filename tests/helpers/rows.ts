import type { PriceRow } from '../../types';

/** Build a price row; values default to none. */
export function row(
  location: string,
  date: string,
  deliveryHour: number,
  values: Record<string, number | null> = {},
  interval?: number,
): PriceRow {
  const r: PriceRow = { location, date, deliveryHour, values };
  if (interval !== undefined) r.interval = interval;
  return r;
}
