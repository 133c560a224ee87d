export type DispatchType = 'Day_Ahead' | 'Pre_Dispatch' | 'Real_Time';

export type DatasetKind = 'energy' | 'operatingReserve';

export type Granularity = 'hourly' | 'interval';

export type Direction = 'low' | 'high';

export type StatisticsMetric =
  | 'LMP_Day_Ahead'
  | 'LMP_Real_Time'
  | 'spread_4h_Day_Ahead'
  | 'spread_4h_Real_Time'
  | 'spread_Day_Ahead_vs_Real_Time';

export interface DatasetInfo {
  name: string;
  url: string;
  kind: DatasetKind;
  granularity: Granularity;
}

export interface PriceRow {
  date: string; // YYYY-MM-DD
  deliveryHour: number; // 1..24, hour ending
  interval?: number; // 1..12, 5-min datasets only
  location: string;
  values: Record<string, number | null>; // null = missing cell
}

export interface Dataset {
  rows: PriceRow[];
  columns: string[]; // numeric value columns, in file order
  hasIntervals: boolean;
}

export interface DateRange {
  start: string;
  end: string;
}

export interface StatisticsKey {
  direction: Direction;
  metric: StatisticsMetric;
}

export interface RankedLocation {
  location: string;
  value: number;
}

export interface HourlyAverage {
  hour: number;
  values: Record<string, number | null>;
}

export interface StatisticsBundle {
  top: Record<Direction, Record<StatisticsMetric, RankedLocation[]>>;
  hourlyAverages: HourlyAverage[];
}

export type ColorScaleName = 'Blues' | 'Reds';

export interface RankingBar {
  location: string;
  value: number;
  label: string;
  intensity: number; // 0..1, 1 = darkest
  fill: string;
}

export interface RankingView {
  key: StatisticsKey;
  scale: ColorScaleName;
  bars: RankingBar[]; // display order, first bar on top
}

export interface MarketFilterState {
  locations: string[];
  dateRange: DateRange;
  dispatchTypes: DispatchType[];
  priceType: string;
  includeAverage: boolean;
}

export interface MeltedPoint {
  location: string;
  date: string;
  deliveryHour: number;
  interval?: number;
  market: string;
  price: number | null;
  timestamp: number;
}

export interface PriceSeries {
  name: string;
  market: string;
  location: string;
  points: MeltedPoint[];
}
