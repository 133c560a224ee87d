import { ColorScaleName, RankingBar, RankingView, StatisticsBundle, StatisticsKey } from '../types';
import { getTopTable } from './statistics';
import { clamp01 } from './mathUtils';

type Rgb = [number, number, number];

// Light-to-dark endpoints of the sequential scales
export const COLOR_SCALES: Record<ColorScaleName, { light: Rgb; dark: Rgb }> = {
  Blues: { light: [198, 219, 239], dark: [8, 48, 107] },
  Reds: { light: [252, 187, 161], dark: [103, 0, 13] },
};

export const scaleFor = (key: StatisticsKey): ColorScaleName => (key.direction === 'low' ? 'Blues' : 'Reds');

export const interpolateColor = (scale: ColorScaleName, t: number): string => {
  const { light, dark } = COLOR_SCALES[scale];
  const x = clamp01(t);
  const channel = (i: number) => Math.round(light[i] + (dark[i] - light[i]) * x);
  return `rgb(${channel(0)}, ${channel(1)}, ${channel(2)})`;
};

/** Normalize to [0, 1] over min..max; a flat list maps to 1. */
export const normalize = (values: number[]): number[] => {
  if (values.length === 0) return [];
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (max === min) return values.map(() => 1);
  return values.map(v => (v - min) / (max - min));
};

/**
 * Display model for the ranking chart.
 *
 * Bars are sorted by value (ascending for low, descending for high) and the
 * first bar is drawn on top. Colors follow the values, reversed in low mode,
 * so the most extreme location is the darkest bar in both modes.
 */
export function buildRankingView(bundle: StatisticsBundle, key: StatisticsKey): RankingView {
  const table = getTopTable(bundle, key);
  const sign = key.direction === 'low' ? 1 : -1;
  const sorted = [...table].sort((a, b) => sign * (a.value - b.value));

  const values = sorted.map(r => r.value);
  const colorValues = key.direction === 'low' ? [...values].reverse() : values;
  const intensities = normalize(colorValues);
  const scale = scaleFor(key);

  const bars: RankingBar[] = sorted.map((r, i) => ({
    location: r.location,
    value: r.value,
    label: r.value.toFixed(2),
    intensity: intensities[i],
    fill: interpolateColor(scale, intensities[i]),
  }));

  return { key, scale, bars };
}
