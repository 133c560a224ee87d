// Basic math helpers for column aggregation

export const sum = (arr: number[]): number => {
  return arr.reduce((a, b) => a + b, 0);
};

// Mean that skips missing cells; null when nothing is left
export const meanOfPresent = (arr: Array<number | null | undefined>): number | null => {
  const present = arr.filter((v): v is number => typeof v === 'number' && !Number.isNaN(v));
  if (present.length === 0) return null;
  return sum(present) / present.length;
};

export const clamp01 = (x: number): number => Math.min(1, Math.max(0, x));
