import { clamp01, meanOfPresent, sum } from '../services/mathUtils';

describe('mathUtils', () => {
  test('sum', () => {
    expect(sum([1.5, 2.5])).toBe(4);
    expect(sum([])).toBe(0);
  });

  test('meanOfPresent skips missing cells', () => {
    expect(meanOfPresent([1, null, undefined, NaN, 3])).toBe(2);
    expect(meanOfPresent([null, undefined])).toBeNull();
    expect(meanOfPresent([])).toBeNull();
  });

  test('clamp01', () => {
    expect(clamp01(-0.5)).toBe(0);
    expect(clamp01(0.25)).toBe(0.25);
    expect(clamp01(3)).toBe(1);
  });
});
