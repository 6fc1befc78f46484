import { DEFAULT_BACKOFF, computeBackoff } from '../../src/invocation/backoff';

describe('computeBackoff', () => {
  const noJitter = { ...DEFAULT_BACKOFF, jitter: false };

  test('doubles from the base delay and stops at the cap', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => computeBackoff(noJitter, attempt))).toEqual([1000, 2000, 4000, 8000, 8000]);
  });

  test('jitter spreads the delay by twenty percent either way', () => {
    expect(computeBackoff(DEFAULT_BACKOFF, 2, () => 0)).toBe(1600);
    expect(computeBackoff(DEFAULT_BACKOFF, 2, () => 1)).toBe(2400);
    expect(computeBackoff(DEFAULT_BACKOFF, 3, () => 0.5)).toBe(4000);
  });

  test('the cap applies after jitter', () => {
    expect(computeBackoff(DEFAULT_BACKOFF, 4, () => 1)).toBe(8000);
    expect(computeBackoff(DEFAULT_BACKOFF, 4, () => 0)).toBe(6400);
  });
});
