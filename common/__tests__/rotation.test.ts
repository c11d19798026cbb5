import { positiveModulo, rotationPosition } from '../rotation';

describe('rotationPosition', () => {
  it('finds the third item 23 seconds into a 3 x 10s rotation', () => {
    expect(rotationPosition(23, 10, 3)).toEqual({ elapsed: 23, index: 2, remaining: 7 });
  });

  it('wraps around the cycle', () => {
    expect(rotationPosition(65, 10, 3)).toEqual({ elapsed: 5, index: 0, remaining: 5 });
  });

  it('maps negative offsets into the cycle', () => {
    expect(rotationPosition(-5, 10, 3)).toEqual({ elapsed: 25, index: 2, remaining: 5 });
  });

  it('gives a full item at an item boundary', () => {
    expect(rotationPosition(10, 10, 3)).toEqual({ elapsed: 10, index: 1, remaining: 10 });
  });

  it('is all zero for an empty catalog', () => {
    expect(rotationPosition(42, 10, 0)).toEqual({ elapsed: 0, index: 0, remaining: 0 });
  });

  it('keeps index and remaining in range', () => {
    for (let t = -30; t <= 60; t += 0.7) {
      const { index, remaining } = rotationPosition(t, 4, 5);
      expect(index).toBeGreaterThanOrEqual(0);
      expect(index).toBeLessThan(5);
      expect(remaining).toBeGreaterThan(0);
      expect(remaining).toBeLessThanOrEqual(4);
    }
  });
});

describe('positiveModulo', () => {
  it('stays non-negative', () => {
    expect(positiveModulo(-1, 30)).toBe(29);
    expect(positiveModulo(31, 30)).toBe(1);
  });
});
