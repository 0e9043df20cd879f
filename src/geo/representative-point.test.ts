import { describe, it, expect } from 'vitest';
import { averagePoint, roundPosition } from './representative-point.js';

describe('averagePoint', () => {
  it('should average a closed ring without the closing vertex', () => {
    expect(averagePoint([[0, 0], [4, 0], [4, 2], [0, 2], [0, 0]])).toEqual([2, 1]);
  });

  it('should take the middle vertex of an odd-length line', () => {
    expect(averagePoint([[0, 0], [1, 1], [5, 5]])).toEqual([1, 1]);
  });

  it('should take the mean of the two middle vertices of an even-length line', () => {
    expect(averagePoint([[0, 0], [2, 2], [4, 4], [6, 6]])).toEqual([3, 3]);
  });

  it('should return the single vertex of a point list', () => {
    expect(averagePoint([[10.5, 60.1]])).toEqual([10.5, 60.1]);
  });

  it('should return null for no coordinates', () => {
    expect(averagePoint([])).toBeNull();
  });
});

describe('roundPosition', () => {
  it('should round to 7 decimals', () => {
    expect(roundPosition([10.123456789, 59.987654321])).toEqual([10.1234568, 59.9876543]);
  });
});
