import { describe, it, expect } from 'vitest';
import {
  binaryEntropy,
  countSymbols,
  lpsProbability,
  symbolEntropy,
} from '../src/model/entropy.js';

describe('Entropy statistics', () => {
  it('should count symbols', () => {
    expect(countSymbols([0, 3, 3, 1])).toEqual([1, 1, 0, 2]);
    expect(countSymbols([])).toEqual([0, 0, 0, 0]);
  });

  it('should reject symbols outside 0..3', () => {
    expect(() => countSymbols([0, 5])).toThrow(RangeError);
  });

  it('should compute symbol entropy', () => {
    expect(symbolEntropy([1, 1, 1, 1])).toBe(2);
    expect(symbolEntropy([2, 2, 0, 0])).toBe(1);
    expect(symbolEntropy([4, 0, 0, 0])).toBe(0);
    expect(symbolEntropy([0, 0, 0, 0])).toBe(0);
    expect(symbolEntropy([2, 1, 1, 0])).toBeCloseTo(1.5, 12);
  });

  it('should compute binary entropy', () => {
    expect(binaryEntropy([0, 1])).toBe(1);
    expect(binaryEntropy([1, 1, 1])).toBe(0);
    expect(binaryEntropy([])).toBe(0);
    expect(binaryEntropy([0, 0, 0, 1])).toBeCloseTo(0.8112781244591328, 12);
  });

  it('should compute the LPS probability', () => {
    expect(lpsProbability([1, 1, 1, 0])).toBe(0.25);
    expect(lpsProbability([0, 0, 1, 0, 0])).toBe(0.2);
    expect(lpsProbability([0, 1])).toBe(0.5);
    expect(lpsProbability([])).toBe(0);
  });
});
