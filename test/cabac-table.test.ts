import { describe, it, expect } from 'vitest';
import {
  CABAC_RANGE_TAB_LPS,
  CABAC_STATE_COUNT,
  cabacStateProbability,
  findNearestCabacState,
} from '../src/model/cabac-table.js';

describe('CABAC LPS range table', () => {
  it('should have 64 rows of 4 entries', () => {
    expect(CABAC_RANGE_TAB_LPS.length).toBe(CABAC_STATE_COUNT);
    for (const row of CABAC_RANGE_TAB_LPS) {
      expect(row.length).toBe(4);
    }
  });

  it('should hold the standard first and last rows', () => {
    expect(CABAC_RANGE_TAB_LPS[0]).toEqual([128, 176, 208, 240]);
    expect(CABAC_RANGE_TAB_LPS[8]).toEqual([95, 116, 137, 158]);
    expect(CABAC_RANGE_TAB_LPS[63]).toEqual([2, 2, 2, 2]);
  });

  it('should be non-increasing down each column', () => {
    for (let col = 0; col < 4; col++) {
      for (let state = 1; state < CABAC_STATE_COUNT; state++) {
        expect(CABAC_RANGE_TAB_LPS[state][col]).toBeLessThanOrEqual(
          CABAC_RANGE_TAB_LPS[state - 1][col]
        );
      }
    }
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(CABAC_RANGE_TAB_LPS)).toBe(true);
    expect(Object.isFrozen(CABAC_RANGE_TAB_LPS[0])).toBe(true);
  });
});

describe('cabacStateProbability', () => {
  it('should divide column 0 by 256', () => {
    expect(cabacStateProbability(0)).toBe(0.5);
    expect(cabacStateProbability(12)).toBe(77 / 256);
    expect(cabacStateProbability(63)).toBe(2 / 256);
  });

  it('should reject states outside 0..63', () => {
    expect(() => cabacStateProbability(-1)).toThrow(RangeError);
    expect(() => cabacStateProbability(64)).toThrow(RangeError);
    expect(() => cabacStateProbability(1.5)).toThrow(RangeError);
  });
});

describe('findNearestCabacState', () => {
  it('should find the closest state', () => {
    expect(findNearestCabacState(0.5)).toBe(0);
    expect(findNearestCabacState(0.3)).toBe(12);
    expect(findNearestCabacState(0.2)).toBe(20);
    expect(findNearestCabacState(0.1)).toBe(33);
  });

  it('should clamp to the end states', () => {
    expect(findNearestCabacState(1)).toBe(0);
    expect(findNearestCabacState(0)).toBe(63);
  });

  it('should prefer the lower state on a tie', () => {
    // 0.25 * 256 = 64 sits halfway between 66 (state 15) and 62 (state 16)
    expect(findNearestCabacState(0.25)).toBe(15);
  });

  it('should reject probabilities outside [0, 1]', () => {
    expect(() => findNearestCabacState(-0.1)).toThrow(RangeError);
    expect(() => findNearestCabacState(1.1)).toThrow(RangeError);
    expect(() => findNearestCabacState(Number.NaN)).toThrow(RangeError);
  });
});
