/**
 * Static frequency model for the rANS coder.
 *
 * Raw symbol counts are scaled to integers summing to exactly TOTFREQ so the
 * cumulative table partitions [0, TOTFREQ) with no gaps or overlaps.
 */

import { ALPHABET_SIZE, assertSymbol } from './binarizer.js';

/**
 * log2 of the total frequency.
 */
export const SCALE_BITS = 12;

/**
 * Total frequency every normalized table sums to (4096).
 */
export const TOTFREQ = 1 << SCALE_BITS;

/**
 * Minimum frequency for any symbol (keeps absent symbols representable).
 */
export const MIN_FREQ = 1;

/**
 * Count occurrences of each symbol.
 *
 * @returns Uint32Array of length 4
 */
export function buildHistogram(symbols: readonly number[]): Uint32Array {
  const counts = new Uint32Array(ALPHABET_SIZE);
  for (const symbol of symbols) {
    assertSymbol(symbol, 'buildHistogram');
    counts[symbol]++;
  }
  return counts;
}

/**
 * Scale raw counts to frequencies summing to TOTFREQ.
 *
 * Each count becomes `floor(count * TOTFREQ / sum)`, with zero counts and
 * zero results forced to MIN_FREQ. A shortfall is added to symbol 0; an
 * excess is removed one unit at a time from the currently largest frequency
 * (lowest index on ties), never taking it below MIN_FREQ.
 *
 * @param counts - Raw histogram from buildHistogram (must not be all zero)
 */
export function normalizeFrequencies(counts: ArrayLike<number>): Uint16Array {
  let sum = 0;
  for (let k = 0; k < ALPHABET_SIZE; k++) {
    sum += counts[k];
  }
  if (sum === 0) {
    throw new RangeError('normalizeFrequencies: empty histogram');
  }

  const freq = new Uint32Array(ALPHABET_SIZE);
  for (let k = 0; k < ALPHABET_SIZE; k++) {
    if (counts[k] === 0) {
      freq[k] = MIN_FREQ;
    } else {
      freq[k] = Math.max(MIN_FREQ, Math.floor((counts[k] * TOTFREQ) / sum));
    }
  }

  let total = freq.reduce((acc, f) => acc + f, 0);

  if (total < TOTFREQ) {
    freq[0] += TOTFREQ - total;
  } else {
    while (total > TOTFREQ) {
      let maxIdx = 0;
      for (let k = 1; k < ALPHABET_SIZE; k++) {
        if (freq[k] > freq[maxIdx]) {
          maxIdx = k;
        }
      }
      if (freq[maxIdx] <= MIN_FREQ) break;
      freq[maxIdx]--;
      total--;
    }
  }

  return Uint16Array.from(freq);
}

/**
 * Describe what makes `freq` unusable as a coding table, or return undefined
 * when every entry is an integer >= MIN_FREQ and the total is TOTFREQ.
 */
export function checkFrequencyTable(freq: ArrayLike<number>): string | undefined {
  if (freq.length !== ALPHABET_SIZE) {
    return `expected ${ALPHABET_SIZE} frequencies, got ${freq.length}`;
  }
  let total = 0;
  for (let k = 0; k < ALPHABET_SIZE; k++) {
    if (!Number.isInteger(freq[k]) || freq[k] < MIN_FREQ) {
      return `frequency ${freq[k]} for symbol ${k} is below ${MIN_FREQ}`;
    }
    total += freq[k];
  }
  if (total !== TOTFREQ) {
    return `frequencies sum to ${total}, expected ${TOTFREQ}`;
  }
  return undefined;
}

/**
 * Prefix sums of the frequency table.
 *
 * @returns Uint32Array of length 5: cum[0] = 0, cum[k] = cum[k-1] + freq[k-1],
 *          cum[4] = total
 */
export function buildCumulativeTable(freq: ArrayLike<number>): Uint32Array {
  const cumulative = new Uint32Array(ALPHABET_SIZE + 1);
  for (let k = 1; k <= ALPHABET_SIZE; k++) {
    cumulative[k] = cumulative[k - 1] + freq[k - 1];
  }
  return cumulative;
}

/**
 * Find the symbol whose interval [cum[s], cum[s+1]) contains `target`.
 * A linear scan is enough for four symbols.
 *
 * @returns Symbol index, or -1 when target is past the table's total
 */
export function findSymbol(cumulative: Uint32Array, target: number): number {
  for (let s = 0; s < ALPHABET_SIZE; s++) {
    if (target >= cumulative[s] && target < cumulative[s + 1]) {
      return s;
    }
  }
  return -1;
}
