/**
 * Empirical entropy measures used by the comparison report.
 */

import type { Bit } from '../core/bit-stream.js';
import { buildHistogram } from '../core/frequency-table.js';

/**
 * Count occurrences of each symbol (0..3).
 */
export function countSymbols(symbols: readonly number[]): number[] {
  return Array.from(buildHistogram(symbols));
}

/**
 * Shannon entropy of a histogram, in bits per symbol.
 * Zero counts contribute nothing; an empty histogram has entropy 0.
 */
export function symbolEntropy(counts: readonly number[]): number {
  const total = counts.reduce((acc, c) => acc + c, 0);
  if (total === 0) return 0;

  let entropy = 0;
  for (const count of counts) {
    if (count === 0) continue;
    const p = count / total;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

/**
 * Entropy of the 0/1 distribution of a bit sequence, in bits per bin.
 */
export function binaryEntropy(bits: readonly Bit[]): number {
  let ones = 0;
  for (const bit of bits) ones += bit;
  return symbolEntropy([bits.length - ones, ones]);
}

/**
 * Probability of the less frequent bit value; 0 for an empty sequence.
 */
export function lpsProbability(bits: readonly Bit[]): number {
  if (bits.length === 0) return 0;
  let ones = 0;
  for (const bit of bits) ones += bit;
  const p1 = ones / bits.length;
  return Math.min(p1, 1 - p1);
}
