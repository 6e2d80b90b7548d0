/**
 * Seeded categorical source over the alphabet {0, 1, 2, 3}.
 */

import { ALPHABET_SIZE } from '../core/binarizer.js';

export interface SourceConfig {
  /** Number of symbols to draw */
  length: number;

  /** Relative weight of each symbol (4 non-negative numbers, not all zero) */
  weights: readonly number[];

  /** PRNG seed; the same seed always yields the same sequence */
  seed: number;
}

/**
 * Default source: 1000 symbols skewed towards 0 (70/10/10/10).
 */
export const DEFAULT_SOURCE_CONFIG: Readonly<SourceConfig> = Object.freeze({
  length: 1000,
  weights: Object.freeze([70, 10, 10, 10]),
  seed: 12345,
});

/**
 * xorshift32 generator returning floats in [0, 1).
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    // xorshift32 never leaves the all-zero state
    this.state = seed >>> 0 || 1;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }
}

function validateConfig(config: SourceConfig): number {
  if (!Number.isInteger(config.length) || config.length < 0) {
    throw new RangeError(`generateSource: invalid length ${config.length}`);
  }
  if (config.weights.length !== ALPHABET_SIZE) {
    throw new RangeError(
      `generateSource: expected ${ALPHABET_SIZE} weights, got ${config.weights.length}`
    );
  }
  let total = 0;
  for (const w of config.weights) {
    if (!Number.isFinite(w) || w < 0) {
      throw new RangeError(`generateSource: invalid weight ${w}`);
    }
    total += w;
  }
  if (total === 0) {
    throw new RangeError('generateSource: weights must not all be zero');
  }
  return total;
}

/**
 * Draw `length` symbols from the categorical distribution given by `weights`.
 */
export function generateSource(config: Partial<SourceConfig> = {}): number[] {
  const resolved: SourceConfig = { ...DEFAULT_SOURCE_CONFIG, ...config };
  const total = validateConfig(resolved);

  // Upper bounds of each symbol's slice of [0, 1)
  const bounds: number[] = [];
  let acc = 0;
  for (const w of resolved.weights) {
    acc += w / total;
    bounds.push(acc);
  }

  // Rounding can leave the last bound just under 1
  const lastDrawable = resolved.weights.findLastIndex((w) => w > 0);

  const random = new SeededRandom(resolved.seed);
  const symbols: number[] = [];
  for (let i = 0; i < resolved.length; i++) {
    const r = random.next();
    let symbol = bounds.findIndex((bound, k) => r < bound && resolved.weights[k] > 0);
    if (symbol < 0) symbol = lastDrawable;
    symbols.push(symbol);
  }
  return symbols;
}
