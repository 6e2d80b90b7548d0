/**
 * quad-entropy
 *
 * Entropy coding for the 4-symbol alphabet {0, 1, 2, 3}: bit streams,
 * binarization, a static binary range coder and a static rANS coder.
 *
 * @example
 * ```typescript
 * import { ransEncode, ransDecode, binarizeSequence, arithEncodeBits } from 'quad-entropy';
 *
 * const symbols = [0, 0, 1, 0, 3, 0, 2, 0];
 *
 * // Direct 4-symbol coding
 * const stream = ransEncode(symbols);
 * console.log(ransDecode(stream)); // [0, 0, 1, 0, 3, 0, 2, 0]
 *
 * // Binarize, then binary range coding
 * const bits = binarizeSequence(symbols, 'efficient');
 * const coded = arithEncodeBits(bits);
 * ```
 */

// Stream-level coders
export { arithEncodeBits, arithDecodeBits, MAX_RANGE_CODER_BITS } from './range-coder.js';
export { ransEncode, ransDecode } from './rans-coder.js';

// Errors
export {
  EntropyCodingError,
  TruncatedStreamError,
  CorruptHeaderError,
  OutOfDataError,
} from './errors.js';

// Core primitives (for advanced usage)
export * from './core/index.js';

// Stream formats (for advanced usage)
export * from './format/index.js';

// Reference data and statistics
export * from './model/index.js';

// Comparison report
export {
  buildEntropyReport,
  formatEntropyReport,
  type EntropyReport,
  type BinarizationStats,
  type CabacFit,
  type RansStats,
  type ReportOptions,
  type ProgressInfo,
} from './report.js';
