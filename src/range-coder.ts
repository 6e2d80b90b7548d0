import type { Bit } from './core/bit-stream.js';
import {
  MAX_TOTAL_COUNT,
  RangeEncoder,
  type RangeEncoderOptions,
} from './core/range-encoder.js';
import { RangeDecoder } from './core/range-decoder.js';
import { readRangeStream, writeRangeStream } from './format/range-header.js';

/**
 * Longest bit sequence one stream can hold (clamped counts must fit the
 * coder's precision).
 */
export const MAX_RANGE_CODER_BITS = MAX_TOTAL_COUNT - 1;

/**
 * Compress a bit sequence with a binary range coder whose probability of 0
 * is estimated once from the whole input.
 *
 * The result is self-describing: 12-byte header (bit count, count0, count1)
 * followed by the coded payload. An empty input still produces the header
 * plus 4 flush bytes.
 */
export function arithEncodeBits(
  bits: readonly Bit[],
  options: Partial<RangeEncoderOptions> = {}
): Uint8Array {
  if (bits.length > MAX_RANGE_CODER_BITS) {
    throw new RangeError(
      `arithEncodeBits: ${bits.length} bits exceeds the limit of ${MAX_RANGE_CODER_BITS}`
    );
  }

  let count0 = 0;
  let count1 = 0;
  for (const bit of bits) {
    if (bit === 0) count0++;
    else count1++;
  }

  // Avoid zero-probability symbols
  const model = { count0: Math.max(count0, 1), count1: Math.max(count1, 1) };

  const encoder = new RangeEncoder(model, options);
  for (const bit of bits) {
    encoder.encodeBit(bit);
  }

  return writeRangeStream({ numBits: bits.length, ...model }, encoder.finish());
}

/**
 * Decompress a stream produced by arithEncodeBits.
 *
 * @throws TruncatedStreamError when shorter than header + 4 state bytes
 * @throws CorruptHeaderError on zero or oversized counts, or a bit count
 *         larger than the counts allow
 */
export function arithDecodeBits(stream: Uint8Array): Bit[] {
  const { header, payload } = readRangeStream(stream);
  const decoder = new RangeDecoder(payload, header);

  const bits: Bit[] = new Array(header.numBits);
  for (let i = 0; i < header.numBits; i++) {
    bits[i] = decoder.decodeBit();
  }
  return bits;
}
